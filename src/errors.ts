/**
 * Shared Error Factory for hitboxmcp domain errors.
 *
 * Every user-facing message lives here. Tool handlers return the structured MCP
 * error response directly:
 *   return errors.hitboxNotFound(name);
 *
 * The geometry core throws the typed `HitboxError` subclasses below, whose
 * messages are built from the same catalog.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The client reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// geometry
// ----------------------------------------------------------------------------

export function insufficientVertices(count: number): DomainErrorResponse {
    return domainError(`Hitbox needs at least 2 coordinates (${String(count)} passed).`);
}

export function conflictingShapeKind(): DomainErrorResponse {
    return domainError('Hitbox cannot be both a circle and a rectangle.');
}

export function nonPositiveRadius(radius: number): DomainErrorResponse {
    return domainError(`Circle radius must be positive (got ${String(radius)}).`);
}

export function nonPositiveSize(width: number, height: number): DomainErrorResponse {
    return domainError(`Rect width and height must be positive (got ${String(width)}×${String(height)}).`);
}

export function rectVertexCount(count: number): DomainErrorResponse {
    return domainError(`A rect hitbox has exactly 4 coordinates (${String(count)} passed).`);
}

export function rectNotAxisAligned(): DomainErrorResponse {
    return domainError('A rect hitbox needs axis-aligned corners in bottom-left, bottom-right, top-right, top-left order.');
}

export function circleEncoding(count: number): DomainErrorResponse {
    return domainError(`A circle hitbox is stored as [center, [radius, 0]] (${String(count)} coordinates passed).`);
}

export function nonFiniteCoordinate(): DomainErrorResponse {
    return domainError('Hitbox coordinates must be finite numbers.');
}

export function unsupportedForKind(operation: string, kind: string): DomainErrorResponse {
    return domainError(`${operation} is not supported for ${kind} hitboxes.`);
}

// ----------------------------------------------------------------------------
// scene
// ----------------------------------------------------------------------------

export function noSceneLoaded(): DomainErrorResponse {
    return domainError('No scene loaded. Call scene new or scene open first.');
}

export function sceneFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Scene file not found: ${path}`);
}

export function noScenePath(): DomainErrorResponse {
    return domainError('Scene has no file path yet. Provide "path" to save it.');
}

export function hitboxNotFound(name: string): DomainErrorResponse {
    return domainError(`Hitbox '${name}' does not exist in the scene.`);
}

export function hitboxAlreadyExists(name: string): DomainErrorResponse {
    return domainError(`Hitbox '${name}' already exists in the scene.`);
}

export function invalidColor(): DomainErrorResponse {
    return domainError('Invalid RGBA color. Expected [r, g, b, a] with each channel 0–255 or a color name.');
}

// ----------------------------------------------------------------------------
// render
// ----------------------------------------------------------------------------

export function emptyScene(): DomainErrorResponse {
    return domainError('Scene has no hitboxes to render.');
}

export function renderTooLarge(width: number, height: number, limit: number): DomainErrorResponse {
    return domainError(
        `Render would be ${String(width)}×${String(height)} pixels; the limit is ${String(limit)} pixels in total.`,
    );
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}

// ----------------------------------------------------------------------------
// Thrown errors
// ----------------------------------------------------------------------------

export type HitboxErrorKind =
    | 'InsufficientVertices'
    | 'ConflictingShapeKind'
    | 'InvalidShape'
    | 'UnsupportedOperation';

/**
 * Base class for precondition violations raised by the geometry core.
 * These are programmer errors: nothing inside the engine retries or recovers them.
 */
export abstract class HitboxError extends Error {
    abstract readonly kind: HitboxErrorKind;

    constructor(response: DomainErrorResponse) {
        super(response.content[0].text);
        this.name = new.target.name;
    }
}

export class InsufficientVerticesError extends HitboxError {
    readonly kind = 'InsufficientVertices';

    constructor(readonly count: number) {
        super(insufficientVertices(count));
    }
}

export class ConflictingShapeKindError extends HitboxError {
    readonly kind = 'ConflictingShapeKind';

    constructor() {
        super(conflictingShapeKind());
    }
}

export class InvalidShapeError extends HitboxError {
    readonly kind = 'InvalidShape';
}

export class UnsupportedOperationError extends HitboxError {
    readonly kind = 'UnsupportedOperation';

    constructor(operation: string, shapeKind: string) {
        super(unsupportedForKind(operation, shapeKind));
    }
}

/**
 * Extracts a printable message from anything a handler caught.
 */
export function messageOf(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
