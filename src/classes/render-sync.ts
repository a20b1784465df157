import { type Point2D, type ShapeKind } from '../types/shape.js';
import { type Color } from '../types/color.js';
import { type HitboxClass } from './hitbox.js';
import { type SceneClass } from './scene.js';
import { RasterCanvas } from './canvas.js';
import { fillCircle, fillPolygon, traceCircle, tracePolygon } from '../algorithms/raster.js';
import * as errors from '../errors.js';

/**
 * Anything that can draw a hitbox from its final coordinates.
 *
 * `origin` is `coords[0]`, the vertex a renderer treats as its position. For
 * circles `coords` is `[center, [radius, 0]]`.
 */
export interface Renderable {
    setVertices(coords: Point2D[], origin: Point2D, kind: ShapeKind): void;
}

/**
 * Keeps a renderable in step with a hitbox.
 *
 * Holds the hitbox by reference and listens for recomputes; the hitbox knows
 * nothing about rendering. Pushes once on construction so the renderable is
 * never blank.
 */
export class RenderSync {
    private _unsubscribe: (() => void) | null;

    constructor(
        readonly hitbox: HitboxClass,
        readonly target: Renderable,
    ) {
        this._unsubscribe = hitbox.onRecompute(() => {
            this.sync();
        });
        this.sync();
    }

    get attached(): boolean {
        return this._unsubscribe !== null;
    }

    /** Pushes the hitbox's current final coordinates to the renderable. */
    sync(): void {
        const coords = this.hitbox.finalCoords;
        this.target.setVertices(coords, [coords[0][0], coords[0][1]], this.hitbox.kind);
    }

    /** Stops following the hitbox. Safe to call twice. */
    detach(): void {
        if (this._unsubscribe !== null) {
            this._unsubscribe();
            this._unsubscribe = null;
        }
    }
}

/**
 * A renderable that rasterizes the last pushed vertex list onto a RasterCanvas.
 */
export class RasterRenderable implements Renderable {
    private _coords: Point2D[] = [];
    private _kind: ShapeKind = 'polygon';

    constructor(
        public color: Color,
        public filled: boolean = false,
    ) {}

    get coords(): Point2D[] {
        return this._coords.map(([x, y]) => [x, y]);
    }

    setVertices(coords: Point2D[], _origin: Point2D, kind: ShapeKind): void {
        this._coords = coords.map(([x, y]) => [x, y]);
        this._kind = kind;
    }

    /**
     * Draws the outline in `color`; when `filled`, the interior first at half alpha.
     */
    drawInto(canvas: RasterCanvas): void {
        if (this._coords.length === 0) return;

        if (this.filled) {
            const fill: Color = [this.color[0], this.color[1], this.color[2], Math.floor(this.color[3] / 2)];
            for (const p of this.interior()) canvas.putPixel(p.x, p.y, fill);
        }
        for (const p of this.outline()) canvas.putPixel(p.x, p.y, this.color);
    }

    private outline() {
        if (this._kind === 'circle') {
            const [[cx, cy], [radius]] = this._coords;
            return traceCircle(cx, cy, radius);
        }
        return tracePolygon(this._coords);
    }

    private interior() {
        if (this._kind === 'circle') {
            const [[cx, cy], [radius]] = this._coords;
            return fillCircle(cx, cy, radius);
        }
        return fillPolygon(this._coords);
    }
}

/** Largest render, in pixels after upscaling, that renderScene will allocate. */
export const MAX_RENDER_PIXELS = 4096 * 4096;

export interface RenderSceneOptions {
    /** Canvas fill. Defaults to the scene's `background`, then transparent. */
    background?: Color;
    /** Fill every hitbox that collides with another at half alpha. */
    highlightCollisions?: boolean;
    /** Collision mode for highlighting. Defaults to the scene's. */
    sacrificeMTV?: boolean;
    /** Empty pixels kept around the scene bounds. */
    margin?: number;
    /** Integer upscale applied on export; counts toward MAX_RENDER_PIXELS. */
    scale?: number;
}

/**
 * Rasterizes every hitbox of a scene, in scene order, onto a canvas sized to
 * the scene bounds. Each hitbox is drawn through a RenderSync/RasterRenderable pair.
 *
 * Throws before allocating when the scaled canvas exceeds MAX_RENDER_PIXELS.
 */
export function renderScene(scene: SceneClass, options: RenderSceneOptions = {}): RasterCanvas {
    const bounds = scene.bounds();
    if (bounds === null) {
        throw new Error(errors.emptyScene().content[0].text);
    }

    const margin = options.margin ?? 2;
    const originX = Math.floor(bounds.minX) - margin;
    const originY = Math.floor(bounds.minY) - margin;
    const width = Math.ceil(bounds.maxX) + margin + 1 - originX;
    const height = Math.ceil(bounds.maxY) + margin + 1 - originY;
    const scale = options.scale ?? 1;
    if (width * scale * (height * scale) > MAX_RENDER_PIXELS) {
        throw new Error(errors.renderTooLarge(width * scale, height * scale, MAX_RENDER_PIXELS).content[0].text);
    }
    const canvas = new RasterCanvas(width, height, originX, originY, options.background ?? scene.defaults.background);

    const colliding = new Set<string>();
    if (options.highlightCollisions ?? false) {
        for (const pair of scene.collisions(options.sacrificeMTV ?? scene.sacrificeMTV)) {
            colliding.add(pair.a);
            colliding.add(pair.b);
        }
    }

    for (const { name, hitbox, color } of scene.entries()) {
        const renderable = new RasterRenderable(color, colliding.has(name));
        const sync = new RenderSync(hitbox, renderable);
        renderable.drawInto(canvas);
        sync.detach();
    }

    return canvas;
}
