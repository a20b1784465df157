/**
 * Core types for Hitbox geometry.
 *
 * These are the JSON-serialisable forms. The live, mutable entity is
 * `HitboxClass` in src/classes/hitbox.ts.
 */

/**
 * A 2D coordinate pair [x, y] in world space (y up).
 */
export type Point2D = [number, number];

/**
 * Shape discriminant. Exactly one applies to any hitbox.
 */
export type ShapeKind = 'polygon' | 'rect' | 'circle';

/**
 * Persisted state of a single hitbox.
 *
 * `coords` are the raw coordinates. For circles they are `[center, [radius, 0]]`:
 * the radius is stored as the x-component of a synthetic second point.
 */
export interface HitboxData {
  kind: ShapeKind;
  coords: Point2D[];
  /** World position of the anchor point (vertex 0 at construction time). */
  translation: Point2D;
  /** Pivot offset in the hitbox's local frame. */
  anchor: Point2D;
  /** Rotation in radians, counter-clockwise. */
  angle: number;
}

/**
 * True for 4 corners of a non-empty, unrotated rect in BL, BR, TR, TL order.
 */
export function isAxisAlignedRect(coords: ReadonlyArray<Readonly<Point2D>>): boolean {
  if (coords.length !== 4) return false;
  const [bl, br, tr, tl] = coords;
  return (
    bl[1] === br[1] && br[0] === tr[0] && tr[1] === tl[1] && tl[0] === bl[0] && br[0] > bl[0] && tl[1] > bl[1]
  );
}

/**
 * Returns true if both components are finite numbers.
 */
export function isFinitePoint(p: Readonly<Point2D>): boolean {
  return Number.isFinite(p[0]) && Number.isFinite(p[1]);
}
