import type { Point2D, ShapeKind } from '../types/shape.js';
import { Vector2 } from './vector2.js';

/**
 * Separating Axis Theorem collision test for convex shapes.
 * https://dyn4j.org/2010/01/sat
 */

/**
 * The read-only view of a shape that SAT operates on.
 * For circles `coords` is `[center, [radius, 0]]`.
 */
export interface SatShape {
  readonly kind: ShapeKind;
  readonly coords: ReadonlyArray<Readonly<Point2D>>;
}

/** A projection of a shape onto an axis, `[min, max]`. */
export type Interval = readonly [number, number];

export type CollisionResult =
  | { collides: false; mtv: null }
  | { collides: true; mtv: Vector2 };

export const NO_COLLISION: CollisionResult = Object.freeze({ collides: false, mtv: null });

export interface SatOptions {
  /**
   * Skip the redundant parallel edges of rects. The boolean result is exact;
   * the MTV is not guaranteed to be minimal.
   */
  sacrificeMTV?: boolean;
  /** Extra axes for the first shape, used for this call only. */
  selfForcedAxes?: readonly Vector2[];
  /** Extra axes for the second shape, used for this call only. */
  otherForcedAxes?: readonly Vector2[];
}

/**
 * Candidate separating axes for a shape: the unit normal of every edge
 * (`perp(p[i] - p[i+1])`, wrapping), followed by the normalized forced axes.
 *
 * Circles have no edges and contribute forced axes only. With `dedupeRectAxes`
 * a rect contributes its first two edges only, as opposite edges are parallel.
 * Zero-length axes (coincident vertices) are dropped: they cannot separate anything.
 */
export function getAxes(
  shape: SatShape,
  dedupeRectAxes: boolean,
  forcedAxes: readonly Vector2[] = [],
): Vector2[] {
  const axes: Vector2[] = [];

  if (shape.kind !== 'circle') {
    const n = shape.coords.length;
    const edgeCount = dedupeRectAxes && shape.kind === 'rect' ? Math.floor(n / 2) : n;
    for (let i = 0; i < edgeCount; i++) {
      const p1 = Vector2.from(shape.coords[i]);
      const p2 = Vector2.from(shape.coords[(i + 1) % n]);
      axes.push(p1.sub(p2).perpendicular().normalize());
    }
  }

  for (const axis of forcedAxes) {
    axes.push(axis.normalize());
  }

  return axes.filter((axis) => !axis.isZero());
}

/**
 * Projects a shape onto an axis and returns the covered interval.
 */
export function project(shape: SatShape, axis: Vector2): Interval {
  if (shape.kind === 'circle') {
    const center = axis.dot(Vector2.from(shape.coords[0]));
    const radius = shape.coords[1][0];
    return [center - radius, center + radius];
  }

  let min = axis.dot(Vector2.from(shape.coords[0]));
  let max = min;
  for (let i = 1; i < shape.coords.length; i++) {
    const p = axis.dot(Vector2.from(shape.coords[i]));
    if (p < min) min = p;
    if (p > max) max = p;
  }
  return [min, max];
}

/**
 * Whether two projections overlap.
 *
 * Half-open on the right: an endpoint landing exactly on the other interval's
 * max does not count, so intervals touching at a single point do not overlap.
 */
export function intersect(l1: Interval, l2: Interval): boolean {
  // Left of l1 inside l2
  if (l2[0] <= l1[0] && l1[0] < l2[1]) return true;
  // Right of l1 inside l2
  if (l2[0] < l1[1] && l1[1] <= l2[1]) return true;
  // l2 strictly inside l1
  if (l1[0] < l2[0] && l1[1] > l2[1]) return true;
  return false;
}

/**
 * Whether either interval strictly contains the other.
 */
export function contains(l1: Interval, l2: Interval): boolean {
  return (l1[0] < l2[0] && l1[1] > l2[1]) || (l2[0] < l1[0] && l2[1] > l1[1]);
}

/**
 * Signed penetration depth along the axis. Positive pushes the first shape
 * towards +axis, negative towards -axis. Assumes `intersect(l1, l2)`; returns 0 otherwise.
 */
export function overlapLength(l1: Interval, l2: Interval): number {
  if (l2[0] <= l1[0] && l1[0] < l2[1]) {
    return l2[1] - l1[0];
  }
  if (l2[0] < l1[1] && l1[1] <= l2[1]) {
    return -(l1[1] - l2[0]);
  }
  if (l1[0] < l2[0] && l1[1] > l2[1]) {
    // l2 inside l1: take whichever direction is shorter
    if (l1[1] - l2[0] < l2[1] - l1[0]) {
      return -(l1[1] - l2[0]);
    }
    return l2[1] - l1[0];
  }
  return 0;
}

/**
 * Full SAT test between two convex shapes.
 *
 * Axes are tested in order: all of `self`'s, then all of `other`'s. The first
 * separating axis ends the test. The MTV is the tested axis with the smallest
 * absolute overlap (first one wins ties), scaled by that signed overlap; adding
 * it to `self` moves `self` out of `other`.
 */
export function collide(self: SatShape, other: SatShape, options: SatOptions = {}): CollisionResult {
  const dedupe = options.sacrificeMTV ?? false;
  const axes = [
    ...getAxes(self, dedupe, options.selfForcedAxes),
    ...getAxes(other, dedupe, options.otherForcedAxes),
  ];

  if (axes.length === 0) {
    return NO_COLLISION;
  }

  let mtvLength = Infinity;
  let mtvAxis = Vector2.ZERO;

  for (const axis of axes) {
    const l1 = project(self, axis);
    const l2 = project(other, axis);

    if (!intersect(l1, l2)) {
      return NO_COLLISION;
    }

    const overlap = overlapLength(l1, l2);
    if (Math.abs(overlap) < Math.abs(mtvLength)) {
      mtvLength = overlap;
      mtvAxis = axis;
    }
  }

  return { collides: true, mtv: mtvAxis.scale(mtvLength) };
}

/**
 * Collides `self` against each shape in list order and returns the first hit.
 * First-match, not deepest penetration. The same options apply to every pair.
 */
export function collideAny(
  self: SatShape,
  others: readonly SatShape[],
  options: SatOptions = {},
): CollisionResult {
  for (const other of others) {
    const result = collide(self, other, options);
    if (result.collides) return result;
  }
  return NO_COLLISION;
}
