import type { Point2D } from '../types/shape.js';
import { type CollisionResult, type SatShape, collide } from './sat.js';
import { Vector2 } from './vector2.js';

/**
 * Lets circles take part in SAT.
 *
 * A circle has no edges, so on its own it offers no separating axis. Each query
 * synthesizes one: the direction between the circle's center and the closest
 * point on the other shape. Axes are computed fresh per call and never stored
 * on the circle, so a circle reused against several shapes in one tick never
 * sees a stale axis.
 */

/**
 * Projects `v` onto `onto`, clamping the scalar to [0, 1] so the result stays
 * on the segment rather than its infinite extension.
 */
function clampedProjection(v: Vector2, onto: Vector2): Vector2 {
  const lenSq = onto.lengthSquared();
  if (lenSq === 0) return Vector2.ZERO;
  const t = Math.min(1, Math.max(0, v.dot(onto) / lenSq));
  return onto.scale(t);
}

/**
 * Vector from `center` to the closest point on the polygon boundary.
 * Edges are scanned in order (p[i] → p[i+1], wrapping); the first strictly
 * shortest candidate wins.
 */
export function closestPointAxis(
  center: Readonly<Point2D>,
  polygon: ReadonlyArray<Readonly<Point2D>>,
): Vector2 {
  const c = Vector2.from(center);
  let best = Vector2.ZERO;
  let bestLength = Infinity;

  for (let i = 0; i < polygon.length; i++) {
    const p1 = Vector2.from(polygon[i]);
    const p2 = Vector2.from(polygon[(i + 1) % polygon.length]);
    const edge = p2.sub(p1);
    const toCenter = c.sub(p1);

    const diff = clampedProjection(toCenter, edge).sub(toCenter);
    const length = diff.length();
    if (length < bestLength) {
      best = diff;
      bestLength = length;
    }
  }

  return best;
}

/**
 * Axis between two circle centers. Coincident centers fall back to +x so the
 * pair still gets one axis to test.
 */
export function circleCircleAxis(a: Readonly<Point2D>, b: Readonly<Point2D>): Vector2 {
  const axis = Vector2.from(b).sub(Vector2.from(a));
  return axis.isZero() ? new Vector2(1, 0) : axis;
}

/**
 * SAT between a circle and a convex polygon, with a freshly derived forced
 * axis on the circle. The MTV moves the circle out of the polygon.
 */
export function circleCollide(circle: SatShape, polygon: SatShape, sacrificeMTV: boolean = false): CollisionResult {
  const axis = closestPointAxis(circle.coords[0], polygon.coords);
  return collide(circle, polygon, { sacrificeMTV, selfForcedAxes: [axis] });
}
