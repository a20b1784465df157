import type { Point2D } from '../types/shape.js';

/**
 * Every intermediate stage of the hitbox transform pipeline.
 * Only `final` is consumed by collision and rendering; the rest are kept for
 * inspection and tests.
 */
export interface TransformStages {
  /** Raw coordinates with vertex 0 moved to the origin. */
  local: Point2D[];
  /** Local coordinates relative to the anchor (rotation pivot). */
  anchored: Point2D[];
  /** Per-vertex displacement produced by rotating the anchored coordinates. */
  rotationDelta: Point2D[];
  /** Local coordinates moved to the translation, with rotation applied. */
  unanchored: Point2D[];
  /** World-space vertices: unanchored minus the anchor. */
  final: Point2D[];
}

/**
 * Runs the transform pipeline: local → anchored → rotated → translated → final.
 *
 * The order is fixed and not associative. Net effect per vertex is
 * `translation + R(angle) · (local - anchor)`, i.e. the anchor point lands on
 * `translation` and the shape rotates about it.
 *
 * Pure: identical inputs give bit-identical output.
 */
export function computeTransform(
  raw: ReadonlyArray<Readonly<Point2D>>,
  translation: Readonly<Point2D>,
  anchor: Readonly<Point2D>,
  angle: number,
): TransformStages {
  if (raw.length === 0) {
    return { local: [], anchored: [], rotationDelta: [], unanchored: [], final: [] };
  }

  const [ox, oy] = raw[0];
  const [ax, ay] = anchor;
  const [tx, ty] = translation;
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);

  const local: Point2D[] = raw.map(([x, y]) => [x - ox, y - oy]);
  const anchored: Point2D[] = local.map(([x, y]) => [x - ax, y - ay]);
  const rotationDelta: Point2D[] = anchored.map(([x, y]) => [
    x * cos - y * sin - x,
    x * sin + y * cos - y,
  ]);
  const unanchored: Point2D[] = local.map(([x, y], i) => [
    x + tx + rotationDelta[i][0],
    y + ty + rotationDelta[i][1],
  ]);
  const final: Point2D[] = unanchored.map(([x, y]) => [x - ax, y - ay]);

  return { local, anchored, rotationDelta, unanchored, final };
}
