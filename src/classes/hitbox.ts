import { type Point2D, type ShapeKind, type HitboxData, isAxisAlignedRect, isFinitePoint } from '../types/shape.js';
import { type TransformStages, computeTransform } from '../algorithms/transform.js';
import { type CollisionResult, type SatOptions, type SatShape, NO_COLLISION, collide } from '../algorithms/sat.js';
import { circleCircleAxis, circleCollide, closestPointAxis } from '../algorithms/circle-adapter.js';
import { type Vector2 } from '../algorithms/vector2.js';
import * as errors from '../errors.js';

export interface HitboxOptions {
  /** Coordinates encode a circle as `[center, [radius, 0]]`. */
  circle?: boolean;
  /** Coordinates are the 4 corners of a rect (enables axis deduplication). */
  rect?: boolean;
}

export type RecomputeListener = (hitbox: HitboxClass) => void;

function copyPoints(points: ReadonlyArray<Readonly<Point2D>>): Point2D[] {
  return points.map(([x, y]) => [x, y]);
}

/**
 * A convex hitbox that collides using SAT (Separating Axis Theorem).
 *
 * Holds raw coordinates plus three independent transforms (translation, anchor,
 * rotation). Any change to one of them recomputes `finalCoords` in full; there
 * is no lazy state observable from outside.
 *
 * Use `fromRect`, `fromCircle` or `fromPolygon` rather than the constructor
 * where possible.
 */
export class HitboxClass {
  private _kind: ShapeKind;

  /** Vertices before rotation/anchor, translated so vertex 0 sits on `_translation`. */
  private _raw: Point2D[];
  private _translation: Point2D;
  private _anchor: Point2D;
  private _angle = 0;

  private _stages: TransformStages;
  private _final: Point2D[] = [];

  private readonly _listeners = new Set<RecomputeListener>();

  /**
   * @param coords Raw coordinates. Vertex 0 becomes the initial translation.
   * @param anchorPos Pivot offset in the local frame. Defaults to (0, 0).
   */
  constructor(
    coords: ReadonlyArray<Readonly<Point2D>>,
    anchorPos: Readonly<Point2D> = [0, 0],
    options: HitboxOptions = {},
  ) {
    const circle = options.circle ?? false;
    const rect = options.rect ?? false;

    if (circle && rect) {
      throw new errors.ConflictingShapeKindError();
    }
    if (!coords.every(isFinitePoint) || !isFinitePoint([anchorPos[0], anchorPos[1]])) {
      throw new errors.InvalidShapeError(errors.nonFiniteCoordinate());
    }

    if (circle) {
      if (coords.length !== 2) {
        throw new errors.InvalidShapeError(errors.circleEncoding(coords.length));
      }
      HitboxClass.validateRadius(coords[1][0]);
    } else {
      if (coords.length < 2) {
        throw new errors.InsufficientVerticesError(coords.length);
      }
      if (rect && coords.length !== 4) {
        throw new errors.InvalidShapeError(errors.rectVertexCount(coords.length));
      }
      // Axis deduplication under sacrificeMTV relies on opposite edges being parallel
      if (rect && !isAxisAlignedRect(coords)) {
        throw new errors.InvalidShapeError(errors.rectNotAxisAligned());
      }
    }

    this._kind = circle ? 'circle' : rect ? 'rect' : 'polygon';
    this._raw = copyPoints(coords);
    this._translation = [coords[0][0], coords[0][1]];
    this._anchor = [anchorPos[0], anchorPos[1]];
    this._stages = this.runPipeline();
  }

  // ------------------------------------------------------------------------
  // Factories
  // ------------------------------------------------------------------------

  /**
   * Corner coordinates of a rect: bottom-left, bottom-right, top-right, top-left.
   */
  static rectCoords(x: number, y: number, width: number, height: number): [Point2D, Point2D, Point2D, Point2D] {
    return [
      [x, y],
      [x + width, y],
      [x + width, y + height],
      [x, y + height],
    ];
  }

  static fromRect(x: number, y: number, width: number, height: number, anchorPos: Readonly<Point2D> = [0, 0]): HitboxClass {
    if (!(width > 0 && height > 0)) {
      throw new errors.InvalidShapeError(errors.nonPositiveSize(width, height));
    }
    return new HitboxClass(HitboxClass.rectCoords(x, y, width, height), anchorPos, { rect: true });
  }

  static fromCircle(center: Readonly<Point2D>, radius: number, anchorPos: Readonly<Point2D> = [0, 0]): HitboxClass {
    HitboxClass.validateRadius(radius);
    return new HitboxClass([[center[0], center[1]], [radius, 0]], anchorPos, { circle: true });
  }

  static fromPolygon(points: ReadonlyArray<Readonly<Point2D>>, anchorPos: Readonly<Point2D> = [0, 0]): HitboxClass {
    return new HitboxClass(points, anchorPos);
  }

  // ------------------------------------------------------------------------
  // Kind
  // ------------------------------------------------------------------------

  get kind(): ShapeKind {
    return this._kind;
  }

  get isCircle(): boolean {
    return this._kind === 'circle';
  }

  get isRect(): boolean {
    return this._kind === 'rect';
  }

  get isPolygon(): boolean {
    return this._kind === 'polygon';
  }

  // ------------------------------------------------------------------------
  // Transform state
  // ------------------------------------------------------------------------

  /** World-space vertices for the current state. Safe to hand to a renderer as-is. */
  get finalCoords(): Point2D[] {
    return copyPoints(this._final);
  }

  get rawCoords(): Point2D[] {
    return copyPoints(this._raw);
  }

  /** Intermediate pipeline arrays from the last recompute. */
  get stages(): TransformStages {
    return {
      local: copyPoints(this._stages.local),
      anchored: copyPoints(this._stages.anchored),
      rotationDelta: copyPoints(this._stages.rotationDelta),
      unanchored: copyPoints(this._stages.unanchored),
      final: copyPoints(this._stages.final),
    };
  }

  get translation(): Point2D {
    return [this._translation[0], this._translation[1]];
  }

  set translation(val: Readonly<Point2D>) {
    this.moveTo(val[0], val[1]);
  }

  get anchorPos(): Point2D {
    return [this._anchor[0], this._anchor[1]];
  }

  set anchorPos(val: Readonly<Point2D>) {
    this.assertFinite(val[0], val[1]);
    this._anchor = [val[0], val[1]];
    this.recompute();
  }

  get anchorX(): number {
    return this._anchor[0];
  }

  set anchorX(val: number) {
    this.anchorPos = [val, this._anchor[1]];
  }

  get anchorY(): number {
    return this._anchor[1];
  }

  set anchorY(val: number) {
    this.anchorPos = [this._anchor[0], val];
  }

  /** Rotation in radians, counter-clockwise about the anchor. */
  get angle(): number {
    return this._angle;
  }

  set angle(val: number) {
    this.assertFinite(val, 0);
    this._angle = val;
    this.recompute();
  }

  /**
   * Moves the hitbox so its anchor point sits at (x, y). Absolute, not relative.
   */
  moveTo(x: number, y: number): void {
    this.assertFinite(x, y);
    const dx = x - this._raw[0][0];
    const dy = y - this._raw[0][1];
    if (this._kind === 'circle') {
      this._raw[0] = [x, y];
    } else {
      this._raw = this._raw.map(([px, py]) => [px + dx, py + dy]);
    }
    this._translation = [x, y];
    this.recompute();
  }

  /**
   * Rebuilds `finalCoords` from raw coordinates, translation, anchor and angle,
   * then notifies listeners.
   */
  recompute(): void {
    this._stages = this.runPipeline();
    for (const listener of this._listeners) {
      listener(this);
    }
  }

  /**
   * Registers a callback run after every recompute.
   * @returns A function that removes the listener.
   */
  onRecompute(listener: RecomputeListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  // ------------------------------------------------------------------------
  // Rect-only
  // ------------------------------------------------------------------------

  /** Width of the unrotated rect. */
  get width(): number {
    this.requireKind('rect', 'width');
    return this._raw[1][0] - this._raw[0][0];
  }

  set width(val: number) {
    this.requireKind('rect', 'width');
    if (!(val > 0)) {
      throw new errors.InvalidShapeError(errors.nonPositiveSize(val, this.height));
    }
    // Bottom-left stays put
    this._raw[1] = [this._raw[0][0] + val, this._raw[1][1]];
    this._raw[2] = [this._raw[3][0] + val, this._raw[2][1]];
    this.recompute();
  }

  /** Height of the unrotated rect. */
  get height(): number {
    this.requireKind('rect', 'height');
    return this._raw[3][1] - this._raw[0][1];
  }

  set height(val: number) {
    this.requireKind('rect', 'height');
    if (!(val > 0)) {
      throw new errors.InvalidShapeError(errors.nonPositiveSize(this.width, val));
    }
    this._raw[2] = [this._raw[2][0], this._raw[1][1] + val];
    this._raw[3] = [this._raw[3][0], this._raw[0][1] + val];
    this.recompute();
  }

  /** Unrotated, unanchored corner. Same for the three below. */
  get bottomLeft(): Point2D {
    return this.corner(0, 'bottomLeft');
  }

  get bottomRight(): Point2D {
    return this.corner(1, 'bottomRight');
  }

  get topRight(): Point2D {
    return this.corner(2, 'topRight');
  }

  get topLeft(): Point2D {
    return this.corner(3, 'topLeft');
  }

  // ------------------------------------------------------------------------
  // Circle-only
  // ------------------------------------------------------------------------

  get radius(): number {
    this.requireKind('circle', 'radius');
    return this._raw[1][0];
  }

  set radius(val: number) {
    this.requireKind('circle', 'radius');
    HitboxClass.validateRadius(val);
    this._raw[1] = [val, 0];
    this.recompute();
  }

  /** World-space center after anchor and rotation. */
  get center(): Point2D {
    this.requireKind('circle', 'center');
    return [this._final[0][0], this._final[0][1]];
  }

  // ------------------------------------------------------------------------
  // Collision
  // ------------------------------------------------------------------------

  /** Read-only SAT view over the current final coordinates. */
  get satShape(): SatShape {
    return { kind: this._kind, coords: this._final };
  }

  /**
   * Runs SAT against another hitbox.
   *
   * The MTV moves `this` out of `other`; negate it to move `other` instead.
   * Circles get a one-off forced axis (closest point, or center to center)
   * derived for this call only.
   */
  collide(other: HitboxClass, sacrificeMTV: boolean = false): CollisionResult {
    return collide(this.satShape, other.satShape, { sacrificeMTV, ...this.forcedAxesAgainst(other) });
  }

  /**
   * Collides against each hitbox in list order and returns the first hit.
   * First-match, not deepest penetration.
   */
  collideAny(hitboxes: readonly HitboxClass[], sacrificeMTV: boolean = false): CollisionResult {
    for (const other of hitboxes) {
      const result = this.collide(other, sacrificeMTV);
      if (result.collides) return result;
    }
    return NO_COLLISION;
  }

  /**
   * Collides a circle hitbox with a polygon or rect hitbox. The MTV moves the circle.
   */
  static circleCollide(circle: HitboxClass, polygon: HitboxClass, sacrificeMTV: boolean = false): CollisionResult {
    if (!circle.isCircle) {
      throw new errors.UnsupportedOperationError('circleCollide as the circle', circle.kind);
    }
    if (polygon.isCircle) {
      throw new errors.UnsupportedOperationError('circleCollide as the polygon', polygon.kind);
    }
    return circleCollide(circle.satShape, polygon.satShape, sacrificeMTV);
  }

  // ------------------------------------------------------------------------
  // Serialization
  // ------------------------------------------------------------------------

  toJSON(): HitboxData {
    return {
      kind: this._kind,
      coords: copyPoints(this._raw),
      translation: this.translation,
      anchor: this.anchorPos,
      angle: this._angle,
    };
  }

  static fromJSON(data: HitboxData): HitboxClass {
    const hitbox = new HitboxClass(data.coords, data.anchor, {
      circle: data.kind === 'circle',
      rect: data.kind === 'rect',
    });
    hitbox.assertFinite(data.angle, 0);
    hitbox._angle = data.angle;
    hitbox.moveTo(data.translation[0], data.translation[1]);
    return hitbox;
  }

  /**
   * Replaces this hitbox's state in place (kind included) and recomputes.
   * Listeners stay attached, so renderers follow undo/redo.
   */
  restore(data: HitboxData): void {
    const source = HitboxClass.fromJSON(data);
    this._kind = source._kind;
    this._raw = source._raw;
    this._translation = source._translation;
    this._anchor = source._anchor;
    this._angle = source._angle;
    this.recompute();
  }

  // ------------------------------------------------------------------------
  // Private Helpers
  // ------------------------------------------------------------------------

  private runPipeline(): TransformStages {
    if (this._kind === 'circle') {
      // Only the center goes through the pipeline; [radius, 0] is not a vertex
      const stages = computeTransform(this._raw.slice(0, 1), this._translation, this._anchor, this._angle);
      this._final = [stages.final[0], [this._raw[1][0], 0]];
      return stages;
    }
    const stages = computeTransform(this._raw, this._translation, this._anchor, this._angle);
    this._final = stages.final;
    return stages;
  }

  private forcedAxesAgainst(other: HitboxClass): Pick<SatOptions, 'selfForcedAxes' | 'otherForcedAxes'> {
    const axes: { selfForcedAxes?: Vector2[]; otherForcedAxes?: Vector2[] } = {};
    if (this.isCircle && other.isCircle) {
      axes.selfForcedAxes = [circleCircleAxis(this._final[0], other._final[0])];
    } else if (this.isCircle) {
      axes.selfForcedAxes = [closestPointAxis(this._final[0], other._final)];
    } else if (other.isCircle) {
      axes.otherForcedAxes = [closestPointAxis(other._final[0], this._final)];
    }
    return axes;
  }

  private corner(index: number, name: string): Point2D {
    this.requireKind('rect', name);
    return [this._raw[index][0], this._raw[index][1]];
  }

  private requireKind(kind: ShapeKind, operation: string): void {
    if (this._kind !== kind) {
      throw new errors.UnsupportedOperationError(operation, this._kind);
    }
  }

  private assertFinite(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new errors.InvalidShapeError(errors.nonFiniteCoordinate());
    }
  }

  private static validateRadius(radius: number): void {
    if (!(radius > 0)) {
      throw new errors.InvalidShapeError(errors.nonPositiveRadius(radius));
    }
  }
}
