import type { Point2D } from '../types/shape.js';

/**
 * Immutable 2D vector. Every operation returns a new instance.
 */
export class Vector2 {
  static readonly ZERO = new Vector2(0, 0);

  constructor(
    readonly x: number,
    readonly y: number,
  ) {}

  static from(point: Readonly<Point2D>): Vector2 {
    return new Vector2(point[0], point[1]);
  }

  add(v: Vector2): Vector2 {
    return new Vector2(this.x + v.x, this.y + v.y);
  }

  sub(v: Vector2): Vector2 {
    return new Vector2(this.x - v.x, this.y - v.y);
  }

  scale(s: number): Vector2 {
    return new Vector2(this.x * s, this.y * s);
  }

  negate(): Vector2 {
    return new Vector2(-this.x, -this.y);
  }

  dot(v: Vector2): number {
    return this.x * v.x + this.y * v.y;
  }

  lengthSquared(): number {
    return this.x * this.x + this.y * this.y;
  }

  length(): number {
    return Math.sqrt(this.lengthSquared());
  }

  /**
   * Unit vector in the same direction. A zero vector normalizes to itself.
   */
  normalize(): Vector2 {
    const len = this.length();
    if (len === 0) return this;
    return new Vector2(this.x / len, this.y / len);
  }

  /** Counter-clockwise perpendicular, `(-y, x)`. */
  perpendicular(): Vector2 {
    return new Vector2(-this.y, this.x);
  }

  isZero(): boolean {
    return this.x === 0 && this.y === 0;
  }

  toPoint(): Point2D {
    return [this.x, this.y];
  }

  toJSON(): { x: number; y: number } {
    return { x: this.x, y: this.y };
  }
}
