import type { Point2D } from '../types/shape.js';

/**
 * Integer rasterization of hitbox outlines and interiors.
 * All functions return pixel coordinates; bounds clipping is the caller's job.
 */

export interface Pixel {
  x: number;
  y: number;
}

/**
 * Pixels of a line segment, one per step along its longer axis.
 * Endpoints are rounded to integers first; both endpoints are included.
 */
export function traceLine(x0: number, y0: number, x1: number, y1: number): Pixel[] {
  const ax = Math.round(x0);
  const ay = Math.round(y0);
  const dx = Math.round(x1) - ax;
  const dy = Math.round(y1) - ay;
  const steps = Math.max(Math.abs(dx), Math.abs(dy));

  const pixels: Pixel[] = [{ x: ax, y: ay }];
  for (let i = 1; i <= steps; i++) {
    // Adding to an integer turns Math.round's -0 into 0
    pixels.push({ x: ax + Math.round((dx * i) / steps), y: ay + Math.round((dy * i) / steps) });
  }
  return pixels;
}

/**
 * Closed outline of a polygon: one traced segment per edge, wrapping.
 */
export function tracePolygon(vertices: ReadonlyArray<Readonly<Point2D>>): Pixel[] {
  const pixels: Pixel[] = [];
  for (let i = 0; i < vertices.length; i++) {
    const [x0, y0] = vertices[i];
    const [x1, y1] = vertices[(i + 1) % vertices.length];
    pixels.push(...traceLine(x0, y0, x1, y1));
  }
  return dedupe(pixels);
}

/**
 * Circle outline. Walks the octant from the top of the circle until x passes y,
 * rounding y = sqrt(r² - x²), and mirrors each point into the other seven.
 */
export function traceCircle(cx: number, cy: number, radius: number): Pixel[] {
  const xc = Math.round(cx);
  const yc = Math.round(cy);
  const r = Math.round(Math.abs(radius));

  const pixels: Pixel[] = [];
  for (let x = 0; ; x++) {
    const y = Math.round(Math.sqrt(Math.max(0, r * r - x * x)));
    if (x > y) break;
    for (const [px, py] of [[x, y], [y, x], [-x, y], [-y, x], [x, -y], [y, -x], [-x, -y], [-y, -x]]) {
      pixels.push({ x: xc + px, y: yc + py });
    }
  }

  return dedupe(pixels);
}

/**
 * Interior of a polygon: every pixel whose center lies inside it (even-odd
 * rule on horizontal scanlines through pixel centers).
 */
export function fillPolygon(vertices: ReadonlyArray<Readonly<Point2D>>): Pixel[] {
  if (vertices.length < 3) return [];

  let minY = Infinity;
  let maxY = -Infinity;
  for (const [, y] of vertices) {
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
  }

  const pixels: Pixel[] = [];
  for (let py = Math.ceil(minY - 0.5); py <= Math.floor(maxY - 0.5); py++) {
    const scanY = py + 0.5;
    const crossings: number[] = [];

    for (let i = 0; i < vertices.length; i++) {
      const [x0, y0] = vertices[i];
      const [x1, y1] = vertices[(i + 1) % vertices.length];
      // Half-open in y so shared vertices are counted once
      if ((y0 <= scanY && y1 > scanY) || (y1 <= scanY && y0 > scanY)) {
        crossings.push(x0 + ((scanY - y0) / (y1 - y0)) * (x1 - x0));
      }
    }

    crossings.sort((a, b) => a - b);
    for (let i = 0; i + 1 < crossings.length; i += 2) {
      for (let px = Math.ceil(crossings[i] - 0.5); px <= Math.floor(crossings[i + 1] - 0.5); px++) {
        pixels.push({ x: px, y: py });
      }
    }
  }

  return pixels;
}

/**
 * Interior of a circle: every pixel whose center lies within the radius.
 */
export function fillCircle(cx: number, cy: number, radius: number): Pixel[] {
  const pixels: Pixel[] = [];
  const rSq = radius * radius;
  for (let py = Math.ceil(cy - radius - 0.5); py <= Math.floor(cy + radius - 0.5); py++) {
    for (let px = Math.ceil(cx - radius - 0.5); px <= Math.floor(cx + radius - 0.5); px++) {
      const dx = px + 0.5 - cx;
      const dy = py + 0.5 - cy;
      if (dx * dx + dy * dy <= rSq) {
        pixels.push({ x: px, y: py });
      }
    }
  }
  return pixels;
}

function dedupe(pixels: Pixel[]): Pixel[] {
  const unique = new Map<string, Pixel>();
  for (const p of pixels) {
    unique.set(`${String(p.x)},${String(p.y)}`, p);
  }
  return Array.from(unique.values());
}
