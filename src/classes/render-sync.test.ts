import { describe, it, expect } from 'vitest';
import { type Renderable, RasterRenderable, RenderSync, renderScene } from './render-sync.js';
import { HitboxClass } from './hitbox.js';
import { SceneClass } from './scene.js';
import { RasterCanvas } from './canvas.js';
import { type Point2D, type ShapeKind } from '../types/shape.js';
import { type Color } from '../types/color.js';

const RED: Color = [255, 0, 0, 255];
const WHITE: Color = [255, 255, 255, 255];

class RecordingRenderable implements Renderable {
  calls: Array<{ coords: Point2D[]; origin: Point2D; kind: ShapeKind }> = [];

  setVertices(coords: Point2D[], origin: Point2D, kind: ShapeKind): void {
    this.calls.push({ coords, origin, kind });
  }
}

describe('RenderSync', () => {
  it('pushes the current vertices on construction', () => {
    const target = new RecordingRenderable();
    new RenderSync(HitboxClass.fromRect(0, 0, 2, 2), target);

    expect(target.calls).toEqual([
      {
        coords: [
          [0, 0],
          [2, 0],
          [2, 2],
          [0, 2],
        ],
        origin: [0, 0],
        kind: 'rect',
      },
    ]);
  });

  it('follows every recompute of the hitbox', () => {
    const hitbox = HitboxClass.fromRect(0, 0, 2, 2);
    const target = new RecordingRenderable();
    new RenderSync(hitbox, target);

    hitbox.moveTo(5, 5);
    expect(target.calls).toHaveLength(2);
    expect(target.calls[1].origin).toEqual([5, 5]);
  });

  it('stops following after detach', () => {
    const hitbox = HitboxClass.fromRect(0, 0, 2, 2);
    const target = new RecordingRenderable();
    const sync = new RenderSync(hitbox, target);

    sync.detach();
    sync.detach();
    hitbox.moveTo(5, 5);

    expect(sync.attached).toBe(false);
    expect(target.calls).toHaveLength(1);
  });
});

describe('RasterRenderable', () => {
  it('draws a polygon outline', () => {
    const renderable = new RasterRenderable(RED);
    new RenderSync(HitboxClass.fromRect(1, 1, 2, 2), renderable);
    const canvas = new RasterCanvas(5, 5);

    renderable.drawInto(canvas);

    expect(canvas.getPixel(1, 1)).toEqual(RED);
    expect(canvas.getPixel(3, 2)).toEqual(RED);
    expect(canvas.getPixel(2, 2)).toEqual([0, 0, 0, 0]);
  });

  it('fills the interior at half alpha when filled', () => {
    const renderable = new RasterRenderable(RED, true);
    new RenderSync(HitboxClass.fromRect(1, 1, 2, 2), renderable);
    const canvas = new RasterCanvas(5, 5);

    renderable.drawInto(canvas);

    expect(canvas.getPixel(2, 2)).toEqual([255, 0, 0, 127]);
    expect(canvas.getPixel(1, 1)).toEqual(RED);
  });

  it('draws a circle from its center and radius', () => {
    const renderable = new RasterRenderable(RED);
    new RenderSync(HitboxClass.fromCircle([5, 5], 1), renderable);
    const canvas = new RasterCanvas(10, 10);

    renderable.drawInto(canvas);

    expect(canvas.getPixel(6, 5)).toEqual(RED);
    expect(canvas.getPixel(5, 4)).toEqual(RED);
    expect(canvas.getPixel(5, 5)).toEqual([0, 0, 0, 0]);
  });

  it('draws nothing before the first push', () => {
    const canvas = new RasterCanvas(2, 2);
    new RasterRenderable(RED).drawInto(canvas);
    expect(canvas.data.every((v) => v === 0)).toBe(true);
  });
});

describe('renderScene', () => {
  it('sizes the canvas to the scene bounds plus a margin', () => {
    const scene = new SceneClass('test');
    scene.add('a', HitboxClass.fromRect(0, 0, 4, 4));

    const canvas = renderScene(scene);

    expect(canvas.width).toBe(9);
    expect(canvas.height).toBe(9);
    expect(canvas.originX).toBe(-2);
    expect(canvas.originY).toBe(-2);
    expect(canvas.getPixel(0, 0)).toEqual(WHITE);
  });

  it('uses the scene background unless overridden', () => {
    const scene = new SceneClass('test', { background: [0, 0, 0, 255] });
    scene.add('a', HitboxClass.fromRect(0, 0, 4, 4));

    expect(renderScene(scene).getPixel(-2, -2)).toEqual([0, 0, 0, 255]);
    expect(renderScene(scene, { background: [9, 9, 9, 9] }).getPixel(-2, -2)).toEqual([9, 9, 9, 9]);
  });

  it('fills colliding hitboxes when highlighting', () => {
    const scene = new SceneClass('test');
    scene.add('a', HitboxClass.fromRect(0, 0, 4, 4));
    scene.add('b', HitboxClass.fromRect(2, 2, 4, 4));

    expect(renderScene(scene).getPixel(1, 1)).toEqual([0, 0, 0, 0]);
    expect(renderScene(scene, { highlightCollisions: true }).getPixel(1, 1)).toEqual([255, 255, 255, 127]);
  });

  it('does not disturb listeners already on a hitbox', () => {
    const hitbox = HitboxClass.fromRect(0, 0, 4, 4);
    const scene = new SceneClass('test');
    scene.add('a', hitbox);
    const target = new RecordingRenderable();
    const sync = new RenderSync(hitbox, target);

    renderScene(scene);
    hitbox.moveTo(1, 1);

    expect(sync.attached).toBe(true);
    expect(target.calls).toHaveLength(2);
  });

  it('refuses a canvas over the pixel limit before allocating it', () => {
    const scene = new SceneClass('test');
    scene.add('origin', HitboxClass.fromRect(0, 0, 1, 1));
    scene.add('distant', HitboxClass.fromRect(1e6, 1e6, 1, 1));

    expect(() => renderScene(scene)).toThrow(
      'Render would be 1000006×1000006 pixels; the limit is 16777216 pixels in total.',
    );
  });

  it('counts the export scale toward the pixel limit', () => {
    const scene = new SceneClass('test');
    scene.add('a', HitboxClass.fromRect(0, 0, 4, 4));

    expect(renderScene(scene, { scale: 2 }).width).toBe(9);
    expect(() => renderScene(scene, { scale: 500 })).toThrow(
      'Render would be 4500×4500 pixels; the limit is 16777216 pixels in total.',
    );
  });

  it('throws for an empty scene', () => {
    expect(() => renderScene(new SceneClass('empty'))).toThrow('Scene has no hitboxes to render.');
  });
});
