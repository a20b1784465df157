import { describe, it, expect } from 'vitest';
import { SceneClass } from './scene.js';
import { HitboxClass } from './hitbox.js';

function sceneWith(...names: string[]): SceneClass {
  const scene = new SceneClass('test');
  names.forEach((name, i) => {
    scene.add(name, HitboxClass.fromRect(i * 100, 0, 10, 10));
  });
  return scene;
}

describe('SceneClass', () => {
  it('keeps insertion order and defaults the color to white', () => {
    const scene = sceneWith('b', 'a', 'c');
    expect(scene.names()).toEqual(['b', 'a', 'c']);
    expect(scene.size).toBe(3);
    expect(scene.colorOf('a')).toEqual([255, 255, 255, 255]);
    expect(scene.isDirty).toBe(true);
  });

  it('rejects duplicate names', () => {
    const scene = sceneWith('a');
    expect(() => {
      scene.add('a', HitboxClass.fromRect(0, 0, 1, 1));
    }).toThrow("Hitbox 'a' already exists in the scene.");
  });

  it('throws for a missing hitbox', () => {
    expect(() => sceneWith().get('zz')).toThrow("Hitbox 'zz' does not exist in the scene.");
  });

  it('remove returns the entry and its position; insertAt puts it back', () => {
    const scene = sceneWith('a', 'b', 'c');
    const hitbox = scene.get('b');

    const removed = scene.remove('b');
    expect(removed.index).toBe(1);
    expect(removed.hitbox).toBe(hitbox);
    expect(scene.names()).toEqual(['a', 'c']);

    scene.insertAt(removed.index, 'b', removed.hitbox, removed.color);
    expect(scene.names()).toEqual(['a', 'b', 'c']);
    expect(scene.get('b')).toBe(hitbox);
  });

  it('rename keeps the position', () => {
    const scene = sceneWith('a', 'b', 'c');
    scene.rename('b', 'z');
    expect(scene.names()).toEqual(['a', 'z', 'c']);
    expect(() => {
      scene.rename('z', 'a');
    }).toThrow("Hitbox 'a' already exists in the scene.");
  });

  it('validates colors', () => {
    const scene = sceneWith('a');
    scene.setColor('a', [1, 2, 3, 4]);
    expect(scene.colorOf('a')).toEqual([1, 2, 3, 4]);
    expect(() => {
      scene.setColor('a', [300, 0, 0, 255]);
    }).toThrow(/Invalid RGBA color/);
  });

  it('lists colliding pairs in scene order', () => {
    const scene = new SceneClass('test');
    scene.add('a', HitboxClass.fromRect(0, 0, 10, 10));
    scene.add('far', HitboxClass.fromRect(100, 100, 1, 1));
    scene.add('b', HitboxClass.fromRect(5, 5, 10, 10));

    const pairs = scene.collisions();
    expect(pairs).toHaveLength(1);
    expect(pairs[0].a).toBe('a');
    expect(pairs[0].b).toBe('b');
    expect(pairs[0].mtv.y).toBeCloseTo(-5);
  });

  it('reads its collision mode from the defaults', () => {
    expect(new SceneClass('x').sacrificeMTV).toBe(false);
    expect(new SceneClass('x', { sacrifice_mtv: true }).sacrificeMTV).toBe(true);
  });

  it('computes bounds including circle radii', () => {
    const scene = new SceneClass('test');
    expect(scene.bounds()).toBeNull();

    scene.add('box', HitboxClass.fromRect(0, 0, 4, 4));
    scene.add('ball', HitboxClass.fromCircle([10, 10], 2));
    expect(scene.bounds()).toEqual({ minX: 0, minY: 0, maxX: 12, maxY: 12 });
  });

  it('summarizes itself for info', () => {
    const scene = new SceneClass('level', { render_scale: 2 });
    scene.add('ball', HitboxClass.fromCircle([0, 0], 1), [255, 0, 0, 255]);
    expect(scene.info()).toEqual({
      name: 'level',
      defaults: { render_scale: 2 },
      isDirty: true,
      hitboxes: [{ name: 'ball', kind: 'circle', color: [255, 0, 0, 255] }],
    });
  });

  it('round-trips through JSON and comes back clean', () => {
    const scene = new SceneClass('level', { sacrifice_mtv: true });
    const box = HitboxClass.fromRect(0, 0, 4, 4, [2, 2]);
    box.angle = 0.25;
    scene.add('box', box, [0, 255, 0, 255]);
    scene.add('ball', HitboxClass.fromCircle([10, 10], 2));

    const copy = SceneClass.fromJSON(scene.toJSON());

    expect(copy.isDirty).toBe(false);
    expect(copy.toJSON()).toEqual(scene.toJSON());
    expect(copy.get('box').finalCoords).toEqual(box.finalCoords);
  });

  it('omits empty defaults from JSON', () => {
    expect('defaults' in sceneWith('a').toJSON()).toBe(false);
  });
});
