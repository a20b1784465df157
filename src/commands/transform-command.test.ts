import { describe, it, expect } from 'vitest';
import { TransformCommand } from './transform-command.js';
import { CommandHistory } from './command.js';
import { SceneClass } from '../classes/scene.js';
import { HitboxClass } from '../classes/hitbox.js';

function setup() {
  const scene = new SceneClass('test');
  const hitbox = HitboxClass.fromRect(0, 0, 4, 2);
  scene.add('box', hitbox);
  scene.isDirty = false;
  return { scene, hitbox, history: new CommandHistory() };
}

describe('TransformCommand', () => {
  it('applies the edit and marks the scene dirty', () => {
    const { scene, hitbox, history } = setup();

    history.push(
      new TransformCommand('move', scene, hitbox, (h) => {
        h.moveTo(5, 5);
      }),
    );

    expect(hitbox.translation).toEqual([5, 5]);
    expect(scene.isDirty).toBe(true);
  });

  it('undo restores the previous state and redo replays it', () => {
    const { scene, hitbox, history } = setup();
    const before = hitbox.finalCoords;

    history.push(
      new TransformCommand('turn', scene, hitbox, (h) => {
        h.anchorPos = [2, 1];
        h.angle = 1;
      }),
    );
    const after = hitbox.finalCoords;

    history.undo();
    expect(hitbox.finalCoords).toEqual(before);
    expect(hitbox.angle).toBe(0);

    history.redo();
    expect(hitbox.finalCoords).toEqual(after);
  });

  it('does not re-run the edit on redo', () => {
    const { scene, hitbox, history } = setup();
    let runs = 0;

    history.push(
      new TransformCommand('grow', scene, hitbox, (h) => {
        runs++;
        h.width = h.width + 1;
      }),
    );
    history.undo();
    history.redo();

    expect(runs).toBe(1);
    expect(hitbox.width).toBe(5);
  });

  it('rolls back a failed edit and is not recorded', () => {
    const { scene, hitbox, history } = setup();

    expect(() => {
      history.push(
        new TransformCommand('bad', scene, hitbox, (h) => {
          h.moveTo(9, 9);
          h.width = -1;
        }),
      );
    }).toThrow('Rect width and height must be positive (got -1×2).');

    expect(hitbox.translation).toEqual([0, 0]);
    expect(history.undoDepth).toBe(0);
  });
});
