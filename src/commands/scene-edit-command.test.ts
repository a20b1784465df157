import { describe, it, expect } from 'vitest';
import { AddHitboxCommand, RemoveHitboxCommand, RenameHitboxCommand, SetColorCommand } from './scene-edit-command.js';
import { CommandHistory } from './command.js';
import { SceneClass } from '../classes/scene.js';
import { HitboxClass } from '../classes/hitbox.js';

function setup() {
  const scene = new SceneClass('test');
  scene.add('a', HitboxClass.fromRect(0, 0, 1, 1));
  scene.add('b', HitboxClass.fromRect(5, 5, 1, 1));
  scene.add('c', HitboxClass.fromRect(9, 9, 1, 1));
  return { scene, history: new CommandHistory() };
}

describe('AddHitboxCommand', () => {
  it('adds on execute and removes on undo', () => {
    const { scene, history } = setup();
    const cmd = new AddHitboxCommand(scene, 'd', HitboxClass.fromCircle([0, 0], 1), [255, 0, 0, 255]);
    expect(cmd.label).toBe('add d');

    history.push(cmd);
    expect(scene.names()).toEqual(['a', 'b', 'c', 'd']);
    expect(scene.colorOf('d')).toEqual([255, 0, 0, 255]);

    history.undo();
    expect(scene.has('d')).toBe(false);
  });
});

describe('RemoveHitboxCommand', () => {
  it('puts the same instance back at its old position', () => {
    const { scene, history } = setup();
    const b = scene.get('b');
    scene.setColor('b', [0, 0, 255, 255]);

    history.push(new RemoveHitboxCommand(scene, 'b'));
    expect(scene.names()).toEqual(['a', 'c']);

    history.undo();
    expect(scene.names()).toEqual(['a', 'b', 'c']);
    expect(scene.get('b')).toBe(b);
    expect(scene.colorOf('b')).toEqual([0, 0, 255, 255]);
  });
});

describe('RenameHitboxCommand', () => {
  it('renames in place and back', () => {
    const { scene, history } = setup();
    const cmd = new RenameHitboxCommand(scene, 'b', 'player');
    expect(cmd.label).toBe('rename b → player');

    history.push(cmd);
    expect(scene.names()).toEqual(['a', 'player', 'c']);

    history.undo();
    expect(scene.names()).toEqual(['a', 'b', 'c']);
  });
});

describe('SetColorCommand', () => {
  it('restores the previous color on undo', () => {
    const { scene, history } = setup();

    history.push(new SetColorCommand(scene, 'a', [0, 255, 0, 255]));
    expect(scene.colorOf('a')).toEqual([0, 255, 0, 255]);

    history.undo();
    expect(scene.colorOf('a')).toEqual([255, 255, 255, 255]);
  });
});
