import { type Command } from './command.js';
import { type SceneClass } from '../classes/scene.js';
import { type Color } from '../types/color.js';
import { type HitboxClass } from '../classes/hitbox.js';

/**
 * Adds a hitbox to the scene. Undo removes it.
 */
export class AddHitboxCommand implements Command {
  readonly label: string;

  constructor(
    private readonly scene: SceneClass,
    private readonly name: string,
    private readonly hitbox: HitboxClass,
    private readonly color?: Color,
  ) {
    this.label = `add ${name}`;
  }

  execute(): void {
    this.scene.add(this.name, this.hitbox, this.color);
  }

  undo(): void {
    this.scene.remove(this.name);
  }
}

/**
 * Removes a hitbox. Undo puts the same instance back at its old position with its old color.
 */
export class RemoveHitboxCommand implements Command {
  readonly label: string;
  private removed: { hitbox: HitboxClass; color: Color; index: number } | null = null;

  constructor(
    private readonly scene: SceneClass,
    private readonly name: string,
  ) {
    this.label = `delete ${name}`;
  }

  execute(): void {
    this.removed = this.scene.remove(this.name);
  }

  undo(): void {
    if (this.removed === null) return;
    const { hitbox, color, index } = this.removed;
    this.scene.insertAt(index, this.name, hitbox, color);
  }
}

/**
 * Renames a hitbox, keeping its position in the scene order.
 */
export class RenameHitboxCommand implements Command {
  readonly label: string;

  constructor(
    private readonly scene: SceneClass,
    private readonly oldName: string,
    private readonly newName: string,
  ) {
    this.label = `rename ${oldName} → ${newName}`;
  }

  execute(): void {
    this.scene.rename(this.oldName, this.newName);
  }

  undo(): void {
    this.scene.rename(this.newName, this.oldName);
  }
}

/**
 * Changes a hitbox's render color.
 */
export class SetColorCommand implements Command {
  readonly label: string;
  private readonly before: Color;

  constructor(
    private readonly scene: SceneClass,
    private readonly name: string,
    private readonly color: Color,
  ) {
    this.label = `set_color ${name}`;
    this.before = scene.colorOf(name);
  }

  execute(): void {
    this.scene.setColor(this.name, this.color);
  }

  undo(): void {
    this.scene.setColor(this.name, this.before);
  }
}
