import { type Command } from './command.js';
import { type HitboxClass } from '../classes/hitbox.js';
import { type SceneClass } from '../classes/scene.js';
import { type HitboxData } from '../types/shape.js';

/**
 * Wraps any in-place hitbox edit (move, anchor, angle, resize, radius).
 *
 * Snapshots the hitbox before the first execute and after it; redo restores
 * the after-snapshot instead of re-running the edit.
 */
export class TransformCommand implements Command {
  private readonly before: HitboxData;
  private after: HitboxData | null = null;

  constructor(
    readonly label: string,
    private readonly scene: SceneClass,
    private readonly hitbox: HitboxClass,
    private readonly action: (hitbox: HitboxClass) => void,
  ) {
    this.before = hitbox.toJSON();
  }

  execute(): void {
    if (this.after !== null) {
      this.hitbox.restore(this.after);
    } else {
      try {
        this.action(this.hitbox);
      } catch (e: unknown) {
        // Leave the hitbox exactly as it was before the failed edit
        this.hitbox.restore(this.before);
        throw e;
      }
      this.after = this.hitbox.toJSON();
    }
    this.scene.touch();
  }

  undo(): void {
    this.hitbox.restore(this.before);
    this.scene.touch();
  }
}
