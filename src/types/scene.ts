import type { Color } from './color.js';
import type { HitboxData } from './shape.js';

/**
 * Core types for the scene file.
 *
 * A scene is a named set of hitboxes plus the defaults tool calls fall back to.
 */

/**
 * Default settings applied by tools when an argument is omitted.
 */
export interface SceneDefaults {
  /** Deduplicate rect axes during collision queries (boolean result exact, MTV not guaranteed minimal). */
  sacrifice_mtv?: boolean;
  /** Integer upscale applied by `scene render`. */
  render_scale?: number;
  /** Background color for `scene render`. */
  background?: Color;
}

/**
 * One hitbox in a scene, in insertion order.
 */
export interface SceneEntry {
  name: string;
  color: Color;
  hitbox: HitboxData;
}

/**
 * The in-memory scene representation (without the on-disk envelope).
 */
export interface Scene {
  name: string;
  defaults?: SceneDefaults;
  hitboxes: SceneEntry[];
}
