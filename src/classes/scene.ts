import { type Scene, type SceneDefaults, type SceneEntry } from '../types/scene.js';
import { type Color, DEFAULT_HITBOX_COLOR, isValidColor } from '../types/color.js';
import { type Point2D } from '../types/shape.js';
import { type Vector2 } from '../algorithms/vector2.js';
import { HitboxClass } from './hitbox.js';
import * as errors from '../errors.js';

/**
 * A colliding ordered pair found by `SceneClass.collisions()`.
 * `mtv` moves `a` out of `b`.
 */
export interface ScenePair {
    a: string;
    b: string;
    mtv: Vector2;
}

export interface SceneBounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

interface LiveEntry {
    hitbox: HitboxClass;
    color: Color;
}

/**
 * Stateful wrapper for a named set of hitboxes.
 * Preserves insertion order, which decides pair order and render order.
 */
export class SceneClass {
    /** Tracks whether the scene has unsaved changes */
    public isDirty: boolean = false;

    private _name: string;
    private _defaults: SceneDefaults;
    private readonly _entries: Map<string, LiveEntry> = new Map();

    constructor(name: string, defaults: SceneDefaults = {}) {
        this._name = name;
        this._defaults = { ...defaults };
    }

    get name(): string {
        return this._name;
    }

    get defaults(): SceneDefaults {
        return { ...this._defaults };
    }

    get size(): number {
        return this._entries.size;
    }

    /** Collision mode used when a tool call leaves `sacrifice_mtv` out. */
    get sacrificeMTV(): boolean {
        return this._defaults.sacrifice_mtv ?? false;
    }

    // ------------------------------------------------------------------------
    // Entries
    // ------------------------------------------------------------------------

    has(name: string): boolean {
        return this._entries.has(name);
    }

    /**
     * Returns a hitbox by name. Throws if missing.
     */
    get(name: string): HitboxClass {
        return this.entry(name).hitbox;
    }

    colorOf(name: string): Color {
        const [r, g, b, a] = this.entry(name).color;
        return [r, g, b, a];
    }

    names(): string[] {
        return Array.from(this._entries.keys());
    }

    entries(): Array<{ name: string; hitbox: HitboxClass; color: Color }> {
        return Array.from(this._entries, ([name, e]) => ({ name, hitbox: e.hitbox, color: e.color }));
    }

    /**
     * Adds a hitbox under a new name, at the end of the order.
     */
    add(name: string, hitbox: HitboxClass, color: Readonly<Color> = DEFAULT_HITBOX_COLOR): void {
        if (this._entries.has(name)) {
            throw new Error(errors.hitboxAlreadyExists(name).content[0].text);
        }
        this._entries.set(name, { hitbox, color: SceneClass.checkedColor(color) });
        this.markDirty();
    }

    /**
     * Removes a hitbox and returns it with its color and former position.
     */
    remove(name: string): { hitbox: HitboxClass; color: Color; index: number } {
        const e = this.entry(name);
        const index = this.names().indexOf(name);
        this._entries.delete(name);
        this.markDirty();
        return { hitbox: e.hitbox, color: e.color, index };
    }

    /**
     * Re-inserts a hitbox at a given position in the order (used by undo).
     */
    insertAt(index: number, name: string, hitbox: HitboxClass, color: Readonly<Color>): void {
        if (this._entries.has(name)) {
            throw new Error(errors.hitboxAlreadyExists(name).content[0].text);
        }
        const ordered = Array.from(this._entries);
        const at = Math.max(0, Math.min(index, ordered.length));
        ordered.splice(at, 0, [name, { hitbox, color: SceneClass.checkedColor(color) }]);
        this.replaceAll(ordered);
        this.markDirty();
    }

    /**
     * Renames an entry, keeping its position.
     */
    rename(oldName: string, newName: string): void {
        this.entry(oldName);
        if (oldName === newName) return;
        if (this._entries.has(newName)) {
            throw new Error(errors.hitboxAlreadyExists(newName).content[0].text);
        }
        const renamed = Array.from(this._entries, ([name, e]): [string, LiveEntry] => [name === oldName ? newName : name, e]);
        this.replaceAll(renamed);
        this.markDirty();
    }

    setColor(name: string, color: Readonly<Color>): void {
        this.entry(name).color = SceneClass.checkedColor(color);
        this.markDirty();
    }

    /** Flags the scene as modified after an in-place hitbox edit. */
    touch(): void {
        this.markDirty();
    }

    // ------------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------------

    /**
     * Every colliding pair (a, b) with `a` before `b` in scene order.
     */
    collisions(sacrificeMTV: boolean = this.sacrificeMTV): ScenePair[] {
        const list = this.entries();
        const pairs: ScenePair[] = [];
        for (let i = 0; i < list.length; i++) {
            for (let j = i + 1; j < list.length; j++) {
                const result = list[i].hitbox.collide(list[j].hitbox, sacrificeMTV);
                if (result.collides) {
                    pairs.push({ a: list[i].name, b: list[j].name, mtv: result.mtv });
                }
            }
        }
        return pairs;
    }

    /**
     * Axis-aligned bounds of every final coordinate (circles: center ± radius).
     * Null for an empty scene.
     */
    bounds(): SceneBounds | null {
        if (this._entries.size === 0) return null;

        let minX = Infinity;
        let minY = Infinity;
        let maxX = -Infinity;
        let maxY = -Infinity;
        const extend = ([x, y]: Point2D, r: number) => {
            minX = Math.min(minX, x - r);
            minY = Math.min(minY, y - r);
            maxX = Math.max(maxX, x + r);
            maxY = Math.max(maxY, y + r);
        };

        for (const { hitbox } of this._entries.values()) {
            if (hitbox.isCircle) {
                extend(hitbox.center, hitbox.radius);
            } else {
                for (const p of hitbox.finalCoords) extend(p, 0);
            }
        }
        return { minX, minY, maxX, maxY };
    }

    info() {
        return {
            name: this._name,
            defaults: this.defaults,
            isDirty: this.isDirty,
            hitboxes: this.entries().map(({ name, hitbox, color }) => ({ name, kind: hitbox.kind, color })),
        };
    }

    // ------------------------------------------------------------------------
    // Serialization
    // ------------------------------------------------------------------------

    toJSON(): Scene {
        const scene: Scene = {
            name: this._name,
            hitboxes: this.entries().map((e): SceneEntry => ({
                name: e.name,
                color: [e.color[0], e.color[1], e.color[2], e.color[3]],
                hitbox: e.hitbox.toJSON(),
            })),
        };
        if (Object.keys(this._defaults).length > 0) {
            scene.defaults = this.defaults;
        }
        return scene;
    }

    static fromJSON(data: Scene): SceneClass {
        const scene = new SceneClass(data.name, data.defaults);
        for (const entry of data.hitboxes) {
            scene.add(entry.name, HitboxClass.fromJSON(entry.hitbox), entry.color);
        }
        scene.isDirty = false;
        return scene;
    }

    // ------------------------------------------------------------------------
    // Private Helpers
    // ------------------------------------------------------------------------

    private entry(name: string): LiveEntry {
        const e = this._entries.get(name);
        if (e === undefined) {
            throw new Error(errors.hitboxNotFound(name).content[0].text);
        }
        return e;
    }

    private replaceAll(ordered: Array<[string, LiveEntry]>): void {
        this._entries.clear();
        for (const [name, e] of ordered) {
            this._entries.set(name, e);
        }
    }

    private static checkedColor(color: Readonly<Color>): Color {
        if (!isValidColor(color)) {
            throw new Error(errors.invalidColor().content[0].text);
        }
        return [color[0], color[1], color[2], color[3]];
    }

    private markDirty(): void {
        this.isDirty = true;
    }
}
