import * as path from 'node:path';
import { type SceneDefaults } from '../types/scene.js';
import { loadSceneFile, saveSceneFile } from '../io/index.js';
import { type Command, CommandHistory } from '../commands/command.js';
import { SceneClass } from './scene.js';
import * as errors from '../errors.js';

/**
 * In-memory editing session singleton.
 * Holds the open scene, where it lives on disk, and the undo/redo history.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** The open scene, or null before `newScene`/`openScene`. */
    public scene: SceneClass | null = null;

    /** Absolute path of the scene file, or null for a scene never saved. */
    public scenePath: string | null = null;

    /** `created` timestamp of the scene file, preserved across saves. */
    private _created: string | undefined;

    private _history = new CommandHistory();

    private constructor() {
        // Singleton; use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Scene Lifecycle
    // ------------------------------------------------------------------------

    /**
     * Returns the open scene. Throws if none is open.
     */
    requireScene(): SceneClass {
        if (this.scene === null) {
            throw new Error(errors.noSceneLoaded().content[0].text);
        }
        return this.scene;
    }

    /**
     * Replaces the session with a new, empty scene. History is cleared.
     */
    newScene(name: string, defaults: SceneDefaults = {}): SceneClass {
        this.scene = new SceneClass(name, defaults);
        this.scene.isDirty = true;
        this.scenePath = null;
        this._created = undefined;
        this._history.clear();
        return this.scene;
    }

    /**
     * Loads a scene file, replacing the session. History is cleared.
     */
    async openScene(filePath: string): Promise<SceneClass> {
        const resolved = path.resolve(filePath);
        const { scene, created } = await loadSceneFile(resolved);
        this.scene = SceneClass.fromJSON(scene);
        this.scenePath = resolved;
        this._created = created;
        this._history.clear();
        return this.scene;
    }

    /**
     * Writes the scene to `filePath` (which becomes the scene's path) or to
     * the path it was opened from, and clears the dirty flag.
     */
    async saveScene(filePath?: string): Promise<{ name: string; path: string }> {
        const scene = this.requireScene();
        const target = filePath !== undefined ? path.resolve(filePath) : this.scenePath;
        if (target === null) {
            throw new Error(errors.noScenePath().content[0].text);
        }

        this._created = await saveSceneFile(target, scene.toJSON(), this._created);
        this.scenePath = target;
        scene.isDirty = false;

        return { name: scene.name, path: target };
    }

    // ------------------------------------------------------------------------
    // Undo/Redo
    // ------------------------------------------------------------------------

    /**
     * Executes a command and pushes it onto the undo stack.
     * Tool handlers construct the command, then call this method.
     */
    pushCommand(cmd: Command): void {
        this._history.push(cmd);
    }

    /** Undoes the last command and returns its label. */
    undo(): string {
        return this._history.undo().label;
    }

    /** Redoes the last undone command and returns its label. */
    redo(): string {
        return this._history.redo().label;
    }

    get undoDepth(): number {
        return this._history.undoDepth;
    }

    get redoDepth(): number {
        return this._history.redoDepth;
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Summary of the session for the `scene info` tool action.
     */
    info() {
        return {
            scene: this.scene ? this.scene.info() : null,
            path: this.scenePath,
            undoDepth: this.undoDepth,
            redoDepth: this.redoDepth,
            nextUndo: this._history.nextUndoLabel,
            nextRedo: this._history.nextRedoLabel,
        };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
