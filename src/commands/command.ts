/**
 * Command interface for scene undo/redo.
 *
 * Implementations capture snapshots of the state they touch when created.
 * `execute()` applies the edit (re-applies it on redo); `undo()` restores the
 * snapshot taken before it.
 */
export interface Command {
  /** Short human-readable description, e.g. "move_to player". */
  readonly label: string;
  execute(): void;
  undo(): void;
}

/**
 * Bounded undo/redo stacks.
 *
 * `push()` executes the command before recording it, so a command that throws
 * is never recorded. Any push clears the redo stack. Beyond `maxDepth`
 * entries the oldest command is dropped.
 */
export class CommandHistory {
  private _undoStack: Command[] = [];
  private _redoStack: Command[] = [];

  constructor(private readonly _maxDepth: number = 100) {}

  push(cmd: Command): void {
    cmd.execute();
    this._undoStack.push(cmd);
    this._redoStack = [];
    if (this._undoStack.length > this._maxDepth) {
      this._undoStack.shift();
    }
  }

  /** Undoes the most recent command and returns it. */
  undo(): Command {
    const cmd = this._undoStack.pop();
    if (cmd === undefined) {
      throw new Error('Nothing to undo');
    }
    cmd.undo();
    this._redoStack.push(cmd);
    return cmd;
  }

  /** Re-executes the most recently undone command and returns it. */
  redo(): Command {
    const cmd = this._redoStack.pop();
    if (cmd === undefined) {
      throw new Error('Nothing to redo');
    }
    cmd.execute();
    this._undoStack.push(cmd);
    return cmd;
  }

  get undoDepth(): number {
    return this._undoStack.length;
  }

  get redoDepth(): number {
    return this._redoStack.length;
  }

  /** Label of the command `undo()` would revert, or null. */
  get nextUndoLabel(): string | null {
    return this._undoStack.at(-1)?.label ?? null;
  }

  /** Label of the command `redo()` would re-apply, or null. */
  get nextRedoLabel(): string | null {
    return this._redoStack.at(-1)?.label ?? null;
  }

  clear(): void {
    this._undoStack = [];
    this._redoStack = [];
  }
}
