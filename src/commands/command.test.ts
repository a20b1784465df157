import { describe, it, expect } from 'vitest';
import { type Command, CommandHistory } from './command.js';

/** A command that sets a shared counter and remembers the previous value. */
function setValue(state: { value: number }, next: number): Command & { executeCalls: number; undoCalls: number } {
  const before = state.value;
  const cmd = {
    label: `set ${String(next)}`,
    executeCalls: 0,
    undoCalls: 0,
    execute() {
      state.value = next;
      cmd.executeCalls++;
    },
    undo() {
      state.value = before;
      cmd.undoCalls++;
    },
  };
  return cmd;
}

describe('CommandHistory', () => {
  it('push() executes the command and records it', () => {
    const state = { value: 0 };
    const history = new CommandHistory();
    const cmd = setValue(state, 5);

    history.push(cmd);

    expect(cmd.executeCalls).toBe(1);
    expect(state.value).toBe(5);
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(0);
  });

  it('a command that throws on execute is not recorded', () => {
    const history = new CommandHistory();
    const failing: Command = {
      label: 'boom',
      execute() {
        throw new Error('boom');
      },
      undo() {},
    };

    expect(() => {
      history.push(failing);
    }).toThrow('boom');
    expect(history.undoDepth).toBe(0);
  });

  it('undo() and redo() return the command they acted on', () => {
    const state = { value: 0 };
    const history = new CommandHistory();
    const cmd = setValue(state, 7);
    history.push(cmd);

    expect(history.undo()).toBe(cmd);
    expect(state.value).toBe(0);
    expect(history.redo()).toBe(cmd);
    expect(state.value).toBe(7);
    expect(cmd.executeCalls).toBe(2);
  });

  it('exposes the labels of the next undo and redo', () => {
    const state = { value: 0 };
    const history = new CommandHistory();
    expect(history.nextUndoLabel).toBeNull();

    history.push(setValue(state, 1));
    history.push(setValue(state, 2));
    expect(history.nextUndoLabel).toBe('set 2');
    expect(history.nextRedoLabel).toBeNull();

    history.undo();
    expect(history.nextUndoLabel).toBe('set 1');
    expect(history.nextRedoLabel).toBe('set 2');
  });

  it('throws when there is nothing to undo or redo', () => {
    const history = new CommandHistory();
    expect(() => history.undo()).toThrow('Nothing to undo');
    expect(() => history.redo()).toThrow('Nothing to redo');
  });

  it('push after undo discards the redo branch', () => {
    const state = { value: 0 };
    const history = new CommandHistory();

    history.push(setValue(state, 10));
    history.push(setValue(state, 20));
    history.undo();
    expect(history.redoDepth).toBe(1);

    history.push(setValue(state, 99));
    expect(state.value).toBe(99);
    expect(history.redoDepth).toBe(0);
    expect(() => history.redo()).toThrow('Nothing to redo');
  });

  it('drops the oldest command beyond max depth', () => {
    const state = { value: 0 };
    const history = new CommandHistory(3);

    for (const v of [10, 20, 30, 40]) {
      history.push(setValue(state, v));
    }
    expect(history.undoDepth).toBe(3);

    history.undo();
    history.undo();
    history.undo();
    // 0 → 10 was dropped, so the earliest reachable state is 10
    expect(state.value).toBe(10);
    expect(() => history.undo()).toThrow('Nothing to undo');
  });

  it('clear() empties both stacks', () => {
    const state = { value: 0 };
    const history = new CommandHistory();
    history.push(setValue(state, 1));
    history.push(setValue(state, 2));
    history.undo();

    history.clear();

    expect(history.undoDepth).toBe(0);
    expect(history.redoDepth).toBe(0);
  });
});
