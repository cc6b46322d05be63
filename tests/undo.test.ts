import { describe, it, expect } from 'vitest';
import { UndoHistory, runGrouped, withUndoGroup } from '../src/core/undo.js';
import { MemoryBuffer } from '../src/core/buffer.js';

describe('UndoHistory', () => {
  it('folds nested groups into one step', () => {
    const history = new UndoHistory();
    history.begin();
    history.record({ start: 0, before: ['a'], after: ['b'] });
    history.begin();
    expect(history.level).toBe(2);
    history.record({ start: 1, before: ['c'], after: ['d'] });
    history.end();
    expect(history.size).toBe(0);
    history.end();

    expect(history.inGroup).toBe(false);
    expect(history.size).toBe(1);
    expect(history.pop()).toHaveLength(2);
  });

  it('records a lone edit as its own step', () => {
    const history = new UndoHistory();
    history.record({ start: 0, before: [], after: ['x'] });
    history.record({ start: 0, before: ['x'], after: ['y'] });
    expect(history.size).toBe(2);
  });

  it('drops empty groups', () => {
    const history = new UndoHistory();
    history.begin();
    history.end();
    expect(history.size).toBe(0);
  });

  it('warns on an unmatched end', () => {
    const history = new UndoHistory();
    history.end();
    expect(history.warnings).toEqual(['end() called without a matching begin()']);
    expect(history.level).toBe(0);
  });
});

describe('withUndoGroup', () => {
  it('closes the group when the callback throws', () => {
    const history = new UndoHistory();
    expect(() => withUndoGroup(history, () => {
      throw new Error('boom');
    })).toThrow('boom');
    expect(history.inGroup).toBe(false);
  });

  it('returns the callback result', () => {
    expect(withUndoGroup(new UndoHistory(), () => 42)).toBe(42);
  });
});

describe('runGrouped', () => {
  it('turns a throw into a collaborator failure', () => {
    const result = runGrouped(new UndoHistory(), 'Failed to align', () => {
      throw new Error('locked');
    });
    expect(result).toEqual({ ok: false, error: { kind: 'collaborator', message: 'Failed to align: locked' } });
  });

  it('wraps a value', () => {
    expect(runGrouped(new UndoHistory(), 'x', () => 'done')).toEqual({ ok: true, value: 'done' });
  });
});

// ─── MemoryBuffer ────────────────────────────────────────────────────

describe('MemoryBuffer', () => {
  it('always holds at least one line', () => {
    expect(new MemoryBuffer([]).allLines()).toEqual(['']);
  });

  it('splits CRLF and LF text', () => {
    const buffer = MemoryBuffer.fromText('a\r\nb\nc', { filetype: 'python' });
    expect(buffer.allLines()).toEqual(['a', 'b', 'c']);
    expect(buffer.filetype).toBe('python');
    expect(buffer.getText()).toBe('a\nb\nc');
  });

  it('rejects writes outside the buffer', () => {
    const buffer = new MemoryBuffer(['a', 'b']);
    expect(() => buffer.setLines(1, 3, ['x'])).toThrow(RangeError);
    expect(() => buffer.setLines(2, 1, [])).toThrow('setLines: range [2, 1) is outside 0..2');
    expect(buffer.modified).toBe(false);
  });

  it('undoes a grouped set of edits at once', () => {
    const buffer = new MemoryBuffer(['a', 'b', 'c']);
    withUndoGroup(buffer.history, () => {
      buffer.setLines(0, 1, ['A']);
      buffer.setLines(1, 3, ['B', 'x', 'C']);
    });
    expect(buffer.allLines()).toEqual(['A', 'B', 'x', 'C']);

    expect(buffer.undo()).toBe(true);
    expect(buffer.allLines()).toEqual(['a', 'b', 'c']);
    expect(buffer.undo()).toBe(false);
  });

  it('tracks modification until saved', () => {
    const buffer = new MemoryBuffer(['a']);
    buffer.setLines(0, 1, ['b']);
    expect(buffer.modified).toBe(true);
    buffer.markSaved();
    expect(buffer.modified).toBe(false);
  });

  it('advances the change tick on edits and undo only', () => {
    const buffer = new MemoryBuffer(['a']);
    expect(buffer.changeTick()).toBe(0);
    buffer.setLines(0, 1, ['b']);
    expect(buffer.changeTick()).toBe(1);
    buffer.markSaved();
    expect(buffer.changeTick()).toBe(1);
    buffer.undo();
    expect(buffer.changeTick()).toBe(2);
    expect(buffer.undo()).toBe(false);
    expect(buffer.changeTick()).toBe(2);
  });
});
