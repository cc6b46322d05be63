import { describe, it, expect, vi } from 'vitest';
import { createContext } from '../src/core/context.js';
import { MemoryBuffer } from '../src/core/buffer.js';
import { UndoHistory } from '../src/core/undo.js';
import {
  analyzeLines, commentLines, toggleLine, toggleLines, uncommentLines, NO_STYLE_MESSAGE,
} from '../src/core/toggle.js';
import type { TextBuffer, ToggleOptions } from '../src/types/index.js';
import { FakeTreeProvider, type NodeSpec } from './fixtures/fake-tree.js';

const ctx = createContext();

function buffer(lines: string[], filetype = 'javascript'): MemoryBuffer {
  return new MemoryBuffer(lines, { filetype });
}

// ─── Classification and decision ─────────────────────────────────────

describe('toggleLines', () => {
  it('comments a mixed range, doubling the commented line', () => {
    const buf = buffer(['x', '// x']);
    const result = toggleLines(ctx, buf, 1, 2);
    expect(result).toEqual({ ok: true, value: { action: 'comment', state: 'mixed', linesChanged: 2 } });
    expect(buf.allLines()).toEqual(['// x', '// // x']);
  });

  it('is its own inverse on a uniform range', () => {
    const original = ['function f() {', '  return 1;', '}'];
    const buf = buffer(original);

    toggleLines(ctx, buf, 1, 3);
    expect(buf.allLines()).toEqual(['// function f() {', '  // return 1;', '// }']);

    const second = toggleLines(ctx, buf, 1, 3);
    expect(second.ok && second.value.action).toBe('uncomment');
    expect(buf.allLines()).toEqual(original);
  });

  it('gives blank lines a bare marker and removes it again', () => {
    const buf = buffer(['a', '', 'b']);
    toggleLines(ctx, buf, 1, 3);
    expect(buf.allLines()).toEqual(['// a', '//', '// b']);
    toggleLines(ctx, buf, 1, 3);
    expect(buf.allLines()).toEqual(['a', '', 'b']);
  });

  it('touches only the requested lines', () => {
    const buf = buffer(['a', 'b', 'c']);
    toggleLine(ctx, buf, 2);
    expect(buf.allLines()).toEqual(['a', '// b', 'c']);
  });

  it('uses block markers for block-only languages', () => {
    const buf = buffer(['a {}', '  b {}'], 'css');
    toggleLines(ctx, buf, 1, 2);
    expect(buf.allLines()).toEqual(['/* a {} */', '  /* b {} */']);
    toggleLines(ctx, buf, 1, 2);
    expect(buf.allLines()).toEqual(['a {}', '  b {}']);
  });

  it('uncomments a lua block comment rather than reading it as a line comment', () => {
    const buf = buffer(['--[[ x ]]'], 'lua');
    toggleLines(ctx, buf, 1, 1);
    expect(buf.allLines()).toEqual(['x']);
  });
});

describe('force flags', () => {
  it('forceComment comments an already commented range', () => {
    const buf = buffer(['// a']);
    const result = commentLines(ctx, buf, 1, 1);
    expect(result.ok && result.value.state).toBe('allCommented');
    expect(buf.allLines()).toEqual(['// // a']);
  });

  it('forceUncomment leaves uncommented lines alone', () => {
    const buf = buffer(['a', '// b']);
    const result = uncommentLines(ctx, buf, 1, 2);
    expect(result).toEqual({ ok: true, value: { action: 'uncomment', state: 'mixed', linesChanged: 1 } });
    expect(buf.allLines()).toEqual(['a', 'b']);
  });

  it('rejects both flags at once', () => {
    const buf = buffer(['a']);
    const result = toggleLines(ctx, buf, 1, 1, { forceComment: true, forceUncomment: true });
    expect(result).toEqual({
      ok: false, error: { kind: 'invalid-option', message: 'Cannot force both comment and uncomment' },
    });
  });
});

// ─── Block style ─────────────────────────────────────────────────────

describe('block style', () => {
  it('wraps a multi-line selection and unwraps it on the next toggle', () => {
    const buf = buffer(['  a()', '  b()']);
    commentLines(ctx, buf, 1, 2, { styleType: 'block' });
    expect(buf.allLines()).toEqual(['  /*', '  a()', '  b()', '  */']);

    expect(analyzeLines(ctx, buf, 1, 4)).toEqual({ ok: true, value: 'allCommented' });
    toggleLines(ctx, buf, 1, 4);
    expect(buf.allLines()).toEqual(['  a()', '  b()']);
  });

  it('uses single-line block comments for one line', () => {
    const buf = buffer(['a()']);
    toggleLines(ctx, buf, 1, 1, { styleType: 'block' });
    expect(buf.allLines()).toEqual(['/* a() */']);
  });

  it('falls back to line comments around existing block comments', () => {
    const buf = buffer(['/* c */', 'x()']);
    commentLines(ctx, buf, 1, 2, { styleType: 'block' });
    expect(buf.allLines()).toEqual(['// /* c */', '// x()']);
  });

  it('wraps around existing block comments when the language nests them', () => {
    const buf = buffer(['/* c */', 'x()'], 'rust');
    commentLines(ctx, buf, 1, 2, { styleType: 'block' });
    expect(buf.allLines()).toEqual(['/*', '/* c */', 'x()', '*/']);
  });

  it('rejects an unknown style type', () => {
    const buf = buffer(['a']);
    // Hosts may pass options straight from untyped user input
    const options: ToggleOptions = JSON.parse('{"styleType": "fancy"}');
    const result = toggleLines(ctx, buf, 1, 1, options);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid style_type: must be 'line' or 'block'");
  });
});

// ─── Failures ────────────────────────────────────────────────────────

describe('validation', () => {
  it.each([
    [0, 1],
    [2, 1],
    [1, 4],
    [1.5, 2],
    [Number.NaN, 1],
  ])('rejects the range %s..%s without writing', (start, end) => {
    const buf = buffer(['a', 'b', 'c']);
    const result = toggleLines(ctx, buf, start, end);
    expect(result).toEqual({ ok: false, error: { kind: 'invalid-range', message: 'Invalid line range' } });
    expect(buf.modified).toBe(false);
    expect(buf.history.size).toBe(0);
  });

  it('fails for languages without comments', () => {
    const buf = buffer(['{"a": 1}'], 'json');
    const result = toggleLines(ctx, buf, 1, 1);
    expect(result).toEqual({ ok: false, error: { kind: 'unsupported-language', message: NO_STYLE_MESSAGE } });
    expect(buf.allLines()).toEqual(['{"a": 1}']);
  });

  it('fails for unknown filetypes without a template', () => {
    const buf = buffer(['x'], 'mystery');
    expect(toggleLines(ctx, buf, 1, 1).ok).toBe(false);
  });

  it('uses the comment template of an unknown filetype', () => {
    const buf = new MemoryBuffer(['x'], { filetype: 'mystery', commentTemplate: '%% %s' });
    toggleLines(ctx, buf, 1, 1);
    expect(buf.allLines()).toEqual(['%% x']);
  });

  it('succeeds with no changes on an empty buffer', () => {
    const empty: TextBuffer = {
      filetype: 'javascript',
      history: new UndoHistory(),
      lineCount: () => 0,
      getLines: () => [],
      setLines: () => undefined,
    };
    expect(toggleLines(ctx, empty, 1, 1)).toEqual({
      ok: true, value: { action: 'comment', state: 'noneCommented', linesChanged: 0 },
    });
  });

  it('reports a throwing buffer as a collaborator failure', () => {
    class ReadOnlyBuffer extends MemoryBuffer {
      override setLines(): void {
        throw new Error('buffer is read-only');
      }
    }
    const buf = new ReadOnlyBuffer(['a'], { filetype: 'javascript' });
    expect(toggleLines(ctx, buf, 1, 1)).toEqual({
      ok: false, error: { kind: 'collaborator', message: 'Failed to toggle comments: buffer is read-only' },
    });
    expect(buf.history.inGroup).toBe(false);
  });
});

// ─── Atomicity ───────────────────────────────────────────────────────

describe('undo grouping', () => {
  it('writes the range with one call in one undo step', () => {
    const buf = buffer(['a', 'b', 'c']);
    const spy = vi.spyOn(buf, 'setLines');
    toggleLines(ctx, buf, 1, 3);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(buf.history.size).toBe(1);

    expect(buf.undo()).toBe(true);
    expect(buf.allLines()).toEqual(['a', 'b', 'c']);
  });
});

// ─── Per-line styles ─────────────────────────────────────────────────

describe('per-line style resolution', () => {
  const tree: NodeSpec = {
    type: 'program',
    range: [0, 0, 4, 0],
    children: [{ type: 'jsx_element', range: [1, 0, 3, 100] }],
  };
  const jsxCtx = createContext({ syntax: new FakeTreeProvider(tree, 'javascript') });

  it('comments JSX markup with the markup style', () => {
    const buf = new MemoryBuffer(['return (', '  <div>', '    <span />', '  </div>', ');'], {
      filetype: 'javascriptreact',
    });
    toggleLines(jsxCtx, buf, 2, 4);
    expect(buf.allLines()).toEqual([
      'return (', '  {/* <div> */}', '    {/* <span /> */}', '  {/* </div> */}', ');',
    ]);

    toggleLines(jsxCtx, buf, 2, 4);
    expect(buf.getLines(1, 4)).toEqual(['  <div>', '    <span />', '  </div>']);
  });

  it('resolves each line on its own across a markup boundary', () => {
    const buf = new MemoryBuffer(['return (', '  <div>'], { filetype: 'javascriptreact' });
    toggleLines(jsxCtx, buf, 1, 2);
    expect(buf.allLines()).toEqual(['// return (', '  {/* <div> */}']);
  });
});

describe('analyzeLines', () => {
  it('ignores blank lines', () => {
    const buf = buffer(['// a', '', '  // b']);
    expect(analyzeLines(ctx, buf, 1, 3)).toEqual({ ok: true, value: 'allCommented' });
    expect(analyzeLines(ctx, buf, 2, 2)).toEqual({ ok: true, value: 'noneCommented' });
  });
});
