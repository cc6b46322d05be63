/**
 * Conversion between line and single-line block comments.
 */

import type { CommentStyle, CurrentStyle, Result, TextBuffer } from '../types/index.js';
import { ok, fail } from '../util/errors.js';
import { isBlank, leadingWhitespace } from '../util/strings.js';
import { getMarkers, strip } from '../detection/regex.js';
import type { QuillContext } from '../core/context.js';
import { getCommentStyle } from '../core/detect.js';
import { validateRange } from '../core/toggle.js';
import { runGrouped } from '../core/undo.js';

function blockOnly(style: CommentStyle): CommentStyle {
  return { block: style.block, supportsNesting: style.supportsNesting, isJsxContext: style.isJsxContext };
}

function lineOnly(style: CommentStyle): CommentStyle {
  return { line: style.line, supportsNesting: style.supportsNesting, isJsxContext: style.isJsxContext };
}

function isBlockCommentedLine(line: string, style: CommentStyle): boolean {
  return style.block !== undefined && getMarkers(line, blockOnly(style))?.markerType === 'block';
}

function isLineCommentedLine(line: string, style: CommentStyle): boolean {
  return style.line !== undefined && getMarkers(line, lineOnly(style))?.markerType === 'line';
}

/** Style for a range: the one in effect at the start of its first line */
function rangeStyle(ctx: QuillContext, buffer: TextBuffer, start: number): CommentStyle | undefined {
  return getCommentStyle(ctx, buffer, start - 1, 0);
}

function classifyLines(lines: readonly string[], style: CommentStyle): CurrentStyle {
  let hasLine = false;
  let hasBlock = false;
  for (const line of lines) {
    if (isBlank(line)) continue;
    if (isBlockCommentedLine(line, style)) hasBlock = true;
    else if (isLineCommentedLine(line, style)) hasLine = true;
  }
  if (hasLine && hasBlock) return 'mixed';
  if (hasLine) return 'line';
  if (hasBlock) return 'block';
  return 'none';
}

/** Which comment form the commented lines of `[start, end]` use */
export function detectCurrentStyle(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
): Result<CurrentStyle> {
  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;
  const style = rangeStyle(ctx, buffer, start);
  if (!style) return ok('none');
  return ok(classifyLines(buffer.getLines(start - 1, end), style));
}

type Rewrite = (line: string, style: CommentStyle) => string | undefined;

function convert(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
  target: 'line' | 'block',
  rewrite: Rewrite,
): Result<number> {
  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;

  const style = rangeStyle(ctx, buffer, start);
  if (target === 'line' && !style?.line) {
    return fail('unsupported-language', "Language doesn't support line comments");
  }
  if (target === 'block' && !style?.block) {
    return fail('unsupported-language', "Language doesn't support block comments");
  }
  if (!style) return ok(0);

  const lines = buffer.getLines(start - 1, end);
  const current = classifyLines(lines, style);
  if (current === 'none' || current === target) return ok(0);

  let count = 0;
  const next = lines.map((line) => {
    if (isBlank(line)) return line;
    const rewritten = rewrite(line, style);
    if (rewritten === undefined) return line;
    count++;
    return rewritten;
  });

  const written = runGrouped(buffer.history, `Failed to convert to ${target} comments`, () => {
    buffer.setLines(start - 1, end, next);
  });
  return written.ok ? ok(count) : written;
}

/** Rewrite single-line block comments in the range as line comments */
export function convertToLine(ctx: QuillContext, buffer: TextBuffer, start: number, end: number): Result<number> {
  return convert(ctx, buffer, start, end, 'line', (line, style) => {
    if (!style.line || !isBlockCommentedLine(line, style)) return undefined;
    const indent = leadingWhitespace(line);
    const content = strip(line, blockOnly(style)).trim();
    return content === '' ? indent + style.line : `${indent}${style.line} ${content}`;
  });
}

/** Rewrite line comments in the range as single-line block comments */
export function convertToBlock(ctx: QuillContext, buffer: TextBuffer, start: number, end: number): Result<number> {
  return convert(ctx, buffer, start, end, 'block', (line, style) => {
    if (!style.block || isBlockCommentedLine(line, style) || !isLineCommentedLine(line, style)) {
      return undefined;
    }
    const [open, close] = style.block;
    const indent = leadingWhitespace(line);
    const content = strip(line, lineOnly(style)).trim();
    return content === '' ? `${indent}${open} ${close}` : `${indent}${open} ${content} ${close}`;
  });
}
