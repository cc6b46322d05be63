/**
 * Toggle engine: classify a line range, decide comment vs uncomment, apply.
 *
 * Lines are 1-indexed and inclusive. Every replacement is computed before
 * the buffer is touched, then written with one setLines call inside one
 * mutation group.
 */

import type {
  CommentStyle, LineRangeState, LineSpan, Result, TextBuffer, ToggleOptions, ToggleOutcome,
} from '../types/index.js';
import { ok, fail } from '../util/errors.js';
import { isBlank, leadingWhitespace } from '../util/strings.js';
import { isCommented as lineIsCommented, isEmptyStyle } from '../detection/regex.js';
import type { QuillContext } from './context.js';
import { getCommentStyle, getFiletypeStyle } from './detect.js';
import { commentRange, isBlockWrapped, isStyleType, uncommentRange } from './comment.js';
import { runGrouped } from './undo.js';

export const NO_STYLE_MESSAGE = 'No comment style available for this buffer';

// ─── Validation ──────────────────────────────────────────────────────

export function validateRange(buffer: TextBuffer, start: number, end: number): Result<LineSpan> {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    return fail('invalid-range', 'Invalid line range');
  }
  if (start < 1 || end < start || end > buffer.lineCount()) {
    return fail('invalid-range', 'Invalid line range');
  }
  return ok({ startLine: start, endLine: end });
}

// ─── Range snapshot ──────────────────────────────────────────────────

interface RangeSnapshot {
  lines: string[];
  /** Style per line; lines without one use `primary` */
  styles: CommentStyle[];
  primary: CommentStyle;
}

/**
 * Read the range and resolve a style for each line at its first
 * non-blank column, so embedded languages and JSX markup get their own.
 */
function snapshot(ctx: QuillContext, buffer: TextBuffer, span: LineSpan): Result<RangeSnapshot> {
  const lines = buffer.getLines(span.startLine - 1, span.endLine);
  const resolved = lines.map((text, i) =>
    getCommentStyle(ctx, buffer, span.startLine - 1 + i, leadingWhitespace(text).length));

  const firstNonBlank = lines.findIndex((text) => !isBlank(text));
  const primary = (firstNonBlank >= 0 ? resolved[firstNonBlank] : undefined) ?? getFiletypeStyle(ctx, buffer);
  if (!primary || isEmptyStyle(primary)) {
    return fail('unsupported-language', NO_STYLE_MESSAGE);
  }

  return ok({ lines, styles: resolved.map((style) => style ?? primary), primary });
}

function classify(snap: RangeSnapshot): LineRangeState {
  if (isBlockWrapped(snap.lines, snap.primary)) return 'allCommented';

  let commented = 0;
  let uncommented = 0;
  snap.lines.forEach((line, i) => {
    if (isBlank(line)) return;
    if (lineIsCommented(line, snap.styles[i])) commented++;
    else uncommented++;
  });

  if (commented > 0 && uncommented === 0) return 'allCommented';
  if (commented > 0 && uncommented > 0) return 'mixed';
  return 'noneCommented';
}

function countChanged(before: readonly string[], after: readonly string[]): number {
  let changed = Math.abs(before.length - after.length);
  const shared = Math.min(before.length, after.length);
  for (let i = 0; i < shared; i++) {
    if (before[i] !== after[i]) changed++;
  }
  return changed;
}

// ─── Public operations ───────────────────────────────────────────────

/** Aggregate comment state of a range; blank lines are ignored */
export function analyzeLines(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
): Result<LineRangeState> {
  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;
  const snap = snapshot(ctx, buffer, span.value);
  if (!snap.ok) return snap;
  return ok(classify(snap.value));
}

/**
 * Toggle comments on `[start, end]`. All commented → uncomment; none or
 * mixed → comment every line, so an already commented line in a mixed
 * range gains a second marker. Force flags skip classification.
 */
export function toggleLines(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
  options: ToggleOptions = {},
): Result<ToggleOutcome> {
  if (buffer.lineCount() === 0) {
    return ok({ action: 'comment', state: 'noneCommented', linesChanged: 0 });
  }

  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;

  if (options.styleType !== undefined && !isStyleType(options.styleType)) {
    return fail('invalid-option', "Invalid style_type: must be 'line' or 'block'");
  }
  if (options.forceComment && options.forceUncomment) {
    return fail('invalid-option', 'Cannot force both comment and uncomment');
  }

  const snap = snapshot(ctx, buffer, span.value);
  if (!snap.ok) return snap;
  const { lines, styles, primary } = snap.value;

  const state = classify(snap.value);
  let shouldComment: boolean;
  if (options.forceComment) shouldComment = true;
  else if (options.forceUncomment) shouldComment = false;
  else shouldComment = state !== 'allCommented';

  const next = shouldComment
    ? commentRange(lines, styles, primary, options.styleType)
    : uncommentRange(lines, styles, primary);

  const written = runGrouped(buffer.history, 'Failed to toggle comments', () => {
    buffer.setLines(span.value.startLine - 1, span.value.endLine, next);
  });
  if (!written.ok) return written;

  return ok({
    action: shouldComment ? 'comment' : 'uncomment',
    state,
    linesChanged: countChanged(lines, next),
  });
}

export function toggleLine(
  ctx: QuillContext,
  buffer: TextBuffer,
  line: number,
  options: ToggleOptions = {},
): Result<ToggleOutcome> {
  return toggleLines(ctx, buffer, line, line, options);
}

export function commentLines(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
  options: Pick<ToggleOptions, 'styleType'> = {},
): Result<ToggleOutcome> {
  return toggleLines(ctx, buffer, start, end, { ...options, forceComment: true });
}

export function uncommentLines(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
): Result<ToggleOutcome> {
  return toggleLines(ctx, buffer, start, end, { forceUncomment: true });
}
