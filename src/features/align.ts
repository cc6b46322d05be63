/**
 * Trailing-comment alignment.
 * Lines in a range that end with a line comment get their comments moved
 * to one shared column.
 */

import type { CommentStyle, Result, TextBuffer } from '../types/index.js';
import type { AlignConfig } from '../config/schema.js';
import { ok } from '../util/errors.js';
import { displayWidth } from '../util/strings.js';
import type { QuillContext } from '../core/context.js';
import { getCommentStyle } from '../core/detect.js';
import { validateRange } from '../core/toggle.js';
import { runGrouped } from '../core/undo.js';

export interface TrailingComment {
  /** Code before the marker, trailing whitespace removed */
  code: string;
  /** Comment text after the marker, leading whitespace removed */
  comment: string;
  marker: string;
}

/**
 * Split a line into code and trailing line comment. Markers inside `'`,
 * `"` or backtick strings are skipped; a line that is only a comment has
 * no trailing comment.
 */
export function findTrailingComment(line: string, style: CommentStyle): TrailingComment | undefined {
  const marker = style.line;
  if (!marker) return undefined;
  if (line.trimStart().startsWith(marker)) return undefined;

  let quote: string | null = null;
  let escaped = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }

    if (quote === null && (ch === '"' || ch === "'" || ch === '`')) {
      quote = ch;
    } else if (quote !== null && ch === quote) {
      quote = null;
    }

    if (quote === null && line.startsWith(marker, i)) {
      const code = line.slice(0, i).trimEnd();
      if (code === '') return undefined;
      return { code, comment: line.slice(i + marker.length).trimStart(), marker };
    }
  }

  return undefined;
}

/** `min(widest code + minGap, column)`; `column` when there is nothing to align */
export function calculateTargetColumn(
  infos: readonly Pick<TrailingComment, 'code'>[],
  opts: AlignConfig,
): number {
  if (infos.length === 0) return opts.column;
  const widest = Math.max(...infos.map((info) => displayWidth(info.code, opts.tabWidth)));
  return Math.min(widest + opts.minGap, opts.column);
}

/** Code, padding to `target` (at least one space), marker, comment */
export function formatAlignedLine(info: TrailingComment, target: number, tabWidth = 8): string {
  const padding = Math.max(1, target - displayWidth(info.code, tabWidth));
  const comment = info.comment.trim();
  const tail = comment === '' ? info.marker : `${info.marker} ${comment}`;
  return info.code + ' '.repeat(padding) + tail;
}

/**
 * Align trailing comments on `[start, end]` (1-indexed, inclusive).
 * Returns the number of lines whose text changed.
 */
export function alignLines(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
  overrides: Partial<AlignConfig> = {},
): Result<number> {
  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;
  const opts: AlignConfig = { ...ctx.config.align, ...overrides };

  const lines = buffer.getLines(start - 1, end);
  const found: { index: number; info: TrailingComment }[] = [];
  lines.forEach((line, index) => {
    const style = getCommentStyle(ctx, buffer, start - 1 + index, 0);
    const info = style ? findTrailingComment(line, style) : undefined;
    if (info) found.push({ index, info });
  });
  if (found.length === 0) return ok(0);

  const target = calculateTargetColumn(found.map((f) => f.info), opts);
  const next = [...lines];
  let changed = 0;
  for (const { index, info } of found) {
    const aligned = formatAlignedLine(info, target, opts.tabWidth);
    if (aligned !== next[index]) changed++;
    next[index] = aligned;
  }
  if (changed === 0) return ok(0);

  const written = runGrouped(buffer.history, 'Failed to align comments', () => {
    buffer.setLines(start - 1, end, next);
  });
  return written.ok ? ok(changed) : written;
}
