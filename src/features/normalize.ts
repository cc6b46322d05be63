/**
 * Comment spacing normalization.
 *
 *   //foo            → // foo
 *   /*   qux   *\/    → /* qux *\/
 *   /**\/             stays as is
 *
 * Multi-line block comments get one space after the opening marker and
 * one before the closing marker.
 */

import type { CommentStyle, Result, TextBuffer } from '../types/index.js';
import { ok } from '../util/errors.js';
import { leadingWhitespace } from '../util/strings.js';
import type { QuillContext } from '../core/context.js';
import { getCommentStyle } from '../core/detect.js';
import { validateRange } from '../core/toggle.js';
import { runGrouped } from '../core/undo.js';

export type CommentLineKind = 'block' | 'block-start' | 'block-end' | 'line';

export interface NormalizedLine {
  text: string;
  changed: boolean;
  kind?: CommentLineKind;
}

function result(original: string, text: string, kind: CommentLineKind): NormalizedLine {
  return { text, changed: text !== original, kind };
}

// ─── Classifiers ─────────────────────────────────────────────────────

function normalizeSingleBlock(line: string, style: CommentStyle): NormalizedLine | undefined {
  if (!style.block) return undefined;
  const [open, close] = style.block;
  const indent = leadingWhitespace(line);
  const content = line.slice(indent.length);
  if (!content.startsWith(open)) return undefined;

  const closeAt = content.indexOf(close, open.length);
  if (closeAt === -1) return undefined;
  if (content.slice(closeAt + close.length).trim() !== '') return undefined;

  const between = content.slice(open.length, closeAt).trim();
  const text = between === ''
    ? indent + open + close
    : `${indent}${open} ${between} ${close}`;
  return result(line, text, 'block');
}

function normalizeBlockStart(line: string, style: CommentStyle): NormalizedLine | undefined {
  if (!style.block) return undefined;
  const [open, close] = style.block;
  const indent = leadingWhitespace(line);
  const content = line.slice(indent.length);
  if (!content.startsWith(open) || content.includes(close)) return undefined;

  const after = content.slice(open.length).trimStart();
  const text = after === '' ? indent + open : `${indent}${open} ${after}`;
  return result(line, text, 'block-start');
}

function normalizeBlockEnd(line: string, style: CommentStyle): NormalizedLine | undefined {
  if (!style.block) return undefined;
  const [open, close] = style.block;
  const closeAt = line.indexOf(close);
  if (closeAt === -1) return undefined;
  const openAt = line.indexOf(open);
  if (openAt !== -1 && openAt < closeAt) return undefined;

  const before = line.slice(0, closeAt);
  const after = line.slice(closeAt + close.length);
  const text = before.trim() === ''
    ? before + close + after
    : `${before.trimEnd()} ${close}${after}`;
  return result(line, text, 'block-end');
}

function normalizeLineComment(line: string, style: CommentStyle): NormalizedLine | undefined {
  if (!style.line) return undefined;
  const indent = leadingWhitespace(line);
  const content = line.slice(indent.length);
  if (!content.startsWith(style.line)) return undefined;

  const rest = content.slice(style.line.length).trimStart();
  const text = rest === '' ? indent + style.line : `${indent}${style.line} ${rest}`;
  return result(line, text, 'line');
}

// ─── Public API ──────────────────────────────────────────────────────

export interface NormalizeLineOptions {
  /**
   * Whether the line sits inside a multi-line block comment. When
   * omitted every form is tried; when set only the forms possible in that
   * state are.
   */
  inBlock?: boolean;
}

/**
 * Normalize one line. Single-line blocks are tried first, then a
 * multi-line block start, a block end, and finally a line comment (so
 * `--[[` is never read as `--`).
 */
export function normalizeLine(
  line: string,
  style: CommentStyle,
  options: NormalizeLineOptions = {},
): NormalizedLine {
  if (line === '') return { text: line, changed: false };

  const { inBlock } = options;
  const found = inBlock === true
    ? normalizeBlockEnd(line, style)
    : normalizeSingleBlock(line, style)
      ?? normalizeBlockStart(line, style)
      ?? (inBlock === false ? undefined : normalizeBlockEnd(line, style))
      ?? normalizeLineComment(line, style);

  return found ?? { text: line, changed: false };
}

/**
 * Normalize `[start, end]` (1-indexed, inclusive), tracking multi-line
 * block state so a close marker in ordinary code is left alone. Returns
 * the number of changed lines.
 */
export function normalizeRange(
  ctx: QuillContext,
  buffer: TextBuffer,
  start: number,
  end: number,
): Result<number> {
  const span = validateRange(buffer, start, end);
  if (!span.ok) return span;

  const lines = buffer.getLines(start - 1, end);
  const next = [...lines];
  let changed = 0;
  let inBlock = false;

  lines.forEach((line, index) => {
    const style = getCommentStyle(ctx, buffer, start - 1 + index, 0);
    if (!style) return;
    const normalized = normalizeLine(line, style, { inBlock });
    if (normalized.kind === 'block-start') inBlock = true;
    else if (normalized.kind === 'block-end') inBlock = false;
    if (normalized.changed) {
      next[index] = normalized.text;
      changed++;
    }
  });

  if (changed === 0) return ok(0);
  const written = runGrouped(buffer.history, 'Failed to normalize comments', () => {
    buffer.setLines(start - 1, end, next);
  });
  return written.ok ? ok(changed) : written;
}

export function normalizeBuffer(ctx: QuillContext, buffer: TextBuffer): Result<number> {
  return normalizeRange(ctx, buffer, 1, buffer.lineCount());
}
