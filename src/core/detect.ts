/**
 * Detection facade: one entry point for "which comment style applies here"
 * and "is this line commented".
 *
 * Order: syntax tree (when the provider covers the buffer), registry by
 * filetype, the buffer's comment template, then configured overrides as an
 * unconditional final pass.
 */

import type { CommentStyle, TextBuffer } from '../types/index.js';
import type { LanguageOverride } from '../languages/schema.js';
import { mergeStyle } from '../languages/registry.js';
import * as regex from '../detection/regex.js';
import { filetypeStyle, isInComment, resolveCommentStyle } from '../detection/syntax-tree.js';
import type { QuillContext } from './context.js';

function configuredOverride(ctx: QuillContext, buffer: TextBuffer): LanguageOverride | undefined {
  const languages = ctx.config.languages;
  return languages[buffer.filetype] ?? languages[ctx.registry.canonicalId(buffer.filetype)];
}

function applyOverrides(
  ctx: QuillContext,
  buffer: TextBuffer,
  base: CommentStyle | undefined,
  override?: LanguageOverride,
): CommentStyle | undefined {
  let style = base;
  const configured = configuredOverride(ctx, buffer);
  if (configured) style = mergeStyle(style, configured);
  if (override) style = mergeStyle(style, override);
  return style;
}

/** Style for the whole buffer, ignoring position */
export function getFiletypeStyle(ctx: QuillContext, buffer: TextBuffer): CommentStyle | undefined {
  return applyOverrides(ctx, buffer, filetypeStyle(ctx.registry, buffer));
}

/**
 * Style at a 0-indexed row/col. `override` is a per-call adjustment
 * applied after the configured one.
 */
export function getCommentStyle(
  ctx: QuillContext,
  buffer: TextBuffer,
  row: number,
  col: number,
  override?: LanguageOverride,
): CommentStyle | undefined {
  const base = resolveCommentStyle(ctx.syntax, ctx.registry, buffer, row, col, {
    jsxAutoDetect: ctx.config.jsx.autoDetect,
  });
  return applyOverrides(ctx, buffer, base, override);
}

/** Whether 1-indexed `line` is commented, judged with the style at its column 0 */
export function isCommented(ctx: QuillContext, buffer: TextBuffer, line: number): boolean {
  if (!Number.isInteger(line) || line < 1 || line > buffer.lineCount()) return false;
  const style = getCommentStyle(ctx, buffer, line - 1, 0);
  if (!style) return false;
  const [text] = buffer.getLines(line - 1, line);
  return text !== undefined && regex.isCommented(text, style);
}

/** Syntax-tree comment check at a 0-indexed position */
export function isInCommentNode(ctx: QuillContext, buffer: TextBuffer, row: number, col: number): boolean {
  return isInComment(ctx.syntax, buffer, row, col);
}
