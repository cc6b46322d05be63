/**
 * Terminal formatting for the quill CLI.
 */

import chalk from 'chalk';
import type { CommentStyle, QuillError, Selection } from '../types/index.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  dim:      chalk.dim,
  bold:     chalk.bold,
  green:    chalk.green,
  red:      chalk.red,
  cyan:     chalk.cyan,
  gray:     chalk.gray,
  yellow:   chalk.yellow,

  added:    chalk.green,
  removed:  chalk.red,
  success:  chalk.green,
  warn:     chalk.yellow,
  error:    chalk.red,
  info:     chalk.blue,
};

// ─── Messages ────────────────────────────────────────────────────────

export function formatError(error: QuillError): string {
  return `${C.error('✗')} ${error.message} ${C.dim(`(${error.kind})`)}`;
}

export function formatWarning(message: string): string {
  return `${C.warn('⚠')} ${message}`;
}

export function formatSuccess(message: string): string {
  return `${C.success('✓')} ${message}`;
}

// ─── Values ──────────────────────────────────────────────────────────

export function formatStyle(style: CommentStyle | undefined): string {
  if (!style) return C.gray('none');
  const parts: string[] = [];
  parts.push(`line ${style.line ? C.cyan(JSON.stringify(style.line)) : C.gray('-')}`);
  parts.push(`block ${style.block ? C.cyan(JSON.stringify(style.block)) : C.gray('-')}`);
  if (style.supportsNesting) parts.push('nesting');
  if (style.isJsxContext) parts.push('jsx');
  return parts.join(', ');
}

export function formatSelection(selection: Selection): string {
  const { start, end } = selection;
  const kind = selection.linewise ? 'lines' : 'chars';
  return `${kind} ${start.line}:${start.col} - ${end.line}:${end.col}`;
}

/**
 * Changed lines between two snapshots of the same file, as `-`/`+` pairs.
 * Only lines at the same index are compared, which covers the in-place
 * edits the line operations make.
 */
export function formatLineDiff(before: readonly string[], after: readonly string[], label?: string): string[] {
  const out: string[] = [];
  if (label) out.push(C.bold(label));
  const shared = Math.min(before.length, after.length);
  for (let i = 0; i < shared; i++) {
    if (before[i] === after[i]) continue;
    out.push(C.removed(`-${i + 1}: ${before[i]}`));
    out.push(C.added(`+${i + 1}: ${after[i]}`));
  }
  for (let i = shared; i < before.length; i++) out.push(C.removed(`-${i + 1}: ${before[i]}`));
  for (let i = shared; i < after.length; i++) out.push(C.added(`+${i + 1}: ${after[i]}`));
  return out;
}
