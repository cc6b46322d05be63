/**
 * Derive a comment style from an editor comment template such as
 * `"# %s"` or `"<!-- %s -->"`. Heuristic fallback for filetypes the
 * registry does not know; returns undefined instead of throwing.
 */

import type { CommentStyle } from '../types/index.js';

const KNOWN_BLOCKS: ReadonlyArray<readonly [string, string]> = [
  ['/*', '*/'],
  ['<!--', '-->'],
  ['{-', '-}'],
  ['(*', '*)'],
  ['#[', ']#'],
  ['#|', '|#'],
];

function blockStyle(open: string, close: string): CommentStyle {
  return { block: [open, close], supportsNesting: false, isJsxContext: false };
}

export function resolveFromTemplate(template: string | undefined): CommentStyle | undefined {
  if (!template) return undefined;

  const body = template.replace(/%s/g, '').trim();
  if (body === '') return undefined;

  const compact = body.replace(/\s+/g, '');
  for (const [open, close] of KNOWN_BLOCKS) {
    if (compact === open + close) return blockStyle(open, close);
  }

  const tokens = body.split(/\s+/);
  if (tokens.length === 2 && tokens[0] !== tokens[1]) {
    return blockStyle(tokens[0], tokens[1]);
  }

  // Un-spaced forms the table above misses: "/*-%s-*/", "<!--%s"
  if (tokens.length === 1) {
    if (body.length > 4 && body.startsWith('/*') && body.endsWith('*/')) {
      return blockStyle('/*', '*/');
    }
    if (body.startsWith('<!--')) return blockStyle('<!--', '-->');
  }

  return { line: body, supportsNesting: false, isJsxContext: false };
}
