/**
 * Syntax-tree detection.
 *
 * Works against a host-supplied provider; the nodes it hands back are
 * borrowed for one query and never stored. Rows and columns are 0-indexed.
 */

import type { CommentStyle, TextBuffer } from '../types/index.js';
import type { LanguageRegistry } from '../languages/registry.js';
import { resolveFromTemplate } from '../languages/template.js';

// ─── Provider interface ──────────────────────────────────────────────

export interface NodeRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

export interface SyntaxNode {
  type(): string;
  parent(): SyntaxNode | null;
  range(): NodeRange;
}

export interface SyntaxTreeProvider {
  isAvailable(buffer: TextBuffer): boolean;
  /** Language of the (possibly embedded) grammar at the position */
  languageAt(buffer: TextBuffer, row: number, col: number): string | undefined;
  smallestNodeAt(buffer: TextBuffer, row: number, col: number): SyntaxNode | undefined;
}

// ─── Node classes ────────────────────────────────────────────────────

export const COMMENT_NODE_TYPES: ReadonlySet<string> = new Set([
  'comment', 'line_comment', 'block_comment', 'doc_comment', 'comment_block', 'shebang',
]);

export const STRING_NODE_TYPES: ReadonlySet<string> = new Set([
  'string', 'string_literal', 'string_content', 'template_string',
  'quoted_string', 'raw_string', 'interpreted_string_literal',
]);

export const JSX_MARKUP_NODE_TYPES: ReadonlySet<string> = new Set([
  'jsx_element', 'jsx_fragment', 'jsx_self_closing_element',
  'jsx_opening_element', 'jsx_closing_element',
]);

export const JSX_EXPRESSION_NODE_TYPES: ReadonlySet<string> = new Set([
  'jsx_expression', 'jsx_expression_statement',
]);

/** Filetypes whose markup takes `{/* *\/}` comments */
export const JSX_FILETYPES: ReadonlySet<string> = new Set(['javascriptreact', 'typescriptreact']);

export function jsxCommentStyle(): CommentStyle {
  return { block: ['{/*', '*/}'], supportsNesting: false, isJsxContext: true };
}

// ─── Queries ─────────────────────────────────────────────────────────

export function isAvailable(provider: SyntaxTreeProvider | undefined, buffer: TextBuffer): boolean {
  return provider !== undefined && provider.isAvailable(buffer);
}

export function languageAtPosition(
  provider: SyntaxTreeProvider | undefined,
  buffer: TextBuffer,
  row: number,
  col: number,
): string | undefined {
  if (!provider || !provider.isAvailable(buffer)) return undefined;
  return provider.languageAt(buffer, row, col) || undefined;
}

function hasAncestorOfType(
  provider: SyntaxTreeProvider | undefined,
  buffer: TextBuffer,
  row: number,
  col: number,
  types: ReadonlySet<string>,
): boolean {
  if (!provider || !provider.isAvailable(buffer)) return false;
  let node = provider.smallestNodeAt(buffer, row, col) ?? null;
  while (node) {
    if (types.has(node.type())) return true;
    node = node.parent();
  }
  return false;
}

export function isInComment(
  provider: SyntaxTreeProvider | undefined,
  buffer: TextBuffer,
  row: number,
  col: number,
): boolean {
  return hasAncestorOfType(provider, buffer, row, col, COMMENT_NODE_TYPES);
}

export function isInString(
  provider: SyntaxTreeProvider | undefined,
  buffer: TextBuffer,
  row: number,
  col: number,
): boolean {
  return hasAncestorOfType(provider, buffer, row, col, STRING_NODE_TYPES);
}

/**
 * Nearest ancestor wins: walking outward from the covering node, the first
 * JSX expression (`{...}`) means plain script context, the first JSX
 * element/fragment/tag means markup context.
 */
export function isInJsxContext(
  provider: SyntaxTreeProvider | undefined,
  buffer: TextBuffer,
  row: number,
  col: number,
): boolean {
  if (!provider || !provider.isAvailable(buffer)) return false;
  let node = provider.smallestNodeAt(buffer, row, col) ?? null;
  while (node) {
    const type = node.type();
    if (JSX_EXPRESSION_NODE_TYPES.has(type)) return false;
    if (JSX_MARKUP_NODE_TYPES.has(type)) return true;
    node = node.parent();
  }
  return false;
}

// ─── Style resolution ────────────────────────────────────────────────

export interface ResolveOptions {
  /** When false the JSX markup style is never substituted */
  jsxAutoDetect: boolean;
}

/** Filetype-level style: registry first, then the buffer's comment template */
export function filetypeStyle(registry: LanguageRegistry, buffer: TextBuffer): CommentStyle | undefined {
  return registry.resolve(buffer.filetype) ?? resolveFromTemplate(buffer.commentTemplate);
}

/**
 * Style at a position. Without a usable parser, or without a language at
 * the position, falls back to the filetype. In react filetypes JSX markup
 * gets the `{/* *\/}` style; otherwise the embedded language's style,
 * then the filetype's.
 */
export function resolveCommentStyle(
  provider: SyntaxTreeProvider | undefined,
  registry: LanguageRegistry,
  buffer: TextBuffer,
  row: number,
  col: number,
  options: ResolveOptions = { jsxAutoDetect: true },
): CommentStyle | undefined {
  const language = languageAtPosition(provider, buffer, row, col);
  if (!language) return filetypeStyle(registry, buffer);

  if (
    options.jsxAutoDetect &&
    JSX_FILETYPES.has(registry.canonicalId(buffer.filetype)) &&
    isInJsxContext(provider, buffer, row, col)
  ) {
    return jsxCommentStyle();
  }

  return registry.resolve(language) ?? filetypeStyle(registry, buffer);
}
