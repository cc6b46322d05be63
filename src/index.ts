/**
 * quill-comment
 *
 * Library entry point. Re-exports the language registry, detection,
 * the toggle engine, derived features and configuration.
 *
 * Usage:
 *   import { createContext, MemoryBuffer, toggleLines } from 'quill-comment';
 *   import type { TextBuffer, CommentStyle } from 'quill-comment';
 */

export * from './types/index.js';
export * from './util/index.js';
export * from './languages/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './features/index.js';
export * from './project/index.js';
export {
  getMarkers, strip, add, isEmptyStyle,
  isCommented as isLineCommentedWith,
} from './detection/regex.js';
export {
  isAvailable, languageAtPosition, isInComment, isInString, isInJsxContext,
  resolveCommentStyle, filetypeStyle, jsxCommentStyle,
  COMMENT_NODE_TYPES, STRING_NODE_TYPES, JSX_MARKUP_NODE_TYPES, JSX_EXPRESSION_NODE_TYPES, JSX_FILETYPES,
  TreeSitterProvider, TREE_SITTER_FILETYPES,
} from './detection/index.js';
export type { SyntaxNode, SyntaxTreeProvider, NodeRange, ResolveOptions } from './detection/index.js';
