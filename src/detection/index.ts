export { isCommented, getMarkers, strip, add, isEmptyStyle } from './regex.js';
export {
  isAvailable, languageAtPosition, isInComment, isInString, isInJsxContext,
  resolveCommentStyle, filetypeStyle, jsxCommentStyle,
  COMMENT_NODE_TYPES, STRING_NODE_TYPES, JSX_MARKUP_NODE_TYPES, JSX_EXPRESSION_NODE_TYPES, JSX_FILETYPES,
} from './syntax-tree.js';
export type { SyntaxNode, SyntaxTreeProvider, NodeRange, ResolveOptions } from './syntax-tree.js';
export { TreeSitterProvider, TREE_SITTER_FILETYPES } from './tree-sitter.js';
