export { MemoryBuffer } from './buffer.js';
export type { MemoryBufferOptions } from './buffer.js';
export { UndoHistory, withUndoGroup, runGrouped } from './undo.js';
export type { LineEdit } from './undo.js';
export { createContext, withSyntax } from './context.js';
export type { QuillContext, CreateContextOptions } from './context.js';
export { getCommentStyle, getFiletypeStyle, isCommented, isInCommentNode } from './detect.js';
export {
  commentLine, uncommentLine, containsBlockComment, isBlockWrapped,
  wrapBlock, unwrapBlock, commentRange, uncommentRange, isStyleType,
} from './comment.js';
export {
  validateRange, analyzeLines, toggleLines, toggleLine, commentLines, uncommentLines,
  NO_STYLE_MESSAGE,
} from './toggle.js';
