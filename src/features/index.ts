export {
  findTrailingComment, calculateTargetColumn, formatAlignedLine, alignLines,
} from './align.js';
export type { TrailingComment } from './align.js';
export { normalizeLine, normalizeRange, normalizeBuffer } from './normalize.js';
export type { NormalizedLine, NormalizeLineOptions, CommentLineKind } from './normalize.js';
export { detectCurrentStyle, convertToLine, convertToBlock } from './convert.js';
export {
  scanRegionSpans, findDebugRegions, isRegionCommented, toggleRegion, toggleBufferRegions,
  listRegions, formatRegion,
} from './debug.js';
export type { BufferToggleSummary, RegionListing } from './debug.js';
export {
  findAttachedDecorators, findFunctionBounds, findDocComment, expandSelection, FUNCTION_NODE_TYPES,
} from './semantic.js';
export {
  findCommentBlockBounds, extractLineContent, selectInnerBlock, selectAroundBlock,
  selectInnerLine, selectAroundLine,
} from './textobjects.js';
export type { LineContent } from './textobjects.js';
