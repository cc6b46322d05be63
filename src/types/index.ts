/**
 * Quill: core type definitions
 * Shared value types for comment styles, buffers, results and regions.
 */

// ─── Comment styles ──────────────────────────────────────────────────

export type BlockPair = readonly [open: string, close: string];

export interface CommentStyle {
  /** Line marker such as `//`; absent when the language has no line form */
  line?: string;
  /** Block open/close pair such as `['/*', '*\/']` */
  block?: BlockPair;
  supportsNesting: boolean;
  /** Set only on the style produced for JSX markup (`{/* *\/}`) */
  isJsxContext: boolean;
}

export type MarkerType = 'line' | 'block';

export type StyleType = MarkerType;

/** 0-indexed marker positions within one line; `endPos` is exclusive */
export interface CommentMarkers {
  startPos: number;
  endPos: number;
  markerType: MarkerType;
}

export type LineRangeState = 'allCommented' | 'noneCommented' | 'mixed';

export type CurrentStyle = 'line' | 'block' | 'mixed' | 'none';

// ─── Host collaborators ──────────────────────────────────────────────

/** Grouped-mutation service: edits between begin/end undo as one unit */
export interface MutationGroup {
  begin(): void;
  end(): void;
}

/**
 * Buffer accessor supplied by the host. `getLines`/`setLines` take
 * 0-indexed, end-exclusive bounds.
 */
export interface TextBuffer {
  readonly filetype: string;
  /** Editor comment template such as `"# %s"`, used when the filetype is unknown */
  readonly commentTemplate?: string;
  readonly history: MutationGroup;
  lineCount(): number;
  getLines(start: number, end: number): string[];
  setLines(start: number, end: number, lines: readonly string[]): void;
  /**
   * Counter that changes whenever the text does. Lets a syntax provider
   * skip reading the buffer to decide whether its tree is stale.
   */
  changeTick?(): number;
}

// ─── Regions & selections ────────────────────────────────────────────

/** Lines are 1-indexed and inclusive */
export interface DebugRegion {
  startLine: number;
  endLine: number;
  isCommented: boolean;
}

/** 1-indexed inclusive line span */
export interface LineSpan {
  startLine: number;
  endLine: number;
}

/** 1-indexed line, 0-indexed column */
export interface Position {
  line: number;
  col: number;
}

/** Character-wise selection; `end.col` is exclusive */
export interface Selection {
  start: Position;
  end: Position;
  linewise: boolean;
}

// ─── Results & errors ────────────────────────────────────────────────

export type QuillErrorKind =
  | 'unsupported-language'
  | 'invalid-range'
  | 'invalid-option'
  | 'malformed-config'
  | 'collaborator';

export interface QuillError {
  kind: QuillErrorKind;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: QuillError };

// ─── Operation options ───────────────────────────────────────────────

export interface ToggleOptions {
  forceComment?: boolean;
  forceUncomment?: boolean;
  styleType?: StyleType;
}

export interface ToggleOutcome {
  action: 'comment' | 'uncomment';
  state: LineRangeState;
  linesChanged: number;
}
