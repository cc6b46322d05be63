/**
 * Quill configuration schema.
 * Every section is optional in input; zod fills the defaults.
 */

import { z } from 'zod';
import { languageOverridesSchema } from '../languages/schema.js';

export const DEFAULT_EXCLUDES: readonly string[] = [
  '.git', 'node_modules', 'vendor', 'build', 'dist', '.next', '__pycache__', '.venv', 'target',
];

// ─── Sections ────────────────────────────────────────────────────────

export const alignSchema = z.object({
  /** Comments never start past this column */
  column: z.number().int().positive().default(80),
  /** Minimum spaces between code and its trailing comment */
  minGap: z.number().int().min(1).default(2),
  tabWidth: z.number().int().positive().default(8),
}).strict();

export const debugSchema = z.object({
  startMarker: z.string().min(1).default('#region debug'),
  endMarker: z.string().min(1).default('#endregion'),
}).strict();

export const jsxSchema = z.object({
  autoDetect: z.boolean().default(true),
}).strict();

export const semanticSchema = z.object({
  includeDecorators: z.boolean().default(true),
  includeDocComments: z.boolean().default(true),
}).strict();

export const projectSchema = z.object({
  maxFiles: z.number().int().positive().default(10000),
  maxFileBytes: z.number().int().positive().default(1048576),
  useSearchTool: z.boolean().default(true),
  /** Directory names skipped by the filesystem walk */
  exclude: z.array(z.string().min(1)).default([...DEFAULT_EXCLUDES]),
}).strict();

// ─── Root ────────────────────────────────────────────────────────────

export const quillConfigSchema = z.object({
  align: alignSchema.default({}),
  debug: debugSchema.default({}),
  languages: languageOverridesSchema.default({}),
  jsx: jsxSchema.default({}),
  semantic: semanticSchema.default({}),
  project: projectSchema.default({}),
}).strict();

export type QuillConfig = z.infer<typeof quillConfigSchema>;
export type QuillConfigInput = z.input<typeof quillConfigSchema>;
export type AlignConfig = QuillConfig['align'];
export type DebugConfig = QuillConfig['debug'];
export type ProjectConfig = QuillConfig['project'];
export type SemanticConfig = QuillConfig['semantic'];
