export {
  quillConfigSchema, alignSchema, debugSchema, jsxSchema, semanticSchema, projectSchema,
  DEFAULT_EXCLUDES,
} from './schema.js';
export type {
  QuillConfig, QuillConfigInput, AlignConfig, DebugConfig, ProjectConfig, SemanticConfig,
} from './schema.js';
export {
  parseConfig, mergeConfig, loadConfig, describeConfigSource,
  projectConfigPath, globalConfigPath, CONFIG_ENV_VAR,
} from './load.js';
export type { LoadConfigOptions, LoadedConfig } from './load.js';
