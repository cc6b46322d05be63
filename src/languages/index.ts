export { LanguageRegistry, createRegistry, loadBuiltinTable, mergeStyle } from './registry.js';
export type { LanguageEntry } from './registry.js';
export { resolveFromTemplate } from './template.js';
export {
  markerSchema, blockPairSchema, languageEntrySchema, languageOverrideSchema,
  languageOverridesSchema, languageTableSchema, toConfigError, parseOrThrow,
} from './schema.js';
export type { LanguageOverride, LanguageOverrideInput, LanguageTable, LanguageEntryData } from './schema.js';
