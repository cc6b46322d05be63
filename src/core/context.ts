/**
 * The explicit context threaded through every operation: validated
 * configuration, the language registry built from it, and an optional
 * syntax-tree provider.
 */

import type { SyntaxTreeProvider } from '../detection/syntax-tree.js';
import { LanguageRegistry, createRegistry } from '../languages/registry.js';
import { parseConfig } from '../config/load.js';
import type { QuillConfig } from '../config/schema.js';

export interface QuillContext {
  readonly config: QuillConfig;
  readonly registry: LanguageRegistry;
  readonly syntax?: SyntaxTreeProvider;
}

export interface CreateContextOptions {
  /** Raw configuration; validated here */
  config?: unknown;
  syntax?: SyntaxTreeProvider;
  /** Reuse an existing registry instead of building one from `config.languages` */
  registry?: LanguageRegistry;
}

/** Build a context. Throws ConfigError when the configuration is invalid. */
export function createContext(options: CreateContextOptions = {}): QuillContext {
  const config = parseConfig(options.config ?? {});
  const registry = options.registry ?? createRegistry(config.languages);
  return { config, registry, syntax: options.syntax };
}

/** Same context with a different syntax-tree provider */
export function withSyntax(ctx: QuillContext, syntax: SyntaxTreeProvider | undefined): QuillContext {
  return { config: ctx.config, registry: ctx.registry, syntax };
}
