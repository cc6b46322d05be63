/**
 * SyntaxTreeProvider backed by web-tree-sitter, with grammars from
 * tree-sitter-wasms. Covers the JavaScript and TypeScript families; other
 * filetypes report the provider as unavailable and detection falls back to
 * the registry.
 */

import type Parser from 'web-tree-sitter';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import type { Result, TextBuffer } from '../types/index.js';
import { ok, fail } from '../util/errors.js';
import type { NodeRange, SyntaxNode, SyntaxTreeProvider } from './syntax-tree.js';

const require = createRequire(import.meta.url);
// web-tree-sitter is a CommonJS module whose export is the Parser class itself
const TreeSitter: typeof Parser = require('web-tree-sitter');

interface Grammar {
  wasm: string;
  /** Language id reported by `languageAt` */
  language: string;
}

const GRAMMARS: Record<string, Grammar> = {
  javascript: { wasm: 'tree-sitter-javascript.wasm', language: 'javascript' },
  javascriptreact: { wasm: 'tree-sitter-javascript.wasm', language: 'javascript' },
  typescript: { wasm: 'tree-sitter-typescript.wasm', language: 'typescript' },
  typescriptreact: { wasm: 'tree-sitter-tsx.wasm', language: 'tsx' },
};

export const TREE_SITTER_FILETYPES: readonly string[] = Object.keys(GRAMMARS);

// ─── Node adapter ────────────────────────────────────────────────────

function adaptNode(node: Parser.SyntaxNode): SyntaxNode {
  return {
    type: () => node.type,
    parent: () => (node.parent ? adaptNode(node.parent) : null),
    range: (): NodeRange => ({
      startRow: node.startPosition.row,
      startCol: node.startPosition.column,
      endRow: node.endPosition.row,
      endCol: node.endPosition.column,
    }),
  };
}

// ─── Provider ────────────────────────────────────────────────────────

interface CachedTree {
  /** Buffer change tick, or the full text for buffers without one */
  key: number | string;
  tree: Parser.Tree;
}

export interface TreeSitterLoadOptions {
  /** Maps filetype aliases (`tsx`, `jsx`) to the ids grammars are keyed by */
  canonicalId?: (filetype: string) => string;
}

export class TreeSitterProvider implements SyntaxTreeProvider {
  private readonly parser: Parser;
  private readonly languages: Map<string, Parser.Language>;
  private readonly canonicalId: (filetype: string) => string;
  private readonly trees = new WeakMap<TextBuffer, CachedTree>();

  private constructor(
    parser: Parser,
    languages: Map<string, Parser.Language>,
    canonicalId: (filetype: string) => string,
  ) {
    this.parser = parser;
    this.languages = languages;
    this.canonicalId = canonicalId;
  }

  /**
   * Initialize the WASM runtime and load grammars for `filetypes`.
   * Loading is sequential: web-tree-sitter keeps global state.
   */
  static async load(
    filetypes: readonly string[] = TREE_SITTER_FILETYPES,
    options: TreeSitterLoadOptions = {},
  ): Promise<Result<TreeSitterProvider>> {
    const canonicalId = options.canonicalId ?? ((filetype: string) => filetype);
    try {
      await TreeSitter.init();
      const parser = new TreeSitter();
      const wasmDir = join(dirname(require.resolve('tree-sitter-wasms/package.json')), 'out');

      const byFile = new Map<string, Parser.Language>();
      const languages = new Map<string, Parser.Language>();
      for (const requested of filetypes) {
        const filetype = canonicalId(requested);
        const grammar = GRAMMARS[filetype];
        if (!grammar) continue;
        let language = byFile.get(grammar.wasm);
        if (!language) {
          language = await TreeSitter.Language.load(join(wasmDir, grammar.wasm));
          byFile.set(grammar.wasm, language);
        }
        languages.set(filetype, language);
      }
      return ok(new TreeSitterProvider(parser, languages, canonicalId));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail('collaborator', `tree-sitter unavailable: ${message}`);
    }
  }

  isAvailable(buffer: TextBuffer): boolean {
    return this.languages.has(this.filetypeOf(buffer));
  }

  languageAt(buffer: TextBuffer, row: number, col: number): string | undefined {
    if (!this.tree(buffer)) return undefined;
    if (row < 0 || row >= buffer.lineCount() || col < 0) return undefined;
    return GRAMMARS[this.filetypeOf(buffer)]?.language;
  }

  smallestNodeAt(buffer: TextBuffer, row: number, col: number): SyntaxNode | undefined {
    const tree = this.tree(buffer);
    if (!tree) return undefined;
    return adaptNode(tree.rootNode.descendantForPosition({ row, column: col }));
  }

  private filetypeOf(buffer: TextBuffer): string {
    return this.canonicalId(buffer.filetype);
  }

  /** Parse on demand; reparse only when the buffer changed */
  private tree(buffer: TextBuffer): Parser.Tree | undefined {
    const language = this.languages.get(this.filetypeOf(buffer));
    if (!language) return undefined;

    const cached = this.trees.get(buffer);
    const tick = buffer.changeTick?.();
    if (cached && tick !== undefined && cached.key === tick) return cached.tree;

    const text = buffer.getLines(0, buffer.lineCount()).join('\n');
    if (cached && cached.key === text) return cached.tree;

    this.parser.setLanguage(language);
    const tree = this.parser.parse(text);
    cached?.tree.delete();
    this.trees.set(buffer, { key: tick ?? text, tree });
    return tree;
  }
}
