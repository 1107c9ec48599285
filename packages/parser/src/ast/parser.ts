import { extname } from 'path';
import Parser from 'tree-sitter';
import TypeScript from 'tree-sitter-typescript';
import type { ASTParseResult } from './types.js';

/** The grammar object the tree-sitter binding accepts */
type Grammar = NonNullable<Parameters<Parser['setLanguage']>[0]>;

export type SupportedLanguage = 'typescript' | 'tsx';

interface GrammarEntry {
  language: SupportedLanguage;
  grammar: Grammar;
  /** Without the dot */
  extensions: readonly string[];
}

// The TypeScript grammar is a superset of JavaScript's; JSX needs the tsx one.
const GRAMMARS: readonly GrammarEntry[] = [
  { language: 'typescript', grammar: TypeScript.typescript, extensions: ['ts', 'mts', 'cts', 'js', 'mjs', 'cjs'] },
  { language: 'tsx', grammar: TypeScript.tsx, extensions: ['tsx', 'jsx'] },
];

const languageByExtension = new Map<string, GrammarEntry>(
  GRAMMARS.flatMap(entry => entry.extensions.map(ext => [ext, entry] as const))
);

/** One parser per grammar, created on first use */
const parsers = new Map<SupportedLanguage, Parser>();

function parserFor(language: SupportedLanguage): Parser {
  let parser = parsers.get(language);
  if (!parser) {
    const entry = GRAMMARS.find(g => g.language === language);
    if (!entry) throw new Error(`No grammar registered for: ${language}`);
    parser = new Parser();
    parser.setLanguage(entry.grammar);
    parsers.set(language, parser);
  }
  return parser;
}

/** Grammar a file needs, by extension; null when tangle cannot analyze it */
export function detectLanguage(filePath: string): SupportedLanguage | null {
  const ext = extname(filePath).slice(1).toLowerCase();
  return languageByExtension.get(ext)?.language ?? null;
}

export function isASTSupported(filePath: string): boolean {
  return detectLanguage(filePath) !== null;
}

export function getSupportedExtensions(): string[] {
  return GRAMMARS.flatMap(entry => entry.extensions);
}

/**
 * Parse source with tree-sitter. The tree comes back even when it holds
 * syntax errors, with `error` set; it is null only when tree-sitter itself
 * fails.
 */
export function parseAST(content: string, language: SupportedLanguage): ASTParseResult {
  try {
    const tree = parserFor(language).parse(content);
    return tree.rootNode.hasError ? { tree, error: 'Parse completed with errors' } : { tree };
  } catch (error) {
    return { tree: null, error: error instanceof Error ? error.message : 'Unknown parse error' };
  }
}
