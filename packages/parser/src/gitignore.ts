import ignore, { type Ignore } from 'ignore';
import fs from 'fs/promises';
import path from 'path';

/**
 * Patterns that are never analyzed, whatever the user's .gitignore says.
 * Single source of truth, imported by scanner.ts.
 */
export const ALWAYS_IGNORE_PATTERNS = [
  'node_modules/**',
  '**/node_modules/**',
  '.git/**',
  '**/.git/**',
  'dist/**',
  '**/dist/**',
  'build/**',
  '**/build/**',
  'coverage/**',
  '**/coverage/**',
  '*.min.js',
  '**/*.min.js',
  '*.d.ts',
  '**/*.d.ts',
];

/** Read .gitignore content from a directory, or null if it has none */
async function readGitignore(dir: string): Promise<string | null> {
  try {
    return await fs.readFile(path.join(dir, '.gitignore'), 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Build the ignore matcher for a directory: its .gitignore (when present),
 * the always-ignored patterns, then any extra exclusions.
 *
 * Paths given to the matcher must be relative to `rootDir`.
 */
export async function createIgnoreMatcher(
  rootDir: string,
  excludePatterns: readonly string[] = []
): Promise<Ignore> {
  const ig = ignore();
  const content = await readGitignore(rootDir);
  if (content !== null) ig.add(content);
  return ig.add([...ALWAYS_IGNORE_PATTERNS, ...excludePatterns]);
}
