import { glob } from 'glob';
import fs from 'fs/promises';
import path from 'path';
import { ALWAYS_IGNORE_PATTERNS, createIgnoreMatcher } from './gitignore.js';
import { getSupportedExtensions, isASTSupported } from './ast/parser.js';

export interface ScanOptions {
  /** Directory relative paths are resolved against (defaults to process.cwd()) */
  cwd?: string;
  /** Extra glob patterns to skip, relative to each scanned directory */
  excludePatterns?: readonly string[];
}

/**
 * Scan one directory for analyzable files, honouring its .gitignore.
 */
export async function scanDirectory(
  rootDir: string,
  excludePatterns: readonly string[] = []
): Promise<string[]> {
  const ig = await createIgnoreMatcher(rootDir, excludePatterns);

  const files = await glob(`**/*.{${getSupportedExtensions().join(',')}}`, {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    ignore: [...ALWAYS_IGNORE_PATTERNS, ...excludePatterns],
  });

  return files.filter(file => {
    const relativePath = path.relative(rootDir, file).replace(/\\/g, '/');
    return !ig.ignores(relativePath);
  });
}

/**
 * Expand the paths given on the command line into a sorted, de-duplicated
 * list of analyzable files. Directories are scanned recursively; files are
 * kept when their extension is supported. Paths that do not exist are
 * returned separately so the caller can report them.
 */
export async function scanPaths(
  paths: readonly string[],
  options: ScanOptions = {}
): Promise<{ files: string[]; missing: string[] }> {
  const cwd = options.cwd ?? process.cwd();
  const found = new Set<string>();
  const missing: string[] = [];

  for (const input of paths) {
    const absolute = path.resolve(cwd, input);
    const stat = await fs.stat(absolute).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    });

    if (!stat) {
      missing.push(input);
    } else if (stat.isDirectory()) {
      for (const file of await scanDirectory(absolute, options.excludePatterns)) found.add(file);
    } else if (isASTSupported(absolute)) {
      found.add(absolute);
    }
  }

  return { files: [...found].sort(), missing };
}
