import fs from 'fs/promises';
import pLimit from 'p-limit';
import { getErrorMessage, type SourceFile } from '@tangle/core';

export interface ReadResult {
  sources: SourceFile[];
  /** Files that could not be read, with the reason */
  unreadable: Array<{ path: string; reason: string }>;
}

/**
 * Parallel file reader that reads many source files concurrently.
 * Uses p-limit to control concurrency and avoid overwhelming the filesystem.
 */
export class ParallelFileReader {
  private concurrency: number;

  /**
   * @param concurrency - Maximum number of concurrent file reads (default: 8)
   */
  constructor(concurrency: number = 8) {
    this.concurrency = concurrency;
  }

  /**
   * Read every file, keeping the input order. A file that fails to read
   * (deleted, permission denied) lands in `unreadable` instead.
   */
  async readFiles(filepaths: readonly string[]): Promise<ReadResult> {
    const limit = pLimit(this.concurrency);

    const results = await Promise.all(
      filepaths.map(filepath =>
        limit(async (): Promise<SourceFile | ReadResult['unreadable'][number]> => {
          try {
            const content = await fs.readFile(filepath, 'utf-8');
            return { path: filepath, content };
          } catch (error) {
            return { path: filepath, reason: getErrorMessage(error) };
          }
        })
      )
    );

    const sources: SourceFile[] = [];
    const unreadable: ReadResult['unreadable'] = [];
    for (const result of results) {
      if ('content' in result) {
        sources.push(result);
      } else {
        unreadable.push(result);
      }
    }
    return { sources, unreadable };
  }
}
