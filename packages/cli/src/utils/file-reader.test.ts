import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ParallelFileReader } from './file-reader.js';

describe('ParallelFileReader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tangle-reader-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should read files in input order', async () => {
    const names = ['c.ts', 'a.ts', 'b.ts'];
    for (const name of names) {
      await fs.writeFile(path.join(testDir, name), `// ${name}`);
    }

    const reader = new ParallelFileReader(2);
    const { sources, unreadable } = await reader.readFiles(names.map(n => path.join(testDir, n)));

    expect(unreadable).toEqual([]);
    expect(sources.map(s => [path.basename(s.path), s.content])).toEqual([
      ['c.ts', '// c.ts'],
      ['a.ts', '// a.ts'],
      ['b.ts', '// b.ts'],
    ]);
  });

  it('should set aside files that cannot be read', async () => {
    const present = path.join(testDir, 'present.ts');
    const gone = path.join(testDir, 'gone.ts');
    await fs.writeFile(present, 'export {};');

    const { sources, unreadable } = await new ParallelFileReader().readFiles([present, gone]);

    expect(sources).toEqual([{ path: present, content: 'export {};' }]);
    expect(unreadable.map(u => u.path)).toEqual([gone]);
    expect(unreadable[0].reason).toContain('ENOENT');
  });
});
