import { describe, it, expect } from 'vitest';
import { TOP_LEVEL_NAME } from '@tangle/parser';
import { analyzeSource, analyzeSources } from './analyzer.js';
import { DEFAULT_THRESHOLDS } from './constants.js';
import { ParseError, TangleErrorCode } from './errors/index.js';
import { silentLogger, type Logger } from './logger.js';

const CLASSIFY = `
function classify(a, b) {
  if ((a && b) || !a) {
    return "A";
  } else {
    return "B";
  }
}
`.trim();

const strict = { ...DEFAULT_THRESHOLDS, cyclomaticLimit: 3 };

describe('analyzeSource', () => {
  it('should score every function in a file', () => {
    const { functions, failures } = analyzeSource(
      'mixed.ts',
      `${CLASSIFY}\n\nconst id = (x) => x;`
    );

    expect(failures).toEqual([]);
    expect(functions.map(f => [f.record.unit.name, f.record.cyclomatic])).toEqual([
      ['classify', 4],
      ['id', 1],
    ]);
  });

  it('should only advise functions over a limit', () => {
    const relaxed = analyzeSource('c.ts', CLASSIFY);
    const flagged = analyzeSource('c.ts', CLASSIFY, { thresholds: strict });

    expect(relaxed.functions[0].suggestions).toEqual([]);
    expect(flagged.functions[0].suggestions.map(s => s.pattern)).toEqual(['Invert Expression']);
  });

  it('should skip suggestions when disabled', () => {
    const { functions } = analyzeSource('c.ts', CLASSIFY, { thresholds: strict, suggestions: false });

    expect(functions[0].suggestions).toEqual([]);
  });

  it('should report parse failures as ParseError and keep the other functions', () => {
    const { functions, failures } = analyzeSource(
      'bad.ts',
      'function broken() {\n  return 1 +;\n}\n\nfunction fine() {\n  return 2;\n}'
    );

    expect(functions.map(f => f.record.unit.name)).toEqual(['fine']);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ file: 'bad.ts', name: 'broken', line: 2 });
    expect(failures[0].error).toBeInstanceOf(ParseError);
    expect(failures[0].error.code).toBe(TangleErrorCode.PARSE_FAILED);
  });

  it('should turn an unsupported file into a single failure', () => {
    const { functions, failures } = analyzeSource('notes.txt', 'hello');

    expect(functions).toEqual([]);
    expect(failures.map(f => [f.name, f.line, f.error.message])).toEqual([
      [TOP_LEVEL_NAME, 1, 'Unsupported language for file: notes.txt'],
    ]);
  });
});

describe('analyzeSources', () => {
  const files = [
    { path: 'a.ts', content: 'function a() {\n  return 1;\n}' },
    { path: 'b.ts', content: 'function b(x) {\n  if (x) return 1;\n  return 2;\n}' },
  ];

  it('should analyze every file', async () => {
    const result = await analyzeSources(files);

    expect(result.cancelled).toBe(false);
    expect(result.filesAnalyzed).toBe(2);
    expect(result.functions.map(f => f.record.unit.id)).toEqual(['a.ts:1:a', 'b.ts:1:b']);
  });

  it('should stop at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await analyzeSources(files, { signal: controller.signal });

    expect(result).toEqual({ filesAnalyzed: 0, functions: [], failures: [], cancelled: true });
  });

  it('should keep finished functions when aborted midway', async () => {
    const controller = new AbortController();
    const logger: Logger = {
      ...silentLogger,
      debug: message => {
        if (message.startsWith('b.ts')) controller.abort();
      },
    };

    const result = await analyzeSources(files, { signal: controller.signal, logger });

    expect(result.cancelled).toBe(true);
    expect(result.filesAnalyzed).toBe(1);
    expect(result.functions.map(f => f.record.unit.name)).toEqual(['a']);
  });

  it('should stop inside a file when the abort arrives between functions', async () => {
    const controller = new AbortController();
    const logger: Logger = {
      ...silentLogger,
      debug: message => {
        if (message.startsWith('c.ts:1:first')) setImmediate(() => controller.abort());
      },
    };
    const source = [
      'function first() {\n  return 1;\n}',
      'function second() {\n  return 2;\n}',
      'function third() {\n  return 3;\n}',
    ].join('\n\n');

    const result = await analyzeSources([{ path: 'c.ts', content: source }], { signal: controller.signal, logger });

    expect(result.cancelled).toBe(true);
    expect(result.filesAnalyzed).toBe(0);
    expect(result.functions.map(f => f.record.unit.name)).toEqual(['first']);
  });

  it('should be idempotent', async () => {
    const first = await analyzeSources(files);
    const second = await analyzeSources(files);

    expect(second.functions.map(f => f.record.cyclomatic)).toEqual(
      first.functions.map(f => f.record.cyclomatic)
    );
  });
});
