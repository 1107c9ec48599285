import { describe, it, expect } from 'vitest';
import type { Report } from '../types.js';
import { formatReport } from './index.js';

function createReport(overrides: Partial<Report> = {}): Report {
  return {
    summary: {
      filesAnalyzed: 2,
      functionsAnalyzed: 4,
      functionsFlagged: 1,
      failedUnits: 1,
      averageCyclomatic: 2.5,
      maxCyclomatic: 12,
    },
    thresholds: { cyclomaticLimit: 10, cognitiveLimit: 15, nestingLimit: 3, lineLimit: 50 },
    entries: [
      {
        file: 'src/orders.ts',
        name: 'OrderService.submit',
        line: 14,
        endLine: 60,
        cyclomatic: 12,
        cognitive: 18,
        maxNestingDepth: 4,
        lineCount: 47,
        exceeded: ['cyclomatic', 'cognitive', 'nesting'],
        suggestions: [
          {
            pattern: 'Guard Clause',
            functionId: 'src/orders.ts:14:OrderService.submit',
            target: { startLine: 20, endLine: 58 },
            before: { cyclomatic: 12, cognitive: 18, maxNestingDepth: 4 },
            after: { cyclomatic: 12, cognitive: 12, maxNestingDepth: 3 },
            reduction: 6,
            rationale: 'Body is wrapped in `if (order)`; return early on the inverted condition instead',
          },
        ],
      },
    ],
    failures: [
      { file: 'src/legacy.ts', name: 'parse', line: 7, message: 'Unexpected syntax at line 7' },
    ],
    cancelled: false,
    ...overrides,
  };
}

describe('formatReport', () => {
  it('should render one line per function with indented suggestions', () => {
    const output = formatReport(createReport(), 'text');

    expect(output.split('\n')).toEqual([
      'src/orders.ts:14: OrderService.submit cyclomatic=12 cognitive=18',
      '  → Guard Clause: Body is wrapped in `if (order)`; return early on the inverted condition instead (cyclomatic 12→12, cognitive 18→12)',
      'src/legacy.ts:7: parse parse error: Unexpected syntax at line 7',
    ]);
  });

  it('should append the average when asked', () => {
    const output = formatReport(createReport({ entries: [], failures: [] }), 'text', { average: true });

    expect(output).toBe('average cyclomatic=2.5');
  });

  it('should note a cancelled run', () => {
    const output = formatReport(createReport({ entries: [], failures: [], cancelled: true }), 'text');

    expect(output).toBe('analysis cancelled; results are partial');
  });

  it('should colour output only when asked', () => {
    const plain = formatReport(createReport(), 'text', { color: false });
    const coloured = formatReport(createReport(), 'text', { color: true });

    expect(plain).not.toContain('\u001b[');
    expect(coloured).toContain('\u001b[31msrc/orders.ts:14:\u001b[39m');
  });

  it('should render the full report as JSON', () => {
    const report = createReport();

    expect(JSON.parse(formatReport(report, 'json'))).toEqual(report);
  });
});
