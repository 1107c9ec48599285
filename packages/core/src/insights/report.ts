import type { MetricRecord } from '../complexity/types.js';
import type { Thresholds } from '../config/schema.js';
import type {
  AnalysisResult,
  FunctionResult,
  MetricName,
  Report,
  ReportEntry,
  ReportSummary,
} from './types.js';

export interface ReportOptions {
  /** List every function, not only the flagged ones */
  includeAll?: boolean;
}

/**
 * Metrics of a record that are strictly above their limit, in display order.
 */
export function exceededMetrics(record: MetricRecord, thresholds: Thresholds): MetricName[] {
  const exceeded: MetricName[] = [];
  if (record.cyclomatic > thresholds.cyclomaticLimit) exceeded.push('cyclomatic');
  if (record.cognitive > thresholds.cognitiveLimit) exceeded.push('cognitive');
  if (record.maxNestingDepth > thresholds.nestingLimit) exceeded.push('nesting');
  if (record.lineCount > thresholds.lineLimit) exceeded.push('lines');
  return exceeded;
}

export function isFlagged(record: MetricRecord, thresholds: Thresholds): boolean {
  return exceededMetrics(record, thresholds).length > 0;
}

/** Most complex first; path and line keep the order stable */
function compareEntries(a: ReportEntry, b: ReportEntry): number {
  return (
    b.cyclomatic - a.cyclomatic ||
    b.cognitive - a.cognitive ||
    a.file.localeCompare(b.file) ||
    a.line - b.line
  );
}

function toEntry({ record, suggestions }: FunctionResult, thresholds: Thresholds): ReportEntry {
  return {
    file: record.unit.file,
    name: record.unit.name,
    line: record.unit.span.startLine,
    endLine: record.unit.span.endLine,
    cyclomatic: record.cyclomatic,
    cognitive: record.cognitive,
    maxNestingDepth: record.maxNestingDepth,
    lineCount: record.lineCount,
    exceeded: exceededMetrics(record, thresholds),
    suggestions,
  };
}

function summarize(
  analysis: AnalysisResult,
  entries: readonly ReportEntry[]
): ReportSummary {
  const cyclomatic = analysis.functions.map(f => f.record.cyclomatic);
  const total = cyclomatic.reduce((sum, c) => sum + c, 0);

  return {
    filesAnalyzed: analysis.filesAnalyzed,
    functionsAnalyzed: cyclomatic.length,
    functionsFlagged: entries.filter(e => e.exceeded.length > 0).length,
    failedUnits: analysis.failures.length,
    averageCyclomatic: cyclomatic.length > 0 ? Math.round((total / cyclomatic.length) * 10) / 10 : 0,
    maxCyclomatic: cyclomatic.reduce((max, c) => Math.max(max, c), 0),
  };
}

/**
 * Aggregate a batch analysis into a report: flagged functions (or every
 * function with `includeAll`) ranked most complex first, failures and a
 * summary.
 */
export function buildReport(
  analysis: AnalysisResult,
  thresholds: Thresholds,
  options: ReportOptions = {}
): Report {
  const all = analysis.functions.map(f => toEntry(f, thresholds)).sort(compareEntries);

  return {
    summary: summarize(analysis, all),
    thresholds: { ...thresholds },
    entries: options.includeAll ? all : all.filter(e => e.exceeded.length > 0),
    failures: analysis.failures.map(f => ({
      file: f.file,
      name: f.name,
      line: f.line,
      message: f.error.message,
    })),
    cancelled: analysis.cancelled,
  };
}

/**
 * Whether any reported function is over a limit.
 */
export function hasViolations(report: Report): boolean {
  return report.summary.functionsFlagged > 0;
}
