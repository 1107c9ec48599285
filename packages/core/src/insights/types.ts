import type { MetricRecord } from '../complexity/types.js';
import type { PatternSuggestion } from '../advisor/types.js';
import type { Thresholds } from '../config/schema.js';
import type { ParseError } from '../errors/index.js';

export type MetricName = 'cyclomatic' | 'cognitive' | 'nesting' | 'lines';

/**
 * A function whose source did not parse. It has no metrics; the batch goes on.
 */
export interface UnitFailure {
  file: string;
  name: string;
  line: number;
  error: ParseError;
}

/** One scored function and the refactorings suggested for it */
export interface FunctionResult {
  record: MetricRecord;
  suggestions: PatternSuggestion[];
}

/**
 * Output of a batch analysis, the input of the report.
 */
export interface AnalysisResult {
  filesAnalyzed: number;
  functions: FunctionResult[];
  failures: UnitFailure[];
  /** The batch was aborted; `functions` holds what finished before */
  cancelled: boolean;
}

export interface ReportEntry {
  file: string;
  name: string;
  line: number;
  endLine: number;
  cyclomatic: number;
  cognitive: number;
  maxNestingDepth: number;
  lineCount: number;
  /** Metrics strictly above their limit, empty for functions within limits */
  exceeded: MetricName[];
  suggestions: PatternSuggestion[];
}

export interface ReportFailure {
  file: string;
  name: string;
  line: number;
  message: string;
}

export interface ReportSummary {
  filesAnalyzed: number;
  functionsAnalyzed: number;
  functionsFlagged: number;
  failedUnits: number;
  /** Rounded to one decimal */
  averageCyclomatic: number;
  maxCyclomatic: number;
}

export interface Report {
  summary: ReportSummary;
  thresholds: Thresholds;
  entries: ReportEntry[];
  failures: ReportFailure[];
  cancelled: boolean;
}
