/**
 * @tangle/core - complexity scoring, refactoring advice and reporting
 *
 * This is the public API for:
 * - @tangle/cli (the `tangle` command)
 * - Third-party integrations
 *
 * @example
 * ```typescript
 * import { analyzeSources, buildReport, formatReport, DEFAULT_THRESHOLDS } from '@tangle/core';
 *
 * const analysis = await analyzeSources([{ path: 'src/app.ts', content }]);
 * const report = buildReport(analysis, DEFAULT_THRESHOLDS);
 * console.log(formatReport(report, 'text'));
 * ```
 */

// =============================================================================
// ANALYSIS
// =============================================================================

export { analyzeSource, analyzeSources } from './analyzer.js';
export type { SourceFile, AnalyzeOptions, BatchOptions, FileAnalysis } from './analyzer.js';

// =============================================================================
// COMPLEXITY
// =============================================================================

export {
  scoreBody,
  scoreFunction,
  buildControlFlowGraph,
  decisionPoints,
  reachableBlocks,
  cyclomaticComplexity,
  calculateCyclomaticComplexity,
  calculateCognitiveComplexity,
  lineCount,
  maxNestingDepth,
} from './complexity/index.js';
export type {
  BasicBlock,
  BasicBlockKind,
  ControlFlowEdge,
  ControlFlowGraph,
  MetricRecord,
  MetricSnapshot,
  CognitiveResult,
} from './complexity/index.js';

// =============================================================================
// PATTERN ADVISOR
// =============================================================================

export { adviseFunction, rankSuggestions, CHECKERS, PATTERN_PRIORITY, minimizeCondition } from './advisor/index.js';
export type {
  AdvisorContext,
  PatternChecker,
  PatternMatch,
  PatternName,
  PatternSuggestion,
  MinimizedCondition,
} from './advisor/index.js';

// =============================================================================
// REPORTING
// =============================================================================

export { buildReport, exceededMetrics, isFlagged, hasViolations } from './insights/report.js';
export type { ReportOptions } from './insights/report.js';
export type {
  MetricName,
  UnitFailure,
  FunctionResult,
  AnalysisResult,
  Report,
  ReportEntry,
  ReportFailure,
  ReportSummary,
} from './insights/types.js';
export {
  formatReport,
  formatTextReport,
  formatJsonReport,
  OUTPUT_FORMATS,
} from './insights/formatters/index.js';
export type { OutputFormat, TextFormatOptions } from './insights/formatters/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
  configSchema,
  defaultConfig,
  toTangleConfig,
} from './config/schema.js';
export type { Thresholds, TangleConfig, TangleConfigInput } from './config/schema.js';
export {
  CONFIG_FILENAME,
  resolveConfigPath,
  loadConfig,
  applyThresholdOverrides,
} from './config/loader.js';

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export {
  TangleError,
  TangleErrorCode,
  ConfigError,
  ParseError,
  EmptyInputError,
  isTangleError,
  getErrorMessage,
} from './errors/index.js';
export type { ErrorSeverity } from './errors/index.js';
export { consoleLogger, silentLogger, createLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export { DEFAULT_THRESHOLDS, DEFAULT_CONCURRENCY } from './constants.js';
