import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { extractFunctionUnits, TOP_LEVEL_NAME, type FunctionUnit } from '@tangle/parser';
import { adviseFunction } from './advisor/index.js';
import { scoreFunction } from './complexity/index.js';
import type { Thresholds } from './config/schema.js';
import { DEFAULT_THRESHOLDS } from './constants.js';
import { getErrorMessage, ParseError } from './errors/index.js';
import { isFlagged } from './insights/report.js';
import type { AnalysisResult, FunctionResult, UnitFailure } from './insights/types.js';
import { silentLogger, type Logger } from './logger.js';

export interface SourceFile {
  path: string;
  content: string;
}

export interface AnalyzeOptions {
  thresholds?: Thresholds;
  /** Run the pattern advisor on flagged functions (default true) */
  suggestions?: boolean;
  logger?: Logger;
}

export interface BatchOptions extends AnalyzeOptions {
  /** Checked between functions; an aborted batch keeps what it finished */
  signal?: AbortSignal;
}

export interface FileAnalysis {
  functions: FunctionResult[];
  failures: UnitFailure[];
}

function analyzeUnit(unit: FunctionUnit, thresholds: Thresholds, suggestions: boolean): FunctionResult {
  const record = scoreFunction(unit);
  const advise = suggestions && isFlagged(record, thresholds);
  return { record, suggestions: advise ? adviseFunction(record, thresholds) : [] };
}

/**
 * Extract a file's units. A file that cannot be parsed at all yields one
 * failure for the whole file.
 */
function extractUnits(file: SourceFile, logger: Logger): { units: FunctionUnit[]; failures: UnitFailure[] } {
  try {
    const { units, failures } = extractFunctionUnits(file.path, file.content);
    return {
      units,
      failures: failures.map(f => ({
        file: f.file,
        name: f.name,
        line: f.line,
        error: new ParseError(f.message, f.file, f.line, { unit: f.name }),
      })),
    };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.warning(`Skipping ${file.path}: ${message}`);
    return {
      units: [],
      failures: [
        { file: file.path, name: TOP_LEVEL_NAME, line: 1, error: new ParseError(message, file.path, 1) },
      ],
    };
  }
}

/**
 * Analyze one file synchronously: score every function and, for those over a
 * limit, rank refactoring suggestions.
 */
export function analyzeSource(
  path: string,
  content: string,
  options: AnalyzeOptions = {}
): FileAnalysis {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const { units, failures } = extractUnits({ path, content }, options.logger ?? silentLogger);
  return {
    functions: units.map(unit => analyzeUnit(unit, thresholds, options.suggestions ?? true)),
    failures,
  };
}

/**
 * Analyze a batch of files. Yields to the event loop after every function
 * and checks the abort signal before the next one, so an interrupt lands
 * inside a large file too; every function finished before the abort is kept.
 */
export async function analyzeSources(
  files: readonly SourceFile[],
  options: BatchOptions = {}
): Promise<AnalysisResult> {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const logger = options.logger ?? silentLogger;
  const suggestions = options.suggestions ?? true;
  const result: AnalysisResult = { filesAnalyzed: 0, functions: [], failures: [], cancelled: false };

  for (const file of files) {
    if (options.signal?.aborted) {
      result.cancelled = true;
      break;
    }

    const { units, failures } = extractUnits(file, logger);
    result.failures.push(...failures);
    logger.debug(`${file.path}: ${units.length} functions, ${failures.length} parse failures`);

    for (const unit of units) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        break;
      }
      const analyzed = analyzeUnit(unit, thresholds, suggestions);
      result.functions.push(analyzed);
      logger.debug(`${unit.id}: cyclomatic=${analyzed.record.cyclomatic} cognitive=${analyzed.record.cognitive}`);
      await yieldToEventLoop();
    }
    if (result.cancelled) break;

    result.filesAnalyzed++;
    await yieldToEventLoop();
  }

  if (result.cancelled) {
    logger.warning(`Analysis cancelled after ${result.functions.length} functions`);
  }
  return result;
}
