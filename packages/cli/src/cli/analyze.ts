import path from 'path';
import chalk from 'chalk';
import {
  analyzeSources,
  applyThresholdOverrides,
  buildReport,
  ConfigError,
  createLogger,
  EmptyInputError,
  formatReport,
  getErrorMessage,
  hasViolations,
  isTangleError,
  loadConfig,
  OUTPUT_FORMATS,
  TangleError,
  TangleErrorCode,
  type AnalysisResult,
  type Logger,
  type OutputFormat,
  type Thresholds,
} from '@tangle/core';
import { scanPaths } from '@tangle/parser';
import { ParallelFileReader } from '../utils/file-reader.js';
import { TaskSpinner } from './utils.js';

/** Options as commander hands them over */
export interface AnalyzeCommandOptions {
  cyclomaticLimit?: string;
  cognitiveLimit?: string;
  nestingLimit?: string;
  lineLimit?: string;
  average?: boolean;
  all?: boolean;
  format?: string;
  /** `--no-suggestions` sets this to false */
  suggestions?: boolean;
  config?: string;
  verbose?: boolean;
}

export const ExitCode = {
  CLEAN: 0,
  VIOLATIONS: 1,
  USAGE: 2,
  NOTHING_TO_CHECK: 3,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Where a run reads from and writes to. The command wires this to the
 * process; tests pass their own.
 */
export interface CommandContext {
  cwd: string;
  /** Receives the rendered report */
  write: (text: string) => void;
  logger: Logger;
  /** ANSI colours in the text report */
  color: boolean;
  /** Show a progress spinner on stderr */
  interactive: boolean;
  signal?: AbortSignal;
}

const USAGE_ERROR_CODES: ReadonlySet<TangleErrorCode> = new Set([
  TangleErrorCode.CONFIG_INVALID,
  TangleErrorCode.INVALID_INPUT,
  TangleErrorCode.FILE_NOT_FOUND,
]);

/** Validate --format option */
function resolveFormat(format: string | undefined): OutputFormat {
  const value = format ?? 'text';
  const match = OUTPUT_FORMATS.find(f => f === value);
  if (!match) {
    throw new TangleError(
      `Invalid --format value "${value}". Must be one of: ${OUTPUT_FORMATS.join(', ')}`,
      TangleErrorCode.INVALID_INPUT,
      { option: '--format', value }
    );
  }
  return match;
}

const LIMIT_FLAGS: ReadonlyArray<[keyof Thresholds, string]> = [
  ['cyclomaticLimit', '--cyclomatic-limit'],
  ['cognitiveLimit', '--cognitive-limit'],
  ['nestingLimit', '--nesting-limit'],
  ['lineLimit', '--line-limit'],
];

/**
 * Turn the limit flags into threshold overrides. Values must be written as
 * digits; the range check happens when the overrides are applied.
 */
function thresholdOverrides(options: AnalyzeCommandOptions): Partial<Thresholds> {
  const overrides: Partial<Thresholds> = {};
  for (const [key, flag] of LIMIT_FLAGS) {
    const raw = options[key];
    if (raw === undefined) continue;
    if (!/^\d+$/.test(raw.trim())) {
      throw new ConfigError(`${flag} must be a positive integer, got ${raw}`, { option: flag, value: raw });
    }
    overrides[key] = Number.parseInt(raw, 10);
  }
  return overrides;
}

/** Report paths relative to the working directory when they sit inside it */
function displayPath(cwd: string, file: string): string {
  const relative = path.relative(cwd, file);
  return relative && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : file;
}

/**
 * Run one analysis and return the exit status.
 *
 * Configuration and usage problems surface before any file is read. A run
 * that finds no analyzable function still prints its parse failures.
 */
export async function runAnalyze(
  paths: readonly string[],
  options: AnalyzeCommandOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { logger } = context;

  try {
    const format = resolveFormat(options.format);
    const config = applyThresholdOverrides(
      loadConfig(context.cwd, options.config),
      thresholdOverrides(options)
    );

    const inputs = paths.length > 0 ? paths : ['.'];
    const { files, missing } = await scanPaths(inputs, {
      cwd: context.cwd,
      excludePatterns: config.exclude,
    });
    if (missing.length > 0) {
      throw new TangleError(
        `Path${missing.length > 1 ? 's' : ''} not found: ${missing.join(', ')}`,
        TangleErrorCode.FILE_NOT_FOUND,
        { missing }
      );
    }
    if (files.length === 0) {
      throw new EmptyInputError(`No TypeScript or JavaScript files found in ${inputs.join(', ')}`);
    }

    const spinner = context.interactive && format === 'text'
      ? new TaskSpinner(`Reading ${files.length} files...`)
      : null;

    let analysis: AnalysisResult;
    try {
      const reader = new ParallelFileReader(config.concurrency);
      const { sources, unreadable } = await reader.readFiles(files);
      for (const { path: file, reason } of unreadable) {
        logger.warning(`Cannot read ${displayPath(context.cwd, file)}: ${reason}`);
      }
      logger.info(`Analyzing ${sources.length} files`);
      spinner?.update(`Analyzing ${sources.length} files...`);

      analysis = await analyzeSources(
        sources.map(source => ({ path: displayPath(context.cwd, source.path), content: source.content })),
        {
          thresholds: config.thresholds,
          suggestions: options.suggestions ?? true,
          logger,
          signal: context.signal,
        }
      );
    } catch (error) {
      spinner?.stop();
      throw error;
    }

    if (analysis.cancelled) {
      spinner?.warn(`Interrupted after ${analysis.functions.length} functions`);
    } else {
      spinner?.succeed(`Analyzed ${analysis.functions.length} functions in ${analysis.filesAnalyzed} files`);
    }

    const report = buildReport(analysis, config.thresholds, { includeAll: options.all ?? false });
    const output = formatReport(report, format, { color: context.color, average: options.average });
    if (output.length > 0) context.write(output);

    if (analysis.cancelled) return ExitCode.INTERRUPTED;
    if (analysis.functions.length === 0) {
      throw new EmptyInputError('No analyzable functions found', {
        failedUnits: analysis.failures.length,
      });
    }
    return hasViolations(report) ? ExitCode.VIOLATIONS : ExitCode.CLEAN;
  } catch (error) {
    if (error instanceof EmptyInputError) {
      logger.warning(error.message);
      return ExitCode.NOTHING_TO_CHECK;
    }
    if (isTangleError(error) && USAGE_ERROR_CODES.has(error.code)) {
      logger.error(error.message);
      return ExitCode.USAGE;
    }
    throw error;
  }
}

/**
 * `tangle [paths...]` action: wires the run to the process, with SIGINT
 * stopping the analysis and keeping the partial report.
 */
export async function analyzeCommand(paths: string[], options: AnalyzeCommandOptions): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    process.exitCode = await runAnalyze(paths, options, {
      cwd: process.cwd(),
      write: text => process.stdout.write(`${text}\n`),
      logger: createLogger(options.verbose ?? false),
      color: process.stdout.isTTY === true,
      interactive: process.stderr.isTTY === true,
      signal: controller.signal,
    });
  } catch (error) {
    console.error(chalk.red('Error analyzing complexity:'), getErrorMessage(error));
    if (options.verbose && error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }
    process.exitCode = ExitCode.USAGE;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
