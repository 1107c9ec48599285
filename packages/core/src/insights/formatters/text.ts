import { Chalk, type ChalkInstance } from 'chalk';
import type { PatternSuggestion } from '../../advisor/types.js';
import type { Report, ReportEntry, ReportFailure } from '../types.js';

export interface TextFormatOptions {
  /** ANSI colours; off when writing to a pipe */
  color?: boolean;
  /** Append the average cyclomatic complexity line */
  average?: boolean;
}

function formatSuggestion(s: PatternSuggestion, chalk: ChalkInstance): string {
  const delta = `(cyclomatic ${s.before.cyclomatic}→${s.after.cyclomatic}, cognitive ${s.before.cognitive}→${s.after.cognitive})`;
  return `  ${chalk.cyan('→')} ${chalk.bold(s.pattern)}: ${s.rationale} ${chalk.dim(delta)}`;
}

function formatEntry(entry: ReportEntry, chalk: ChalkInstance): string[] {
  const location = `${entry.file}:${entry.line}:`;
  const colorFn = entry.exceeded.length > 0 ? chalk.red : chalk.green;
  const lines = [
    `${colorFn(location)} ${chalk.bold(entry.name)} cyclomatic=${entry.cyclomatic} cognitive=${entry.cognitive}`,
  ];
  for (const suggestion of entry.suggestions) {
    lines.push(formatSuggestion(suggestion, chalk));
  }
  return lines;
}

function formatFailure(failure: ReportFailure, chalk: ChalkInstance): string {
  return `${chalk.yellow(`${failure.file}:${failure.line}:`)} ${failure.name} parse error: ${failure.message}`;
}

/**
 * Plain-text report: one line per function, its suggestions indented below,
 * then parse failures.
 */
export function formatTextReport(report: Report, options: TextFormatOptions = {}): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const lines: string[] = [];

  for (const entry of report.entries) {
    lines.push(...formatEntry(entry, chalk));
  }
  for (const failure of report.failures) {
    lines.push(formatFailure(failure, chalk));
  }
  if (options.average) {
    lines.push(`average cyclomatic=${report.summary.averageCyclomatic.toFixed(1)}`);
  }
  if (report.cancelled) {
    lines.push(chalk.yellow('analysis cancelled; results are partial'));
  }

  return lines.join('\n');
}
