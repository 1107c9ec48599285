import { Command } from 'commander';
import { DEFAULT_THRESHOLDS } from '@tangle/core';
import { getPackageVersion } from '../utils/version.js';
import { analyzeCommand } from './analyze.js';

export const program = new Command();

program
  .name('tangle')
  .description('Measure function complexity and suggest refactorings for TypeScript and JavaScript')
  .version(getPackageVersion())
  .argument('[paths...]', 'Files or directories to analyze (defaults to the current directory)')
  .option('--cyclomatic-limit <n>', `Cyclomatic complexity limit (default: ${DEFAULT_THRESHOLDS.cyclomaticLimit})`)
  .option('--cognitive-limit <n>', `Cognitive complexity limit (default: ${DEFAULT_THRESHOLDS.cognitiveLimit})`)
  .option('--nesting-limit <n>', `Maximum nesting depth (default: ${DEFAULT_THRESHOLDS.nestingLimit})`)
  .option('--line-limit <n>', `Maximum function length in lines (default: ${DEFAULT_THRESHOLDS.lineLimit})`)
  .option('--average', 'Print the average cyclomatic complexity')
  .option('--all', 'List every function, not only those over a limit')
  .option('--format <type>', 'Output format: text, json', 'text')
  .option('--no-suggestions', 'Skip refactoring suggestions')
  .option('--config <path>', 'Config file (defaults to .tangle.yml)')
  .option('-v, --verbose', 'Show detailed logging')
  .action(analyzeCommand);

export { runAnalyze, ExitCode } from './analyze.js';
export type { AnalyzeCommandOptions, CommandContext } from './analyze.js';
