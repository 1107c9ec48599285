import { scoreBody } from '../complexity/index.js';
import type { MetricRecord, MetricSnapshot } from '../complexity/types.js';
import type { Thresholds } from '../config/schema.js';
import { ConsolidateConditionalChecker } from './patterns/consolidate-conditional.js';
import { DecomposeConditionalChecker } from './patterns/decompose-conditional.js';
import { ExtractFunctionChecker } from './patterns/extract-function.js';
import { GuardClauseChecker } from './patterns/guard-clause.js';
import { InvertExpressionChecker } from './patterns/invert-expression.js';
import { RemoveControlFlagChecker } from './patterns/remove-control-flag.js';
import { ScopedCleanupChecker } from './patterns/scoped-cleanup.js';
import { TableDrivenChecker } from './patterns/table-driven.js';
import { PATTERN_PRIORITY, type PatternChecker, type PatternSuggestion } from './types.js';

export type {
  AdvisorContext,
  PatternChecker,
  PatternMatch,
  PatternName,
  PatternSuggestion,
} from './types.js';
export { PATTERN_PRIORITY } from './types.js';
export { minimizeCondition, type MinimizedCondition } from './boolean-minimizer.js';

/** Every checker, in tie-break order */
export const CHECKERS: readonly PatternChecker[] = [
  new GuardClauseChecker(),
  new DecomposeConditionalChecker(),
  new ExtractFunctionChecker(),
  new InvertExpressionChecker(),
  new ConsolidateConditionalChecker(),
  new RemoveControlFlagChecker(),
  new TableDrivenChecker(),
  new ScopedCleanupChecker(),
];

function snapshot(record: MetricRecord): MetricSnapshot {
  return {
    cyclomatic: record.cyclomatic,
    cognitive: record.cognitive,
    maxNestingDepth: record.maxNestingDepth,
  };
}

/**
 * Order suggestions by reduction (largest first), then by pattern priority.
 */
export function rankSuggestions(suggestions: readonly PatternSuggestion[]): PatternSuggestion[] {
  return [...suggestions].sort(
    (a, b) =>
      b.reduction - a.reduction ||
      PATTERN_PRIORITY.indexOf(a.pattern) - PATTERN_PRIORITY.indexOf(b.pattern)
  );
}

/**
 * Run every checker over one scored function and rank what applies.
 * Each match is rescored on its rewritten body to measure the gain.
 */
export function adviseFunction(
  record: MetricRecord,
  thresholds: Thresholds,
  checkers: readonly PatternChecker[] = CHECKERS
): PatternSuggestion[] {
  const context = { unit: record.unit, metrics: record, thresholds };
  const before = snapshot(record);
  const suggestions: PatternSuggestion[] = [];

  for (const checker of checkers) {
    const match = checker.check(context);
    if (!match) continue;

    const after = scoreBody(match.rewritten);
    suggestions.push({
      pattern: checker.pattern,
      functionId: record.unit.id,
      target: match.target,
      before,
      after,
      reduction: before.cyclomatic - after.cyclomatic + (before.cognitive - after.cognitive),
      rationale: match.rationale,
    });
  }

  return rankSuggestions(suggestions);
}
