/**
 * Pattern advisor types.
 *
 * - PatternChecker: the contract every refactoring pattern implements
 * - AdvisorContext: what every checker receives
 * - PatternMatch: a checker's rewritten body, before rescoring
 * - PatternSuggestion: the scored, ranked output
 */

import type { BlockNode, FunctionUnit, Span } from '@tangle/parser';
import type { MetricRecord, MetricSnapshot } from '../complexity/types.js';
import type { Thresholds } from '../config/schema.js';

export type PatternName =
  | 'Guard Clause'
  | 'Decompose Conditional'
  | 'Extract Function'
  | 'Invert Expression'
  | 'Consolidate Conditional'
  | 'Remove Control Flag'
  | 'Table-Driven'
  | 'Use Scoped Cleanup';

/** Tie-break order when two suggestions reduce complexity equally */
export const PATTERN_PRIORITY: readonly PatternName[] = [
  'Guard Clause',
  'Decompose Conditional',
  'Extract Function',
  'Invert Expression',
  'Consolidate Conditional',
  'Remove Control Flag',
  'Table-Driven',
  'Use Scoped Cleanup',
];

/**
 * The world every checker receives.
 */
export interface AdvisorContext {
  unit: FunctionUnit;
  metrics: MetricRecord;
  thresholds: Thresholds;
}

/**
 * A checker's finding: where the pattern applies and the function body as it
 * would read after the refactoring.
 */
export interface PatternMatch {
  target: Span;
  rewritten: BlockNode;
  rationale: string;
}

/**
 * The contract every refactoring pattern implements.
 */
export interface PatternChecker {
  readonly pattern: PatternName;
  /** Short description of what the refactoring does */
  readonly description: string;
  /** Return the pattern's rewrite of the unit, or null when the preconditions do not hold */
  check(context: AdvisorContext): PatternMatch | null;
}

export interface PatternSuggestion {
  pattern: PatternName;
  functionId: string;
  target: Span;
  before: MetricSnapshot;
  after: MetricSnapshot;
  /** `(before.cyclomatic - after.cyclomatic) + (before.cognitive - after.cognitive)` */
  reduction: number;
  rationale: string;
}
