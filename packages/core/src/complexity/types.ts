import type { FunctionUnit } from '@tangle/parser';

/**
 * The three metrics a refactoring can change.
 */
export interface MetricSnapshot {
  cyclomatic: number;
  cognitive: number;
  maxNestingDepth: number;
}

/**
 * Scores for one function unit. Frozen once computed.
 */
export interface MetricRecord extends MetricSnapshot {
  readonly unit: FunctionUnit;
  /** Decision points + 1, never below 1 */
  readonly cyclomatic: number;
  readonly cognitive: number;
  /** Deepest nesting level any body in the function reaches */
  readonly maxNestingDepth: number;
  /** Physical lines, `endLine - startLine + 1` */
  readonly lineCount: number;
}

/** Result of the cognitive walk, shared with structural metrics */
export interface CognitiveResult {
  score: number;
  maxNesting: number;
}
