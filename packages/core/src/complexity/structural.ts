import { spanLines, type FunctionUnit } from '@tangle/parser';
import type { CognitiveResult } from './types.js';

/**
 * Deepest nesting level reached by the cognitive walk.
 */
export function maxNestingDepth(cognitive: CognitiveResult): number {
  return cognitive.maxNesting;
}

/**
 * Physical lines of a unit: `endLine - startLine + 1`, so never below 1.
 */
export function lineCount(unit: FunctionUnit): number {
  return spanLines(unit.span);
}
