import type { BlockNode, FunctionUnit } from '@tangle/parser';
import { calculateCyclomaticComplexity } from './cyclomatic.js';
import { calculateCognitiveComplexity } from './cognitive.js';
import { lineCount, maxNestingDepth } from './structural.js';
import type { MetricRecord, MetricSnapshot } from './types.js';

export { buildControlFlowGraph, decisionPoints, reachableBlocks } from './cfg.js';
export type { BasicBlock, BasicBlockKind, ControlFlowEdge, ControlFlowGraph } from './cfg.js';
export { cyclomaticComplexity, calculateCyclomaticComplexity } from './cyclomatic.js';
export { calculateCognitiveComplexity } from './cognitive.js';
export { lineCount, maxNestingDepth } from './structural.js';
export type { MetricRecord, MetricSnapshot, CognitiveResult } from './types.js';

/**
 * Score a function body: cyclomatic, cognitive and nesting.
 * Used for units as extracted and for rewritten bodies alike.
 */
export function scoreBody(body: BlockNode): MetricSnapshot {
  const cognitive = calculateCognitiveComplexity(body);
  return {
    cyclomatic: calculateCyclomaticComplexity(body),
    cognitive: cognitive.score,
    maxNestingDepth: maxNestingDepth(cognitive),
  };
}

/**
 * Compute the frozen metric record of a function unit.
 */
export function scoreFunction(unit: FunctionUnit): MetricRecord {
  return Object.freeze({
    unit,
    ...scoreBody(unit.body),
    lineCount: lineCount(unit),
  });
}
