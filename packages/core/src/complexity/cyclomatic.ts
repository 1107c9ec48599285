import type { BlockNode } from '@tangle/parser';
import { buildControlFlowGraph, decisionPoints, type ControlFlowGraph } from './cfg.js';

/**
 * Cyclomatic complexity of a control-flow graph: decision points + 1.
 */
export function cyclomaticComplexity(cfg: ControlFlowGraph): number {
  return decisionPoints(cfg) + 1;
}

/**
 * Build the graph for a body and score it.
 */
export function calculateCyclomaticComplexity(body: BlockNode): number {
  return cyclomaticComplexity(buildControlFlowGraph(body));
}
