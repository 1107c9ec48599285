import { extractFunctionUnits, type FunctionUnit } from '@tangle/parser';
import { scoreFunction, type MetricRecord } from '../../complexity/index.js';
import { DEFAULT_THRESHOLDS } from '../../constants.js';
import type { AdvisorContext } from '../../advisor/types.js';

/**
 * First function unit of a TypeScript snippet
 */
export function unitOf(source: string, file = 'test.ts'): FunctionUnit {
  const [unit] = extractFunctionUnits(file, source).units;
  if (!unit) throw new Error(`No function found in test source:\n${source}`);
  return unit;
}

export function recordOf(source: string): MetricRecord {
  return scoreFunction(unitOf(source));
}

/**
 * Advisor context for the first function of a snippet, with default thresholds
 */
export function contextOf(source: string): AdvisorContext {
  const metrics = recordOf(source);
  return { unit: metrics.unit, metrics, thresholds: { ...DEFAULT_THRESHOLDS } };
}
