import { describe, it, expect } from 'vitest';
import { scoreBody } from '../../complexity/index.js';
import { contextOf } from '../../test/helpers/units.js';
import { ConsolidateConditionalChecker } from './consolidate-conditional.js';

const checker = new ConsolidateConditionalChecker();

describe('ConsolidateConditionalChecker', () => {
  it('should merge consecutive checks with the same exit', () => {
    const context = contextOf(`
function charge(order) {
  if (!order) return null;
  if (order.total <= 0) return null;
  if (order.cancelled) return null;
  return pay(order);
}
    `.trim());

    const match = checker.check(context);
    if (!match) throw new Error('expected a match');

    expect(match.target).toEqual({ startLine: 2, endLine: 4 });
    expect(match.rationale).toBe(
      '3 consecutive checks end in the same `return null;`; combine them into `hasEarlyExit()`'
    );
    expect(match.rewritten.children.map(s => s.text)).toEqual([
      'if (hasEarlyExit()) return null;',
      'return pay(order);',
    ]);
    expect(context.metrics.cyclomatic).toBe(4);
    expect(scoreBody(match.rewritten).cyclomatic).toBe(2);
  });

  it('should stop the run where the exit differs', () => {
    const context = contextOf(`
function check(a, b) {
  if (a) throw new Error("a");
  if (b) return false;
  return true;
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });

  it('should skip checks with assignments in their tests', () => {
    const context = contextOf(`
function next(it) {
  let v;
  if ((v = it.next())) return null;
  if (it.done) return null;
  return v;
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });
});
