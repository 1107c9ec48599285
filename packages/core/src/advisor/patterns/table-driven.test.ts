import { describe, it, expect } from 'vitest';
import { scoreBody } from '../../complexity/index.js';
import { contextOf } from '../../test/helpers/units.js';
import { TableDrivenChecker } from './table-driven.js';

const checker = new TableDrivenChecker();

describe('TableDrivenChecker', () => {
  it('should replace an if/else-if chain of constants with a lookup', () => {
    const context = contextOf(`
function price(size) {
  if (size === "s") {
    return 1;
  } else if (size === "m") {
    return 2;
  } else if (size === "l") {
    return 3;
  } else {
    return 0;
  }
}
    `.trim());

    const match = checker.check(context);
    if (!match) throw new Error('expected a match');

    expect(match.target).toEqual({ startLine: 2, endLine: 10 });
    expect(match.rationale).toBe(
      '3 branches of an if/else-if chain differ only in constants; look them up in `priceTable`'
    );
    expect(match.rewritten.children.map(s => s.text)).toEqual(['priceTable[size]']);
    expect(context.metrics.cognitive).toBe(3);
    expect(scoreBody(match.rewritten)).toEqual({ cyclomatic: 1, cognitive: 0, maxNestingDepth: 0 });
  });

  it('should ignore the trailing break of each case', () => {
    const context = contextOf(`
function apply(op, state) {
  switch (op) {
    case "a":
      state.mode = 1;
      break;
    case "b":
      state.mode = 2;
      break;
    case "c":
      state.mode = 3;
      break;
    default:
      state.mode = 0;
  }
}
    `.trim());

    const match = checker.check(context);

    expect(match?.rewritten.children.map(s => s.text)).toEqual(['applyTable[op]']);
    expect(match?.rationale).toBe('3 cases of `switch (op)` differ only in constants; look them up in `applyTable`');
  });

  it('should leave branches of different shapes alone', () => {
    const context = contextOf(`
function price(size) {
  if (size === "s") return 1;
  else if (size === "m") return size.length * 2;
  else if (size === "l") return 3;
  return 0;
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });

  it('should leave a switch alone when one case differs from the rest', () => {
    const context = contextOf(`
function apply(op, state) {
  switch (op) {
    case "a":
      state.mode = 1;
      break;
    case "b":
      state.mode = 2;
      break;
    case "c":
      state.mode = 3;
      break;
    case "d":
      reset(state);
      break;
  }
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });

  it('should leave cases with several statements alone', () => {
    const context = contextOf(`
function apply(op, state) {
  switch (op) {
    case "a":
      state.mode = 1;
      state.dirty = true;
      break;
    case "b":
      state.mode = 2;
      state.dirty = false;
      break;
    case "c":
      state.mode = 3;
      state.dirty = true;
      break;
  }
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });

  it('should leave an if/else-if chain with several statements per branch alone', () => {
    const context = contextOf(`
function price(size) {
  if (size === "s") {
    track(1);
    return 1;
  } else if (size === "m") {
    track(2);
    return 2;
  } else if (size === "l") {
    track(3);
    return 3;
  }
  return 0;
}
    `.trim());

    expect(checker.check(context)).toBeNull();
  });
});
