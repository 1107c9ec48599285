import { describe, it, expect } from 'vitest';
import { extractFunctionUnits, type FunctionUnit } from '@tangle/parser';
import { scoreFunction } from './index.js';

function unitOf(source: string): FunctionUnit {
  return extractFunctionUnits('test.ts', source).units[0];
}

describe('scoreFunction', () => {
  it('should score a branch-free function as cyclomatic 1 and cognitive 0', () => {
    const record = scoreFunction(unitOf('function noop() {\n  return;\n}'));

    expect(record.cyclomatic).toBe(1);
    expect(record.cognitive).toBe(0);
    expect(record.maxNestingDepth).toBe(0);
    expect(record.lineCount).toBe(3);
  });

  it('should score the mixed boolean condition example', () => {
    const record = scoreFunction(
      unitOf(`function pick(a, b) {
  if ((a && b) || !a) return "A";
  else return "B";
}`)
    );

    expect(record.cyclomatic).toBe(4);
    // if +1, two operator runs +2
    expect(record.cognitive).toBe(3);
  });

  it('should score a five-case switch without default', () => {
    const record = scoreFunction(
      unitOf(`function label(k) {
  switch (k) {
    case 1: return "one";
    case 2: return "two";
    case 3: return "three";
    case 4: return "four";
    case 5: return "five";
  }
}`)
    );

    expect(record.cyclomatic).toBe(6);
    expect(record.cognitive).toBe(1);
  });

  it('should count lines of a long branch-free function', () => {
    const lines = Array.from({ length: 68 }, (_, i) => `  const v${i} = ${i};`);
    const record = scoreFunction(unitOf(`function long() {\n${lines.join('\n')}\n}`));

    expect(record.lineCount).toBe(70);
    expect(record.cyclomatic).toBe(1);
    expect(record.cognitive).toBe(0);
  });

  it('should keep a reference to the unit and freeze the record', () => {
    const unit = unitOf('function f() {}');
    const record = scoreFunction(unit);

    expect(record.unit).toBe(unit);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should never lower a metric when a decision is added', () => {
    const bodies = [
      'return a;',
      'if (a) { b(); }\n  return a;',
      'if (a) { b(); }\n  if (c) { d(); }\n  return a;',
      'if (a) { b(); }\n  if (c) { while (e) { d(); } }\n  return a;',
      'if (a) { b(); }\n  if (c) { while (e && f) { d(); } }\n  return a;',
    ];
    const records = bodies.map(body => scoreFunction(unitOf(`function f(a, c, e, f) {\n  ${body}\n}`)));

    expect(records.map(r => r.cyclomatic)).toEqual([1, 2, 3, 4, 5]);
    // while nested in an if +2, then one operator run +1
    expect(records.map(r => r.cognitive)).toEqual([0, 1, 2, 4, 5]);
  });

  it('should score an unconditional loop and a plain try/catch without decisions', () => {
    const record = scoreFunction(
      unitOf(`function drain(xs) {
  for (const x of xs) {
    send(x);
  }
  try {
    flush();
  } catch (err) {
    report(err);
  }
}`)
    );

    expect(record.cyclomatic).toBe(1);
    // for-of +1, catch +1
    expect(record.cognitive).toBe(2);
    expect(record.maxNestingDepth).toBe(1);
  });

  it('should be idempotent', () => {
    const unit = unitOf('function f(a) {\n  for (const x of a) { if (x) return x; }\n}');

    expect(scoreFunction(unit)).toEqual(scoreFunction(unit));
  });
});
