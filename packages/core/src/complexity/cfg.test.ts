import { describe, it, expect } from 'vitest';
import { extractFunctionUnits } from '@tangle/parser';
import { buildControlFlowGraph, decisionPoints, reachableBlocks, type ControlFlowGraph } from './cfg.js';
import { cyclomaticComplexity } from './cyclomatic.js';

function graphOf(body: string): ControlFlowGraph {
  const { units } = extractFunctionUnits('test.ts', `function f(a, b, c, xs, ys) {\n${body}\n}`);
  return buildControlFlowGraph(units[0].body);
}

function cyclomaticOf(body: string): number {
  return cyclomaticComplexity(graphOf(body));
}

/** Distinct successor count of every reachable block with more than one */
function branchingDegrees(cfg: ControlFlowGraph): number[] {
  const reachable = reachableBlocks(cfg);
  const successors = new Map<number, Set<number>>();
  for (const [from, to] of cfg.edges) {
    successors.set(from, (successors.get(from) ?? new Set<number>()).add(to));
  }
  return [...successors.entries()]
    .filter(([id, out]) => reachable.has(id) && out.size > 1)
    .map(([, out]) => out.size);
}

describe('buildControlFlowGraph', () => {
  it('should give straight-line code no decision points', () => {
    const cfg = graphOf('a();\nb();\nreturn c;');

    expect(decisionPoints(cfg)).toBe(0);
    expect(cyclomaticComplexity(cfg)).toBe(1);
    expect(reachableBlocks(cfg).has(cfg.exit)).toBe(true);
  });

  it('should give an empty body complexity 1', () => {
    expect(cyclomaticOf('')).toBe(1);
  });

  it('should make each if one block with two successors', () => {
    const cfg = graphOf('if (a) { b(); }\nif (c) { xs(); } else { ys(); }');

    expect(branchingDegrees(cfg)).toEqual([2, 2]);
  });

  it('should count else-if as its own decision', () => {
    expect(cyclomaticOf('if (a) { b(); } else if (c) { xs(); } else { ys(); }')).toBe(3);
  });

  it('should count each short-circuit operator', () => {
    expect(cyclomaticOf('if (a && b || c) { xs(); }')).toBe(4);
  });

  it('should not count nullish coalescing or optional chaining', () => {
    expect(cyclomaticOf('return a?.b ?? c;')).toBe(1);
  });

  it('should count ternaries', () => {
    expect(cyclomaticOf('return a ? 1 : 2;')).toBe(2);
  });

  it('should count loops with a real test', () => {
    expect(cyclomaticOf('for (let i = 0; i < a; i++) { b(i); }')).toBe(2);
    expect(cyclomaticOf('while (a) { b(); }')).toBe(2);
    expect(cyclomaticOf('do { b(); } while (a);')).toBe(2);
  });

  it('should not count a loop over every element', () => {
    expect(cyclomaticOf('for (const x of xs) { b(x); }')).toBe(1);
    expect(cyclomaticOf('for (const k in xs) { b(k); }')).toBe(1);
    expect(cyclomaticOf('for (const x of xs) { if (x) break; b(x); }\nreturn a;')).toBe(2);
  });

  it('should reach the code after a loop over every element', () => {
    const cfg = graphOf('for (const x of xs) { continue; }\nif (a) { b(); }');

    expect(decisionPoints(cfg)).toBe(1);
    expect(reachableBlocks(cfg).has(cfg.exit)).toBe(true);
  });

  it('should not branch at the header of a constant-true loop', () => {
    expect(cyclomaticOf('while (true) { if (a) break; b(); }')).toBe(2);
    expect(cyclomaticOf('for (;;) { if (a) return 1; }')).toBe(2);
  });

  it('should count each non-default case of a switch', () => {
    const withoutDefault = `switch (a) {
  case 1: b(); break;
  case 2: b(); break;
  case 3: b(); break;
  case 4: b(); break;
  case 5: b(); break;
}`;
    const withDefault = `switch (a) {
  case 1: b(); break;
  case 2: b(); break;
  default: c();
}`;

    expect(cyclomaticOf(withoutDefault)).toBe(6);
    expect(cyclomaticOf(withDefault)).toBe(3);
  });

  it('should give a switch dispatch one block with every case as successor', () => {
    const cfg = graphOf('switch (a) { case 1: b(); break; case 2: c(); break; }');

    expect(branchingDegrees(cfg)).toEqual([3]);
  });

  it('should not count catch as a decision', () => {
    expect(cyclomaticOf('try { a(); } catch (err) { b(err); }')).toBe(1);
    expect(cyclomaticOf('try { if (a) throw b; c(); } catch (err) { xs(err); }')).toBe(2);
    expect(cyclomaticOf('try { a(); } finally { b(); }')).toBe(1);
  });

  it('should count decisions inside a handler the block never throws to', () => {
    const cfg = graphOf('try { return a(); } catch (err) { if (b) { c(); } }');

    expect(decisionPoints(cfg)).toBe(1);
    expect(cfg.implicitEdges).toHaveLength(1);
  });

  it('should resolve labelled break and continue to the right loop', () => {
    const body = `outer: for (const x of xs) {
  for (const y of ys) {
    if (y) continue outer;
    if (x) break outer;
  }
}
return a;`;

    expect(cyclomaticOf(body)).toBe(3);
    const cfg = graphOf(body);
    expect(reachableBlocks(cfg).has(cfg.exit)).toBe(true);
  });

  it('should inline closures so their branches count', () => {
    expect(cyclomaticOf('xs.forEach(x => { if (x) { b(x); } });\nreturn c;')).toBe(2);
  });

  it('should keep the code after a closure that never returns reachable', () => {
    const cfg = graphOf('const spin = () => { while (true) { a(); } };\nif (b) { c(); }\nreturn spin;');

    expect(decisionPoints(cfg)).toBe(1);
    expect(reachableBlocks(cfg).has(cfg.exit)).toBe(true);
  });

  it('should keep returns inside closures local to the closure', () => {
    const cfg = graphOf('const g = () => { return 1; };\nif (a) { b(); }');

    expect(decisionPoints(cfg)).toBe(1);
  });

  it('should ignore decisions in unreachable code', () => {
    expect(cyclomaticOf('return a;\nif (b) { c(); }')).toBe(1);
  });

  it('should grow when a decision is added', () => {
    const base = 'if (a) { b(); }';
    expect(cyclomaticOf(`${base}\nif (c) { b(); }`)).toBeGreaterThan(cyclomaticOf(base));
  });
});
