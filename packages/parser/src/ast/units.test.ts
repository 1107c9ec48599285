import { describe, it, expect } from 'vitest';
import { extractFunctionUnits, TOP_LEVEL_NAME } from './units.js';
import { findAll } from './nodes.js';
import type { CallNode, SyntaxNode } from './types.js';

const isCall = (n: SyntaxNode): n is CallNode => n.kind === 'call' || n.kind === 'recursion';

describe('extractFunctionUnits', () => {
  it('should extract a simple function', () => {
    const content = `
function hello() {
  console.log("Hello world");
  return true;
}
    `.trim();

    const { units, failures } = extractFunctionUnits('test.ts', content);

    expect(failures).toEqual([]);
    expect(units).toHaveLength(1);
    expect(units[0].id).toBe('test.ts:1:hello');
    expect(units[0].name).toBe('hello');
    expect(units[0].kind).toBe('function');
    expect(units[0].span).toEqual({ startLine: 1, endLine: 4 });
    expect(units[0].params).toEqual([]);
    expect(units[0].body.children.map(c => c.kind)).toEqual(['call', 'jump']);
  });

  it('should qualify class methods with the class name', () => {
    const content = `
class Calculator {
  add(a: number, b: number): number {
    return a + b;
  }

  subtract(a: number, b: number): number {
    return a - b;
  }
}
    `.trim();

    const { units } = extractFunctionUnits('calc.ts', content);

    expect(units.map(u => u.name)).toEqual(['Calculator.add', 'Calculator.subtract']);
    expect(units[0].kind).toBe('method');
    expect(units[0].params).toEqual(['a', 'b']);
    expect(units[0].span).toEqual({ startLine: 2, endLine: 4 });
    expect(units[1].id).toBe('calc.ts:6:Calculator.subtract');
  });

  it('should extract arrow functions and function expressions from declarations', () => {
    const content = `
export const double = (n: number) => n * 2;
const triple = function (n) {
  return n * 3;
};
let single = x => x;
    `.trim();

    const { units } = extractFunctionUnits('math.ts', content);

    expect(units.map(u => [u.name, u.kind])).toEqual([
      ['double', 'arrow'],
      ['triple', 'function'],
      ['single', 'arrow'],
    ]);
    expect(units[0].params).toEqual(['n']);
    expect(units[2].params).toEqual(['x']);
    expect(units[1].span).toEqual({ startLine: 2, endLine: 4 });
  });

  it('should wrap an expression-bodied arrow in an implicit return', () => {
    const { units } = extractFunctionUnits('math.ts', 'const double = (n: number) => n * 2;');

    const [statement] = units[0].body.children;
    expect(statement.kind).toBe('jump');
    expect(statement.kind === 'jump' && statement.form).toBe('return');
  });

  it('should extract exported functions', () => {
    const content = `
export function first() {
  return 1;
}

export default function () {
  return 2;
}
    `.trim();

    const { units } = extractFunctionUnits('mod.ts', content);

    expect(units.map(u => u.name)).toEqual(['first', 'default']);
  });

  it('should keep nested functions inside their enclosing unit', () => {
    const content = `
function outer() {
  function inner() {
    return 1;
  }
  return inner();
}
    `.trim();

    const { units } = extractFunctionUnits('nested.ts', content);

    expect(units).toHaveLength(1);
    const [closure] = units[0].body.children;
    expect(closure.kind).toBe('closure');
    expect(closure.kind === 'closure' && closure.name).toBe('inner');
  });

  it('should freeze extracted units', () => {
    const { units } = extractFunctionUnits('test.ts', 'function f() { return 1; }');

    expect(Object.isFrozen(units[0])).toBe(true);
    expect(Object.isFrozen(units[0].span)).toBe(true);
  });

  it('should mark direct self-calls as recursion', () => {
    const content = `
function fact(n: number): number {
  return n <= 1 ? 1 : n * fact(n - 1);
}
    `.trim();

    const { units } = extractFunctionUnits('fact.ts', content);
    const calls = findAll(units[0].body, isCall);

    expect(calls).toHaveLength(1);
    expect(calls[0].kind).toBe('recursion');
    expect(calls[0].callee).toBe('fact');
  });

  it('should only treat this.<name>() as recursion inside a method', () => {
    const content = `
class Tree {
  walk(node) {
    walk(node.left);
    this.walk(node.right);
  }
}
    `.trim();

    const { units } = extractFunctionUnits('tree.ts', content);
    const calls = findAll(units[0].body, isCall);

    expect(calls.map(c => [c.callee, c.kind])).toEqual([
      ['walk', 'call'],
      ['this.walk', 'recursion'],
    ]);
  });

  it('should report a function that does not parse and keep the rest', () => {
    const content = `
function broken() {
  return 1 +;
}

function fine() {
  return 2;
}
    `.trim();

    const { units, failures } = extractFunctionUnits('broken.ts', content);

    expect(units.map(u => u.name)).toEqual(['fine']);
    expect(failures).toEqual([
      { file: 'broken.ts', name: 'broken', line: 2, message: 'Unexpected syntax at line 2' },
    ]);
  });

  it('should report syntax errors outside any function as top-level failures', () => {
    const content = `
function ok() {
  return 1;
}
const = 5;
    `.trim();

    const { units, failures } = extractFunctionUnits('stray.ts', content);

    expect(units.map(u => u.name)).toEqual(['ok']);
    expect(failures.map(f => [f.name, f.line])).toEqual([[TOP_LEVEL_NAME, 4]]);
  });

  it('should parse tsx files with the tsx grammar', () => {
    const content = `
export function Badge({ count }) {
  return count > 0 ? <span>{count}</span> : null;
}
    `.trim();

    const { units, failures } = extractFunctionUnits('badge.tsx', content);

    expect(failures).toEqual([]);
    expect(units[0].body.children[0].children[0].kind).toBe('conditional');
  });

  it('should throw for unsupported files', () => {
    expect(() => extractFunctionUnits('notes.txt', 'hello')).toThrow(
      'Unsupported language for file: notes.txt'
    );
  });
});
