/**
 * Two-level boolean minimization (Quine–McCluskey) over the `&&`, `||` and
 * `!` structure of a condition. Anything that is not one of those operators
 * is an atom, identified by its source text.
 */

import type { SyntaxNode } from '@tangle/parser';
import { MAX_BOOLEAN_ATOMS } from '../constants.js';

type BoolExpr =
  | { kind: 'atom'; index: number }
  | { kind: 'not'; operand: BoolExpr }
  | { kind: 'and' | 'or'; left: BoolExpr; right: BoolExpr };

/**
 * A product term. Bit `i` refers to atom `i`; bits set in `dashes` do not
 * matter, the rest must equal the matching bit of `value`.
 */
interface Term {
  value: number;
  dashes: number;
}

export interface MinimizedCondition {
  /** Atom source texts, in order of first appearance */
  atoms: string[];
  /** `true` / `false` when the condition does not depend on any atom */
  constant: boolean | null;
  /** Sum-of-products rendering, e.g. `!a || b` */
  text: string;
  /** `&&`, `||` and `!` occurrences in the minimal form */
  operatorCount: number;
  /** Whether the minimal form still has a `&&` or `||` */
  hasBinaryOperator: boolean;
}

function atomKey(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, ' ').trim();
}

function isBooleanOperator(node: SyntaxNode): boolean {
  return node.kind === 'logicalAnd' || node.kind === 'logicalOr' || node.kind === 'not';
}

function toBoolExpr(node: SyntaxNode, atoms: Map<string, number>): BoolExpr {
  switch (node.kind) {
    case 'logicalAnd':
    case 'logicalOr':
      return {
        kind: node.kind === 'logicalAnd' ? 'and' : 'or',
        left: toBoolExpr(node.left, atoms),
        right: toBoolExpr(node.right, atoms),
      };
    case 'not':
      return { kind: 'not', operand: toBoolExpr(node.operand, atoms) };
    default: {
      const key = atomKey(node);
      let index = atoms.get(key);
      if (index === undefined) {
        index = atoms.size;
        atoms.set(key, index);
      }
      return { kind: 'atom', index };
    }
  }
}

function evaluate(expr: BoolExpr, assignment: number): boolean {
  switch (expr.kind) {
    case 'atom':
      return (assignment & (1 << expr.index)) !== 0;
    case 'not':
      return !evaluate(expr.operand, assignment);
    case 'and':
      return evaluate(expr.left, assignment) && evaluate(expr.right, assignment);
    case 'or':
      return evaluate(expr.left, assignment) || evaluate(expr.right, assignment);
  }
}

/**
 * Count `&&`, `||` and `!` occurrences in a condition.
 */
export function countBooleanOperators(node: SyntaxNode): number {
  switch (node.kind) {
    case 'logicalAnd':
    case 'logicalOr':
      return 1 + countBooleanOperators(node.left) + countBooleanOperators(node.right);
    case 'not':
      return 1 + countBooleanOperators(node.operand);
    default:
      return 0;
  }
}

/**
 * Whether some atom occurs both under an odd and under an even number of
 * negations, e.g. `a` in `(a && b) || !a`.
 */
export function hasMixedPolarity(node: SyntaxNode): boolean {
  const polarity = new Map<string, Set<boolean>>();
  const visit = (n: SyntaxNode, negated: boolean): void => {
    if (n.kind === 'logicalAnd' || n.kind === 'logicalOr') {
      visit(n.left, negated);
      visit(n.right, negated);
    } else if (n.kind === 'not') {
      visit(n.operand, !negated);
    } else {
      const key = atomKey(n);
      polarity.set(key, (polarity.get(key) ?? new Set<boolean>()).add(negated));
    }
  };
  visit(node, false);
  return [...polarity.values()].some(set => set.size === 2);
}

function popcount(x: number): number {
  let count = 0;
  for (let v = x; v !== 0; v &= v - 1) count++;
  return count;
}

function covers(term: Term, minterm: number): boolean {
  return (minterm & ~term.dashes) === term.value;
}

function primeImplicants(minterms: readonly number[]): Term[] {
  const primes: Term[] = [];
  const primeKeys = new Set<string>();
  let current: Term[] = minterms.map(m => ({ value: m, dashes: 0 }));

  while (current.length > 0) {
    const used = new Set<number>();
    const next: Term[] = [];
    const nextKeys = new Set<string>();

    for (let i = 0; i < current.length; i++) {
      for (let j = i + 1; j < current.length; j++) {
        const a = current[i];
        const b = current[j];
        if (a.dashes !== b.dashes) continue;
        const diff = a.value ^ b.value;
        if (diff === 0 || (diff & (diff - 1)) !== 0) continue;

        used.add(i);
        used.add(j);
        const combined = { value: a.value & ~diff, dashes: a.dashes | diff };
        const key = `${combined.value}/${combined.dashes}`;
        if (!nextKeys.has(key)) {
          nextKeys.add(key);
          next.push(combined);
        }
      }
    }

    current.forEach((term, i) => {
      const key = `${term.value}/${term.dashes}`;
      if (!used.has(i) && !primeKeys.has(key)) {
        primeKeys.add(key);
        primes.push(term);
      }
    });
    current = next;
  }

  return primes;
}

function termLiterals(term: Term, atomCount: number): number {
  return atomCount - popcount(term.dashes);
}

/** `||` between terms, `&&` inside them, `!` on negative literals */
function sumOfProductsCost(terms: readonly Term[], atomCount: number): number {
  let cost = Math.max(0, terms.length - 1);
  for (const term of terms) {
    cost += Math.max(0, termLiterals(term, atomCount) - 1);
    for (let i = 0; i < atomCount; i++) {
      const bit = 1 << i;
      if ((term.dashes & bit) === 0 && (term.value & bit) === 0) cost++;
    }
  }
  return cost;
}

/**
 * Cheapest set of prime implicants covering every minterm, by branch and
 * bound on the uncovered minterm with the lowest index.
 */
function minimalCover(primes: readonly Term[], minterms: readonly number[], atomCount: number): Term[] {
  const state: { best: Term[]; cost: number } = { best: [], cost: Number.POSITIVE_INFINITY };

  const search = (uncovered: readonly number[], chosen: readonly Term[]): void => {
    const cost = sumOfProductsCost(chosen, atomCount);
    if (cost >= state.cost) return;
    const first = uncovered[0];
    if (first === undefined) {
      state.best = [...chosen];
      state.cost = cost;
      return;
    }
    for (const prime of primes) {
      if (!covers(prime, first)) continue;
      search(
        uncovered.filter(m => !covers(prime, m)),
        [...chosen, prime]
      );
    }
  };

  search(minterms, []);
  return state.best;
}

function renderAtom(text: string): string {
  return /^[\w$.]+(\([^()]*\))?$/.test(text) ? text : `(${text})`;
}

function renderTerm(term: Term, atoms: readonly string[], parenthesize: boolean): string {
  const literals: string[] = [];
  atoms.forEach((atom, i) => {
    const bit = 1 << i;
    if ((term.dashes & bit) !== 0) return;
    literals.push((term.value & bit) !== 0 ? renderAtom(atom) : `!${renderAtom(atom)}`);
  });
  const text = literals.join(' && ');
  return parenthesize && literals.length > 1 ? `(${text})` : text;
}

/**
 * Minimize a condition. Returns null when it has more atoms than the
 * minimizer handles.
 */
export function minimizeCondition(node: SyntaxNode): MinimizedCondition | null {
  const atomIndex = new Map<string, number>();
  const expr = toBoolExpr(node, atomIndex);
  const atoms = [...atomIndex.keys()];
  if (atoms.length > MAX_BOOLEAN_ATOMS) return null;

  const minterms: number[] = [];
  for (let assignment = 0; assignment < 1 << atoms.length; assignment++) {
    if (evaluate(expr, assignment)) minterms.push(assignment);
  }

  if (minterms.length === 0 || minterms.length === 1 << atoms.length) {
    const constant = minterms.length > 0;
    return {
      atoms,
      constant,
      text: String(constant),
      operatorCount: 0,
      hasBinaryOperator: false,
    };
  }

  const cover = minimalCover(primeImplicants(minterms), minterms, atoms.length);
  const multipleTerms = cover.length > 1;
  return {
    atoms,
    constant: null,
    text: cover.map(term => renderTerm(term, atoms, multipleTerms)).join(' || '),
    operatorCount: sumOfProductsCost(cover, atoms.length),
    hasBinaryOperator:
      multipleTerms || cover.some(term => termLiterals(term, atoms.length) > 1),
  };
}

/**
 * Whether a node is a condition the minimizer can say something about:
 * built from boolean operators, with at least one of them.
 */
export function isBooleanCondition(node: SyntaxNode): boolean {
  return isBooleanOperator(node);
}
