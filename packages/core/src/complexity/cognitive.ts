import type { BlockNode, ConditionalNode, SyntaxNode } from '@tangle/parser';
import type { CognitiveResult } from './types.js';

type LogicalKind = 'logicalAnd' | 'logicalOr';

/**
 * Flatten a logical expression into its operators in source order and the
 * operands between them. A `not` is an operand: it ends the sequence.
 */
function flattenLogical(n: SyntaxNode, ops: LogicalKind[], operands: SyntaxNode[]): void {
  if (n.kind === 'logicalAnd' || n.kind === 'logicalOr') {
    flattenLogical(n.left, ops, operands);
    ops.push(n.kind);
    flattenLogical(n.right, ops, operands);
  } else {
    operands.push(n);
  }
}

/** Number of runs of like operators: `a && b || c && d` has three */
function countOperatorRuns(ops: readonly LogicalKind[]): number {
  return ops.filter((op, i) => i === 0 || op !== ops[i - 1]).length;
}

/**
 * Calculate cognitive complexity of a function body
 *
 * Based on SonarSource's Cognitive Complexity specification:
 * - +1 + nesting for `if`, ternaries, loops and `catch`
 * - nothing for `else`; an `else if` scores as an `if` at the same level
 * - +1 flat for a whole `switch`
 * - +1 for each run of same-kind logical operators, +1 per kind change
 * - +1 for recursion and for labelled `break` / `continue`
 * - closures add nesting but no increment of their own
 *
 * Nesting is passed down by value; nothing is stored on the nodes.
 *
 * @see https://www.sonarsource.com/docs/CognitiveComplexity.pdf
 */
export function calculateCognitiveComplexity(body: BlockNode): CognitiveResult {
  let score = 0;
  let maxNesting = 0;

  /** Walk a body that sits one level inside a structure */
  function enter(n: SyntaxNode, level: number): void {
    maxNesting = Math.max(maxNesting, level);
    traverse(n, level);
  }

  function traverseAll(children: readonly SyntaxNode[], level: number): void {
    for (const child of children) traverse(child, level);
  }

  /** `else` costs nothing; an `else if` is an `if` beside the first one */
  function traverseElse(alternate: SyntaxNode, level: number): void {
    if (alternate.kind === 'conditional' && alternate.form === 'if') {
      traverseConditional(alternate, level);
    } else {
      enter(alternate, level + 1);
    }
  }

  function traverseConditional(n: ConditionalNode, level: number): void {
    score += 1 + level;
    traverse(n.test, level);
    enter(n.consequent, level + 1);
    if (!n.alternate) return;
    if (n.form === 'ternary') {
      enter(n.alternate, level + 1);
    } else {
      traverseElse(n.alternate, level);
    }
  }

  function traverse(n: SyntaxNode, level: number): void {
    switch (n.kind) {
      case 'logicalAnd':
      case 'logicalOr': {
        const ops: LogicalKind[] = [];
        const operands: SyntaxNode[] = [];
        flattenLogical(n, ops, operands);
        score += countOperatorRuns(ops);
        traverseAll(operands, level);
        return;
      }

      case 'conditional':
        traverseConditional(n, level);
        return;

      case 'loop':
        score += 1 + level;
        for (const part of [n.init, n.test, n.update]) {
          if (part) traverse(part, level);
        }
        enter(n.body, level + 1);
        return;

      case 'switch':
        score += 1;
        traverse(n.discriminant, level);
        for (const c of n.cases) enter(c.body, level + 1);
        return;

      case 'try':
        traverse(n.block, level);
        if (n.handler) {
          score += 1 + level;
          enter(n.handler.body, level + 1);
        }
        if (n.finalizer) traverse(n.finalizer, level);
        return;

      case 'closure':
        enter(n.body, level + 1);
        return;

      case 'recursion':
        score += 1;
        traverseAll(n.children, level);
        return;

      case 'jump':
        if ((n.form === 'break' || n.form === 'continue') && n.label !== null) score += 1;
        traverseAll(n.children, level);
        return;

      default:
        traverseAll(n.children, level);
    }
  }

  traverse(body, 0);
  return { score, maxNesting };
}
