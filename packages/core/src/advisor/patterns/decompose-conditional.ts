import { collectReads, findAll, isIf, type ConditionalNode, type SyntaxNode } from '@tangle/parser';
import { containsConditional, findOwn } from '../search.js';
import { camelName, replaceNode, syntheticCall } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

/** A conditional whose own branches hold another conditional */
function isBranchingConditional(n: SyntaxNode): n is ConditionalNode {
  if (n.kind !== 'conditional') return false;
  return containsConditional(n.consequent) || (n.alternate !== null && containsConditional(n.alternate));
}

/**
 * Decompose Conditional: a branch that itself branches twice deep reads
 * better as a call to a function named after what it handles.
 */
export class DecomposeConditionalChecker implements PatternChecker {
  pattern: PatternName = 'Decompose Conditional';
  description = 'Move a nested conditional into its own function';

  check({ unit }: AdvisorContext): PatternMatch | null {
    for (const outer of findAll(unit.body, isIf)) {
      for (const branch of branchesOf(outer)) {
        const inner = findOwn(branch, isBranchingConditional);
        if (!inner) continue;

        const name = handlerName(inner);
        return {
          target: inner.span,
          rewritten: replaceNode(unit.body, inner, syntheticCall(name, inner.span)),
          rationale: `Conditional on \`${inner.test.text}\` nests further branches inside an if; extract it as \`${name}()\``,
        };
      }
    }
    return null;
  }
}

/** `else if` alternates are checked as ifs of their own */
function branchesOf(node: ConditionalNode): SyntaxNode[] {
  const branches: SyntaxNode[] = [node.consequent];
  if (node.alternate && !isIf(node.alternate)) branches.push(node.alternate);
  return branches;
}

function handlerName(node: ConditionalNode): string {
  const [subject] = collectReads(node.test);
  return camelName('handle', subject ?? 'case');
}
