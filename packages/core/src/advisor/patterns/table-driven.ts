import {
  collectReads,
  isIf,
  type ConditionalNode,
  type SwitchNode,
  type SyntaxNode,
} from '@tangle/parser';
import { MIN_TABLE_BRANCHES } from '../../constants.js';
import { shapeOf, walkOwnCode } from '../search.js';
import { baseName, camelName, replaceNode, syntheticLookup } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

/** Case statements without the closing unlabelled `break` */
function caseStatements(statements: readonly SyntaxNode[]): readonly SyntaxNode[] {
  const last = statements[statements.length - 1];
  const endsWithBreak = last?.kind === 'jump' && last.form === 'break' && last.label === null;
  return endsWithBreak ? statements.slice(0, -1) : statements;
}

/**
 * Number of non-default cases when each holds a single statement and all of
 * them share one shape; 0 otherwise. Empty cases fall through and are skipped.
 */
function uniformCaseCount(node: SwitchNode): number {
  const shapes = new Set<string>();
  let count = 0;
  for (const c of node.cases) {
    if (c.isDefault) continue;
    const statements = caseStatements(c.body.children);
    if (statements.length === 0) continue;
    if (statements.length > 1) return 0;
    shapes.add(shapeOf(statements));
    count++;
  }
  return shapes.size === 1 ? count : 0;
}

/** The `if` and every `else if` of a chain, in order */
function chainOf(node: ConditionalNode): ConditionalNode[] {
  const chain: ConditionalNode[] = [];
  for (let current: SyntaxNode | null = node; current && isIf(current); current = current.alternate) {
    chain.push(current);
  }
  return chain;
}

function isUniformChain(chain: readonly ConditionalNode[]): boolean {
  if (chain.length < MIN_TABLE_BRANCHES) return false;
  const [first] = chain;
  const body = shapeOf(branchStatements(first.consequent));
  return chain.every(c => {
    const statements = branchStatements(c.consequent);
    return statements.length === 1 && c.test.shape === first.test.shape && shapeOf(statements) === body;
  });
}

function branchStatements(branch: SyntaxNode): readonly SyntaxNode[] {
  return branch.kind === 'block' ? branch.children : [branch];
}

/**
 * Table-Driven: branches that differ only in their constants become a
 * lookup in a table of those constants.
 */
export class TableDrivenChecker implements PatternChecker {
  pattern: PatternName = 'Table-Driven';
  description = 'Replace branches that differ only in constants with a lookup table';

  check({ unit }: AdvisorContext): PatternMatch | null {
    const table = camelName(baseName(unit.name), 'table');
    let match: PatternMatch | null = null;

    walkOwnCode(unit.body, (node, parent) => {
      if (match) return false;

      if (node.kind === 'switch') {
        const group = uniformCaseCount(node);
        if (group < MIN_TABLE_BRANCHES) return;
        const refs = [...collectReads(node.discriminant)];
        match = {
          target: node.span,
          rewritten: replaceNode(
            unit.body,
            node,
            syntheticLookup(`${table}[${node.discriminant.text}]`, node.span, refs)
          ),
          rationale: `${group} cases of \`switch (${node.discriminant.text})\` differ only in constants; look them up in \`${table}\``,
        };
        return false;
      }

      // Chains are judged from their first `if`
      if (!isIf(node) || (parent?.kind === 'conditional' && parent.alternate === node)) return;
      const chain = chainOf(node);
      if (!isUniformChain(chain)) return;

      const [key] = collectReads(node.test);
      const index = key ?? 'key';
      match = {
        target: node.span,
        rewritten: replaceNode(
          unit.body,
          node,
          syntheticLookup(`${table}[${index}]`, node.span, key ? [key] : [])
        ),
        rationale: `${chain.length} branches of an if/else-if chain differ only in constants; look them up in \`${table}\``,
      };
      return false;
    });

    return match;
  }
}
