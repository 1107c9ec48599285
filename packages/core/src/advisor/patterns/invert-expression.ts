import {
  blockNode,
  collectReads,
  conditionalNode,
  findAll,
  isConditional,
  leafNode,
  type ConditionalNode,
  type SyntaxNode,
} from '@tangle/parser';
import {
  countBooleanOperators,
  hasMixedPolarity,
  isBooleanCondition,
  minimizeCondition,
  type MinimizedCondition,
} from '../boolean-minimizer.js';
import { baseName, camelName, replaceNode, syntheticCall } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

/**
 * Invert Expression: a condition that tests the same operand both ways can
 * usually be written with fewer operators.
 */
export class InvertExpressionChecker implements PatternChecker {
  pattern: PatternName = 'Invert Expression';
  description = 'Replace a condition with its simplest equivalent form';

  check({ unit }: AdvisorContext): PatternMatch | null {
    for (const node of findAll(unit.body, isConditional)) {
      if (!isBooleanCondition(node.test) || !hasMixedPolarity(node.test)) continue;

      const minimal = minimizeCondition(node.test);
      const operators = countBooleanOperators(node.test);
      if (!minimal || minimal.operatorCount >= operators) continue;

      const predicate = camelName(baseName(unit.name), 'condition');
      return {
        target: node.span,
        rewritten: replaceNode(unit.body, node, simplify(node, minimal, predicate)),
        rationale: describe(node.test.text, minimal, predicate),
      };
    }
    return null;
  }
}

function simplify(node: ConditionalNode, minimal: MinimizedCondition, predicate: string): SyntaxNode {
  if (minimal.constant === true) return node.consequent;
  if (minimal.constant === false) {
    return node.alternate ?? blockNode({ span: node.span, text: '{}' }, []);
  }

  const test = minimal.hasBinaryOperator
    ? syntheticCall(predicate, node.test.span, minimal.atoms.filter(isIdentifier))
    : leafNode({ span: node.test.span, text: minimal.text }, [...collectReads(node.test)]);

  return conditionalNode(
    { span: node.span, text: node.text },
    node.form,
    test,
    node.consequent,
    node.alternate
  );
}

function isIdentifier(text: string): boolean {
  return /^[A-Za-z_$][\w$]*$/.test(text);
}

function describe(original: string, minimal: MinimizedCondition, predicate: string): string {
  if (minimal.constant !== null) {
    return `Condition \`${original}\` is always ${minimal.constant}; drop the test`;
  }
  if (minimal.hasBinaryOperator) {
    return `Condition \`${original}\` reduces to \`${minimal.text}\`; name it as \`${predicate}()\``;
  }
  return `Condition \`${original}\` reduces to \`${minimal.text}\``;
}
