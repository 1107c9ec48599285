import {
  blockNode,
  conditionalNode,
  isIf,
  statementsOf,
  type ConditionalNode,
  type SyntaxNode,
} from '@tangle/parser';
import { calculateCognitiveComplexity } from '../../complexity/cognitive.js';
import { MIN_GUARD_NESTING } from '../../constants.js';
import { singleJump } from '../search.js';
import { metaOf, negate, syntheticReturn } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

/** An else-less `if` that wraps more than a single jump */
function wrapsRemainder(node: SyntaxNode | undefined): node is ConditionalNode {
  return node !== undefined && isIf(node) && node.alternate === null && singleJump(node.consequent) === null;
}

function guardFor(node: ConditionalNode): ConditionalNode {
  const test = negate(node.test);
  return conditionalNode(
    { span: node.span, text: `if (${test.text}) return;` },
    'if',
    test,
    syntheticReturn(node.test.span),
    null
  );
}

/**
 * Guard Clause: a function whose remaining work sits inside a trailing `if`
 * returns early instead, flattening the body.
 */
export class GuardClauseChecker implements PatternChecker {
  pattern: PatternName = 'Guard Clause';
  description = 'Return early instead of wrapping the rest of the function in an if';

  check({ unit }: AdvisorContext): PatternMatch | null {
    const statements = unit.body.children;
    const last = statements[statements.length - 1];
    if (!wrapsRemainder(last)) return null;

    const nesting = calculateCognitiveComplexity(blockNode(metaOf(last), [last])).maxNesting;
    if (nesting < MIN_GUARD_NESTING) return null;

    let rewritten = [...statements];
    const guards: string[] = [];
    for (let tail = rewritten[rewritten.length - 1]; wrapsRemainder(tail); tail = rewritten[rewritten.length - 1]) {
      rewritten = [...rewritten.slice(0, -1), guardFor(tail), ...statementsOf(tail.consequent)];
      guards.push(tail.test.text);
    }

    return {
      target: last.span,
      rewritten: blockNode(metaOf(unit.body), rewritten),
      rationale: `Body is wrapped in \`if (${last.test.text})\`; return early on ${guards.length === 1 ? 'the inverted condition' : `${guards.length} inverted conditions`} instead`,
    };
  }
}
