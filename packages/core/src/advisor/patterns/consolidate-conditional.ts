import { conditionalNode, isAssign, isIf, type ConditionalNode, type SyntaxNode } from '@tangle/parser';
import { MIN_CONSOLIDATE_RUN } from '../../constants.js';
import { containsOwn, ownBlocks, singleJump } from '../search.js';
import { spanOf, spliceStatements, syntheticCall } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

const PREDICATE_NAME = 'hasEarlyExit';

/** An else-less `if` whose body is one `return` or `throw`; yields the body's text */
function exitText(statement: SyntaxNode): string | null {
  if (!isIf(statement) || statement.alternate) return null;
  if (containsOwn(statement.test, isAssign)) return null;
  const jump = singleJump(statement.consequent);
  if (!jump || (jump.form !== 'return' && jump.form !== 'throw')) return null;
  return jump.text.replace(/\s+/g, ' ').trim();
}

/**
 * Consolidate Conditional: consecutive checks that all leave the same way
 * become one check.
 */
export class ConsolidateConditionalChecker implements PatternChecker {
  pattern: PatternName = 'Consolidate Conditional';
  description = 'Merge consecutive checks with the same result into one';

  check({ unit }: AdvisorContext): PatternMatch | null {
    for (const block of ownBlocks(unit.body)) {
      const statements = block.children;
      let i = 0;
      while (i < statements.length) {
        const run = collectRun(statements, i);
        if (run.length >= MIN_CONSOLIDATE_RUN) {
          const [first] = run;
          const target = spanOf(run);
          const merged = ifOnPredicate(first, target);
          return {
            target,
            rewritten: spliceStatements(unit.body, block, i, run.length, [merged]),
            rationale: `${run.length} consecutive checks end in the same \`${exitText(first)}\`; combine them into \`${PREDICATE_NAME}()\``,
          };
        }
        i += Math.max(run.length, 1);
      }
    }
    return null;
  }
}

function collectRun(statements: readonly SyntaxNode[], start: number): ConditionalNode[] {
  const run: ConditionalNode[] = [];
  const tests = new Set<string>();
  let body: string | null = null;

  for (let i = start; i < statements.length; i++) {
    const statement = statements[i];
    const text = exitText(statement);
    if (text === null || !isIf(statement)) break;
    if (body !== null && text !== body) break;
    if (tests.has(statement.test.text)) break;

    body = text;
    tests.add(statement.test.text);
    run.push(statement);
  }
  return run;
}

function ifOnPredicate(first: ConditionalNode, span: ConditionalNode['span']): SyntaxNode {
  const test = syntheticCall(PREDICATE_NAME, first.test.span);
  return conditionalNode(
    { span, text: `if (${test.text}) ${first.consequent.text}` },
    'if',
    test,
    first.consequent,
    null
  );
}
