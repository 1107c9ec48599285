import {
  collectReads,
  collectWrites,
  loopNode,
  type AssignNode,
  type BlockNode,
  type LoopNode,
  type SyntaxNode,
} from '@tangle/parser';
import { ownBlocks } from '../search.js';
import { metaOf, rebuild, replaceStatements, syntheticBreak } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

interface FlagDeclaration {
  name: string;
  index: number;
}

/**
 * How a loop test uses the flag: the value that stops the loop, and what is
 * left of the test once the flag is gone (null: nothing, loop forever).
 */
interface FlagTest {
  stopValue: boolean;
  remainder: SyntaxNode | null;
}

function booleanLiteral(node: SyntaxNode | null): boolean | null {
  if (node?.kind !== 'leaf') return null;
  if (node.text === 'true') return true;
  if (node.text === 'false') return false;
  return null;
}

function isFlag(node: SyntaxNode, flag: string): boolean {
  return node.kind === 'leaf' && node.text === flag;
}

function isNegatedFlag(node: SyntaxNode, flag: string): boolean {
  return node.kind === 'not' && isFlag(node.operand, flag);
}

function readTest(test: SyntaxNode | null, flag: string): FlagTest | null {
  if (!test) return null;
  if (isFlag(test, flag)) return { stopValue: false, remainder: null };
  if (isNegatedFlag(test, flag)) return { stopValue: true, remainder: null };
  if (test.kind !== 'logicalAnd') return null;

  const other = isNegatedFlag(test.right, flag)
    ? test.left
    : isNegatedFlag(test.left, flag)
      ? test.right
      : null;
  if (!other || collectReads(other).has(flag)) return null;
  return { stopValue: true, remainder: other };
}

/** A child that stands as a statement of its parent: in a block or as an unbraced branch */
function isStatementPosition(parent: SyntaxNode, child: SyntaxNode): boolean {
  if (parent.kind === 'block') return true;
  return parent.kind === 'conditional' && parent.form === 'if' && child !== parent.test;
}

/**
 * Assignments of the flag inside the loop body. Null when the flag is used
 * in a way a `break` cannot replace: read, assigned anything but a boolean
 * literal, assigned inside an inner loop, switch or closure, or assigned as
 * part of a larger expression.
 */
function flagAssignments(body: SyntaxNode, flag: string, stopValue: boolean): AssignNode[] | null {
  const found: AssignNode[] = [];
  let valid = true;

  const visit = (node: SyntaxNode, inStatementList: boolean, nested: boolean): void => {
    if (!valid) return;
    if (node.kind === 'assign' && node.target === flag) {
      const value = booleanLiteral(node.value);
      if (nested || !inStatementList || node.declaration || node.operator !== '=' || value !== stopValue) {
        valid = false;
        return;
      }
      found.push(node);
      return;
    }
    if (node.kind === 'leaf' && node.refs.includes(flag)) {
      valid = false;
      return;
    }
    const innerNested = nested || node.kind === 'loop' || node.kind === 'switch' || node.kind === 'closure';
    for (const child of node.children) visit(child, isStatementPosition(node, child), innerNested);
  };

  visit(body, body.kind !== 'block', false);
  return valid && found.length > 0 ? found : null;
}

/**
 * Remove Control Flag: a boolean that only exists to stop a loop is a
 * `break` in disguise.
 */
export class RemoveControlFlagChecker implements PatternChecker {
  pattern: PatternName = 'Remove Control Flag';
  description = 'Replace a loop-control flag with break';

  check({ unit }: AdvisorContext): PatternMatch | null {
    for (const block of ownBlocks(unit.body)) {
      for (const declaration of flagDeclarations(block)) {
        const match = this.checkFlag(unit.body, block, declaration);
        if (match) return match;
      }
    }
    return null;
  }

  private checkFlag(root: BlockNode, block: BlockNode, flag: FlagDeclaration): PatternMatch | null {
    const statements = block.children;
    const loopIndex = statements.findIndex(
      (s, i) => i > flag.index && s.kind === 'loop' && s.form !== 'doWhile' && readTest(s.test, flag.name) !== null
    );
    const loop = statements[loopIndex];
    if (loop?.kind !== 'loop') return null;

    const test = readTest(loop.test, flag.name);
    if (!test) return null;

    const loopParts = [loop.init, loop.update].filter((n): n is SyntaxNode => n !== null);
    if (loopParts.some(n => collectReads(n).has(flag.name) || collectWrites(n).has(flag.name))) return null;

    const assignments = flagAssignments(loop.body, flag.name, test.stopValue);
    if (!assignments) return null;

    // Only the statement right after the loop may still look at the flag
    const next = statements[loopIndex + 1];
    for (let i = 0; i < statements.length; i++) {
      if (i === flag.index || i === loopIndex) continue;
      const statement = statements[i];
      if (collectWrites(statement).has(flag.name)) return null;
      if (statement !== next && collectReads(statement).has(flag.name)) return null;
    }

    const rewrittenLoop = withoutFlag(loop, test, assignments);
    const readAfter = next !== undefined && collectReads(next).has(flag.name);
    const rewritten = statements
      .map((s, i) => (i === loopIndex ? rewrittenLoop : s))
      .filter((_, i) => readAfter || i !== flag.index);

    return {
      target: loop.span,
      rewritten: replaceStatements(root, block, rewritten),
      rationale: `Flag \`${flag.name}\` only stops the loop; replace its ${assignments.length === 1 ? 'assignment' : `${assignments.length} assignments`} with \`break\``,
    };
  }
}

function flagDeclarations(block: BlockNode): FlagDeclaration[] {
  const declarations: FlagDeclaration[] = [];
  block.children.forEach((s, index) => {
    if (s.kind === 'assign' && s.declaration && booleanLiteral(s.value) !== null) {
      declarations.push({ name: s.target, index });
    }
  });
  return declarations;
}

function withoutFlag(loop: LoopNode, test: FlagTest, assignments: readonly AssignNode[]): LoopNode {
  const replace = (n: SyntaxNode): SyntaxNode =>
    n.kind === 'assign' && assignments.includes(n) ? syntheticBreak(n.span) : rebuild(n, replace);

  return loopNode(metaOf(loop), {
    form: loop.form,
    label: loop.label,
    init: loop.init,
    test: test.remainder,
    alwaysTrue: test.remainder === null,
    update: loop.update,
    body: replace(loop.body),
  });
}
