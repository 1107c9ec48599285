import {
  blockNode,
  tryNode,
  type BlockNode,
  type CallNode,
  type SyntaxNode,
} from '@tangle/parser';
import { MIN_CLEANUP_RETURNS } from '../../constants.js';
import { ownBlocks } from '../search.js';
import { metaOf, rebuild, replaceStatements, spanOf } from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

const RELEASE_VERBS = ['close', 'release', 'end', 'dispose', 'destroy', 'unlock', 'disconnect', 'free'];

/** The call a statement makes, looking through `await` */
function statementCall(statement: SyntaxNode): CallNode | null {
  if (statement.kind === 'call') return statement;
  if (statement.kind === 'leaf' && statement.children.length === 1 && /^await\b/.test(statement.text)) {
    const [inner] = statement.children;
    return inner.kind === 'call' ? inner : null;
  }
  return null;
}

/** `x.close()` or `close(x)`, `closeFile(x)` and the like */
function isRelease(statement: SyntaxNode, resource: string): boolean {
  const call = statementCall(statement);
  if (!call) return false;

  const dot = call.callee.lastIndexOf('.');
  if (dot !== -1 && call.callee.slice(0, dot) === resource) {
    return RELEASE_VERBS.includes(call.callee.slice(dot + 1));
  }
  const verb = call.callee.slice(dot + 1).toLowerCase();
  return RELEASE_VERBS.some(v => verb.startsWith(v)) && call.args[0]?.text === resource;
}

function isAcquisition(value: SyntaxNode | null): boolean {
  return value !== null && statementCall(value) !== null;
}

/** Releases that sit immediately before a `return`, anywhere after the acquisition */
function releasesBeforeReturns(statements: readonly SyntaxNode[], resource: string): SyntaxNode[] {
  const lists = [statements, ...statements.flatMap(s => ownBlocks(s).map(b => b.children))];
  const releases: SyntaxNode[] = [];
  for (const list of lists) {
    list.forEach((s, i) => {
      const next = list[i + 1];
      if (next?.kind === 'jump' && next.form === 'return' && isRelease(s, resource)) releases.push(s);
    });
  }
  return releases;
}

/**
 * Use Scoped Cleanup: a resource released by hand on every exit path is
 * released once, in a `finally`.
 */
export class ScopedCleanupChecker implements PatternChecker {
  pattern: PatternName = 'Use Scoped Cleanup';
  description = 'Release a resource once in finally instead of before every return';

  check({ unit }: AdvisorContext): PatternMatch | null {
    for (const block of ownBlocks(unit.body)) {
      for (let i = 0; i < block.children.length; i++) {
        const statement = block.children[i];
        if (statement.kind !== 'assign' || !statement.declaration || !isAcquisition(statement.value)) continue;

        const resource = statement.target;
        const rest = block.children.slice(i + 1);
        const releases = releasesBeforeReturns(rest, resource);
        if (releases.length < MIN_CLEANUP_RETURNS) continue;

        return {
          target: spanOf(rest),
          rewritten: replaceStatements(unit.body, block, [
            ...block.children.slice(0, i + 1),
            withFinally(rest, releases[0], resource),
          ]),
          rationale: `\`${resource}\` is released before ${releases.length} separate returns; release it once in a finally block`,
        };
      }
    }
    return null;
  }
}

function withFinally(rest: readonly SyntaxNode[], release: SyntaxNode, resource: string): SyntaxNode {
  const strip = (n: SyntaxNode): SyntaxNode => {
    if (n.kind === 'closure') return n;
    if (n.kind === 'block') {
      return blockNode(
        metaOf(n),
        n.children.filter(c => !isRelease(c, resource)).map(strip)
      );
    }
    return rebuild(n, strip);
  };

  const span = spanOf(rest);
  const body: BlockNode = blockNode(
    { span, text: rest.map(s => s.text).join('\n') },
    rest.filter(s => !isRelease(s, resource)).map(strip)
  );
  const finalizer = blockNode(metaOf(release), [release]);
  return tryNode(
    { span, text: `try {\n${body.text}\n} finally {\n${release.text}\n}` },
    body,
    null,
    finalizer
  );
}
