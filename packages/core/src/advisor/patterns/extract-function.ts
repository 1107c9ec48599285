import {
  collectReads,
  collectWrites,
  spanLines,
  walk,
  type BlockNode,
  type FunctionUnit,
  type SyntaxNode,
} from '@tangle/parser';
import { EXTRACT_SPAN_RATIO } from '../../constants.js';
import { containsOwn, ownBlocks } from '../search.js';
import {
  baseName,
  camelName,
  replaceStatements,
  spanOf,
  spliceStatements,
  syntheticCall,
} from '../rewrite.js';
import type { AdvisorContext, PatternChecker, PatternMatch, PatternName } from '../types.js';

interface StatementRun {
  start: number;
  count: number;
  lines: number;
}

/** Parameters and every local declared in the unit */
function localsOf(unit: FunctionUnit): Set<string> {
  const locals = new Set(unit.params);
  walk(unit.body, n => {
    if (n.kind === 'assign' && n.declaration) locals.add(n.target);
  });
  return locals;
}

function localsUsed(statement: SyntaxNode, locals: ReadonlySet<string>): Set<string> {
  const used = new Set<string>();
  for (const name of [...collectReads(statement), ...collectWrites(statement)]) {
    if (locals.has(name)) used.add(name);
  }
  return used;
}

const isReturn = (n: SyntaxNode): boolean => n.kind === 'jump' && n.form === 'return';

/**
 * Longest run of top-level statements that shares no local with the rest of
 * the body and spans more than the extraction ratio. Earliest wins ties.
 */
function independentRun(unit: FunctionUnit, minLines: number): StatementRun | null {
  const statements = unit.body.children;
  const locals = localsOf(unit);
  const used = statements.map(s => localsUsed(s, locals));
  const returns = statements.map(s => containsOwn(s, isReturn));

  // How many statements use each local
  const users = new Map<string, number>();
  for (const names of used) {
    for (const name of names) users.set(name, (users.get(name) ?? 0) + 1);
  }

  let best: StatementRun | null = null;
  for (let start = 0; start < statements.length; start++) {
    const inRun = new Map<string, number>();
    for (let end = start; end < statements.length; end++) {
      if (returns[end]) break;
      for (const name of used[end]) inRun.set(name, (inRun.get(name) ?? 0) + 1);

      const count = end - start + 1;
      if (count === statements.length) continue;

      const lines = spanLines(spanOf(statements.slice(start, end + 1)));
      if (lines <= minLines || (best && lines <= best.lines)) continue;

      // Disjoint when every local the run touches is touched only inside it
      const isolated = [...inRun].every(([name, n]) => users.get(name) === n);
      if (isolated) best = { start, count, lines };
    }
  }
  return best;
}

/** Locals touched anywhere in the body outside `skip` */
function localsOutside(body: BlockNode, skip: SyntaxNode, locals: ReadonlySet<string>): Set<string> {
  const used = new Set<string>();
  walk(body, n => {
    if (n === skip) return false;
    const names = n.kind === 'leaf' ? n.refs : n.kind === 'assign' ? [n.target] : [];
    for (const name of names) {
      if (locals.has(name)) used.add(name);
    }
  });
  return used;
}

/**
 * Largest nested block with at least two statements spanning more than the
 * ratio whose assigned locals are used nowhere else. Locals it only reads
 * become the helper's arguments.
 */
function largeBlock(unit: FunctionUnit, minLines: number): BlockNode | null {
  const locals = localsOf(unit);
  let best: BlockNode | null = null;
  for (const block of ownBlocks(unit.body)) {
    if (block === unit.body || block.children.length < 2) continue;
    const lines = spanLines(block.span);
    if (lines <= minLines || (best && lines <= spanLines(best.span))) continue;

    const outside = localsOutside(unit.body, block, locals);
    const shared = [...collectWrites(block)].some(name => outside.has(name));
    if (!shared) best = block;
  }
  return best;
}

/**
 * Extract Function: a long function, or one with a large self-contained
 * region, becomes shorter by moving that region into a helper.
 */
export class ExtractFunctionChecker implements PatternChecker {
  pattern: PatternName = 'Extract Function';
  description = 'Move a self-contained region into its own function';

  check({ unit, metrics, thresholds }: AdvisorContext): PatternMatch | null {
    const statements = unit.body.children;
    if (statements.length === 0) return null;

    const minLines = metrics.lineCount * EXTRACT_SPAN_RATIO;
    const helper = camelName(baseName(unit.name), 'step');
    const tooLong = metrics.lineCount > thresholds.lineLimit;

    const run = independentRun(unit, minLines);
    if (run) {
      const target = spanOf(statements.slice(run.start, run.start + run.count));
      return {
        target,
        rewritten: spliceStatements(unit.body, unit.body, run.start, run.count, [syntheticCall(helper, target)]),
        rationale: `Lines ${target.startLine}-${target.endLine} share no local variables with the rest of the function; extract them as \`${helper}()\``,
      };
    }

    const block = largeBlock(unit, minLines);
    if (block) {
      return {
        target: block.span,
        rewritten: replaceStatements(unit.body, block, [syntheticCall(helper, block.span)]),
        rationale: `Block at lines ${block.span.startLine}-${block.span.endLine} covers ${spanLines(block.span)} of ${metrics.lineCount} lines; extract it as \`${helper}()\``,
      };
    }

    if (!tooLong) return null;

    const count = Math.max(1, Math.floor(statements.length / 2));
    const target = spanOf(statements.slice(0, count));
    return {
      target,
      rewritten: spliceStatements(unit.body, unit.body, 0, count, [syntheticCall(helper, target)]),
      rationale: `Function is ${metrics.lineCount} lines long (limit ${thresholds.lineLimit}); extract lines ${target.startLine}-${target.endLine} as \`${helper}()\``,
    };
  }
}
