import {
  isConditional,
  type BlockNode,
  type JumpNode,
  type SyntaxNode,
} from '@tangle/parser';

/**
 * Pre-order walk that stays inside the unit's own code: closure bodies run
 * at another time and are not searched.
 */
export function walkOwnCode(
  root: SyntaxNode,
  visit: (node: SyntaxNode, parent: SyntaxNode | null) => boolean | void,
  parent: SyntaxNode | null = null
): void {
  if (root.kind === 'closure' && parent !== null) return;
  if (visit(root, parent) === false) return;
  for (const child of root.children) walkOwnCode(child, visit, root);
}

/** Every statement list under `root`, outermost first */
export function ownBlocks(root: SyntaxNode): BlockNode[] {
  const blocks: BlockNode[] = [];
  walkOwnCode(root, n => {
    if (n.kind === 'block') blocks.push(n);
  });
  return blocks;
}

/** First node in pre-order matching the predicate */
export function findOwn<T extends SyntaxNode>(
  root: SyntaxNode,
  predicate: (n: SyntaxNode) => n is T
): T | null {
  let found: T | null = null;
  walkOwnCode(root, n => {
    if (found) return false;
    if (predicate(n)) {
      found = n;
      return false;
    }
  });
  return found;
}

export function containsOwn(root: SyntaxNode, predicate: (n: SyntaxNode) => boolean): boolean {
  return findOwn(root, (n): n is SyntaxNode => predicate(n)) !== null;
}

export function containsConditional(root: SyntaxNode): boolean {
  return containsOwn(root, isConditional);
}

/** A branch that is nothing but one `return`, `throw`, `break` or `continue` */
export function singleJump(branch: SyntaxNode): JumpNode | null {
  const statements = branch.kind === 'block' ? branch.children : [branch];
  const only = statements.length === 1 ? statements[0] : undefined;
  return only?.kind === 'jump' ? only : null;
}

/** Statement shapes joined, so blocks that differ only in literals compare equal */
export function shapeOf(statements: readonly SyntaxNode[]): string {
  return statements.map(s => s.shape).join(' ');
}
