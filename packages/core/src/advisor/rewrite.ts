/**
 * Tree rewriting helpers shared by the pattern checkers.
 *
 * Lowered nodes are immutable: every rewrite rebuilds the path from the root
 * to the replaced node and shares everything else.
 */

import {
  assignNode,
  blockNode,
  callNode,
  caseNode,
  catchNode,
  closureNode,
  conditionalNode,
  jumpNode,
  leafNode,
  logicalNode,
  loopNode,
  notNode,
  switchNode,
  tryNode,
  type BlockNode,
  type CaseNode,
  type CatchNode,
  type NodeMeta,
  type Span,
  type SyntaxNode,
} from '@tangle/parser';

export function metaOf(node: SyntaxNode): NodeMeta {
  return { span: node.span, text: node.text };
}

/** Blocks stay blocks; any other node is wrapped in one */
export function asBlock(node: SyntaxNode): BlockNode {
  return node.kind === 'block' ? node : blockNode(metaOf(node), [node]);
}

function rebuildCase(c: CaseNode, map: (n: SyntaxNode) => SyntaxNode): CaseNode {
  return caseNode(metaOf(c), c.isDefault, c.test && map(c.test), asBlock(map(c.body)));
}

function rebuildCatch(c: CatchNode, map: (n: SyntaxNode) => SyntaxNode): CatchNode {
  return catchNode(metaOf(c), c.param, asBlock(map(c.body)));
}

/**
 * Rebuild a node with `map` applied to each of its structural children.
 */
export function rebuild(node: SyntaxNode, map: (n: SyntaxNode) => SyntaxNode): SyntaxNode {
  const meta = metaOf(node);
  switch (node.kind) {
    case 'block':
      return blockNode(meta, node.children.map(map));
    case 'conditional':
      return conditionalNode(
        meta,
        node.form,
        map(node.test),
        map(node.consequent),
        node.alternate && map(node.alternate)
      );
    case 'loop':
      return loopNode(meta, {
        form: node.form,
        label: node.label,
        init: node.init && map(node.init),
        test: node.test && map(node.test),
        alwaysTrue: node.alwaysTrue,
        update: node.update && map(node.update),
        body: map(node.body),
      });
    case 'switch':
      return switchNode(
        meta,
        node.label,
        map(node.discriminant),
        node.cases.map(c => rebuildCase(c, map))
      );
    case 'case':
      return rebuildCase(node, map);
    case 'logicalAnd':
    case 'logicalOr':
      return logicalNode(meta, node.kind, map(node.left), map(node.right));
    case 'not':
      return notNode(meta, map(node.operand));
    case 'call':
    case 'recursion': {
      // The callee expression, when present, precedes the arguments
      const callee = node.children.length > node.args.length ? node.children[0] : null;
      return callNode(meta, node.kind, node.callee, callee && map(callee), node.args.map(map));
    }
    case 'jump':
      return jumpNode(meta, node.form, node.label, node.argument && map(node.argument));
    case 'try':
      return tryNode(
        meta,
        asBlock(map(node.block)),
        node.handler && rebuildCatch(node.handler, map),
        node.finalizer && asBlock(map(node.finalizer))
      );
    case 'catch':
      return rebuildCatch(node, map);
    case 'closure':
      return closureNode(meta, node.name, node.params, map(node.body));
    case 'assign':
      return assignNode(meta, {
        target: node.target,
        operator: node.operator,
        declaration: node.declaration,
        value: node.value && map(node.value),
      });
    case 'leaf':
      return leafNode(meta, node.refs, node.children.map(map));
  }
}

/**
 * Replace one node (by identity) anywhere under `root`.
 */
export function replaceNode(
  root: BlockNode,
  target: SyntaxNode,
  replacement: SyntaxNode
): BlockNode {
  const go = (n: SyntaxNode): SyntaxNode => (n === target ? replacement : rebuild(n, go));
  return asBlock(go(root));
}

/**
 * Replace `count` statements of `block`, starting at `start`, with new ones.
 */
export function spliceStatements(
  root: BlockNode,
  block: BlockNode,
  start: number,
  count: number,
  replacement: readonly SyntaxNode[]
): BlockNode {
  const statements = [...block.children];
  statements.splice(start, count, ...replacement);
  return replaceStatements(root, block, statements);
}

/**
 * Give `block` a new statement list.
 */
export function replaceStatements(
  root: BlockNode,
  block: BlockNode,
  statements: readonly SyntaxNode[]
): BlockNode {
  return replaceNode(root, block, blockNode(metaOf(block), statements));
}

// =============================================================================
// SYNTHETIC NODES
// =============================================================================

/** Span covering a run of nodes */
export function spanOf(nodes: readonly SyntaxNode[]): Span {
  const first = nodes[0];
  const last = nodes[nodes.length - 1];
  if (!first || !last) throw new Error('Cannot compute the span of an empty node list');
  return { startLine: first.span.startLine, endLine: last.span.endLine };
}

/**
 * A call to a function the refactoring introduces, e.g. an extracted helper
 * or a named predicate.
 */
export function syntheticCall(name: string, at: Span, args: readonly string[] = []): SyntaxNode {
  const text = `${name}(${args.join(', ')})`;
  return callNode(
    { span: at, text },
    'call',
    name,
    null,
    args.map(arg => leafNode({ span: at, text: arg }, [arg]))
  );
}

export function syntheticReturn(at: Span): SyntaxNode {
  return jumpNode({ span: at, text: 'return;' }, 'return', null, null);
}

export function syntheticBreak(at: Span): SyntaxNode {
  return jumpNode({ span: at, text: 'break;' }, 'break', null, null);
}

/** A value lookup standing in for a whole branching construct */
export function syntheticLookup(text: string, at: Span, refs: readonly string[]): SyntaxNode {
  return leafNode({ span: at, text }, refs);
}

/**
 * Logical negation, unwrapping an existing `!` rather than stacking a second.
 */
export function negate(test: SyntaxNode): SyntaxNode {
  if (test.kind === 'not') return test.operand;
  const wrapped = /^[\w$.]+$/.test(test.text) ? test.text : `(${test.text})`;
  return notNode({ span: test.span, text: `!${wrapped}` }, test);
}

/** Unqualified name of a unit: `save` for `Repository.save` */
export function baseName(qualified: string): string {
  const dot = qualified.lastIndexOf('.');
  return dot === -1 ? qualified : qualified.slice(dot + 1);
}

/** `fooBar` from `foo bar`, `foo.bar` or `foo_bar` */
export function camelName(...parts: string[]): string {
  const words = parts
    .flatMap(p => p.split(/[^A-Za-z0-9]+/))
    .filter(w => w.length > 0);
  return words
    .map((w, i) => (i === 0 ? w.charAt(0).toLowerCase() + w.slice(1) : w.charAt(0).toUpperCase() + w.slice(1)))
    .join('');
}
