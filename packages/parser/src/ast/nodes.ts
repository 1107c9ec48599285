import type {
  AssignNode,
  BlockNode,
  CallNode,
  CaseNode,
  CatchNode,
  ClosureNode,
  ConditionalNode,
  JumpForm,
  JumpNode,
  LeafNode,
  LogicalNode,
  LoopForm,
  LoopNode,
  NotNode,
  Span,
  SwitchNode,
  SyntaxNode,
  TryNode,
} from './types.js';

/**
 * Position and source text shared by every node constructor.
 */
export interface NodeMeta {
  span: Span;
  text: string;
}

const LITERAL_PATTERN =
  /(["'])(?:\\.|(?!\1)[^\\\n])*\1|`(?:\\.|[^`\\$])*`|\b(?:0[xob][\da-fA-F_]+|\d[\d_]*(?:\.\d+)?(?:[eE][+-]?\d+)?)n?\b|\b(?:true|false|null|undefined)\b/g;

/**
 * Mask string, number and keyword literals as `#` and collapse whitespace,
 * so two snippets that differ only in constants produce the same shape.
 */
export function maskLiterals(text: string): string {
  return text.replace(LITERAL_PATTERN, '#').replace(/\s+/g, ' ').trim();
}

function base(meta: NodeMeta, children: SyntaxNode[]) {
  return {
    span: meta.span,
    text: meta.text,
    shape: maskLiterals(meta.text),
    children,
  };
}

function present(...nodes: Array<SyntaxNode | null>): SyntaxNode[] {
  return nodes.filter((n): n is SyntaxNode => n !== null);
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function blockNode(meta: NodeMeta, statements: readonly SyntaxNode[]): BlockNode {
  return { kind: 'block', ...base(meta, [...statements]) };
}

export function conditionalNode(
  meta: NodeMeta,
  form: ConditionalNode['form'],
  test: SyntaxNode,
  consequent: SyntaxNode,
  alternate: SyntaxNode | null,
): ConditionalNode {
  return {
    kind: 'conditional',
    form,
    test,
    consequent,
    alternate,
    ...base(meta, present(test, consequent, alternate)),
  };
}

export interface LoopParts {
  form: LoopForm;
  label: string | null;
  init: SyntaxNode | null;
  test: SyntaxNode | null;
  alwaysTrue: boolean;
  update: SyntaxNode | null;
  body: SyntaxNode;
}

export function loopNode(meta: NodeMeta, parts: LoopParts): LoopNode {
  const ordered =
    parts.form === 'doWhile'
      ? present(parts.body, parts.test)
      : present(parts.init, parts.test, parts.body, parts.update);
  return { kind: 'loop', ...parts, ...base(meta, ordered) };
}

export function switchNode(
  meta: NodeMeta,
  label: string | null,
  discriminant: SyntaxNode,
  cases: readonly CaseNode[],
): SwitchNode {
  return {
    kind: 'switch',
    label,
    discriminant,
    cases: [...cases],
    ...base(meta, [discriminant, ...cases]),
  };
}

export function caseNode(
  meta: NodeMeta,
  isDefault: boolean,
  test: SyntaxNode | null,
  body: BlockNode,
): CaseNode {
  return { kind: 'case', isDefault, test, body, ...base(meta, present(test, body)) };
}

export function logicalNode(
  meta: NodeMeta,
  kind: LogicalNode['kind'],
  left: SyntaxNode,
  right: SyntaxNode,
): LogicalNode {
  return { kind, left, right, ...base(meta, [left, right]) };
}

export function notNode(meta: NodeMeta, operand: SyntaxNode): NotNode {
  return { kind: 'not', operand, ...base(meta, [operand]) };
}

export function callNode(
  meta: NodeMeta,
  kind: CallNode['kind'],
  callee: string,
  calleeNode: SyntaxNode | null,
  args: readonly SyntaxNode[],
): CallNode {
  return { kind, callee, args: [...args], ...base(meta, [...present(calleeNode), ...args]) };
}

export function jumpNode(
  meta: NodeMeta,
  form: JumpForm,
  label: string | null,
  argument: SyntaxNode | null,
): JumpNode {
  return { kind: 'jump', form, label, argument, ...base(meta, present(argument)) };
}

export function tryNode(
  meta: NodeMeta,
  block: BlockNode,
  handler: CatchNode | null,
  finalizer: BlockNode | null,
): TryNode {
  return { kind: 'try', block, handler, finalizer, ...base(meta, present(block, handler, finalizer)) };
}

export function catchNode(meta: NodeMeta, param: string | null, body: BlockNode): CatchNode {
  return { kind: 'catch', param, body, ...base(meta, [body]) };
}

export function closureNode(
  meta: NodeMeta,
  name: string | null,
  params: readonly string[],
  body: SyntaxNode,
): ClosureNode {
  return { kind: 'closure', name, params: [...params], body, ...base(meta, [body]) };
}

export interface AssignParts {
  target: string;
  operator: string;
  declaration: boolean;
  value: SyntaxNode | null;
}

export function assignNode(meta: NodeMeta, parts: AssignParts): AssignNode {
  return { kind: 'assign', ...parts, ...base(meta, present(parts.value)) };
}

export function leafNode(
  meta: NodeMeta,
  refs: readonly string[],
  children: readonly SyntaxNode[] = [],
): LeafNode {
  return { kind: 'leaf', refs: [...new Set(refs)], ...base(meta, [...children]) };
}

// =============================================================================
// TRAVERSAL
// =============================================================================

/**
 * Pre-order walk. Return `false` from the visitor to skip a node's children.
 */
export function walk(
  node: SyntaxNode,
  visit: (node: SyntaxNode, parent: SyntaxNode | null) => boolean | void,
  parent: SyntaxNode | null = null,
): void {
  if (visit(node, parent) === false) return;
  for (const child of node.children) {
    walk(child, visit, node);
  }
}

/**
 * Collect every node in the subtree matching the predicate, in source order.
 */
export function findAll<T extends SyntaxNode>(
  node: SyntaxNode,
  predicate: (n: SyntaxNode) => n is T,
): T[] {
  const found: T[] = [];
  walk(node, n => {
    if (predicate(n)) found.push(n);
  });
  return found;
}

/**
 * Identifiers read anywhere in the subtree. Compound assignments (`+=`, `++`)
 * read their target as well as writing it.
 */
export function collectReads(node: SyntaxNode): Set<string> {
  const reads = new Set<string>();
  walk(node, n => {
    if (n.kind === 'leaf') {
      for (const ref of n.refs) reads.add(ref);
    } else if (n.kind === 'assign' && n.operator !== '=') {
      reads.add(n.target);
    }
  });
  return reads;
}

/**
 * Identifiers assigned or declared anywhere in the subtree.
 */
export function collectWrites(node: SyntaxNode): Set<string> {
  const writes = new Set<string>();
  walk(node, n => {
    if (n.kind === 'assign') writes.add(n.target);
  });
  return writes;
}

/**
 * The statement list a branch or body stands for: a block's children, or the
 * single statement of an unbraced body.
 */
export function statementsOf(node: SyntaxNode): readonly SyntaxNode[] {
  return node.kind === 'block' ? node.children : [node];
}

export function isConditional(node: SyntaxNode): node is ConditionalNode {
  return node.kind === 'conditional';
}

export function isIf(node: SyntaxNode): node is ConditionalNode {
  return node.kind === 'conditional' && node.form === 'if';
}

export function isAssign(node: SyntaxNode): node is AssignNode {
  return node.kind === 'assign';
}

/**
 * Number of physical lines a span covers.
 */
export function spanLines(span: Span): number {
  return span.endLine - span.startLine + 1;
}
