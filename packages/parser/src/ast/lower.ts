import type Parser from 'tree-sitter';
import type {
  AssignNode,
  BlockNode,
  CaseNode,
  ClosureNode,
  JumpNode,
  LoopNode,
  SwitchNode,
  SyntaxNode,
  TryNode,
} from './types.js';
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
  type NodeMeta,
} from './nodes.js';

type TSNode = Parser.SyntaxNode;

/**
 * What the lowering needs to know about the function being lowered.
 */
export interface LoweringContext {
  /** Unqualified name of the unit, used to spot direct self-calls */
  selfName: string | null;
  /** Methods recurse through `this.<selfName>(...)`, functions through `<selfName>(...)` */
  isMethod: boolean;
}

/** Wrappers that add no control flow; lowering looks straight through them */
const TRANSPARENT_TYPES = new Set([
  'parenthesized_expression',
  'as_expression',
  'satisfies_expression',
  'non_null_expression',
  'type_assertion',
]);

const CLOSURE_TYPES = new Set([
  'arrow_function',
  'function_expression',
  'function',
  'generator_function',
  'function_declaration',
  'generator_function_declaration',
  'method_definition',
]);

const REF_TYPES = new Set(['identifier', 'shorthand_property_identifier']);

const LOOP_TYPES = new Set(['for_statement', 'for_in_statement', 'while_statement', 'do_statement']);

function meta(n: TSNode): NodeMeta {
  return {
    span: { startLine: n.startPosition.row + 1, endLine: n.endPosition.row + 1 },
    text: n.text,
  };
}

function namedChildren(n: TSNode): TSNode[] {
  return n.namedChildren.filter(c => c.type !== 'comment');
}

function sameNode(a: TSNode, b: TSNode): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

function unwrap(n: TSNode): TSNode {
  let current = n;
  while (TRANSPARENT_TYPES.has(current.type)) {
    const inner = namedChildren(current);
    const next = current.type === 'type_assertion' ? inner[inner.length - 1] : inner[0];
    if (!next) break;
    current = next;
  }
  return current;
}

function operatorOf(n: TSNode): string | undefined {
  return n.childForFieldName('operator')?.text;
}

function isLogicalBinary(n: TSNode): boolean {
  if (n.type !== 'binary_expression') return false;
  const op = operatorOf(n);
  return op === '&&' || op === '||';
}

function isNegation(n: TSNode): boolean {
  return n.type === 'unary_expression' && operatorOf(n) === '!';
}

/** Node types that get their own lowered kind when found inside an expression */
function isSignificant(n: TSNode): boolean {
  if (isLogicalBinary(n) || isNegation(n)) return true;
  return (
    CLOSURE_TYPES.has(n.type) ||
    n.type === 'ternary_expression' ||
    n.type === 'call_expression' ||
    n.type === 'assignment_expression' ||
    n.type === 'augmented_assignment_expression' ||
    n.type === 'update_expression'
  );
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

/**
 * Lower an expression. Anything that is not a logical operator, negation,
 * ternary, call, closure or assignment becomes a leaf.
 */
export function lowerExpression(n: TSNode, ctx: LoweringContext): SyntaxNode {
  const node = unwrap(n);
  const left = node.childForFieldName('left');
  const right = node.childForFieldName('right');

  if (isLogicalBinary(node) && left && right) {
    const kind = operatorOf(node) === '&&' ? 'logicalAnd' : 'logicalOr';
    return logicalNode(meta(node), kind, lowerExpression(left, ctx), lowerExpression(right, ctx));
  }

  if (isNegation(node)) {
    const argument = node.childForFieldName('argument');
    if (argument) return notNode(meta(node), lowerExpression(argument, ctx));
  }

  switch (node.type) {
    case 'ternary_expression':
      return lowerTernary(node, ctx);
    case 'call_expression':
      return lowerCall(node, ctx);
    case 'assignment_expression':
    case 'augmented_assignment_expression':
    case 'update_expression':
      return lowerAssignment(node, ctx);
  }

  if (CLOSURE_TYPES.has(node.type)) return lowerClosure(node, ctx);
  return lowerLeaf(node, ctx);
}

function lowerTernary(node: TSNode, ctx: LoweringContext): SyntaxNode {
  const condition = node.childForFieldName('condition');
  const consequence = node.childForFieldName('consequence');
  const alternative = node.childForFieldName('alternative');
  if (!condition || !consequence || !alternative) return lowerLeaf(node, ctx);

  return conditionalNode(
    meta(node),
    'ternary',
    lowerExpression(condition, ctx),
    lowerExpression(consequence, ctx),
    lowerExpression(alternative, ctx),
  );
}

function isSelfCall(callee: TSNode, ctx: LoweringContext): boolean {
  if (!ctx.selfName) return false;
  if (!ctx.isMethod) return callee.type === 'identifier' && callee.text === ctx.selfName;
  if (callee.type === 'member_expression') {
    const object = callee.childForFieldName('object');
    const property = callee.childForFieldName('property');
    return object?.type === 'this' && property?.text === ctx.selfName;
  }
  return false;
}

function lowerCall(node: TSNode, ctx: LoweringContext): SyntaxNode {
  const callee = node.childForFieldName('function');
  if (!callee) return lowerLeaf(node, ctx);

  const argsNode = node.childForFieldName('arguments');
  const args =
    argsNode && argsNode.type === 'arguments'
      ? namedChildren(argsNode).map(a => lowerExpression(a, ctx))
      : [];
  const kind = isSelfCall(callee, ctx) ? 'recursion' : 'call';
  return callNode(meta(node), kind, unwrap(callee).text, lowerExpression(callee, ctx), args);
}

function lowerAssignment(node: TSNode, ctx: LoweringContext): AssignNode {
  if (node.type === 'update_expression') {
    const argument = node.childForFieldName('argument');
    return assignNode(meta(node), {
      target: argument ? unwrap(argument).text : node.text,
      operator: operatorOf(node) ?? '++',
      declaration: false,
      value: null,
    });
  }

  const left = node.childForFieldName('left');
  const right = node.childForFieldName('right');
  return assignNode(meta(node), {
    target: left ? unwrap(left).text : '',
    operator: node.type === 'assignment_expression' ? '=' : (operatorOf(node) ?? '='),
    declaration: false,
    value: right ? lowerExpression(right, ctx) : null,
  });
}

export function parameterNames(node: TSNode): string[] {
  const single = node.childForFieldName('parameter');
  if (single) return [single.text];

  const params = node.childForFieldName('parameters');
  if (!params) return [];
  return namedChildren(params).map(p => {
    const pattern = p.childForFieldName('pattern') ?? p.childForFieldName('left');
    return (pattern ?? p).text;
  });
}

/**
 * Wrap an arrow function's expression body as `{ return <expr>; }`.
 */
export function implicitReturn(expr: TSNode, ctx: LoweringContext): BlockNode {
  const m = meta(expr);
  return blockNode(m, [jumpNode(m, 'return', null, lowerExpression(expr, ctx))]);
}

/**
 * Lower the body of any function-like node to a block.
 */
export function lowerFunctionBody(node: TSNode, ctx: LoweringContext): BlockNode {
  const body = node.childForFieldName('body');
  if (!body) return blockNode(meta(node), []);
  return body.type === 'statement_block' ? lowerBlock(body, ctx) : implicitReturn(body, ctx);
}

function lowerClosure(node: TSNode, ctx: LoweringContext): ClosureNode {
  const name = node.childForFieldName('name')?.text ?? null;
  return closureNode(meta(node), name, parameterNames(node), lowerFunctionBody(node, ctx));
}

/**
 * Lower a node with no control-flow meaning: record the identifiers it reads
 * and lower every significant node found inside it.
 */
function lowerLeaf(node: TSNode, ctx: LoweringContext): SyntaxNode {
  if (REF_TYPES.has(node.type)) return leafNode(meta(node), [node.text]);

  const refs: string[] = [];
  const children: SyntaxNode[] = [];
  const visit = (n: TSNode): void => {
    for (const child of namedChildren(n)) {
      if (isSignificant(child)) {
        children.push(lowerExpression(child, ctx));
      } else if (REF_TYPES.has(child.type)) {
        refs.push(child.text);
      } else {
        visit(child);
      }
    }
  };
  visit(node);
  return leafNode(meta(node), refs, children);
}

// =============================================================================
// STATEMENTS
// =============================================================================

/**
 * Lower one statement to zero or more nodes. Declarations with several
 * declarators produce one `assign` per declarator.
 */
export function lowerStatements(node: TSNode, ctx: LoweringContext): SyntaxNode[] {
  switch (node.type) {
    case 'comment':
    case 'empty_statement':
      return [];
    case 'lexical_declaration':
    case 'variable_declaration':
      return lowerDeclaration(node, ctx);
    case 'expression_statement': {
      const expr = namedChildren(node)[0];
      return expr ? [lowerExpression(expr, ctx)] : [];
    }
    default:
      return [lowerStatement(node, ctx)];
  }
}

export function lowerBlock(node: TSNode, ctx: LoweringContext): BlockNode {
  return blockNode(meta(node), namedChildren(node).flatMap(c => lowerStatements(c, ctx)));
}

/**
 * Lower a statement that must stand as a single node (a branch or loop body).
 */
function lowerSingle(node: TSNode, ctx: LoweringContext): SyntaxNode {
  const lowered = lowerStatements(node, ctx);
  if (lowered.length === 1) return lowered[0];
  return blockNode(meta(node), lowered);
}

function lowerStatement(node: TSNode, ctx: LoweringContext): SyntaxNode {
  switch (node.type) {
    case 'statement_block':
      return lowerBlock(node, ctx);
    case 'if_statement':
      return lowerIf(node, ctx);
    case 'switch_statement':
      return lowerSwitch(node, ctx, null);
    case 'try_statement':
      return lowerTry(node, ctx);
    case 'return_statement':
    case 'throw_statement':
    case 'break_statement':
    case 'continue_statement':
      return lowerJump(node, ctx);
    case 'labeled_statement':
      return lowerLabeled(node, ctx);
  }

  if (LOOP_TYPES.has(node.type)) return lowerLoop(node, ctx, null);
  if (CLOSURE_TYPES.has(node.type)) return lowerClosure(node, ctx);
  return lowerLeaf(node, ctx);
}

function lowerDeclaration(node: TSNode, ctx: LoweringContext): SyntaxNode[] {
  const declarators = namedChildren(node).filter(c => c.type === 'variable_declarator');
  return declarators.map(d => {
    const name = d.childForFieldName('name');
    const value = d.childForFieldName('value');
    return assignNode(declarators.length === 1 ? meta(node) : meta(d), {
      target: name?.text ?? d.text,
      operator: '=',
      declaration: true,
      value: value ? lowerExpression(value, ctx) : null,
    });
  });
}

function lowerIf(node: TSNode, ctx: LoweringContext): SyntaxNode {
  const condition = node.childForFieldName('condition');
  const consequence = node.childForFieldName('consequence');
  if (!condition || !consequence) return lowerLeaf(node, ctx);

  const elseClause = node.childForFieldName('alternative');
  const elseBody = elseClause ? namedChildren(elseClause)[0] : undefined;

  return conditionalNode(
    meta(node),
    'if',
    lowerExpression(condition, ctx),
    lowerSingle(consequence, ctx),
    elseBody ? lowerSingle(elseBody, ctx) : null,
  );
}

function isTrueLiteral(node: SyntaxNode | null): boolean {
  return node !== null && node.kind === 'leaf' && node.text === 'true';
}

/** `for` headers: declarations, expression statements or `;` depending on grammar version */
function lowerForClause(clause: TSNode | null, ctx: LoweringContext): SyntaxNode | null {
  if (!clause || clause.type === 'empty_statement' || clause.type === ';') return null;
  if (clause.type === 'expression_statement') {
    const expr = namedChildren(clause)[0];
    return expr ? lowerExpression(expr, ctx) : null;
  }
  if (clause.type !== 'lexical_declaration' && clause.type !== 'variable_declaration') {
    return lowerExpression(clause, ctx);
  }
  const lowered = lowerStatements(clause, ctx);
  if (lowered.length === 0) return null;
  return lowered.length === 1 ? lowered[0] : blockNode(meta(clause), lowered);
}

function lowerLoop(node: TSNode, ctx: LoweringContext, label: string | null): LoopNode {
  const bodyNode = node.childForFieldName('body');
  const body = bodyNode ? lowerSingle(bodyNode, ctx) : blockNode(meta(node), []);

  if (node.type === 'for_in_statement') {
    const right = node.childForFieldName('right');
    return loopNode(meta(node), {
      form: node.children.some(c => c.type === 'of') ? 'forOf' : 'forIn',
      label,
      init: right ? lowerExpression(right, ctx) : null,
      test: null,
      alwaysTrue: false,
      update: null,
      body,
    });
  }

  if (node.type === 'for_statement') {
    const test = lowerForClause(node.childForFieldName('condition'), ctx);
    const increment = node.childForFieldName('increment');
    return loopNode(meta(node), {
      form: 'for',
      label,
      init: lowerForClause(node.childForFieldName('initializer'), ctx),
      test,
      alwaysTrue: test === null || isTrueLiteral(test),
      update: increment ? lowerExpression(increment, ctx) : null,
      body,
    });
  }

  const condition = node.childForFieldName('condition');
  const test = condition ? lowerExpression(condition, ctx) : null;
  return loopNode(meta(node), {
    form: node.type === 'do_statement' ? 'doWhile' : 'while',
    label,
    init: null,
    test,
    alwaysTrue: test === null || isTrueLiteral(test),
    update: null,
    body,
  });
}

function caseBody(node: TSNode, statements: TSNode[], ctx: LoweringContext): BlockNode {
  const first = statements[0];
  const last = statements[statements.length - 1];
  const span =
    first && last
      ? { startLine: first.startPosition.row + 1, endLine: last.endPosition.row + 1 }
      : meta(node).span;
  return blockNode(
    { span, text: statements.map(s => s.text).join('\n') },
    statements.flatMap(s => lowerStatements(s, ctx)),
  );
}

function lowerSwitch(node: TSNode, ctx: LoweringContext, label: string | null): SwitchNode {
  const value = node.childForFieldName('value');
  const body = node.childForFieldName('body');

  const cases: CaseNode[] = [];
  for (const clause of body ? namedChildren(body) : []) {
    if (clause.type !== 'switch_case' && clause.type !== 'switch_default') continue;

    const test = clause.childForFieldName('value');
    const statements = namedChildren(clause).filter(c => !test || !sameNode(c, test));
    cases.push(
      caseNode(
        meta(clause),
        clause.type === 'switch_default',
        test ? lowerExpression(test, ctx) : null,
        caseBody(clause, statements, ctx),
      ),
    );
  }

  const discriminant = value ? lowerExpression(value, ctx) : leafNode(meta(node), []);
  return switchNode(meta(node), label, discriminant, cases);
}

function lowerTry(node: TSNode, ctx: LoweringContext): TryNode {
  const body = node.childForFieldName('body');
  const handler = node.childForFieldName('handler');
  const finalizer = node.childForFieldName('finalizer');

  const handlerBody = handler?.childForFieldName('body');
  const finalizerBody = finalizer?.childForFieldName('body');

  return tryNode(
    meta(node),
    body ? lowerBlock(body, ctx) : blockNode(meta(node), []),
    handler
      ? catchNode(
          meta(handler),
          handler.childForFieldName('parameter')?.text ?? null,
          handlerBody ? lowerBlock(handlerBody, ctx) : blockNode(meta(handler), []),
        )
      : null,
    finalizerBody ? lowerBlock(finalizerBody, ctx) : null,
  );
}

function lowerJump(node: TSNode, ctx: LoweringContext): JumpNode {
  const form =
    node.type === 'return_statement'
      ? 'return'
      : node.type === 'throw_statement'
        ? 'throw'
        : node.type === 'break_statement'
          ? 'break'
          : 'continue';

  if (form === 'break' || form === 'continue') {
    const label = namedChildren(node).find(c => c.type === 'statement_identifier');
    return jumpNode(meta(node), form, label?.text ?? null, null);
  }

  const argument = namedChildren(node)[0];
  return jumpNode(meta(node), form, null, argument ? lowerExpression(argument, ctx) : null);
}

function lowerLabeled(node: TSNode, ctx: LoweringContext): SyntaxNode {
  const label = node.childForFieldName('label')?.text ?? null;
  const body = node.childForFieldName('body');
  if (!body) return lowerLeaf(node, ctx);

  if (LOOP_TYPES.has(body.type)) return lowerLoop(body, ctx, label);
  if (body.type === 'switch_statement') return lowerSwitch(body, ctx, label);
  return lowerSingle(body, ctx);
}
