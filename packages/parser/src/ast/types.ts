import type Parser from 'tree-sitter';

/**
 * AST parse result containing the tree and any errors
 */
export interface ASTParseResult {
  tree: Parser.Tree | null;
  error?: string;
}

/**
 * 1-based, inclusive line range
 */
export interface Span {
  startLine: number;
  endLine: number;
}

export type { SupportedLanguage } from './parser.js';

// =============================================================================
// LOWERED SYNTAX TREE
// =============================================================================
//
// tree-sitter's concrete syntax tree is lowered into this smaller tree before
// any scoring happens. Only constructs that matter to control flow or to the
// refactoring checks get their own kind; everything else is a `leaf` that
// keeps the significant nodes nested inside it as children.

export type SyntaxKind =
  | 'block'
  | 'conditional'
  | 'loop'
  | 'switch'
  | 'case'
  | 'logicalAnd'
  | 'logicalOr'
  | 'not'
  | 'call'
  | 'recursion'
  | 'jump'
  | 'try'
  | 'catch'
  | 'closure'
  | 'assign'
  | 'leaf';

interface BaseNode {
  readonly span: Span;
  /** Source text of the node */
  readonly text: string;
  /** Source text with literals masked as `#` and whitespace collapsed */
  readonly shape: string;
  /** Ordered child nodes, in source order */
  readonly children: readonly SyntaxNode[];
}

/** Statement list: function bodies, `{ ... }` blocks, case bodies */
export interface BlockNode extends BaseNode {
  readonly kind: 'block';
}

export interface ConditionalNode extends BaseNode {
  readonly kind: 'conditional';
  readonly form: 'if' | 'ternary';
  readonly test: SyntaxNode;
  readonly consequent: SyntaxNode;
  /** `else` branch; an `else if` is a nested conditional here */
  readonly alternate: SyntaxNode | null;
}

export type LoopForm = 'for' | 'while' | 'doWhile' | 'forIn' | 'forOf';

export interface LoopNode extends BaseNode {
  readonly kind: 'loop';
  readonly form: LoopForm;
  readonly label: string | null;
  /** Initializer of a `for`, or the iterated collection of `for...in` / `for...of` */
  readonly init: SyntaxNode | null;
  /** Continuation test; null when absent (`for (;;)`) or implicit (`for...of`) */
  readonly test: SyntaxNode | null;
  /** Continuation test is absent or the literal `true` */
  readonly alwaysTrue: boolean;
  readonly update: SyntaxNode | null;
  readonly body: SyntaxNode;
}

export interface SwitchNode extends BaseNode {
  readonly kind: 'switch';
  readonly label: string | null;
  readonly discriminant: SyntaxNode;
  readonly cases: readonly CaseNode[];
}

export interface CaseNode extends BaseNode {
  readonly kind: 'case';
  readonly isDefault: boolean;
  readonly test: SyntaxNode | null;
  readonly body: BlockNode;
}

export interface LogicalNode extends BaseNode {
  readonly kind: 'logicalAnd' | 'logicalOr';
  readonly left: SyntaxNode;
  readonly right: SyntaxNode;
}

export interface NotNode extends BaseNode {
  readonly kind: 'not';
  readonly operand: SyntaxNode;
}

/** A call; `recursion` when the callee is the enclosing function itself */
export interface CallNode extends BaseNode {
  readonly kind: 'call' | 'recursion';
  /** Callee source text, e.g. `save` or `conn.release` */
  readonly callee: string;
  readonly args: readonly SyntaxNode[];
}

export type JumpForm = 'return' | 'break' | 'continue' | 'throw';

export interface JumpNode extends BaseNode {
  readonly kind: 'jump';
  readonly form: JumpForm;
  readonly label: string | null;
  readonly argument: SyntaxNode | null;
}

export interface TryNode extends BaseNode {
  readonly kind: 'try';
  readonly block: BlockNode;
  readonly handler: CatchNode | null;
  readonly finalizer: BlockNode | null;
}

export interface CatchNode extends BaseNode {
  readonly kind: 'catch';
  readonly param: string | null;
  readonly body: BlockNode;
}

/** Nested function, arrow function or method defined inside a unit */
export interface ClosureNode extends BaseNode {
  readonly kind: 'closure';
  readonly name: string | null;
  readonly params: readonly string[];
  readonly body: SyntaxNode;
}

/** `let x = v`, `x = v`, `x += v`, `x++` on a plain identifier or pattern */
export interface AssignNode extends BaseNode {
  readonly kind: 'assign';
  readonly target: string;
  readonly operator: string;
  readonly declaration: boolean;
  readonly value: SyntaxNode | null;
}

/** Anything without control-flow meaning of its own */
export interface LeafNode extends BaseNode {
  readonly kind: 'leaf';
  /** Identifiers read directly by this leaf (not by its children) */
  readonly refs: readonly string[];
}

export type SyntaxNode =
  | BlockNode
  | ConditionalNode
  | LoopNode
  | SwitchNode
  | CaseNode
  | LogicalNode
  | NotNode
  | CallNode
  | JumpNode
  | TryNode
  | CatchNode
  | ClosureNode
  | AssignNode
  | LeafNode;

// =============================================================================
// FUNCTION UNITS
// =============================================================================

export type FunctionKind = 'function' | 'method' | 'arrow';

/**
 * One analyzable function or method, frozen after extraction.
 */
export interface FunctionUnit {
  /** `file:startLine:name`, unique within a batch */
  readonly id: string;
  readonly file: string;
  /** Qualified name: `Class.method` for methods */
  readonly name: string;
  readonly kind: FunctionKind;
  readonly span: Span;
  readonly params: readonly string[];
  readonly body: BlockNode;
}

/**
 * A function that could not be lowered because its source does not parse.
 */
export interface UnitParseFailure {
  readonly file: string;
  readonly name: string;
  readonly line: number;
  readonly message: string;
}

export interface ExtractResult {
  units: FunctionUnit[];
  failures: UnitParseFailure[];
}
