// @tangle/parser - tree-sitter parsing, function extraction and lowering

// =============================================================================
// TYPES
// =============================================================================

export type {
  Span,
  SyntaxKind,
  SyntaxNode,
  BlockNode,
  ConditionalNode,
  LoopForm,
  LoopNode,
  SwitchNode,
  CaseNode,
  LogicalNode,
  NotNode,
  CallNode,
  JumpForm,
  JumpNode,
  TryNode,
  CatchNode,
  ClosureNode,
  AssignNode,
  LeafNode,
  FunctionKind,
  FunctionUnit,
  UnitParseFailure,
  ExtractResult,
  SupportedLanguage,
} from './ast/types.js';

// =============================================================================
// AST
// =============================================================================

export { parseAST, detectLanguage, isASTSupported, getSupportedExtensions } from './ast/parser.js';
export { extractFunctionUnits, TOP_LEVEL_NAME } from './ast/units.js';

// Lowered-tree constructors and traversal
export {
  maskLiterals,
  blockNode,
  conditionalNode,
  loopNode,
  switchNode,
  caseNode,
  logicalNode,
  notNode,
  callNode,
  jumpNode,
  tryNode,
  catchNode,
  closureNode,
  assignNode,
  leafNode,
  walk,
  findAll,
  collectReads,
  collectWrites,
  statementsOf,
  isConditional,
  isIf,
  isAssign,
  spanLines,
} from './ast/nodes.js';
export type { NodeMeta, LoopParts, AssignParts } from './ast/nodes.js';

// =============================================================================
// SCANNING
// =============================================================================

export { scanPaths, scanDirectory } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { ALWAYS_IGNORE_PATTERNS, createIgnoreMatcher } from './gitignore.js';
