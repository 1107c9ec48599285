import type Parser from 'tree-sitter';

type TSNode = Parser.SyntaxNode;

/** Declarations scored as units of their own */
export const FUNCTION_DECLARATION_TYPES: ReadonlySet<string> = new Set([
  'function_declaration',
  'generator_function_declaration',
  'method_definition',
]);

/** Function values: what `const f = ...` or `export default ...` may hold */
export const FUNCTION_VALUE_TYPES: ReadonlySet<string> = new Set([
  'arrow_function',
  'function_expression',
  'function',
  'generator_function',
]);

const CLASS_TYPES: ReadonlySet<string> = new Set(['class_declaration', 'abstract_class_declaration', 'class']);

const VARIABLE_DECLARATION_TYPES: ReadonlySet<string> = new Set(['lexical_declaration', 'variable_declaration']);

/** Nodes whose children are searched for units at the same depth */
const PASS_THROUGH_TYPES: ReadonlySet<string> = new Set(['program', 'export_statement', 'class_body']);

export function isPassThrough(node: TSNode): boolean {
  return PASS_THROUGH_TYPES.has(node.type);
}

export function isVariableDeclaration(node: TSNode): boolean {
  return VARIABLE_DECLARATION_TYPES.has(node.type);
}

/** Body of a class node, whose methods sit one level down; null for anything else */
export function classBody(node: TSNode): TSNode | null {
  return CLASS_TYPES.has(node.type) ? node.childForFieldName('body') : null;
}

export function enclosingClassName(node: TSNode): string | undefined {
  for (let current = node.parent; current; current = current.parent) {
    if (CLASS_TYPES.has(current.type)) return current.childForFieldName('name')?.text;
  }
  return undefined;
}

export interface BoundFunction {
  fn: TSNode;
  /** Null when the binding is a destructuring pattern */
  name: string | null;
}

/**
 * The function a variable declaration binds. Only the first declarator
 * counts: `const a = () => {}, b = 1` binds `a`.
 */
export function boundFunction(declaration: TSNode): BoundFunction | null {
  const declarator = declaration.namedChildren.find(c => c.type === 'variable_declarator');
  const value = declarator?.childForFieldName('value');
  if (!declarator || !value || !FUNCTION_VALUE_TYPES.has(value.type)) return null;
  const nameNode = declarator.childForFieldName('name');
  return { fn: value, name: nameNode?.type === 'identifier' ? nameNode.text : null };
}
