import type Parser from 'tree-sitter';
import type { ExtractResult, FunctionKind, FunctionUnit, UnitParseFailure } from './types.js';
import { parseAST, detectLanguage } from './parser.js';
import {
  boundFunction,
  classBody,
  enclosingClassName,
  FUNCTION_DECLARATION_TYPES,
  FUNCTION_VALUE_TYPES,
  isPassThrough,
  isVariableDeclaration,
} from './unit-nodes.js';
import { lowerFunctionBody, parameterNames } from './lower.js';

/** Name reported for parse failures that sit outside every function */
export const TOP_LEVEL_NAME = '<top-level>';

const ANONYMOUS_NAME = '<anonymous>';

/**
 * A function found in the tree, before lowering.
 */
interface UnitCandidate {
  /** Node whose span the unit reports (the declaration for `const f = () => {}`) */
  outer: Parser.SyntaxNode;
  /** Node holding the parameters and body */
  fn: Parser.SyntaxNode;
  name: string;
  kind: FunctionKind;
  selfName: string | null;
}

function isUnitNode(node: Parser.SyntaxNode, depth: number): boolean {
  if (node.parent?.type === 'export_statement' && FUNCTION_VALUE_TYPES.has(node.type)) {
    // export default function () {} / export default () => {}
    return true;
  }
  if (depth === 0 && isVariableDeclaration(node)) return boundFunction(node) !== null;
  return depth <= 1 && FUNCTION_DECLARATION_TYPES.has(node.type);
}

/**
 * Every node that becomes a function unit: program-level and exported
 * functions, function-valued variables, and methods one class deep. Nested
 * functions stay inside their enclosing unit.
 */
function findUnitNodes(root: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const found: Parser.SyntaxNode[] = [];

  const visit = (node: Parser.SyntaxNode, depth: number): void => {
    if (isUnitNode(node, depth)) {
      found.push(node);
      return;
    }
    const body = classBody(node);
    if (body) {
      visit(body, depth + 1);
    } else if (isPassThrough(node)) {
      for (const child of node.namedChildren) visit(child, depth);
    }
  };

  visit(root, 0);
  return found;
}

function toCandidate(node: Parser.SyntaxNode): UnitCandidate | null {
  if (isVariableDeclaration(node)) {
    const bound = boundFunction(node);
    if (!bound) return null;
    return {
      outer: node,
      fn: bound.fn,
      name: bound.name ?? ANONYMOUS_NAME,
      kind: bound.fn.type === 'arrow_function' ? 'arrow' : 'function',
      selfName: bound.name,
    };
  }

  const ownName = node.childForFieldName('name')?.text ?? null;
  if (node.type === 'method_definition') {
    const container = enclosingClassName(node);
    const method = ownName ?? ANONYMOUS_NAME;
    return {
      outer: node,
      fn: node,
      name: container ? `${container}.${method}` : method,
      kind: 'method',
      selfName: ownName,
    };
  }

  return {
    outer: node,
    fn: node,
    // Anonymous default exports
    name: ownName ?? 'default',
    kind: node.type === 'arrow_function' ? 'arrow' : 'function',
    selfName: ownName,
  };
}

/**
 * Line of the first syntax error inside a node: the first ERROR node, or the
 * deepest node that contains a MISSING token.
 */
function firstErrorLine(node: Parser.SyntaxNode): number {
  let current = node;
  for (;;) {
    if (current.type === 'ERROR') return current.startPosition.row + 1;
    const next = current.children.find(c => c.hasError);
    if (!next) return current.startPosition.row + 1;
    current = next;
  }
}

function parseFailure(file: string, name: string, line: number): UnitParseFailure {
  return Object.freeze({ file, name, line, message: `Unexpected syntax at line ${line}` });
}

/**
 * Top-level ERROR nodes that fall outside every extracted function.
 */
function topLevelFailures(
  file: string,
  root: Parser.SyntaxNode,
  covered: Parser.SyntaxNode[]
): UnitParseFailure[] {
  const inside = (n: Parser.SyntaxNode) =>
    covered.some(c => n.startIndex >= c.startIndex && n.endIndex <= c.endIndex);

  const failures: UnitParseFailure[] = [];
  const visit = (n: Parser.SyntaxNode): void => {
    if (!n.hasError || inside(n)) return;
    if (n.type === 'ERROR' || !n.children.some(c => c.hasError)) {
      failures.push(parseFailure(file, TOP_LEVEL_NAME, firstErrorLine(n)));
      return;
    }
    for (const child of n.children) visit(child);
  };
  visit(root);

  // One failure per line is enough
  return failures.filter((f, i) => failures.findIndex(o => o.line === f.line) === i);
}

function buildUnit(file: string, candidate: UnitCandidate): FunctionUnit {
  const { outer, fn, name, kind, selfName } = candidate;
  const startLine = outer.startPosition.row + 1;
  const body = lowerFunctionBody(fn, { selfName, isMethod: kind === 'method' });

  return Object.freeze({
    id: `${file}:${startLine}:${name}`,
    file,
    name,
    kind,
    span: Object.freeze({ startLine, endLine: outer.endPosition.row + 1 }),
    params: Object.freeze(parameterNames(fn)),
    body,
  });
}

/**
 * Extract every analyzable function from a source file.
 *
 * Functions are collected at program level, inside `export` statements, as
 * class methods, and as `const`/`let`/`var` declarations whose value is an
 * arrow function or function expression. A function whose source does not
 * parse is reported as a failure; the rest of the file is still extracted.
 *
 * @param file - Path of the file, used for language detection and unit ids
 * @param content - File content
 * @throws Error if the file's language is not supported or tree-sitter fails
 */
export function extractFunctionUnits(file: string, content: string): ExtractResult {
  const language = detectLanguage(file);
  if (!language) {
    throw new Error(`Unsupported language for file: ${file}`);
  }

  const parseResult = parseAST(content, language);
  if (!parseResult.tree) {
    throw new Error(`Failed to parse ${file}: ${parseResult.error}`);
  }

  const root = parseResult.tree.rootNode;
  const nodes = findUnitNodes(root);

  const units: FunctionUnit[] = [];
  const failures: UnitParseFailure[] = [];

  for (const node of nodes) {
    const candidate = toCandidate(node);
    if (!candidate) continue;

    if (candidate.outer.hasError) {
      failures.push(parseFailure(file, candidate.name, firstErrorLine(candidate.outer)));
      continue;
    }
    units.push(buildUnit(file, candidate));
  }

  if (root.hasError) {
    failures.push(...topLevelFailures(file, root, nodes));
  }

  return { units, failures };
}
