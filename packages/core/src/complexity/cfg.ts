/**
 * Control-flow graph construction for one function unit.
 *
 * The graph is an arena: blocks live in one array and edges are index
 * pairs. Every branching construct produces exactly one block with more than
 * one distinct successor, so counting decisions is a walk over the blocks.
 */

import type {
  BlockNode,
  ClosureNode,
  ConditionalNode,
  JumpNode,
  LogicalNode,
  LoopNode,
  SwitchNode,
  SyntaxNode,
  TryNode,
} from '@tangle/parser';

export type BasicBlockKind =
  | 'entry'
  | 'exit'
  | 'basic'
  | 'branch'
  | 'join'
  | 'loop'
  | 'switch'
  | 'catch'
  | 'closure';

export interface BasicBlock {
  id: number;
  kind: BasicBlockKind;
}

/** `[from, to]` block indices */
export type ControlFlowEdge = readonly [number, number];

export interface ControlFlowGraph {
  blocks: BasicBlock[];
  /** Transfers that can be chosen; a block with several of these is a decision */
  edges: ControlFlowEdge[];
  /**
   * Transfers that are never a choice at their source: entry into a `catch`
   * handler and the continuation after an inlined closure. They count for
   * reachability only.
   */
  implicitEdges: ControlFlowEdge[];
  entry: number;
  exit: number;
}

/** Where `break` and `continue` inside a loop or switch lead */
interface JumpTarget {
  label: string | null;
  breakTo: number;
  /** null for a switch: `continue` skips it */
  continueTo: number | null;
}

/**
 * Jump resolution for one function body. Closures get their own frame, so
 * a `return` inside a callback ends the callback, not the unit.
 */
interface Frame {
  returnTo: number;
  targets: JumpTarget[];
  /** Entry blocks of enclosing `catch` handlers, innermost last */
  handlers: number[];
}

/** Block the flow is in, or null after a jump */
type Cursor = number | null;

class GraphBuilder {
  private readonly blocks: BasicBlock[] = [];
  private readonly edges: Array<[number, number]> = [];
  private readonly implicitEdges: Array<[number, number]> = [];
  private readonly incoming: number[] = [];
  private readonly frames: Frame[] = [];

  build(body: BlockNode): ControlFlowGraph {
    const entry = this.block('entry');
    const exit = this.block('exit');

    this.frames.push({ returnTo: exit, targets: [], handlers: [] });
    const end = this.visit(body, entry);
    this.frames.pop();
    if (end !== null) this.edge(end, exit);

    return { blocks: this.blocks, edges: this.edges, implicitEdges: this.implicitEdges, entry, exit };
  }

  private block(kind: BasicBlockKind): number {
    const id = this.blocks.length;
    this.blocks.push({ id, kind });
    this.incoming.push(0);
    return id;
  }

  private edge(from: number, to: number): void {
    this.edges.push([from, to]);
    this.incoming[to] += 1;
  }

  private implicitEdge(from: number, to: number): void {
    this.implicitEdges.push([from, to]);
    this.incoming[to] += 1;
  }

  /** Continue from `to` only if something flows into it */
  private reached(to: number): Cursor {
    return this.incoming[to] > 0 ? to : null;
  }

  private get frame(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error('Control-flow frame stack is empty');
    return frame;
  }

  /** Code after a jump still gets blocks; nothing reaches them */
  private ensure(cursor: Cursor): number {
    return cursor ?? this.block('basic');
  }

  /** Start a branch target from a decision block */
  private branch(from: number, kind: BasicBlockKind = 'basic'): number {
    const start = this.block(kind);
    this.edge(from, start);
    return start;
  }

  private join(...ends: Cursor[]): Cursor {
    const join = this.block('join');
    for (const end of ends) {
      if (end !== null) this.edge(end, join);
    }
    return this.reached(join);
  }

  visit(node: SyntaxNode, cursor: Cursor): Cursor {
    switch (node.kind) {
      case 'conditional':
        return this.visitConditional(node, cursor);
      case 'logicalAnd':
      case 'logicalOr':
        return this.visitLogical(node, cursor);
      case 'loop':
        return this.visitLoop(node, cursor);
      case 'switch':
        return this.visitSwitch(node, cursor);
      case 'try':
        return this.visitTry(node, cursor);
      case 'jump':
        return this.visitJump(node, cursor);
      case 'closure':
        return this.visitClosure(node, cursor);
      default:
        return this.visitSequence(node.children, cursor);
    }
  }

  private visitSequence(nodes: readonly SyntaxNode[], cursor: Cursor): Cursor {
    let current = cursor;
    for (const child of nodes) {
      current = this.visit(child, this.ensure(current));
    }
    return current;
  }

  private visitConditional(node: ConditionalNode, cursor: Cursor): Cursor {
    const decision = this.ensure(this.visit(node.test, this.ensure(cursor)));
    const thenEnd = this.visit(node.consequent, this.branch(decision));
    const elseEnd = node.alternate ? this.visit(node.alternate, this.branch(decision)) : decision;
    return this.join(thenEnd, elseEnd);
  }

  private visitLogical(node: LogicalNode, cursor: Cursor): Cursor {
    // The left operand decides whether the right one runs
    const decision = this.ensure(this.visit(node.left, this.ensure(cursor)));
    const rightEnd = this.visit(node.right, this.branch(decision));
    return this.join(rightEnd, decision);
  }

  private visitLoop(node: LoopNode, cursor: Cursor): Cursor {
    let current = this.ensure(cursor);
    if (node.init) current = this.ensure(this.visit(node.init, current));

    const loopExit = this.block('join');
    const header = this.branch(current, 'loop');

    if (node.form === 'doWhile') {
      const check = this.block('branch');
      const bodyEnd = this.withTarget(node.label, loopExit, check, () =>
        this.visit(node.body, header)
      );
      if (bodyEnd !== null) this.edge(bodyEnd, check);

      const testEnd = node.test ? this.visit(node.test, check) : check;
      if (testEnd !== null) {
        this.edge(testEnd, header);
        if (!node.alwaysTrue) this.edge(testEnd, loopExit);
      }
      return this.reached(loopExit);
    }

    // for-in / for-of visit every element: one pass through the body, no test
    if (node.form === 'forIn' || node.form === 'forOf') {
      const bodyEnd = this.withTarget(node.label, loopExit, loopExit, () =>
        this.visit(node.body, header)
      );
      if (bodyEnd !== null) this.edge(bodyEnd, loopExit);
      return this.reached(loopExit);
    }

    let decision: Cursor = header;
    if (node.test && !node.alwaysTrue) {
      decision = this.visit(node.test, header);
    }

    const bodyStart = this.block('basic');
    if (decision !== null) {
      this.edge(decision, bodyStart);
      if (!node.alwaysTrue) this.edge(decision, loopExit);
    }

    const continueTo = node.update ? this.block('basic') : header;
    const bodyEnd = this.withTarget(node.label, loopExit, continueTo, () =>
      this.visit(node.body, bodyStart)
    );

    if (node.update) {
      if (bodyEnd !== null) this.edge(bodyEnd, continueTo);
      const updateEnd = this.visit(node.update, continueTo);
      if (updateEnd !== null) this.edge(updateEnd, header);
    } else if (bodyEnd !== null) {
      this.edge(bodyEnd, header);
    }

    return this.reached(loopExit);
  }

  private visitSwitch(node: SwitchNode, cursor: Cursor): Cursor {
    const dispatch = this.ensure(this.visit(node.discriminant, this.ensure(cursor)));
    const switchExit = this.block('join');

    let fallthrough: Cursor = null;
    const end = this.withTarget(node.label, switchExit, null, () => {
      for (const c of node.cases) {
        const start = this.branch(dispatch, 'switch');
        if (fallthrough !== null) this.edge(fallthrough, start);
        fallthrough = this.visit(c.body, start);
      }
      return fallthrough;
    });

    if (!node.cases.some(c => c.isDefault)) this.edge(dispatch, switchExit);
    if (end !== null) this.edge(end, switchExit);
    return this.reached(switchExit);
  }

  private visitTry(node: TryNode, cursor: Cursor): Cursor {
    const start = this.ensure(cursor);
    const handler = node.handler;

    let end: Cursor;
    if (handler) {
      const catchStart = this.block('catch');
      // Any statement of the block may throw; the handler is not a choice
      this.implicitEdge(start, catchStart);

      this.frame.handlers.push(catchStart);
      const blockEnd = this.visit(node.block, start);
      this.frame.handlers.pop();

      const catchEnd = this.visit(handler.body, catchStart);
      end = this.join(blockEnd, catchEnd);
    } else {
      end = this.visit(node.block, start);
    }

    return node.finalizer ? this.visit(node.finalizer, this.ensure(end)) : end;
  }

  private visitJump(node: JumpNode, cursor: Cursor): Cursor {
    const current = node.argument
      ? this.ensure(this.visit(node.argument, this.ensure(cursor)))
      : this.ensure(cursor);
    const frame = this.frame;

    switch (node.form) {
      case 'return':
        this.edge(current, frame.returnTo);
        break;
      case 'throw': {
        const handler = frame.handlers[frame.handlers.length - 1];
        this.edge(current, handler ?? frame.returnTo);
        break;
      }
      case 'break': {
        const target = this.resolveTarget(node.label, false);
        this.edge(current, target?.breakTo ?? frame.returnTo);
        break;
      }
      case 'continue': {
        const target = this.resolveTarget(node.label, true);
        this.edge(current, target?.continueTo ?? frame.returnTo);
        break;
      }
    }
    return null;
  }

  private visitClosure(node: ClosureNode, cursor: Cursor): Cursor {
    const definition = this.ensure(cursor);
    const start = this.branch(definition, 'closure');
    const closureEnd = this.block('join');
    // Defining the closure does not run it: the code after it is always reached
    this.implicitEdge(definition, closureEnd);

    this.frames.push({ returnTo: closureEnd, targets: [], handlers: [] });
    const bodyEnd = this.visit(node.body, start);
    this.frames.pop();

    if (bodyEnd !== null) this.edge(bodyEnd, closureEnd);
    return this.reached(closureEnd);
  }

  private resolveTarget(label: string | null, forContinue: boolean): JumpTarget | undefined {
    const targets = this.frame.targets;
    for (let i = targets.length - 1; i >= 0; i--) {
      const target = targets[i];
      if (label !== null) {
        if (target.label === label) return target;
      } else if (!forContinue || target.continueTo !== null) {
        return target;
      }
    }
    return undefined;
  }

  private withTarget(
    label: string | null,
    breakTo: number,
    continueTo: number | null,
    visitBody: () => Cursor
  ): Cursor {
    const targets = this.frame.targets;
    targets.push({ label, breakTo, continueTo });
    try {
      return visitBody();
    } finally {
      targets.pop();
    }
  }
}

/**
 * Build the control-flow graph of a function body.
 *
 * Closures defined in the body are inlined as a sub-flow between their
 * definition and the code that follows, so their branches count toward the
 * enclosing function. `for...in` / `for...of` visit every element and add no
 * decision of their own, and neither does a `catch`.
 */
export function buildControlFlowGraph(body: BlockNode): ControlFlowGraph {
  return new GraphBuilder().build(body);
}

/**
 * Block indices reachable from the entry block, over both kinds of edge.
 */
export function reachableBlocks(cfg: ControlFlowGraph): Set<number> {
  const successors = successorMap([...cfg.edges, ...cfg.implicitEdges]);
  const seen = new Set<number>([cfg.entry]);
  const queue = [cfg.entry];

  while (queue.length > 0) {
    const current = queue.pop();
    if (current === undefined) break;
    for (const next of successors.get(current) ?? []) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return seen;
}

function successorMap(edges: readonly ControlFlowEdge[]): Map<number, Set<number>> {
  const map = new Map<number, Set<number>>();
  for (const [from, to] of edges) {
    const set = map.get(from) ?? new Set<number>();
    set.add(to);
    map.set(from, set);
  }
  return map;
}

/**
 * Number of binary decisions in the graph: for every reachable block, its
 * distinct successors minus one.
 */
export function decisionPoints(cfg: ControlFlowGraph): number {
  const successors = successorMap(cfg.edges);
  let decisions = 0;
  for (const id of reachableBlocks(cfg)) {
    const out = successors.get(id)?.size ?? 0;
    if (out > 1) decisions += out - 1;
  }
  return decisions;
}
