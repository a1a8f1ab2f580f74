/**
 * Generic graph simplification run after attribute freezing.
 *
 * Implements:
 * - Constant propagation (pure ops on literals, prim::If on a literal condition)
 * - Constant pooling (one hoisted prim::Constant per distinct literal)
 * - CSE (Common Subexpression Elimination) for pure ops, scoped by block nesting
 * - Dead code elimination, including effect-free control flow
 */

import { tryInsertConstant, toIValue } from "../ir/constants";
import {
  aten,
  type Block,
  type Graph,
  type Node,
  prim,
  type Value,
} from "../ir/graph";
import { type IValue, ivalueToString, Tuple } from "../jit/ivalue";
import { graphDebug, graphDump, graphUpdate } from "../jit/jit-log";
import { typeToString } from "../jit/types";
import { getOp } from "../runtime/ops";
import { Tensor } from "../runtime/tensor";

// ============================================================================
// Op Classification
// ============================================================================

/**
 * Pure aten ops: no mutation, result depends only on the inputs.
 */
const PURE_ATEN_OPS = new Set<string>([
  aten.add,
  aten.sub,
  aten.mul,
  aten.div,
  aten.neg,
  aten.relu,
  aten.eq,
  aten.ne,
  aten.lt,
  aten.le,
  aten.gt,
  aten.ge,
]);

const UNARY_ATEN_OPS = new Set<string>([aten.neg, aten.relu]);

/**
 * Tuple plumbing that is pure. Lists are mutable and stay out.
 */
const PURE_TUPLE_OPS = new Set<string>([
  prim.TupleConstruct,
  prim.TupleIndex,
  prim.TupleUnpack,
]);

/**
 * Node kinds with effects beyond their outputs.
 */
const SIDE_EFFECT_KINDS = new Set<string>([
  prim.SetAttr,
  prim.Print,
  prim.RaiseException,
  prim.CallMethod,
]);

export function isPureNode(node: Node): boolean {
  return PURE_ATEN_OPS.has(node.kind) || PURE_TUPLE_OPS.has(node.kind);
}

/**
 * In-place aten ops follow the trailing-underscore convention.
 */
export function isInPlaceOp(kind: string): boolean {
  return kind.startsWith("aten::") && kind.endsWith("_");
}

/**
 * Whether removing the node could change observable behaviour. Control
 * nodes inherit the effects of their bodies.
 */
export function hasSideEffects(node: Node): boolean {
  if (SIDE_EFFECT_KINDS.has(node.kind) || isInPlaceOp(node.kind)) {
    return true;
  }
  return node.blocks.some((block) => block.nodes().some(hasSideEffects));
}

const NUMERIC_TYPE_KINDS = new Set<string>(["Tensor", "Int", "Float", "Bool"]);

function isNumeric(value: Value): boolean {
  return NUMERIC_TYPE_KINDS.has(value.type.kind);
}

/**
 * Whether running a pure node could raise. Tensor shapes are not tracked,
 * so two distinct tensor operands may fail to broadcast.
 */
export function mayRaise(node: Node): boolean {
  switch (node.kind) {
    case prim.TupleConstruct:
      return false;
    case prim.TupleUnpack: {
      const type = node.input(0).type;
      return type.kind !== "Tuple" || type.elements.length !== node.outputs.length;
    }
    case prim.TupleIndex: {
      const type = node.input(0).type;
      const index = toIValue(node.input(1));
      return (
        type.kind !== "Tuple" ||
        typeof index !== "number" ||
        !Number.isInteger(index) ||
        index < 0 ||
        index >= type.elements.length
      );
    }
  }
  if (!PURE_ATEN_OPS.has(node.kind)) {
    return true;
  }
  if (UNARY_ATEN_OPS.has(node.kind)) {
    return !isNumeric(node.input(0));
  }

  const lhs = node.input(0);
  const rhs = node.input(1);
  if (!isNumeric(lhs) || !isNumeric(rhs)) {
    // eq/ne fall back to structural equality on non-numeric operands.
    return node.kind !== aten.eq && node.kind !== aten.ne;
  }
  if (lhs.type.kind === "Tensor" && rhs.type.kind === "Tensor") {
    return lhs !== rhs;
  }
  if (node.kind === aten.div && lhs.type.kind !== "Tensor" && rhs.type.kind !== "Tensor") {
    const divisor = toIValue(rhs);
    return !(divisor === true || (typeof divisor === "number" && divisor !== 0));
  }
  return false;
}

function graphHasInPlaceOps(graph: Graph): boolean {
  return graph.allNodes().some((node) => isInPlaceOp(node.kind));
}

/**
 * Tensors can be mutated in place, so a value computed from a tensor is
 * only stable when the graph has no in-place ops.
 */
function readsTensor(node: Node): boolean {
  return node.inputs.some((input) => input.type.kind === "Tensor");
}

// ============================================================================
// Constant Propagation
// ============================================================================

export interface ConstantPropagationResult {
  constantsFolded: number;
  branchesFolded: number;
}

function evaluate(node: Node, args: IValue[]): IValue[] | undefined {
  switch (node.kind) {
    case prim.TupleConstruct:
      return [new Tuple(args)];
    case prim.TupleIndex: {
      const [tuple, index] = args;
      return tuple instanceof Tuple && typeof index === "number"
        ? [tuple.get(index)]
        : undefined;
    }
    case prim.TupleUnpack: {
      const [tuple] = args;
      return tuple instanceof Tuple ? tuple.elements.slice() : undefined;
    }
    default: {
      const op = getOp(node.kind);
      return op ? [op(args)] : undefined;
    }
  }
}

function evaluateOrDefer(node: Node, args: IValue[]): IValue[] | undefined {
  try {
    return evaluate(node, args);
  } catch (err) {
    // The op raises on these inputs; keep it so the error surfaces at run time.
    graphDebug("optimize", () =>
      `Not folding ${node.kind}: ${err instanceof Error ? err.message : String(err)}`,
    );
    return undefined;
  }
}

function tryFoldNode(node: Node, tensorsStable: boolean): boolean {
  if (!isPureNode(node) || (!tensorsStable && readsTensor(node))) {
    return false;
  }
  const args: IValue[] = [];
  for (const input of node.inputs) {
    const value = toIValue(input);
    if (value === undefined) return false;
    args.push(value);
  }

  const results = evaluateOrDefer(node, args);
  if (!results || results.length !== node.outputs.length) {
    return false;
  }

  const graph = node.graph;
  const constants = graph.withInsertPoint(node, () =>
    node.outputs.map((out, i) => tryInsertConstant(graph, results[i], out.type)),
  );
  if (constants.some((c) => c === undefined)) {
    for (const c of constants) c?.node.destroy();
    return false;
  }
  node.outputs.forEach((out, i) => {
    const constant = constants[i];
    if (constant) out.replaceAllUsesWith(constant);
  });
  graphUpdate("optimize", () => `Folded ${node.kind} into a constant`);
  node.destroy();
  return true;
}

/**
 * Replace `ifNode` by the branch its literal condition selects. Returns the
 * first node that was moved out of the branch, if any.
 */
function foldIf(ifNode: Node, condition: boolean): Node | undefined {
  const taken = condition ? ifNode.blocks[0] : ifNode.blocks[1];
  const first = taken.firstNode();
  for (const node of taken.nodes()) {
    node.moveBefore(ifNode);
  }
  ifNode.outputs.forEach((out, i) => {
    out.replaceAllUsesWith(taken.outputs[i]);
  });
  graphUpdate("optimize", () =>
    `Folded ${prim.If} on constant condition ${condition ? "True" : "False"}`,
  );
  ifNode.destroy();
  return first;
}

function propagateBlock(
  block: Block,
  tensorsStable: boolean,
  result: ConstantPropagationResult,
): void {
  for (let node = block.firstNode(); node; ) {
    let next = node.nextInBlock();
    if (node.kind === prim.If) {
      const condition = toIValue(node.input());
      if (typeof condition === "boolean") {
        // Revisit the hoisted branch body: it may fold further.
        next = foldIf(node, condition) ?? next;
        result.branchesFolded++;
        node = next;
        continue;
      }
    }
    for (const sub of node.blocks) {
      propagateBlock(sub, tensorsStable, result);
    }
    if (tryFoldNode(node, tensorsStable)) {
      result.constantsFolded++;
    }
    node = next;
  }
}

export function propagateConstants(graph: Graph): ConstantPropagationResult {
  const result: ConstantPropagationResult = {
    constantsFolded: 0,
    branchesFolded: 0,
  };
  propagateBlock(graph.block, !graphHasInPlaceOps(graph), result);
  return result;
}

// ============================================================================
// Constant Pooling
// ============================================================================

/**
 * Key identifying a literal. Tensors are keyed by identity: two equal-valued
 * tensors may still be mutated separately.
 */
export function constantKey(node: Node): string {
  const value = node.ival("value");
  const type = typeToString(node.output().type);
  if (value instanceof Tensor) {
    return `${type}:tensor#${value.id}`;
  }
  if (containsTensor(value)) {
    return `${type}:unpooled#${node.output().id}`;
  }
  if (Object.is(value, -0)) {
    return `${type}:-0`;
  }
  return `${type}:${ivalueToString(value)}`;
}

function containsTensor(value: IValue): boolean {
  if (value instanceof Tensor) return true;
  if (value instanceof Tuple) return value.elements.some(containsTensor);
  if (Array.isArray(value)) return value.some(containsTensor);
  return false;
}

/**
 * Hoist every constant to the top of the graph and merge duplicates.
 * Returns the number of constants removed.
 */
export function poolConstants(graph: Graph): number {
  const constants = graph.allNodes().filter((n) => n.kind === prim.Constant);
  const pooled = new Map<string, Node>();
  let anchor: Node = graph.block.paramNode;
  let removed = 0;
  for (const node of constants) {
    const key = constantKey(node);
    const existing = pooled.get(key);
    if (existing) {
      node.output().replaceAllUsesWith(existing.output());
      node.destroy();
      removed++;
      continue;
    }
    pooled.set(key, node);
    node.removeFromList();
    node.insertAfter(anchor);
    anchor = node;
  }
  return removed;
}

// ============================================================================
// Common Subexpression Elimination
// ============================================================================

/**
 * Generate a CSE key for a node.
 * Nodes with the same key compute the same values.
 */
export function generateCSEKey(node: Node): string {
  const inputs = node.inputs.map((input) => input.id).join(",");
  const attrs = node
    .attributeNames()
    .map((name) => `${name}=${ivalueToString(node.ival(name))}`)
    .join(",");
  const outputs = node.outputs.map((out) => typeToString(out.type)).join(",");
  return `${node.kind}[${attrs}](${inputs})->(${outputs})`;
}

function cseBlock(
  block: Block,
  visible: ReadonlyMap<string, Node>,
  tensorsStable: boolean,
): number {
  const table = new Map(visible);
  let eliminated = 0;
  for (let node = block.firstNode(); node; ) {
    const next = node.nextInBlock();
    for (const sub of node.blocks) {
      eliminated += cseBlock(sub, table, tensorsStable);
    }
    if (isPureNode(node) && (tensorsStable || !readsTensor(node))) {
      const key = generateCSEKey(node);
      const existing = table.get(key);
      if (existing) {
        node.outputs.forEach((out, i) => {
          out.replaceAllUsesWith(existing.output(i));
        });
        node.destroy();
        eliminated++;
      } else {
        table.set(key, node);
      }
    }
    node = next;
  }
  return eliminated;
}

/**
 * Merge pure nodes that compute the same thing from the same inputs. A node
 * may reuse an equivalent node from an enclosing block, never from a
 * sibling block.
 */
export function eliminateCommonSubexpressions(graph: Graph): number {
  return cseBlock(graph.block, new Map(), !graphHasInPlaceOps(graph));
}

// ============================================================================
// Dead Code Elimination
// ============================================================================

function eraseUnusedIfOutputs(node: Node): void {
  for (let i = node.outputs.length - 1; i >= 0; i--) {
    if (node.outputs[i].hasUses()) continue;
    for (const block of node.blocks) {
      block.eraseOutput(i);
    }
    node.eraseOutput(i);
  }
}

function isRemovable(node: Node): boolean {
  if (hasSideEffects(node) || (isPureNode(node) && mayRaise(node))) {
    return false;
  }
  return node.blocks.every((block) => block.nodes().every(isRemovable));
}

function dceBlock(block: Block): number {
  let eliminated = 0;
  const nodes = block.nodes();
  for (let i = nodes.length - 1; i >= 0; i--) {
    const node = nodes[i];
    if (node.kind === prim.If) {
      eraseUnusedIfOutputs(node);
    }
    for (const sub of node.blocks) {
      eliminated += dceBlock(sub);
    }
    if (!node.hasUses() && isRemovable(node)) {
      node.destroy();
      eliminated++;
    }
  }
  return eliminated;
}

/**
 * Remove nodes whose outputs are never used and that have no effects. An
 * unused op that may raise stays, so the error still surfaces at run time.
 */
export function eliminateDeadCode(graph: Graph): number {
  return dceBlock(graph.block);
}

// ============================================================================
// Full Optimization Pipeline
// ============================================================================

/**
 * Options for graph optimization.
 */
export interface OptimizeOptions {
  enableConstantPropagation?: boolean;
  enableConstantPooling?: boolean;
  enableCSE?: boolean;
  enableDCE?: boolean;
}

/**
 * Result of the optimization pipeline.
 */
export interface OptimizeResult {
  stats: {
    originalNodeCount: number;
    finalNodeCount: number;
    constantsFolded: number;
    branchesFolded: number;
    constantsPooled: number;
    cseEliminated: number;
    dceEliminated: number;
  };
}

/**
 * Run the full optimization pipeline in place.
 */
export function runOptimization(
  graph: Graph,
  options: OptimizeOptions = {},
): OptimizeResult {
  const {
    enableConstantPropagation = true,
    enableConstantPooling = true,
    enableCSE = true,
    enableDCE = true,
  } = options;

  const originalNodeCount = graph.allNodes().length;
  const propagation = enableConstantPropagation
    ? propagateConstants(graph)
    : { constantsFolded: 0, branchesFolded: 0 };
  const constantsPooled = enableConstantPooling ? poolConstants(graph) : 0;
  const cseEliminated = enableCSE ? eliminateCommonSubexpressions(graph) : 0;
  const dceEliminated = enableDCE ? eliminateDeadCode(graph) : 0;

  graphDump("optimize", "After optimization", graph);

  return {
    stats: {
      originalNodeCount,
      finalNodeCount: graph.allNodes().length,
      constantsFolded: propagation.constantsFolded,
      branchesFolded: propagation.branchesFolded,
      constantsPooled,
      cseEliminated,
      dceEliminated,
    },
  };
}
