import { GraphLintError } from "../jit/jit-errors";
import type { Block, Graph, Node, Value } from "./graph";

function fail(message: string): never {
  throw new GraphLintError(message);
}

function checkUses(value: Value): void {
  for (const use of value.uses) {
    if (use.user.destroyed) {
      fail(`%${value.displayName()} is used by a destroyed ${use.user.kind}`);
    }
    if (use.user.inputs[use.offset] !== value) {
      fail(
        `%${value.displayName()} records a use by ${use.user.kind} at input ${use.offset} that does not exist`,
      );
    }
  }
}

function checkInputs(node: Node, scope: ReadonlySet<Value>): void {
  node.inputs.forEach((input, offset) => {
    if (input.node.destroyed) {
      fail(`${node.kind} reads %${input.displayName()} from a destroyed node`);
    }
    if (!scope.has(input)) {
      fail(`${node.kind} reads %${input.displayName()} before or outside its definition`);
    }
    if (!input.uses.some((use) => use.user === node && use.offset === offset)) {
      fail(`${node.kind} input ${offset} is missing from the use list of %${input.displayName()}`);
    }
  });
}

function lintBlock(block: Block, outer: ReadonlySet<Value>): void {
  const scope = new Set(outer);
  for (const input of block.inputs) {
    checkUses(input);
    scope.add(input);
  }
  let prev: Node = block.paramNode;
  for (const node of block.nodes()) {
    if (node.destroyed) fail(`destroyed ${node.kind} is still linked into a block`);
    if (node.owningBlock !== block) fail(`${node.kind} has the wrong owning block`);
    if (node.prev !== prev) fail(`${node.kind} has a broken prev link`);
    checkInputs(node, scope);
    for (const sub of node.blocks) {
      lintBlock(sub, scope);
    }
    node.outputs.forEach((out, offset) => {
      if (out.node !== node || out.offset !== offset) {
        fail(`%${out.displayName()} has a stale producer record`);
      }
      checkUses(out);
      scope.add(out);
    });
    prev = node;
  }
  if (block.returnNode.prev !== prev) {
    fail("block return node has a broken prev link");
  }
  checkInputs(block.returnNode, scope);
}

/**
 * Verify def/use consistency of a graph. Throws GraphLintError on the first
 * problem found.
 */
export function lintGraph(graph: Graph): void {
  lintBlock(graph.block, new Set());
}
