/**
 * Method inliner: expands prim::CallMethod into the callee's body so that
 * a method's whole behaviour is visible in one flat graph.
 */

import { type Block, type Graph, type Node, prim, type Value } from "../ir/graph";
import {
  IRInvariantError,
  MissingMethodError,
  RecursiveInlineError,
} from "../jit/jit-errors";
import { graphUpdate } from "../jit/jit-log";
import { isClassType, type Method } from "../jit/types";

function resolveCallee(call: Node): Method {
  const receiverType = call.input(0).type;
  if (!isClassType(receiverType)) {
    throw new IRInvariantError(
      `${prim.CallMethod} receiver %${call.input(0).displayName()} is not an object`,
    );
  }
  const name = call.s("name");
  const method = receiverType.findMethod(name);
  if (!method) {
    throw new MissingMethodError(receiverType.qualifiedName, name);
  }
  return method;
}

function inlineCallTo(call: Node, stack: readonly Method[]): number {
  const method = resolveCallee(call);
  if (stack.includes(method)) {
    const chain = [...stack, method]
      .map((m) => `${m.owner.qualifiedName}.${m.name}`)
      .join(" -> ");
    throw new RecursiveInlineError(`recursive method call: ${chain}`);
  }

  // Flatten the callee on a private copy first, then splice it in.
  const callee = method.graph.copy();
  const nested = inlineBlock(callee.block, [...stack, method]);

  const env = new Map<Value, Value>();
  callee.inputs.forEach((param, i) => env.set(param, call.input(i)));
  const lookup = (value: Value): Value => {
    const mapped = env.get(value);
    if (!mapped) {
      throw new IRInvariantError(
        `%${value.displayName()} escapes the scope of ${method.name}`,
      );
    }
    return mapped;
  };
  for (const node of callee.nodes()) {
    const copy = call.graph.createClone(node, lookup);
    copy.insertBefore(call);
    node.outputs.forEach((out, i) => env.set(out, copy.outputs[i]));
  }
  callee.outputs.forEach((out, i) => {
    call.output(i).replaceAllUsesWith(lookup(out));
  });

  graphUpdate("inliner", () =>
    `Inlined ${method.owner.qualifiedName}.${method.name} (${callee.nodes().length} nodes)`,
  );
  call.destroy();
  return nested + 1;
}

function inlineBlock(block: Block, stack: readonly Method[]): number {
  let count = 0;
  for (let node = block.firstNode(); node; ) {
    const next = node.nextInBlock();
    for (const sub of node.blocks) {
      count += inlineBlock(sub, stack);
    }
    if (node.kind === prim.CallMethod) {
      count += inlineCallTo(node, stack);
    }
    node = next;
  }
  return count;
}

/**
 * Inline every method call in `graph`, recursively. Returns the number of
 * call sites expanded, nested ones included.
 */
export function inlineCalls(graph: Graph): number {
  return inlineBlock(graph.block, []);
}
