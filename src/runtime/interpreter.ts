/**
 * Reference interpreter for instruction graphs.
 *
 * Values live in one environment per call; nested blocks share it since
 * every Value is defined exactly once.
 */

import { type Block, type Graph, type Node, prim, type Value } from "../ir/graph";
import { type IValue, ivalueToString, Tuple } from "../jit/ivalue";
import {
  IRInvariantError,
  MissingMethodError,
  ScriptRuntimeError,
} from "../jit/jit-errors";
import { ScriptModule } from "../jit/module";
import { getOp } from "./ops";

export interface RunOptions {
  /** Sink for prim::Print. Defaults to console.log. */
  print?: (line: string) => void;
}

type Frame = {
  env: Map<Value, IValue>;
  print: (line: string) => void;
};

function read(frame: Frame, value: Value): IValue {
  const result = frame.env.get(value);
  if (result === undefined) {
    throw new IRInvariantError(
      `%${value.displayName()} was read before it was computed`,
    );
  }
  return result;
}

function expectModule(node: Node, value: IValue): ScriptModule {
  if (!(value instanceof ScriptModule)) {
    throw new ScriptRuntimeError(`${node.kind} expects a module receiver`);
  }
  return value;
}

function expectBool(node: Node, value: IValue): boolean {
  if (typeof value !== "boolean") {
    throw new ScriptRuntimeError(`${node.kind} expects a bool condition`);
  }
  return value;
}

function expectInt(node: Node, value: IValue): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ScriptRuntimeError(`${node.kind} expects an int`);
  }
  return value;
}

function expectTuple(node: Node, value: IValue): Tuple {
  if (!(value instanceof Tuple)) {
    throw new ScriptRuntimeError(`${node.kind} expects a tuple`);
  }
  return value;
}

function runBlock(block: Block, inputs: readonly IValue[], frame: Frame): IValue[] {
  block.inputs.forEach((param, i) => frame.env.set(param, inputs[i]));
  for (const node of block.nodes()) {
    const outputs = runNode(node, frame);
    node.outputs.forEach((out, i) => frame.env.set(out, outputs[i]));
  }
  return block.outputs.map((out) => read(frame, out));
}

function runLoop(node: Node, args: IValue[], frame: Frame): IValue[] {
  const maxTripCount = expectInt(node, args[0]);
  let condition = expectBool(node, args[1]);
  let carried = args.slice(2);
  const body = node.blocks[0];
  for (let i = 0; condition && i < maxTripCount; i++) {
    const [nextCondition, ...nextCarried] = runBlock(body, [i, ...carried], frame);
    condition = expectBool(node, nextCondition);
    carried = nextCarried;
  }
  return carried;
}

function runNode(node: Node, frame: Frame): IValue[] {
  const args = node.inputs.map((input) => read(frame, input));
  switch (node.kind) {
    case prim.Constant:
      return [node.ival("value")];
    case prim.GetAttr:
      return [expectModule(node, args[0]).attr(node.s("name"))];
    case prim.SetAttr:
      expectModule(node, args[0]).setattr(node.s("name"), args[1]);
      return [];
    case prim.CallMethod: {
      const receiver = expectModule(node, args[0]);
      const name = node.s("name");
      const method = receiver.findMethod(name);
      if (!method) {
        throw new MissingMethodError(receiver.type.qualifiedName, name);
      }
      return runGraph(method.graph, args, { print: frame.print });
    }
    case prim.If: {
      const taken = expectBool(node, args[0]) ? node.blocks[0] : node.blocks[1];
      return runBlock(taken, [], frame);
    }
    case prim.Loop:
      return runLoop(node, args, frame);
    case prim.TupleConstruct:
      return [new Tuple(args)];
    case prim.TupleUnpack:
      return expectTuple(node, args[0]).elements.slice();
    case prim.TupleIndex:
      return [expectTuple(node, args[0]).get(expectInt(node, args[1]))];
    case prim.ListConstruct:
      return [args];
    case prim.RaiseException:
      throw new ScriptRuntimeError(
        typeof args[0] === "string" ? args[0] : "Exception",
      );
    case prim.Print:
      frame.print(args.map(ivalueToString).join(" "));
      return [];
    default: {
      const op = getOp(node.kind);
      if (!op) {
        throw new IRInvariantError(`the interpreter cannot run ${node.kind}`);
      }
      return [op(args)];
    }
  }
}

/**
 * Execute a graph. `inputs` line up with the graph inputs (the receiver
 * first, for methods).
 */
export function runGraph(
  graph: Graph,
  inputs: readonly IValue[],
  options: RunOptions = {},
): IValue[] {
  if (inputs.length !== graph.inputs.length) {
    throw new ScriptRuntimeError(
      `graph expects ${graph.inputs.length} inputs, got ${inputs.length}`,
    );
  }
  const frame: Frame = {
    env: new Map(),
    print: options.print ?? ((line) => console.log(line)),
  };
  return runBlock(graph.block, inputs, frame);
}
