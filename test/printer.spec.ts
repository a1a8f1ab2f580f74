import { describe, expect, it } from "vitest";

import { aten, Graph, prim } from "../src/ir/graph";
import { insertConstant } from "../src/ir/constants";
import { printGraph } from "../src/ir/printer";
import { BoolT, FloatT, IntT, NoneT, StringT, TensorT } from "../src/jit/types";
import { Tensor } from "../src/runtime/tensor";

describe("printGraph", () => {
  it("prints inputs, nodes and outputs", () => {
    const graph = new Graph();
    const x = graph.addInput(TensorT, "x");
    const y = graph.addInput(TensorT, "y");
    const sum = graph.insert(aten.add, [x, y], [TensorT]).output();
    graph.registerOutput(sum);

    expect(printGraph(graph)).toBe(
      [
        "graph(%x : Tensor,",
        "      %y : Tensor):",
        "  %2 : Tensor = aten::add(%x, %y)",
        "  return (%2)",
      ].join("\n"),
    );
  });

  it("prints constant payloads by type", () => {
    const graph = new Graph();
    const values = [
      insertConstant(graph, 2, FloatT),
      insertConstant(graph, 2.5, FloatT),
      insertConstant(graph, 3, IntT),
      insertConstant(graph, true, BoolT),
      insertConstant(graph, "relu", StringT),
      insertConstant(graph, null, NoneT),
      insertConstant(graph, Tensor.fromArray([1, 2, 3, 4], [2, 2]), TensorT),
    ];
    for (const value of values) graph.registerOutput(value);

    expect(printGraph(graph).split("\n")).toEqual([
      "graph():",
      "  %0 : float = prim::Constant[value=2.]()",
      "  %1 : float = prim::Constant[value=2.5]()",
      "  %2 : int = prim::Constant[value=3]()",
      "  %3 : bool = prim::Constant[value=True]()",
      '  %4 : str = prim::Constant[value="relu"]()',
      "  %5 : NoneType = prim::Constant()",
      "  %6 : Tensor = prim::Constant[value=<Tensor [2, 2]>]()",
      "  return (%0, %1, %2, %3, %4, %5, %6)",
    ]);
  });

  it("prints nested blocks", () => {
    const graph = new Graph();
    const c = graph.addInput(BoolT, "c");
    const node = graph.insert(prim.If, [c], [IntT]);
    node.output().setDebugName("r");
    for (const value of [1, 0]) {
      const block = node.addBlock();
      block.registerOutput(
        graph.withInsertPoint(block, () => insertConstant(graph, value, IntT)),
      );
    }
    graph.registerOutput(node.output());

    expect(printGraph(graph)).toBe(
      [
        "graph(%c : bool):",
        "  %r : int = prim::If(%c)",
        "    block0():",
        "      %2 : int = prim::Constant[value=1]()",
        "      -> (%2)",
        "    block1():",
        "      %3 : int = prim::Constant[value=0]()",
        "      -> (%3)",
        "  return (%r)",
      ].join("\n"),
    );
  });
});
