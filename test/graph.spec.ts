import { describe, expect, it } from "vitest";

import { aten, Graph, prim } from "../src/ir/graph";
import { insertConstant } from "../src/ir/constants";
import { lintGraph } from "../src/ir/lint";
import { GraphLintError, IRInvariantError } from "../src/jit/jit-errors";
import { IntT, TensorT } from "../src/jit/types";

function addGraph() {
  const graph = new Graph();
  const x = graph.addInput(IntT, "x");
  const one = insertConstant(graph, 1, IntT);
  const sum = graph.insert(aten.add, [x, one], [IntT]).output();
  graph.registerOutput(sum);
  return { graph, x, one, sum };
}

describe("Graph", () => {
  it("appends nodes at the end of the top block by default", () => {
    const { graph } = addGraph();

    expect(graph.nodes().map((n) => n.kind)).toEqual([prim.Constant, aten.add]);
    expect(graph.getInsertPoint()).toBe(graph.block.returnNode);
  });

  it("tracks uses", () => {
    const { x, one, sum } = addGraph();

    expect(x.uses.length).toBe(1);
    expect(x.uses[0].user === sum.node).toBe(true);
    expect(x.uses[0].offset).toBe(0);
    expect(one.uses.length).toBe(1);
    expect(one.uses[0].user === sum.node).toBe(true);
    expect(one.uses[0].offset).toBe(1);
    expect(sum.uses.map((u) => u.user.kind)).toEqual([prim.Return]);
  });

  it("replaces all uses", () => {
    const { graph, x, sum } = addGraph();
    const two = graph.withInsertPoint(sum.node, () => insertConstant(graph, 2, IntT));

    x.replaceAllUsesWith(two);

    expect(x.hasUses()).toBe(false);
    expect(sum.node.inputs[0]).toBe(two);
    lintGraph(graph);
  });

  it("refuses to destroy a node whose outputs are used", () => {
    const { sum } = addGraph();

    expect(() => sum.node.destroy()).toThrow(IRInvariantError);
  });

  it("destroys unused nodes and drops their uses", () => {
    const { graph, x, one, sum } = addGraph();
    graph.block.eraseOutput(0);
    graph.registerOutput(x);

    sum.node.destroy();

    expect(sum.node.destroyed).toBe(true);
    expect(one.hasUses()).toBe(false);
    expect(graph.nodes().map((n) => n.kind)).toEqual([prim.Constant]);
    lintGraph(graph);
  });

  it("keeps debug names unique", () => {
    const graph = new Graph();
    const a = graph.addInput(IntT, "v");
    const b = graph.addInput(IntT, "v");
    const c = graph.addInput(IntT, "v");

    expect([a, b, c].map((v) => v.displayName())).toEqual(["v", "v.1", "v.2"]);

    a._clearDebugName();
    const d = graph.addInput(IntT, "v");
    expect(d.displayName()).toBe("v");
    expect(a.displayName()).toBe(String(a.id));
  });

  it("restores the insert point after withInsertPoint", () => {
    const { graph, sum } = addGraph();

    graph.withInsertPoint(sum.node, () => insertConstant(graph, 3, IntT));
    graph.insert(aten.neg, [sum], [IntT]);

    expect(graph.nodes().map((n) => n.kind)).toEqual([
      prim.Constant,
      prim.Constant,
      aten.add,
      aten.neg,
    ]);
  });

  it("copies graphs including nested blocks", () => {
    const graph = new Graph();
    const flag = graph.addInput(TensorT, "flag");
    const node = graph.insert(prim.If, [flag], [IntT]);
    for (const value of [1, 2]) {
      const block = node.addBlock();
      block.registerOutput(graph.withInsertPoint(block, () => insertConstant(graph, value, IntT)));
    }
    graph.registerOutput(node.output());

    const copy = graph.copy();
    const copiedIf = copy.nodes()[0];

    expect(copy.inputs[0].displayName()).toBe("flag");
    expect(Object.is(copiedIf, node)).toBe(false);
    expect(copiedIf.blocks.map((b) => b.nodes()[0].ival("value"))).toEqual([1, 2]);
    expect(copy.allNodes()).toHaveLength(3);
    lintGraph(copy);
  });

  it("moves nodes between blocks", () => {
    const graph = new Graph();
    const flag = graph.addInput(TensorT, "flag");
    const node = graph.insert(prim.If, [flag], []);
    const block = node.addBlock();
    node.addBlock();
    const inner = graph.withInsertPoint(block, () => insertConstant(graph, 4, IntT));

    inner.node.moveBefore(node);

    expect(graph.nodes().map((n) => n.kind)).toEqual([prim.Constant, prim.If]);
    expect(block.nodes()).toEqual([]);
    expect(inner.node.owningBlock).toBe(graph.block);
  });
});

describe("lintGraph", () => {
  it("rejects uses before definition", () => {
    const { graph, sum } = addGraph();
    const late = graph.insert(aten.neg, [sum], [IntT]).output();
    sum.node.replaceInput(1, late);

    expect(() => lintGraph(graph)).toThrow(GraphLintError);
  });

  it("rejects values defined in a sibling block", () => {
    const graph = new Graph();
    const flag = graph.addInput(TensorT, "flag");
    const node = graph.insert(prim.If, [flag], [IntT]);
    const thenBlock = node.addBlock();
    const elseBlock = node.addBlock();
    const inner = graph.withInsertPoint(thenBlock, () => insertConstant(graph, 1, IntT));
    thenBlock.registerOutput(inner);
    elseBlock.registerOutput(inner);
    graph.registerOutput(node.output());

    expect(() => lintGraph(graph)).toThrow(
      "prim::Return reads %2 before or outside its definition",
    );
  });
});
