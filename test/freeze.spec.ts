import { describe, expect, it } from "vitest";

import { freezeModule } from "../src/freeze";
import { aten, prim } from "../src/ir/graph";
import { lintGraph } from "../src/ir/lint";
import { printGraph } from "../src/ir/printer";
import {
  MissingMethodError,
  ScriptRuntimeError,
  UnknownAttributeError,
} from "../src/jit/jit-errors";
import { ScriptModule } from "../src/jit/module";
import { FloatT, IntT, TensorT } from "../src/jit/types";
import { Tensor } from "../src/runtime/tensor";
import { attributeNames, GraphBuilder, makeModule } from "./helpers/builder";
import { scaleAndBiasModule, tupleReceiverModule } from "./helpers/scenarios";

describe("freezeModule", () => {
  describe("immutable attributes", () => {
    it("folds direct and nested reads and prunes the root", () => {
      const m = scaleAndBiasModule();
      const frozen = freezeModule(m);
      const graph = frozen.getMethod("forward").graph;

      expect(printGraph(graph)).toBe(
        [
          "graph(%self : M):",
          "  %7 : int = prim::Constant[value=7]()",
          "  return (%7)",
        ].join("\n"),
      );
      expect(attributeNames(frozen)).toEqual([]);
      expect(frozen.forward()).toBe(7);
      lintGraph(graph);
    });

    it("keeps the submodule while the graph still reads it", () => {
      const frozen = freezeModule(scaleAndBiasModule(), { optimize: false });
      const graph = frozen.getMethod("forward").graph;

      expect(printGraph(graph)).toBe(
        [
          "graph(%self : M):",
          '  %B : B = prim::GetAttr[name="B"](%self)',
          "  %B.bias : int = prim::Constant[value=5]()",
          "  %M.scale : int = prim::Constant[value=2]()",
          "  %out : int = aten::add(%M.scale, %B.bias)",
          "  return (%out)",
        ].join("\n"),
      );
      expect(attributeNames(frozen)).toEqual(["B"]);
      expect(attributeNames(frozen.submodule("B"))).toEqual(["bias"]);
      expect(frozen.forward()).toBe(7);
    });

    it("leaves the input module untouched", () => {
      const m = scaleAndBiasModule();
      const before = printGraph(m.getMethod("forward").graph);
      const frozen = freezeModule(m);

      expect(Object.is(frozen, m)).toBe(false);
      expect(frozen.handle).not.toBe(m.handle);
      expect(attributeNames(m)).toEqual(["scale", "B"]);
      expect(printGraph(m.getMethod("forward").graph)).toBe(before);
      expect(m.forward()).toBe(7);
    });

    it("clears requiresGrad on folded tensors of the clone only", () => {
      const weight = Tensor.fromArray([1, 2, 3], [3], { requiresGrad: true });
      const m = makeModule("Linear", [["weight", TensorT, weight]]);
      const g = new GraphBuilder();
      const self = g.input(m.type, "self");
      const x = g.input(TensorT, "x");
      m.type.addMethod(
        "forward",
        g.ret(g.op(aten.mul, [x, g.getAttr(self, "weight")], TensorT)),
      );

      const frozen = freezeModule(m);
      const constant = frozen
        .getMethod("forward")
        .graph.nodes()
        .find((node) => node.kind === prim.Constant);
      const folded = constant?.ival("value");

      expect(folded).toBeInstanceOf(Tensor);
      expect(folded instanceof Tensor && folded.requiresGrad).toBe(false);
      expect(Object.is(folded, weight)).toBe(false);
      expect(weight.requiresGrad).toBe(true);

      const out = frozen.forward(Tensor.fromArray([2, 2, 2]));
      expect(out instanceof Tensor && out.toArray()).toEqual([2, 4, 6]);
    });
  });

  describe("mutated attributes", () => {
    it("keeps a written attribute live and retained", () => {
      const frozen = freezeModule(scaleAndBiasModule({ writeBias: true }));
      const graph = frozen.getMethod("forward").graph;

      expect(printGraph(graph)).toBe(
        [
          "graph(%self : M,",
          "      %x : int):",
          "  %M.scale : int = prim::Constant[value=2]()",
          '  %B : B = prim::GetAttr[name="B"](%self)',
          '  %bias : int = prim::GetAttr[name="bias"](%B)',
          "  %out : int = aten::add(%M.scale, %bias)",
          '  %B.1 : B = prim::GetAttr[name="B"](%self)',
          '  prim::SetAttr[name="bias"](%B.1, %x)',
          "  return (%out)",
        ].join("\n"),
      );
      expect(attributeNames(frozen)).toEqual(["B"]);
      expect(attributeNames(frozen.submodule("B"))).toEqual(["bias"]);
      lintGraph(graph);
    });

    it("behaves like the original across calls", () => {
      const m = scaleAndBiasModule({ writeBias: true });
      const frozen = freezeModule(m);

      expect(frozen.forward(7)).toBe(7);
      expect(frozen.forward(1)).toBe(9);
      expect(frozen.submodule("B").attr("bias")).toBe(1);
      expect(m.submodule("B").attr("bias")).toBe(5);
    });

    it("keeps a root attribute that is only written", () => {
      const m = makeModule("Counter", [
        ["count", IntT, 0],
        ["step", IntT, 3],
      ]);
      const g = new GraphBuilder();
      const self = g.input(m.type, "self");
      const next = g.op(aten.add, [g.getAttr(self, "count"), g.getAttr(self, "step")], IntT);
      g.setAttr(self, "count", next);
      m.type.addMethod("forward", g.ret(next));

      const frozen = freezeModule(m);

      expect(attributeNames(frozen)).toEqual(["count"]);
      expect(frozen.forward()).toBe(3);
      expect(frozen.forward()).toBe(6);
    });
  });

  describe("unresolved receivers", () => {
    it("leaves reads through a tuple unfolded", () => {
      const frozen = freezeModule(tupleReceiverModule());
      const graph = frozen.getMethod("forward").graph;

      expect(printGraph(graph)).toBe(
        [
          "graph(%self : M):",
          "  %M.offset : int = prim::Constant[value=1]()",
          '  %A : A = prim::GetAttr[name="A"](%self)',
          "  %3 : (A, int) = prim::TupleConstruct(%A, %M.offset)",
          "  %4 : A, %5 : int = prim::TupleUnpack(%3)",
          '  %x : Tensor = prim::GetAttr[name="x"](%4)',
          "  return (%x)",
        ].join("\n"),
      );
      expect(attributeNames(frozen)).toEqual(["A"]);
      expect(attributeNames(frozen.submodule("A"))).toEqual(["x"]);

      const out = frozen.forward();
      expect(out instanceof Tensor && out.toArray()).toEqual([1, 2]);
    });
  });

  describe("options", () => {
    it("freezes another method when asked", () => {
      const m = makeModule("M", [["scale", FloatT, 0.5]]);
      const g = new GraphBuilder();
      const self = g.input(m.type, "self");
      m.type.addMethod("scaled", g.ret(g.getAttr(self, "scale")));

      const frozen = freezeModule(m, { methodName: "scaled" });

      expect(frozen.run("scaled")).toBe(0.5);
      expect(attributeNames(frozen)).toEqual([]);
    });

    it("keeps preserved attributes as attributes", () => {
      const frozen = freezeModule(scaleAndBiasModule(), {
        preservedAttrs: ["scale"],
      });
      const graph = frozen.getMethod("forward").graph;

      expect(printGraph(graph)).toBe(
        [
          "graph(%self : M):",
          "  %B.bias : int = prim::Constant[value=5]()",
          '  %scale : int = prim::GetAttr[name="scale"](%self)',
          "  %out : int = aten::add(%scale, %B.bias)",
          "  return (%out)",
        ].join("\n"),
      );
      expect(attributeNames(frozen)).toEqual(["scale"]);

      frozen.setattr("scale", 10);
      expect(frozen.forward()).toBe(15);
    });

    it("keeps a preserved submodule and everything read through it", () => {
      const frozen = freezeModule(scaleAndBiasModule(), {
        preservedAttrs: ["B"],
      });

      expect(attributeNames(frozen)).toEqual(["B"]);
      frozen.submodule("B").setattr("bias", 40);
      expect(frozen.forward()).toBe(42);
    });

    it("rejects an unknown preserved attribute", () => {
      expect(() =>
        freezeModule(scaleAndBiasModule(), { preservedAttrs: ["missing"] }),
      ).toThrow(new UnknownAttributeError("M", "missing"));
    });
  });

  describe("errors", () => {
    it("keeps an unused division that raises on a frozen zero", () => {
      const build = (d: number) => {
        const m = makeModule("M", [["d", IntT, d]]);
        const g = new GraphBuilder();
        const self = g.input(m.type, "self");
        const x = g.input(IntT, "x");
        g.op(aten.div, [x, g.getAttr(self, "d")], FloatT);
        m.type.addMethod("forward", g.ret(x));
        return m;
      };

      const m = build(0);
      const frozen = freezeModule(m);
      expect(() => m.forward(3)).toThrow(ScriptRuntimeError);
      expect(() => frozen.forward(3)).toThrow(ScriptRuntimeError);
      expect(attributeNames(frozen)).toEqual([]);

      const safe = freezeModule(build(2));
      expect(safe.getMethod("forward").graph.nodes()).toHaveLength(0);
      expect(safe.forward(3)).toBe(3);
    });

    it("throws MissingMethodError when the entry method does not exist", () => {
      const m = makeModule("Empty", [["scale", IntT, 1]]);

      expect(() => freezeModule(m)).toThrow(MissingMethodError);
      expect(() => freezeModule(m)).toThrow("Module 'Empty' has no method 'forward'");
    });

    it("inlines method calls before folding", () => {
      const inner = makeModule("Inner", [["k", IntT, 4]]);
      const outer = makeModule("Outer", [["inner", inner.type, inner]]);

      const callee = new GraphBuilder();
      const innerSelf = callee.input(inner.type, "self");
      const y = callee.input(IntT, "y");
      inner.type.addMethod(
        "forward",
        callee.ret(callee.op(aten.mul, [y, callee.getAttr(innerSelf, "k")], IntT)),
      );

      const g = new GraphBuilder();
      const self = g.input(outer.type, "self");
      const x = g.input(IntT, "x");
      outer.type.addMethod(
        "forward",
        g.ret(g.call(g.getAttr(self, "inner"), "forward", [x], IntT)),
      );

      const frozen = freezeModule(outer);
      const kinds = frozen.getMethod("forward").graph.nodes().map((n) => n.kind);

      expect(kinds).toEqual([prim.Constant, aten.mul]);
      expect(attributeNames(frozen)).toEqual([]);
      expect(frozen.forward(3)).toBe(12);
      expect(outer.forward(3)).toBe(12);
    });
  });

  it("returns a ScriptModule of a fresh type", () => {
    const m = scaleAndBiasModule();
    const frozen = freezeModule(m);

    expect(frozen).toBeInstanceOf(ScriptModule);
    expect(Object.is(frozen.type, m.type)).toBe(false);
    expect(frozen.type.qualifiedName).toBe("M");
  });
});
