import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { freezeModule } from "../src/freeze";
import { aten, prim, type Value } from "../src/ir/graph";
import { lintGraph } from "../src/ir/lint";
import type { ScriptModule } from "../src/jit/module";
import { BoolT, IntT, typesEqual } from "../src/jit/types";
import { type AttributeSpec, GraphBuilder, makeModule } from "./helpers/builder";

type Step =
  | { kind: "readRoot"; attr: number }
  | { kind: "readSub"; attr: number }
  | { kind: "writeRoot"; attr: number; src: number }
  | { kind: "writeSub"; attr: number; src: number }
  | { kind: "add" | "mul"; lhs: number; rhs: number }
  | { kind: "select"; then: number; else: number };

const ROOT_ATTRS = 3;
const SUB_ATTRS = 2;

const attrArb = (count: number) => fc.integer({ min: 0, max: count - 1 });
const indexArb = fc.nat({ max: 16 });

const stepArb: fc.Arbitrary<Step> = fc.oneof(
  attrArb(ROOT_ATTRS).map((attr) => ({ kind: "readRoot" as const, attr })),
  attrArb(SUB_ATTRS).map((attr) => ({ kind: "readSub" as const, attr })),
  fc.record({ attr: attrArb(ROOT_ATTRS), src: indexArb }).map((s) => ({
    kind: "writeRoot" as const,
    ...s,
  })),
  fc.record({ attr: attrArb(SUB_ATTRS), src: indexArb }).map((s) => ({
    kind: "writeSub" as const,
    ...s,
  })),
  fc.record({
    kind: fc.constantFrom("add" as const, "mul" as const),
    lhs: indexArb,
    rhs: indexArb,
  }),
  fc.record({ then: attrArb(ROOT_ATTRS), else: attrArb(SUB_ATTRS) }).map((s) => ({
    kind: "select" as const,
    ...s,
  })),
);

const programArb = fc.record({
  rootValues: fc.array(fc.integer({ min: -5, max: 5 }), {
    minLength: ROOT_ATTRS,
    maxLength: ROOT_ATTRS,
  }),
  subValues: fc.array(fc.integer({ min: -5, max: 5 }), {
    minLength: SUB_ATTRS,
    maxLength: SUB_ATTRS,
  }),
  steps: fc.array(stepArb, { minLength: 1, maxLength: 12 }),
  inputs: fc.array(fc.integer({ min: -3, max: 3 }), { minLength: 1, maxLength: 4 }),
});

const rootName = (i: number) => `r${i}`;
const subName = (i: number) => `s${i}`;

function buildModule(
  rootValues: number[],
  subValues: number[],
  steps: Step[],
): ScriptModule {
  const sub = makeModule(
    "Sub",
    subValues.map((v, i): AttributeSpec => [subName(i), IntT, v]),
  );
  const m = makeModule("Root", [
    ...rootValues.map((v, i): AttributeSpec => [rootName(i), IntT, v]),
    ["sub", sub.type, sub],
  ]);

  const g = new GraphBuilder();
  const self = g.input(m.type, "self");
  const x = g.input(IntT, "x");
  const stack: Value[] = [x];
  const pick = (i: number) => stack[i % stack.length];
  const subRef = () => g.getAttr(self, "sub");

  for (const step of steps) {
    switch (step.kind) {
      case "readRoot":
        stack.push(g.getAttr(self, rootName(step.attr)));
        break;
      case "readSub":
        stack.push(g.getAttr(subRef(), subName(step.attr)));
        break;
      case "writeRoot":
        g.setAttr(self, rootName(step.attr), pick(step.src));
        break;
      case "writeSub":
        g.setAttr(subRef(), subName(step.attr), pick(step.src));
        break;
      case "add":
      case "mul":
        stack.push(
          g.op(step.kind === "add" ? aten.add : aten.mul, [pick(step.lhs), pick(step.rhs)], IntT),
        );
        break;
      case "select": {
        const positive = g.op(aten.gt, [x, g.constant(0, IntT)], BoolT);
        const branch = g.ifElse(
          positive,
          [IntT],
          () => [g.getAttr(self, rootName(step.then))],
          () => [g.getAttr(subRef(), subName(step.else))],
        );
        stack.push(branch.output());
        break;
      }
    }
  }
  m.type.addMethod("forward", g.ret(stack[stack.length - 1]));
  return m;
}

describe("freezing (property-based)", () => {
  it("frozen modules compute what the original computes", () => {
    fc.assert(
      fc.property(programArb, ({ rootValues, subValues, steps, inputs }) => {
        const module = buildModule(rootValues, subValues, steps);
        const reference = module.clone();
        const frozen = freezeModule(module);

        for (const x of inputs) {
          expect(frozen.forward(x)).toBe(reference.forward(x));
        }
      }),
    );
  });

  it("frozen graphs are well formed and only read surviving attributes", () => {
    fc.assert(
      fc.property(programArb, ({ rootValues, subValues, steps }) => {
        const module = buildModule(rootValues, subValues, steps);
        const frozen = freezeModule(module);
        const graph = frozen.getMethod("forward").graph;

        lintGraph(graph);
        for (const node of graph.allNodes()) {
          if (
            node.kind === prim.GetAttr &&
            typesEqual(node.input().type, frozen.type)
          ) {
            expect(frozen.hasattr(node.s("name"))).toBe(true);
          }
        }
        expect(frozen.type.numAttributes()).toBeLessThanOrEqual(
          module.type.numAttributes(),
        );
      }),
    );
  });

  it("written attributes are never folded away", () => {
    fc.assert(
      fc.property(programArb, ({ rootValues, subValues, steps }) => {
        const module = buildModule(rootValues, subValues, steps);
        const frozen = freezeModule(module);

        for (const step of steps) {
          if (step.kind === "writeRoot") {
            expect(frozen.hasattr(rootName(step.attr))).toBe(true);
          }
        }
      }),
    );
  });
});
