import { Device, type IValue, Tuple } from "../jit/ivalue";
import { IRInvariantError } from "../jit/jit-errors";
import { type JitType, typeToString } from "../jit/types";
import { Tensor } from "../runtime/tensor";
import { type Graph, prim, type Value } from "./graph";

/**
 * Whether `value` can be written into the graph as a literal of `type`.
 * Modules, plain objects and opaque runtime handles never can.
 */
export function isLiteralValue(value: IValue, type: JitType): boolean {
  switch (type.kind) {
    case "None":
      return value === null;
    case "Bool":
      return typeof value === "boolean";
    case "Int":
      return typeof value === "number" && Number.isInteger(value);
    case "Float":
      return typeof value === "number";
    case "String":
      return typeof value === "string";
    case "Device":
      return value instanceof Device;
    case "Tensor":
      return value instanceof Tensor;
    case "Tuple":
      return (
        value instanceof Tuple &&
        value.elements.length === type.elements.length &&
        value.elements.every((el, i) => isLiteralValue(el, type.elements[i]))
      );
    case "List": {
      const elementKind = type.element.kind;
      if (
        elementKind !== "Int" &&
        elementKind !== "Float" &&
        elementKind !== "Bool" &&
        elementKind !== "Tensor"
      ) {
        return false;
      }
      return (
        Array.isArray(value) &&
        value.every((el) => isLiteralValue(el, type.element))
      );
    }
    case "Opaque":
    case "Class":
      return false;
  }
}

/**
 * Insert a `prim::Constant` holding `value` at the graph's insert point.
 * Returns undefined, inserting nothing, when the value has no literal form.
 */
export function tryInsertConstant(
  graph: Graph,
  value: IValue,
  type: JitType,
): Value | undefined {
  if (!isLiteralValue(value, type)) {
    return undefined;
  }
  const node = graph.insert(prim.Constant, [], [type], { value });
  return node.output();
}

export function insertConstant(
  graph: Graph,
  value: IValue,
  type: JitType,
): Value {
  const constant = tryInsertConstant(graph, value, type);
  if (!constant) {
    throw new IRInvariantError(
      `value cannot be represented as a ${typeToString(type)} constant`,
    );
  }
  return constant;
}

export function isConstant(value: Value): boolean {
  return value.node.kind === prim.Constant;
}

/**
 * Literal held by `value`, or undefined when it is not a constant.
 */
export function toIValue(value: Value): IValue | undefined {
  if (!isConstant(value)) {
    return undefined;
  }
  return value.node.ival("value");
}
