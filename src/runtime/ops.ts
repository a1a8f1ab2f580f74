/**
 * Reference implementations of the aten ops the interpreter and constant
 * propagation understand. Ops work on Python-style numbers and booleans and
 * element-wise on tensors, broadcasting scalars and shapes.
 */

import { broadcastOffset, broadcastShapes, sizeOf } from "../core/shape";
import { aten } from "../ir/graph";
import { type IValue, ivaluesEqual } from "../jit/ivalue";
import { ScriptRuntimeError } from "../jit/jit-errors";
import { type DType, Tensor } from "./tensor";

export type OpImpl = (args: readonly IValue[]) => IValue;

type Operand = Tensor | number;

function asOperand(op: string, value: IValue): Operand {
  if (value instanceof Tensor || typeof value === "number") {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  throw new ScriptRuntimeError(`${op}: expected a number or tensor operand`);
}

function operandDType(value: Operand): DType {
  if (value instanceof Tensor) {
    return value.dtype === "bool" ? "i32" : value.dtype;
  }
  return Number.isInteger(value) ? "i32" : "f32";
}

function promote(a: Operand, b: Operand): DType {
  return operandDType(a) === "f32" || operandDType(b) === "f32" ? "f32" : "i32";
}

function elementwise(
  a: Operand,
  b: Operand,
  outDType: DType,
  fn: (x: number, y: number) => number,
): Tensor {
  const aShape = a instanceof Tensor ? a.shape : [];
  const bShape = b instanceof Tensor ? b.shape : [];
  const shape = broadcastShapes(aShape, bShape);
  const out = Tensor.empty(shape, outDType);
  const size = sizeOf(shape);
  for (let i = 0; i < size; i++) {
    const x = a instanceof Tensor ? a.data[broadcastOffset(i, shape, aShape)] : a;
    const y = b instanceof Tensor ? b.data[broadcastOffset(i, shape, bShape)] : b;
    const result = fn(x, y);
    out.data[i] = outDType === "bool" ? (result ? 1 : 0) : result;
  }
  return out;
}

function unaryTensor(t: Tensor, fn: (x: number) => number): Tensor {
  const dtype = t.dtype === "bool" ? "i32" : t.dtype;
  const out = Tensor.empty(t.shape, dtype);
  for (let i = 0; i < t.data.length; i++) {
    out.data[i] = fn(t.data[i]);
  }
  return out;
}

function arithmetic(
  op: string,
  fn: (x: number, y: number) => number,
  options: { trueDivision?: boolean } = {},
): OpImpl {
  return (args) => {
    const a = asOperand(op, args[0]);
    const b = asOperand(op, args[1]);
    if (a instanceof Tensor || b instanceof Tensor) {
      const dtype = options.trueDivision ? "f32" : promote(a, b);
      return elementwise(a, b, dtype, fn);
    }
    if (options.trueDivision && b === 0) {
      throw new ScriptRuntimeError("ZeroDivisionError: division by zero");
    }
    return fn(a, b);
  };
}

function isNumeric(value: IValue): boolean {
  return (
    value instanceof Tensor ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function comparison(
  op: string,
  fn: (x: number, y: number) => boolean,
): OpImpl {
  return (args) => {
    const [lhs, rhs] = args;
    if ((op === aten.eq || op === aten.ne) && !(isNumeric(lhs) && isNumeric(rhs))) {
      return ivaluesEqual(lhs, rhs) === (op === aten.eq);
    }
    const a = asOperand(op, lhs);
    const b = asOperand(op, rhs);
    if (a instanceof Tensor || b instanceof Tensor) {
      return elementwise(a, b, "bool", (x, y) => (fn(x, y) ? 1 : 0));
    }
    return fn(a, b);
  };
}

function addInPlace(args: readonly IValue[]): IValue {
  const [self, other] = args;
  if (!(self instanceof Tensor)) {
    throw new ScriptRuntimeError(`${aten.add_}: expected a tensor receiver`);
  }
  const sum = elementwise(self, asOperand(aten.add_, other), self.dtype, (x, y) => x + y);
  if (sum.numel !== self.numel) {
    throw new ScriptRuntimeError(
      `${aten.add_}: result shape [${sum.shape}] does not match [${self.shape}]`,
    );
  }
  self.data.set(sum.data);
  return self;
}

const OPS = new Map<string, OpImpl>([
  [aten.add, arithmetic(aten.add, (x, y) => x + y)],
  [aten.sub, arithmetic(aten.sub, (x, y) => x - y)],
  [aten.mul, arithmetic(aten.mul, (x, y) => x * y)],
  [aten.div, arithmetic(aten.div, (x, y) => x / y, { trueDivision: true })],
  [
    aten.neg,
    (args) => {
      const a = asOperand(aten.neg, args[0]);
      return a instanceof Tensor ? unaryTensor(a, (x) => -x) : -a;
    },
  ],
  [
    aten.relu,
    (args) => {
      const a = asOperand(aten.relu, args[0]);
      return a instanceof Tensor
        ? unaryTensor(a, (x) => Math.max(0, x))
        : Math.max(0, a);
    },
  ],
  [aten.eq, comparison(aten.eq, (x, y) => x === y)],
  [aten.ne, comparison(aten.ne, (x, y) => x !== y)],
  [aten.lt, comparison(aten.lt, (x, y) => x < y)],
  [aten.le, comparison(aten.le, (x, y) => x <= y)],
  [aten.gt, comparison(aten.gt, (x, y) => x > y)],
  [aten.ge, comparison(aten.ge, (x, y) => x >= y)],
  [aten.add_, addInPlace],
]);

export function getOp(kind: string): OpImpl | undefined {
  return OPS.get(kind);
}
