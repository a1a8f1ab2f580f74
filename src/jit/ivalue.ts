import { Tensor } from "../runtime/tensor";
import { ScriptModule } from "./module";

export class Device {
  constructor(
    readonly type: string,
    readonly index?: number,
  ) {}

  equals(other: Device): boolean {
    return this.type === other.type && this.index === other.index;
  }

  toString(): string {
    return this.index === undefined ? this.type : `${this.type}:${this.index}`;
  }
}

export class Tuple {
  readonly elements: readonly IValue[];

  constructor(elements: readonly IValue[]) {
    this.elements = elements.slice();
  }

  get(index: number): IValue {
    if (index < 0 || index >= this.elements.length) {
      throw new RangeError(
        `tuple index ${index} out of range for tuple of size ${this.elements.length}`,
      );
    }
    return this.elements[index];
  }
}

/**
 * Handle to runtime-only state. Carried around by reference, never
 * serialized or turned into a literal.
 */
export class OpaqueObject {
  constructor(
    readonly typeName: string,
    readonly payload: unknown,
  ) {}
}

export type IValue =
  | null
  | boolean
  | number
  | string
  | Device
  | Tensor
  | Tuple
  | OpaqueObject
  | ScriptModule
  | IValue[];

export function isTensor(value: IValue): value is Tensor {
  return value instanceof Tensor;
}

export function isModule(value: IValue): value is ScriptModule {
  return value instanceof ScriptModule;
}

export function ivaluesEqual(a: IValue, b: IValue): boolean {
  if (a instanceof Tensor) {
    return b instanceof Tensor && a.equals(b);
  }
  if (a instanceof Device) {
    return b instanceof Device && a.equals(b);
  }
  if (a instanceof Tuple) {
    return (
      b instanceof Tuple &&
      a.elements.length === b.elements.length &&
      a.elements.every((el, i) => ivaluesEqual(el, b.elements[i]))
    );
  }
  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((el, i) => ivaluesEqual(el, b[i]))
    );
  }
  if (typeof a === "number" && typeof b === "number") {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
  }
  return a === b;
}

export function ivalueToString(value: IValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number") return String(value);
  if (value instanceof Tuple) {
    return `(${value.elements.map(ivalueToString).join(", ")})`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(ivalueToString).join(", ")}]`;
  }
  if (value instanceof ScriptModule) {
    return `<${value.type.qualifiedName} module #${value.handle}>`;
  }
  if (value instanceof OpaqueObject) {
    return `<${value.typeName} object>`;
  }
  return value.toString();
}
