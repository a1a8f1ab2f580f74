import type { Graph } from "../ir/graph";
import { DuplicateAttributeError, UnknownAttributeError } from "./jit-errors";

export type TensorType = { readonly kind: "Tensor" };
export type IntType = { readonly kind: "Int" };
export type FloatType = { readonly kind: "Float" };
export type BoolType = { readonly kind: "Bool" };
export type StringType = { readonly kind: "String" };
export type NoneType = { readonly kind: "None" };
export type DeviceType = { readonly kind: "Device" };
export interface TupleType {
  readonly kind: "Tuple";
  readonly elements: readonly JitType[];
}
export type ListType = { readonly kind: "List"; readonly element: JitType };
/**
 * Runtime-only object (a capsule, a handle into native state). Never a
 * literal.
 */
export type OpaqueType = { readonly kind: "Opaque"; readonly name: string };

export type JitType =
  | TensorType
  | IntType
  | FloatType
  | BoolType
  | StringType
  | NoneType
  | DeviceType
  | TupleType
  | ListType
  | OpaqueType
  | ClassType;

export const TensorT: TensorType = { kind: "Tensor" };
export const IntT: IntType = { kind: "Int" };
export const FloatT: FloatType = { kind: "Float" };
export const BoolT: BoolType = { kind: "Bool" };
export const StringT: StringType = { kind: "String" };
export const NoneT: NoneType = { kind: "None" };
export const DeviceT: DeviceType = { kind: "Device" };

export function tupleType(elements: readonly JitType[]): TupleType {
  return { kind: "Tuple", elements: elements.slice() };
}

export function listType(element: JitType): ListType {
  return { kind: "List", element };
}

export function opaqueType(name: string): OpaqueType {
  return { kind: "Opaque", name };
}

export interface Method {
  readonly name: string;
  readonly owner: ClassType;
  readonly graph: Graph;
}

/**
 * Nominal type of a module (or plain object). Compared by identity: two
 * distinct ClassType objects are distinct types even when their names match.
 */
export class ClassType {
  readonly kind = "Class";
  readonly qualifiedName: string;
  readonly isModule: boolean;
  private readonly attributeNames: string[] = [];
  private readonly attributeTypes: JitType[] = [];
  private readonly methodTable = new Map<string, Method>();

  constructor(qualifiedName: string, options: { isModule?: boolean } = {}) {
    this.qualifiedName = qualifiedName;
    this.isModule = options.isModule ?? true;
  }

  /** Unqualified name: the last dotted component. */
  get name(): string {
    const dot = this.qualifiedName.lastIndexOf(".");
    return dot < 0 ? this.qualifiedName : this.qualifiedName.slice(dot + 1);
  }

  numAttributes(): number {
    return this.attributeNames.length;
  }

  getAttributeName(slot: number): string {
    const name = this.attributeNames[slot];
    if (name === undefined) {
      throw new RangeError(
        `${this.qualifiedName} has no attribute slot ${slot}`,
      );
    }
    return name;
  }

  getAttribute(slot: number): JitType {
    const type = this.attributeTypes[slot];
    if (type === undefined) {
      throw new RangeError(
        `${this.qualifiedName} has no attribute slot ${slot}`,
      );
    }
    return type;
  }

  findAttributeSlot(name: string): number | undefined {
    const slot = this.attributeNames.indexOf(name);
    return slot < 0 ? undefined : slot;
  }

  hasAttribute(name: string): boolean {
    return this.attributeNames.includes(name);
  }

  findAttribute(name: string): JitType | undefined {
    const slot = this.findAttributeSlot(name);
    return slot === undefined ? undefined : this.attributeTypes[slot];
  }

  addAttribute(name: string, type: JitType): number {
    if (this.hasAttribute(name)) {
      throw new DuplicateAttributeError(this.qualifiedName, name);
    }
    this.attributeNames.push(name);
    this.attributeTypes.push(type);
    return this.attributeNames.length - 1;
  }

  /**
   * Drop a descriptor without touching instances. Callers remove the
   * matching instance slot first.
   */
  unsafeRemoveAttribute(name: string): void {
    const slot = this.findAttributeSlot(name);
    if (slot === undefined) {
      throw new UnknownAttributeError(this.qualifiedName, name);
    }
    this.attributeNames.splice(slot, 1);
    this.attributeTypes.splice(slot, 1);
  }

  attributes(): Array<{ name: string; type: JitType }> {
    return this.attributeNames.map((name, i) => ({
      name,
      type: this.attributeTypes[i],
    }));
  }

  addMethod(name: string, graph: Graph): Method {
    const method: Method = { name, owner: this, graph };
    this.methodTable.set(name, method);
    return method;
  }

  findMethod(name: string): Method | undefined {
    return this.methodTable.get(name);
  }

  methods(): Method[] {
    return [...this.methodTable.values()];
  }
}

export function isClassType(type: JitType): type is ClassType {
  return type instanceof ClassType;
}

export function isModuleType(type: JitType): type is ClassType {
  return type instanceof ClassType && type.isModule;
}

export function typesEqual(a: JitType, b: JitType): boolean {
  if (a instanceof ClassType || b instanceof ClassType) {
    return a === b;
  }
  switch (a.kind) {
    case "Tuple":
      return (
        b.kind === "Tuple" &&
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => typesEqual(el, b.elements[i]))
      );
    case "List":
      return b.kind === "List" && typesEqual(a.element, b.element);
    case "Opaque":
      return b.kind === "Opaque" && a.name === b.name;
    default:
      return a.kind === b.kind;
  }
}

export function typeToString(type: JitType): string {
  if (type instanceof ClassType) {
    return type.qualifiedName;
  }
  switch (type.kind) {
    case "Tensor":
      return "Tensor";
    case "Int":
      return "int";
    case "Float":
      return "float";
    case "Bool":
      return "bool";
    case "String":
      return "str";
    case "None":
      return "NoneType";
    case "Device":
      return "Device";
    case "Tuple":
      return `(${type.elements.map(typeToString).join(", ")})`;
    case "List":
      return `${typeToString(type.element)}[]`;
    case "Opaque":
      return type.name;
  }
}

/**
 * Rebuild a type with every class type passed through `mapClass`. Used when
 * graphs are copied across cloned type hierarchies.
 */
export function remapType(
  type: JitType,
  mapClass: (cls: ClassType) => ClassType,
): JitType {
  if (type instanceof ClassType) {
    return mapClass(type);
  }
  switch (type.kind) {
    case "Tuple":
      return tupleType(type.elements.map((el) => remapType(el, mapClass)));
    case "List":
      return listType(remapType(type.element, mapClass));
    default:
      return type;
  }
}
