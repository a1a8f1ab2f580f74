/**
 * Script modules: stateful instances of a module ClassType.
 * Similar to torch.jit.ScriptModule.
 */

import { Tensor } from "../runtime/tensor";
import { runGraph, type RunOptions } from "../runtime/interpreter";
import { type IValue, Tuple } from "./ivalue";
import {
  MissingMethodError,
  NotAModuleError,
  UninitializedAttributeError,
  UnknownAttributeError,
} from "./jit-errors";
import {
  ClassType,
  type JitType,
  type Method,
  remapType,
} from "./types";

/**
 * Stable identity of a module instance. Two module values are the same
 * instance iff their handles match.
 */
export type ModuleHandle = number;

let nextModuleHandle = 1;

export interface CloneState {
  types: Map<ClassType, ClassType>;
  modules: Map<ScriptModule, ScriptModule>;
}

function cloneClassType(type: ClassType, state: CloneState): ClassType {
  if (!type.isModule) {
    return type;
  }
  const existing = state.types.get(type);
  if (existing) {
    return existing;
  }
  const copy = new ClassType(type.qualifiedName, { isModule: true });
  // Registered before attributes and methods so self-references resolve.
  state.types.set(type, copy);
  const mapType = (t: JitType): JitType =>
    remapType(t, (cls) => cloneClassType(cls, state));
  for (const { name, type: attrType } of type.attributes()) {
    copy.addAttribute(name, mapType(attrType));
  }
  for (const method of type.methods()) {
    copy.addMethod(method.name, method.graph.copy(mapType));
  }
  return copy;
}

function cloneValue(value: IValue, state: CloneState): IValue {
  if (value instanceof ScriptModule) {
    return value._cloneInto(state);
  }
  if (value instanceof Tensor) {
    return value.clone();
  }
  if (value instanceof Tuple) {
    return new Tuple(value.elements.map((el) => cloneValue(el, state)));
  }
  if (Array.isArray(value)) {
    return value.map((el) => cloneValue(el, state));
  }
  // Primitives and devices are immutable; opaque objects are shared.
  return value;
}

export class ScriptModule {
  readonly handle: ModuleHandle;
  readonly type: ClassType;
  private readonly slots: Array<IValue | undefined> = [];

  constructor(type: ClassType, initial: Record<string, IValue> = {}) {
    this.handle = nextModuleHandle++;
    this.type = type;
    for (const [name, value] of Object.entries(initial)) {
      this.setattr(name, value);
    }
  }

  private slotOf(name: string): number {
    const slot = this.type.findAttributeSlot(name);
    if (slot === undefined) {
      throw new UnknownAttributeError(this.type.qualifiedName, name);
    }
    return slot;
  }

  hasattr(name: string): boolean {
    return this.type.hasAttribute(name);
  }

  attr(name: string): IValue {
    const value = this.slots[this.slotOf(name)];
    if (value === undefined) {
      throw new UninitializedAttributeError(this.type.qualifiedName, name);
    }
    return value;
  }

  setattr(name: string, value: IValue): void {
    this.slots[this.slotOf(name)] = value;
  }

  /**
   * Declare a new attribute on the module's type and initialize it here.
   */
  registerAttribute(name: string, type: JitType, value: IValue): this {
    const slot = this.type.addAttribute(name, type);
    this.slots[slot] = value;
    return this;
  }

  /**
   * Drop the instance slot of `name`. The type descriptor must be removed
   * right after with `type.unsafeRemoveAttribute`, or slots go out of line.
   */
  unsafeRemoveAttr(name: string): void {
    this.slots.splice(this.slotOf(name), 1);
  }

  namedAttributes(): Array<{ name: string; value: IValue }> {
    return this.type.attributes().map(({ name }) => ({
      name,
      value: this.attr(name),
    }));
  }

  submodule(name: string): ScriptModule {
    const value = this.attr(name);
    if (!(value instanceof ScriptModule)) {
      throw new NotAModuleError(this.type.qualifiedName, name);
    }
    return value;
  }

  findMethod(name: string): Method | undefined {
    return this.type.findMethod(name);
  }

  getMethod(name: string): Method {
    const method = this.findMethod(name);
    if (!method) {
      throw new MissingMethodError(this.type.qualifiedName, name);
    }
    return method;
  }

  /**
   * Run a method with this module bound as its receiver. Returns the
   * method's single output, or a Tuple when it has several.
   */
  run(methodName: string, args: IValue[] = [], options?: RunOptions): IValue {
    const outputs = runGraph(
      this.getMethod(methodName).graph,
      [this, ...args],
      options,
    );
    return outputs.length === 1 ? outputs[0] : new Tuple(outputs);
  }

  forward(...args: IValue[]): IValue {
    return this.run("forward", args);
  }

  /**
   * Deep copy: new instances, new module types, copied method graphs and
   * tensors. Sharing between submodules is preserved inside the copy.
   */
  clone(): ScriptModule {
    return this._cloneInto({ types: new Map(), modules: new Map() });
  }

  _cloneInto(state: CloneState): ScriptModule {
    const existing = state.modules.get(this);
    if (existing) {
      return existing;
    }
    const copy = new ScriptModule(cloneClassType(this.type, state));
    state.modules.set(this, copy);
    this.slots.forEach((value, slot) => {
      if (value !== undefined) {
        copy.slots[slot] = cloneValue(value, state);
      }
    });
    return copy;
  }
}
