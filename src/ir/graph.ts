/**
 * Instruction graph: blocks of nodes connected by SSA values.
 *
 * Each block keeps its nodes in a doubly linked list between a parameter
 * node (whose outputs are the block inputs) and a return node (whose inputs
 * are the block outputs). Passes that destroy nodes while walking a block
 * read `node.nextInBlock()` before touching the current node.
 */

import type { IValue } from "../jit/ivalue";
import { IRInvariantError } from "../jit/jit-errors";
import type { JitType } from "../jit/types";

// ============================================================================
// Node kinds
// ============================================================================

export const prim = {
  Param: "prim::Param",
  Return: "prim::Return",
  Constant: "prim::Constant",
  GetAttr: "prim::GetAttr",
  SetAttr: "prim::SetAttr",
  CallMethod: "prim::CallMethod",
  If: "prim::If",
  Loop: "prim::Loop",
  TupleConstruct: "prim::TupleConstruct",
  TupleUnpack: "prim::TupleUnpack",
  TupleIndex: "prim::TupleIndex",
  ListConstruct: "prim::ListConstruct",
  RaiseException: "prim::RaiseException",
  Print: "prim::Print",
} as const;

export const aten = {
  add: "aten::add",
  sub: "aten::sub",
  mul: "aten::mul",
  div: "aten::div",
  neg: "aten::neg",
  relu: "aten::relu",
  eq: "aten::eq",
  ne: "aten::ne",
  lt: "aten::lt",
  le: "aten::le",
  gt: "aten::gt",
  ge: "aten::ge",
  add_: "aten::add_",
} as const;

export type NodeKind = string;

export interface Use {
  user: Node;
  offset: number;
}

function removeUse(value: Value, user: Node, offset: number): void {
  const index = value.uses.findIndex(
    (use) => use.user === user && use.offset === offset,
  );
  if (index < 0) {
    throw new IRInvariantError(
      `use of %${value.displayName()} by ${user.kind} at input ${offset} is not recorded`,
    );
  }
  value.uses.splice(index, 1);
}

// ============================================================================
// Value
// ============================================================================

export class Value {
  readonly id: number;
  readonly node: Node;
  offset: number;
  type: JitType;
  readonly uses: Use[] = [];
  private _debugName: string | undefined;

  constructor(node: Node, offset: number, type: JitType, id: number) {
    this.node = node;
    this.offset = offset;
    this.type = type;
    this.id = id;
  }

  get graph(): Graph {
    return this.node.graph;
  }

  get debugName(): string | undefined {
    return this._debugName;
  }

  hasUses(): boolean {
    return this.uses.length > 0;
  }

  /**
   * Names are unique within a graph; a taken name gets a numeric suffix.
   */
  setDebugName(name: string): this {
    if (this._debugName !== undefined) {
      this.graph._releaseName(this._debugName, this);
    }
    this._debugName = this.graph._claimName(name, this);
    return this;
  }

  _clearDebugName(): void {
    if (this._debugName !== undefined) {
      this.graph._releaseName(this._debugName, this);
      this._debugName = undefined;
    }
  }

  displayName(): string {
    return this._debugName ?? String(this.id);
  }

  replaceAllUsesWith(other: Value): void {
    if (other === this) return;
    for (const use of this.uses) {
      use.user.inputs[use.offset] = other;
      other.uses.push(use);
    }
    this.uses.length = 0;
  }
}

// ============================================================================
// Node
// ============================================================================

export class Node {
  readonly kind: NodeKind;
  readonly graph: Graph;
  readonly inputs: Value[] = [];
  readonly outputs: Value[] = [];
  readonly blocks: Block[] = [];
  owningBlock: Block | undefined;
  prev: Node | undefined;
  next: Node | undefined;
  private readonly attributes = new Map<string, IValue>();
  private _destroyed = false;

  constructor(graph: Graph, kind: NodeKind) {
    this.graph = graph;
    this.kind = kind;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  get owningNode(): Node | undefined {
    return this.owningBlock?.owningNode;
  }

  // --- attributes ----------------------------------------------------------

  hasAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  attributeNames(): string[] {
    return [...this.attributes.keys()];
  }

  s(name: string): string {
    const value = this.attributes.get(name);
    if (typeof value !== "string") {
      throw new IRInvariantError(
        `${this.kind} has no string attribute '${name}'`,
      );
    }
    return value;
  }

  i(name: string): number {
    const value = this.attributes.get(name);
    if (typeof value !== "number") {
      throw new IRInvariantError(
        `${this.kind} has no numeric attribute '${name}'`,
      );
    }
    return value;
  }

  ival(name: string): IValue {
    if (!this.attributes.has(name)) {
      throw new IRInvariantError(`${this.kind} has no attribute '${name}'`);
    }
    return this.attributes.get(name) ?? null;
  }

  setAttribute(name: string, value: IValue): this {
    this.attributes.set(name, value);
    return this;
  }

  copyAttributes(from: Node): this {
    for (const [name, value] of from.attributes) {
      this.attributes.set(name, value);
    }
    return this;
  }

  // --- inputs / outputs ----------------------------------------------------

  input(index = 0): Value {
    const value = this.inputs[index];
    if (!value) {
      throw new IRInvariantError(`${this.kind} has no input ${index}`);
    }
    return value;
  }

  output(index = 0): Value {
    const value = this.outputs[index];
    if (!value) {
      throw new IRInvariantError(`${this.kind} has no output ${index}`);
    }
    return value;
  }

  addInput(value: Value): Value {
    value.uses.push({ user: this, offset: this.inputs.length });
    this.inputs.push(value);
    return value;
  }

  replaceInput(index: number, value: Value): Value {
    const old = this.input(index);
    removeUse(old, this, index);
    this.inputs[index] = value;
    value.uses.push({ user: this, offset: index });
    return old;
  }

  removeInput(index: number): void {
    removeUse(this.input(index), this, index);
    this.inputs.splice(index, 1);
    for (let i = index; i < this.inputs.length; i++) {
      const use = this.inputs[i].uses.find(
        (u) => u.user === this && u.offset === i + 1,
      );
      if (use) use.offset = i;
    }
  }

  removeAllInputs(): void {
    for (let i = 0; i < this.inputs.length; i++) {
      removeUse(this.inputs[i], this, i);
    }
    this.inputs.length = 0;
  }

  addOutput(type: JitType): Value {
    const value = new Value(
      this,
      this.outputs.length,
      type,
      this.graph._allocateValueId(),
    );
    this.outputs.push(value);
    return value;
  }

  eraseOutput(index: number): void {
    const value = this.output(index);
    if (value.hasUses()) {
      throw new IRInvariantError(
        `cannot erase output %${value.displayName()} of ${this.kind}: it still has uses`,
      );
    }
    value._clearDebugName();
    this.outputs.splice(index, 1);
    for (let i = index; i < this.outputs.length; i++) {
      this.outputs[i].offset = i;
    }
  }

  hasUses(): boolean {
    return this.outputs.some((out) => out.hasUses());
  }

  addBlock(): Block {
    const block = new Block(this.graph, this);
    this.blocks.push(block);
    return block;
  }

  // --- list placement ------------------------------------------------------

  insertBefore(anchor: Node): this {
    const block = anchor.owningBlock;
    if (!block || anchor.prev === undefined) {
      throw new IRInvariantError(
        `cannot insert before ${anchor.kind}: anchor is not a placeable node`,
      );
    }
    this.assertDetached();
    this.owningBlock = block;
    this.prev = anchor.prev;
    this.next = anchor;
    anchor.prev.next = this;
    anchor.prev = this;
    return this;
  }

  insertAfter(anchor: Node): this {
    const block = anchor.owningBlock;
    if (!block || anchor.next === undefined) {
      throw new IRInvariantError(
        `cannot insert after ${anchor.kind}: anchor is not a placeable node`,
      );
    }
    this.assertDetached();
    this.owningBlock = block;
    this.next = anchor.next;
    this.prev = anchor;
    anchor.next.prev = this;
    anchor.next = this;
    return this;
  }

  moveBefore(anchor: Node): this {
    this.removeFromList();
    return this.insertBefore(anchor);
  }

  removeFromList(): void {
    if (this.prev) this.prev.next = this.next;
    if (this.next) this.next.prev = this.prev;
    this.prev = undefined;
    this.next = undefined;
    this.owningBlock = undefined;
  }

  /**
   * Next node in the same block, or undefined at the block's end.
   */
  nextInBlock(): Node | undefined {
    const next = this.next;
    if (!next || next.kind === prim.Return) return undefined;
    return next;
  }

  /**
   * Remove the node for good. All outputs must already be unused.
   */
  destroy(): void {
    if (this.kind === prim.Param || this.kind === prim.Return) {
      throw new IRInvariantError(`cannot destroy ${this.kind} directly`);
    }
    for (const out of this.outputs) {
      if (out.hasUses()) {
        throw new IRInvariantError(
          `cannot destroy ${this.kind}: output %${out.displayName()} still has ${out.uses.length} use(s)`,
        );
      }
    }
    this.removeAllInputs();
    for (const block of this.blocks) {
      block._destroyContents();
    }
    this.blocks.length = 0;
    for (const out of this.outputs) {
      out._clearDebugName();
    }
    this.removeFromList();
    this._destroyed = true;
  }

  private assertDetached(): void {
    if (this.owningBlock !== undefined) {
      throw new IRInvariantError(`${this.kind} is already in a block`);
    }
    if (this._destroyed) {
      throw new IRInvariantError(`${this.kind} was destroyed`);
    }
  }
}

// ============================================================================
// Block
// ============================================================================

export class Block {
  readonly graph: Graph;
  readonly owningNode: Node | undefined;
  readonly paramNode: Node;
  readonly returnNode: Node;

  constructor(graph: Graph, owningNode: Node | undefined) {
    this.graph = graph;
    this.owningNode = owningNode;
    this.paramNode = new Node(graph, prim.Param);
    this.returnNode = new Node(graph, prim.Return);
    this.paramNode.owningBlock = this;
    this.returnNode.owningBlock = this;
    this.paramNode.next = this.returnNode;
    this.returnNode.prev = this.paramNode;
  }

  get inputs(): readonly Value[] {
    return this.paramNode.outputs;
  }

  get outputs(): readonly Value[] {
    return this.returnNode.inputs;
  }

  addInput(type: JitType, name?: string): Value {
    const value = this.paramNode.addOutput(type);
    if (name !== undefined) value.setDebugName(name);
    return value;
  }

  eraseInput(index: number): void {
    this.paramNode.eraseOutput(index);
  }

  registerOutput(value: Value): number {
    this.returnNode.addInput(value);
    return this.returnNode.inputs.length - 1;
  }

  eraseOutput(index: number): void {
    this.returnNode.removeInput(index);
  }

  firstNode(): Node | undefined {
    return this.paramNode.nextInBlock();
  }

  /** Snapshot of the node list; safe to mutate the block while iterating. */
  nodes(): Node[] {
    const result: Node[] = [];
    for (let node = this.firstNode(); node; node = node.nextInBlock()) {
      result.push(node);
    }
    return result;
  }

  appendNode(node: Node): Node {
    return node.insertBefore(this.returnNode);
  }

  prependNode(node: Node): Node {
    return node.insertAfter(this.paramNode);
  }

  /**
   * Append copies of `src`'s inputs, nodes and outputs. Values defined
   * outside `src` are translated through `env`.
   */
  cloneFrom(
    src: Block,
    env: (value: Value) => Value,
    mapType: (type: JitType) => JitType = (type) => type,
  ): void {
    const local = new Map<Value, Value>();
    const lookup = (value: Value): Value => local.get(value) ?? env(value);
    for (const input of src.inputs) {
      const copy = this.addInput(mapType(input.type));
      if (input.debugName !== undefined) copy.setDebugName(input.debugName);
      local.set(input, copy);
    }
    for (const node of src.nodes()) {
      const copy = this.graph.createClone(node, lookup, mapType);
      this.appendNode(copy);
      node.outputs.forEach((out, i) => local.set(out, copy.outputs[i]));
    }
    for (const out of src.outputs) {
      this.registerOutput(lookup(out));
    }
  }

  _destroyContents(): void {
    this.returnNode.removeAllInputs();
    const nodes = this.nodes();
    for (let i = nodes.length - 1; i >= 0; i--) {
      const node = nodes[i];
      // Uses from later siblings are gone already; anything left comes from
      // outside this block and would be an IR bug.
      node.destroy();
    }
    for (const input of this.inputs) {
      input._clearDebugName();
    }
  }
}

// ============================================================================
// Graph
// ============================================================================

export class Graph {
  readonly block: Block;
  private nextValueId = 0;
  private readonly names = new Map<string, Value>();
  private insertPoint: Node;

  constructor() {
    this.block = new Block(this, undefined);
    this.insertPoint = this.block.returnNode;
  }

  get inputs(): readonly Value[] {
    return this.block.inputs;
  }

  get outputs(): readonly Value[] {
    return this.block.outputs;
  }

  addInput(type: JitType, name?: string): Value {
    return this.block.addInput(type, name);
  }

  registerOutput(value: Value): number {
    return this.block.registerOutput(value);
  }

  nodes(): Node[] {
    return this.block.nodes();
  }

  /** Every node in every block, outer nodes before the nodes they own. */
  allNodes(): Node[] {
    const result: Node[] = [];
    const visit = (block: Block): void => {
      for (const node of block.nodes()) {
        result.push(node);
        node.blocks.forEach(visit);
      }
    };
    visit(this.block);
    return result;
  }

  /** Create a detached node. */
  create(
    kind: NodeKind,
    inputs: readonly Value[] = [],
    outputTypes: readonly JitType[] = [],
  ): Node {
    const node = new Node(this, kind);
    for (const input of inputs) node.addInput(input);
    for (const type of outputTypes) node.addOutput(type);
    return node;
  }

  createClone(
    node: Node,
    env: (value: Value) => Value,
    mapType: (type: JitType) => JitType = (type) => type,
  ): Node {
    const copy = this.create(
      node.kind,
      node.inputs.map(env),
      node.outputs.map((out) => mapType(out.type)),
    );
    copy.copyAttributes(node);
    node.outputs.forEach((out, i) => {
      if (out.debugName !== undefined) {
        copy.outputs[i].setDebugName(out.debugName);
      }
    });
    for (const block of node.blocks) {
      copy.addBlock().cloneFrom(block, env, mapType);
    }
    return copy;
  }

  insertNode(node: Node): Node {
    return node.insertBefore(this.insertPoint);
  }

  /** Create a node, set its attributes and insert it at the insert point. */
  insert(
    kind: NodeKind,
    inputs: readonly Value[] = [],
    outputTypes: readonly JitType[] = [],
    attributes: Record<string, IValue> = {},
  ): Node {
    const node = this.create(kind, inputs, outputTypes);
    for (const [name, value] of Object.entries(attributes)) {
      node.setAttribute(name, value);
    }
    return this.insertNode(node);
  }

  getInsertPoint(): Node {
    return this.insertPoint;
  }

  /**
   * New nodes go right before `point`; a block means its end.
   */
  setInsertPoint(point: Node | Block): void {
    this.insertPoint = point instanceof Block ? point.returnNode : point;
  }

  withInsertPoint<T>(point: Node | Block, fn: () => T): T {
    const saved = this.insertPoint;
    this.setInsertPoint(point);
    try {
      return fn();
    } finally {
      this.insertPoint = saved;
    }
  }

  /** Deep copy, optionally translating types (e.g. onto cloned classes). */
  copy(mapType?: (type: JitType) => JitType): Graph {
    const graph = new Graph();
    graph.block.cloneFrom(
      this.block,
      (value) => {
        throw new IRInvariantError(
          `%${value.displayName()} is used outside the scope that defines it`,
        );
      },
      mapType,
    );
    return graph;
  }

  _allocateValueId(): number {
    return this.nextValueId++;
  }

  _claimName(name: string, value: Value): string {
    const owner = this.names.get(name);
    if (owner === undefined || owner === value) {
      this.names.set(name, value);
      return name;
    }
    let suffix = 1;
    while (this.names.has(`${name}.${suffix}`)) {
      suffix++;
    }
    const unique = `${name}.${suffix}`;
    this.names.set(unique, value);
    return unique;
  }

  _releaseName(name: string, value: Value): void {
    if (this.names.get(name) === value) {
      this.names.delete(name);
    }
  }
}
