/**
 * Node storage.
 *
 * A Graph is an arena: every node lives at an integer id in a set of
 * parallel columns (data, grad, parent ids, op, label). A `Value` is a
 * thin handle onto one slot. Nodes only ever reference earlier ids, so
 * the arena is acyclic by construction, and the whole graph is released
 * together when the last reference to it goes away.
 */
import { InvalidOperandError } from "@scalargrad/core";
import { ADD, EXP, LEAF, MUL, RELU, TANH, forward, type Op } from "./ops.js";
import { backward } from "./backward.js";

/** Anything accepted in an operand slot: a node, or a number lifted to a leaf. */
export type Operand = Value | number;

function describe(x: unknown): string {
  if (x === null) return "null";
  if (typeof x === "object") return x.constructor?.name ?? "object";
  return typeof x;
}

// ── Graph ──────────────────────────────────────────────────────────────────
export class Graph {
  private readonly _data: number[] = [];
  private readonly _grad: number[] = [];
  private readonly _parents: (readonly number[])[] = [];
  private readonly _ops: Op[] = [];
  private readonly _labels: string[] = [];
  private readonly _handles: Value[] = [];

  /** Number of nodes in the arena. */
  get size(): number {
    return this._data.length;
  }

  /** Create a leaf node holding `data`. Any float is accepted, NaN included. */
  value(data: number, label = ""): Value {
    return this.push(data, [], LEAF, label);
  }

  /**
   * Bring an operand into this graph. Numbers become fresh leaves; values
   * must already belong here.
   */
  lift(x: Operand, opName: string): Value {
    if (typeof x === "number") return this.value(x);
    if (x instanceof Value) {
      if (x.graph !== this) {
        throw new InvalidOperandError({ message: `${opName}: operand belongs to a different graph` });
      }
      return x;
    }
    throw new InvalidOperandError({
      message: `${opName}: expected a Value or a number, got ${describe(x)}`,
    });
  }

  /** Record `op` over operands of this graph and return the result node. */
  apply(op: Op, operands: readonly Value[]): Value {
    const ids = operands.map((v) => v.id);
    return this.push(forward(op, ids.map((id) => this._data[id])), ids, op, "");
  }

  /** All nodes in creation order. */
  nodes(): Value[] {
    return this._handles.slice();
  }

  /** Reset every gradient to 0, e.g. between backward passes over shared nodes. */
  zeroGrad(): void {
    this._grad.fill(0);
  }

  handle(id: number): Value {
    return this._handles[id];
  }

  dataOf(id: number): number {
    return this._data[id];
  }

  gradOf(id: number): number {
    return this._grad[id];
  }

  setGrad(id: number, g: number): void {
    this._grad[id] = g;
  }

  accumulateGrad(id: number, g: number): void {
    this._grad[id] += g;
  }

  parentIdsOf(id: number): readonly number[] {
    return this._parents[id];
  }

  opOf(id: number): Op {
    return this._ops[id];
  }

  labelOf(id: number): string {
    return this._labels[id];
  }

  setLabel(id: number, label: string): void {
    this._labels[id] = label;
  }

  private push(data: number, parents: readonly number[], op: Op, label: string): Value {
    const id = this._data.length;
    this._data.push(data);
    this._grad.push(0);
    this._parents.push(parents);
    this._ops.push(op);
    this._labels.push(label);
    const v = new Value(this, id);
    this._handles.push(v);
    return v;
  }
}

// ── Value ──────────────────────────────────────────────────────────────────
export class Value {
  readonly graph: Graph;
  readonly id: number;

  constructor(graph: Graph, id: number) {
    this.graph = graph;
    this.id = id;
  }

  get data(): number {
    return this.graph.dataOf(this.id);
  }

  get grad(): number {
    return this.graph.gradOf(this.id);
  }

  set grad(g: number) {
    this.graph.setGrad(this.id, g);
  }

  get label(): string {
    return this.graph.labelOf(this.id);
  }

  set label(label: string) {
    this.graph.setLabel(this.id, label);
  }

  get op(): Op {
    return this.graph.opOf(this.id);
  }

  /** Operands in slot order; `x.add(x)` lists `x` twice. */
  get parents(): Value[] {
    return this.graph.parentIdsOf(this.id).map((id) => this.graph.handle(id));
  }

  add(other: Operand): Value {
    return this.graph.apply(ADD, [this, this.graph.lift(other, "add")]);
  }

  mul(other: Operand): Value {
    return this.graph.apply(MUL, [this, this.graph.lift(other, "mul")]);
  }

  /** Raise to a constant exponent. The exponent is not a graph node. */
  pow(exponent: number): Value {
    if (typeof exponent !== "number") {
      throw new InvalidOperandError({
        message: `pow: exponent must be a number, got ${describe(exponent)}`,
      });
    }
    return this.graph.apply({ kind: "pow", exponent }, [this]);
  }

  neg(): Value {
    return this.mul(-1);
  }

  sub(other: Operand): Value {
    return this.add(this.graph.lift(other, "sub").neg());
  }

  div(other: Operand): Value {
    return this.mul(this.graph.lift(other, "div").pow(-1));
  }

  exp(): Value {
    return this.graph.apply(EXP, [this]);
  }

  tanh(): Value {
    return this.graph.apply(TANH, [this]);
  }

  relu(): Value {
    return this.graph.apply(RELU, [this]);
  }

  /** Run the backward pass with this node as the terminal. */
  backward(): void {
    backward(this);
  }

  toString(): string {
    return `Value(data=${this.data})`;
  }
}
