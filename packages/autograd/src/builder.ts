/**
 * Free-function form of the operation set.
 *
 * Either operand of a binary op may be a plain number, so `mul(2, x)` and
 * `sub(1, x)` cover the reflected forms. At least one operand has to be a
 * Value: that is where the graph comes from.
 */
import { InvalidOperandError } from "@scalargrad/core";
import { Value, type Graph, type Operand } from "./graph.js";

function graphOf(opName: string, operands: readonly unknown[]): Graph {
  for (const x of operands) {
    if (x instanceof Value) return x.graph;
  }
  throw new InvalidOperandError({
    message: `${opName}: at least one operand must be a Value`,
  });
}

function unary(opName: string, a: Value): Value {
  if (!(a instanceof Value)) {
    throw new InvalidOperandError({ message: `${opName}: operand must be a Value` });
  }
  return a;
}

export function add(a: Operand, b: Operand): Value {
  return graphOf("add", [a, b]).lift(a, "add").add(b);
}

export function sub(a: Operand, b: Operand): Value {
  return graphOf("sub", [a, b]).lift(a, "sub").sub(b);
}

export function mul(a: Operand, b: Operand): Value {
  return graphOf("mul", [a, b]).lift(a, "mul").mul(b);
}

export function div(a: Operand, b: Operand): Value {
  return graphOf("div", [a, b]).lift(a, "div").div(b);
}

export function pow(a: Value, exponent: number): Value {
  return unary("pow", a).pow(exponent);
}

export function neg(a: Value): Value {
  return unary("neg", a).neg();
}

export function exp(a: Value): Value {
  return unary("exp", a).exp();
}

export function tanh(a: Value): Value {
  return unary("tanh", a).tanh();
}

export function relu(a: Value): Value {
  return unary("relu", a).relu();
}

/** Left fold of `add` over a non-empty list. */
export function sum(values: readonly Value[]): Value {
  if (values.length === 0) {
    throw new InvalidOperandError({ message: "sum: needs at least one Value" });
  }
  let acc = unary("sum", values[0]);
  for (let i = 1; i < values.length; i++) acc = acc.add(values[i]);
  return acc;
}
