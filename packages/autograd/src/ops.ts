/**
 * Operation set: forward formulas and local-gradient rules.
 *
 * Each node records a tagged `Op` instead of a backward closure. The
 * backward executor dispatches on `op.kind` through `localGradients`,
 * which returns one contribution per operand slot.
 */
import { AutogradError } from "@scalargrad/core";

export type Op =
  | { readonly kind: "leaf" }
  | { readonly kind: "add" }
  | { readonly kind: "mul" }
  | { readonly kind: "pow"; readonly exponent: number }
  | { readonly kind: "exp" }
  | { readonly kind: "tanh" }
  | { readonly kind: "relu" };

export type OpKind = Op["kind"];

export const LEAF: Op = { kind: "leaf" };
export const ADD: Op = { kind: "add" };
export const MUL: Op = { kind: "mul" };
export const EXP: Op = { kind: "exp" };
export const TANH: Op = { kind: "tanh" };
export const RELU: Op = { kind: "relu" };

/** Number of operands each op takes. */
export function arity(op: Op): 0 | 1 | 2 {
  switch (op.kind) {
    case "leaf": return 0;
    case "add":
    case "mul": return 2;
    case "pow":
    case "exp":
    case "tanh":
    case "relu": return 1;
  }
}

/** Forward value of `op` applied to operand values. */
export function forward(op: Op, inputs: readonly number[]): number {
  switch (op.kind) {
    case "leaf":
      throw new AutogradError({ message: "forward: leaves have no operands" });
    case "add": return inputs[0] + inputs[1];
    case "mul": return inputs[0] * inputs[1];
    case "pow": return inputs[0] ** op.exponent;
    case "exp": return Math.exp(inputs[0]);
    case "tanh": {
      const e2x = Math.exp(2 * inputs[0]);
      return (e2x - 1) / (e2x + 1);
    }
    case "relu": return inputs[0] > 0 ? inputs[0] : 0;
  }
}

/**
 * Gradient contribution to each operand slot, given the operand values,
 * this node's forward value `out` and its accumulated gradient `g`.
 */
export function localGradients(op: Op, inputs: readonly number[], out: number, g: number): number[] {
  switch (op.kind) {
    case "leaf": return [];
    case "add": return [g, g];
    case "mul": return [g * inputs[1], g * inputs[0]];
    case "pow": return [g * op.exponent * inputs[0] ** (op.exponent - 1)];
    case "exp": return [g * out];
    case "tanh": return [g * (1 - out ** 2)];
    case "relu": return [inputs[0] > 0 ? g : 0];
  }
}

/** Short symbol for diagrams: "+", "*", "**k", function names, "" for leaves. */
export function opSymbol(op: Op): string {
  switch (op.kind) {
    case "leaf": return "";
    case "add": return "+";
    case "mul": return "*";
    case "pow": return `**${op.exponent}`;
    case "exp":
    case "tanh":
    case "relu": return op.kind;
  }
}
