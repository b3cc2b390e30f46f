/**
 * Finite-difference checks for the backward pass.
 */
import type { Rng } from "@scalargrad/core";
import { Graph, type Value } from "./graph.js";

/** Builds one scalar output from a list of input leaves. */
export type Expression = (inputs: readonly Value[]) => Value;

export interface GradcheckOptions {
  readonly eps?: number;
  readonly tolerance?: number;
}

export interface GradcheckResult {
  readonly output: number;
  readonly analytic: number[];
  readonly numeric: number[];
  /** Largest per-input error: absolute below magnitude 1, relative above. */
  readonly maxError: number;
  readonly ok: boolean;
}

/** Central difference of `f` at `point`, one coordinate at a time. */
export function numericalGradient(
  f: (point: readonly number[]) => number,
  point: readonly number[],
  eps = 1e-6,
): number[] {
  const grad: number[] = [];
  const probe = point.slice();
  for (let i = 0; i < point.length; i++) {
    probe[i] = point[i] + eps;
    const hi = f(probe);
    probe[i] = point[i] - eps;
    const lo = f(probe);
    probe[i] = point[i];
    grad.push((hi - lo) / (2 * eps));
  }
  return grad;
}

/** Evaluate `expr` forward only, on a throwaway graph. */
export function evaluate(expr: Expression, point: readonly number[]): number {
  const graph = new Graph();
  return expr(point.map((x) => graph.value(x))).data;
}

/** Compare backward-pass gradients of `expr` at `point` against central differences. */
export function gradcheck(
  expr: Expression,
  point: readonly number[],
  options: GradcheckOptions = {},
): GradcheckResult {
  const eps = options.eps ?? 1e-6;
  const tolerance = options.tolerance ?? 1e-4;

  const graph = new Graph();
  const inputs = point.map((x, i) => graph.value(x, `x${i}`));
  const out = expr(inputs);
  out.backward();
  const analytic = inputs.map((v) => v.grad);
  const numeric = numericalGradient((p) => evaluate(expr, p), point, eps);

  let maxError = 0;
  for (let i = 0; i < analytic.length; i++) {
    const scale = Math.max(1, Math.abs(analytic[i]), Math.abs(numeric[i]));
    const err = Math.abs(analytic[i] - numeric[i]) / scale;
    // NaN must fail the check, so compare with !(err <= maxError)
    if (!(err <= maxError)) maxError = err;
  }
  return { output: out.data, analytic, numeric, maxError, ok: maxError <= tolerance };
}

// ── Random expressions ─────────────────────────────────────────────────────

type StepKind = "add" | "sub" | "mul" | "div" | "tanh" | "exp" | "relu" | "square";

const STEP_KINDS: readonly StepKind[] = ["add", "sub", "mul", "div", "tanh", "exp", "relu", "square"];

interface Step {
  readonly kind: StepKind;
  readonly a: number;
  readonly b: number;
}

function applyStep(step: Step, pool: readonly Value[]): Value {
  const a = pool[step.a];
  const b = pool[step.b];
  switch (step.kind) {
    case "add": return a.add(b);
    case "sub": return a.sub(b);
    case "mul": return a.mul(b);
    // denominator kept >= 1
    case "div": return a.div(b.mul(b).add(1));
    case "tanh": return a.tanh();
    // squashed first so chained exps stay finite
    case "exp": return a.tanh().exp();
    case "relu": return a.relu();
    case "square": return a.pow(2);
  }
}

/**
 * A random DAG over `nInputs` leaves. Each of the `depth` steps picks its
 * operands from the inputs and all earlier results, so nodes are shared
 * between branches. The output sums the last two results.
 */
export function randomExpression(rng: Rng, nInputs: number, depth: number): Expression {
  const steps: Step[] = [];
  for (let i = 0; i < depth; i++) {
    const poolSize = nInputs + i;
    steps.push({
      kind: STEP_KINDS[rng.int(STEP_KINDS.length)],
      a: rng.int(poolSize),
      b: rng.int(poolSize),
    });
  }
  return (inputs) => {
    const pool = inputs.slice();
    for (const step of steps) pool.push(applyStep(step, pool));
    const last = pool[pool.length - 1];
    return pool.length > 1 ? last.add(pool[pool.length - 2]) : last;
  };
}
