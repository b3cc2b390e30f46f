/**
 * Losses over graph nodes, plus plain-number metrics.
 */
import { InvalidOperandError } from "@scalargrad/core";
import { sum, type Value } from "@scalargrad/autograd";

function checkPairs(name: string, a: readonly unknown[], b: readonly unknown[]): void {
  if (a.length === 0 || a.length !== b.length) {
    throw new InvalidOperandError({
      message: `${name}: expected equal non-empty lengths, got ${a.length} and ${b.length}`,
    });
  }
}

/** mean((p - t)^2) */
export function mseLoss(preds: readonly Value[], targets: readonly number[]): Value {
  checkPairs("mseLoss", preds, targets);
  return sum(preds.map((p, i) => p.sub(targets[i]).pow(2))).div(preds.length);
}

/** Max-margin loss for labels in {-1, +1}: mean(relu(1 - y * s)). */
export function hingeLoss(scores: readonly Value[], labels: readonly number[]): Value {
  checkPairs("hingeLoss", scores, labels);
  return sum(scores.map((s, i) => s.mul(-labels[i]).add(1).relu())).div(scores.length);
}

/** alpha * sum(p^2) */
export function l2Penalty(params: readonly Value[], alpha: number): Value {
  return sum(params.map((p) => p.mul(p))).mul(alpha);
}

/** Fraction of scores whose sign matches the label's. */
export function accuracy(scores: readonly number[], labels: readonly number[]): number {
  if (scores.length === 0) return 0;
  let hits = 0;
  for (let i = 0; i < scores.length; i++) {
    if ((scores[i] > 0) === (labels[i] > 0)) hits++;
  }
  return hits / scores.length;
}
