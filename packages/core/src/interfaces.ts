/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";

// ── Parameters ─────────────────────────────────────────────────────────────
/** A named parameter block: current values and the gradient from the last backward pass. */
export interface ParamSlot {
  readonly data: Float64Array;
  readonly grad: Float64Array;
}

export type ParamEntry = readonly [name: string, slot: ParamSlot];

// ── Optimizer ──────────────────────────────────────────────────────────────
export interface Optimizer {
  readonly name: string;
  /** Current learning rate; the trainer updates it for the lr schedule. */
  lr: number;
  step(entries: readonly ParamEntry[]): void;
}

export class OptimizerService extends Context.Tag("OptimizerService")<
  OptimizerService,
  Optimizer
>() {}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextGauss(): number;
  uniform(lo: number, hi: number): number;
  int(n: number): number;
  shuffle<T>(items: readonly T[]): T[];
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
