/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that constructs it from config.
 */
import { Layer } from "effect";
import { OptimizerService, RngService, SeededRng, type Optimizer, type Rng } from "@scalargrad/core";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number): Layer.Layer<RngService> =>
  Layer.sync(RngService, (): Rng => new SeededRng(seed));

// ── Optimizer Layer ────────────────────────────────────────────────────────

export const OptimizerFrom = (optimizer: Optimizer): Layer.Layer<OptimizerService> =>
  Layer.succeed(OptimizerService, optimizer);
