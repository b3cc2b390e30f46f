/**
 * Core types for the scalargrad system.
 */

// ── Model config ───────────────────────────────────────────────────────────
export type Activation = "tanh" | "relu";

export interface MlpConfig {
  readonly nIn: number;
  readonly hidden: readonly number[];
  readonly nOut: number;
  readonly activation: Activation;
}

export const defaultMlpConfig: MlpConfig = {
  nIn: 2,
  hidden: [16, 16],
  nOut: 1,
  activation: "relu",
};

// ── Training config ────────────────────────────────────────────────────────
export type LossKind = "hinge" | "mse";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "none";

export interface TrainConfig {
  readonly steps: number;
  readonly lr: number;
  /** Decay lr linearly to lr * lrMinRatio over the run (1 = constant). */
  readonly lrMinRatio: number;
  readonly momentum: number;
  readonly optimizer: string;
  readonly loss: LossKind;
  /** L2 regularization strength (0 = off). */
  readonly alpha: number;
  /** Mini-batch size (0 = full batch). */
  readonly batchSize: number;
  readonly logInterval: number;
  readonly seed: number;
  readonly logLevel: LogLevelName;
}

export const defaultTrainConfig: TrainConfig = {
  steps: 100,
  lr: 1.0,
  lrMinRatio: 0.1,
  momentum: 0,
  optimizer: "sgd",
  loss: "hinge",
  alpha: 1e-4,
  batchSize: 0,
  logInterval: 10,
  seed: 1337,
  logLevel: "info",
};

// ── Gradient check config ──────────────────────────────────────────────────
export interface GradcheckConfig {
  readonly trials: number;
  readonly depth: number;
  readonly eps: number;
  readonly tolerance: number;
  readonly seed: number;
}

export const defaultGradcheckConfig: GradcheckConfig = {
  trials: 20,
  depth: 4,
  eps: 1e-6,
  tolerance: 1e-4,
  seed: 7,
};
