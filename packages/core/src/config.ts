/**
 * Validation for configs assembled from defaults, JSON files and CLI flags.
 */
import { ConfigError } from "./errors.js";
import type { GradcheckConfig, MlpConfig, TrainConfig } from "./types.js";

function fail(message: string): never {
  throw new ConfigError({ message });
}

/** Validate an MlpConfig, throwing ConfigError on invalid values. */
export function validateMlpConfig(config: MlpConfig): void {
  if (!Number.isInteger(config.nIn) || config.nIn < 1) {
    fail(`nIn must be an integer >= 1, got ${config.nIn}`);
  }
  if (!Number.isInteger(config.nOut) || config.nOut < 1) {
    fail(`nOut must be an integer >= 1, got ${config.nOut}`);
  }
  for (const width of config.hidden) {
    if (!Number.isInteger(width) || width < 1) {
      fail(`hidden layer widths must be integers >= 1, got ${config.hidden.join(",")}`);
    }
  }
  if (config.activation !== "tanh" && config.activation !== "relu") {
    fail(`activation must be "tanh" or "relu", got ${String(config.activation)}`);
  }
}

/** Validate a TrainConfig, throwing ConfigError on invalid values. */
export function validateTrainConfig(config: TrainConfig): void {
  if (!Number.isInteger(config.steps) || config.steps < 1) {
    fail(`steps must be an integer >= 1, got ${config.steps}`);
  }
  if (!(config.lr > 0)) {
    fail(`lr must be > 0, got ${config.lr}`);
  }
  if (!(config.lrMinRatio >= 0 && config.lrMinRatio <= 1)) {
    fail(`lrMinRatio must be in [0,1], got ${config.lrMinRatio}`);
  }
  if (!(config.momentum >= 0 && config.momentum < 1)) {
    fail(`momentum must be in [0,1), got ${config.momentum}`);
  }
  if (config.loss !== "hinge" && config.loss !== "mse") {
    fail(`loss must be "hinge" or "mse", got ${String(config.loss)}`);
  }
  if (!(config.alpha >= 0)) {
    fail(`alpha must be >= 0, got ${config.alpha}`);
  }
  if (!Number.isInteger(config.batchSize) || config.batchSize < 0) {
    fail(`batchSize must be an integer >= 0, got ${config.batchSize}`);
  }
  if (!Number.isInteger(config.logInterval) || config.logInterval < 1) {
    fail(`logInterval must be an integer >= 1, got ${config.logInterval}`);
  }
}

export function validateGradcheckConfig(config: GradcheckConfig): void {
  if (!Number.isInteger(config.trials) || config.trials < 1) {
    fail(`trials must be an integer >= 1, got ${config.trials}`);
  }
  if (!Number.isInteger(config.depth) || config.depth < 1) {
    fail(`depth must be an integer >= 1, got ${config.depth}`);
  }
  if (!(config.eps > 0)) {
    fail(`eps must be > 0, got ${config.eps}`);
  }
  if (!(config.tolerance > 0)) {
    fail(`tolerance must be > 0, got ${config.tolerance}`);
  }
}
