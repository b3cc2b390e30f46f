export {
  InvalidOperandError,
  AutogradError,
  ConfigError,
  DatasetError,
  TrainError,
  CheckpointError,
} from "./errors.js";
export {
  type ParamSlot,
  type ParamEntry,
  type Optimizer,
  OptimizerService,
  type Rng,
  RngService,
} from "./interfaces.js";
export {
  type Activation,
  type MlpConfig,
  defaultMlpConfig,
  type LossKind,
  type LogLevelName,
  type TrainConfig,
  defaultTrainConfig,
  type GradcheckConfig,
  defaultGradcheckConfig,
} from "./types.js";
export { validateMlpConfig, validateTrainConfig, validateGradcheckConfig } from "./config.js";
export { SeededRng } from "./rng.js";
export { Registry } from "./registry.js";
