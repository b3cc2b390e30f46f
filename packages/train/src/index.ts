export { SGD, Adam, createOptimizerRegistry } from "./optimizers.js";
export type { SGDConfig, AdamConfig } from "./optimizers.js";
export { mseLoss, hingeLoss, l2Penalty, accuracy } from "./losses.js";
export {
  type Dataset,
  type DatasetGenerator,
  makeMoons,
  makeCircles,
  makeXor,
  datasetRegistry,
  parseDataset,
  loadDataset,
  sampleBatch,
} from "./data.js";
export { FileCheckpoint, restoreParams } from "./checkpoint.js";
export {
  type StepMetrics,
  type TrainResult,
  learningRate,
  trainStep,
  evaluateAccuracy,
  train,
} from "./trainer.js";
