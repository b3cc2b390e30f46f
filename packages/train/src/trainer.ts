/**
 * Training loop.
 *
 * Every step binds the parameters into a fresh Graph, builds the loss,
 * runs backward, and hands the gradients to the optimizer. The graph is
 * dropped at the end of the step; only the Float64Array parameters persist.
 */
import { Effect } from "effect";
import {
  ConfigError, OptimizerService, RngService, TrainError,
  validateMlpConfig, validateTrainConfig,
  type MlpConfig, type Optimizer, type TrainConfig,
} from "@scalargrad/core";
import { Graph } from "@scalargrad/autograd";
import {
  bindParams, collectParamEntries, countParams, initMLP, layerSizes, mlpForward, predict,
  type MlpParams,
} from "@scalargrad/model";
import { accuracy, hingeLoss, l2Penalty, mseLoss } from "./losses.js";
import { sampleBatch, type Dataset } from "./data.js";

// ── Step metrics ───────────────────────────────────────────────────────────

export interface StepMetrics {
  readonly step: number;
  /** Data loss plus regularization. */
  readonly loss: number;
  readonly dataLoss: number;
  /** Accuracy on this step's batch, before the update. */
  readonly accuracy: number;
  readonly lr: number;
  /** Graph size for this step. */
  readonly nodes: number;
}

export interface TrainResult {
  readonly params: MlpParams;
  readonly history: StepMetrics[];
  /** Accuracy over the full dataset after the last update. */
  readonly accuracy: number;
}

/** Linear decay from lr at step 0 to lr * lrMinRatio at the last step. */
export function learningRate(config: TrainConfig, step: number): number {
  return config.lr * (1 - (1 - config.lrMinRatio) * (step / Math.max(1, config.steps - 1)));
}

/** One forward/backward/update on the examples at `indices`. */
export function trainStep(
  params: MlpParams,
  optimizer: Optimizer,
  config: Pick<TrainConfig, "loss" | "alpha">,
  dataset: Dataset,
  indices: readonly number[],
  step: number,
  lr: number,
): StepMetrics {
  const graph = new Graph();
  const model = bindParams(graph, params);
  const scores = indices.map((i) => mlpForward(model, dataset.inputs[i])[0]);
  const labels = indices.map((i) => dataset.labels[i]);

  const dataLoss = config.loss === "hinge" ? hingeLoss(scores, labels) : mseLoss(scores, labels);
  const total = config.alpha > 0
    ? dataLoss.add(l2Penalty(model.layers.flatMap((l) => [...l.weight, ...l.bias]), config.alpha))
    : dataLoss;
  total.backward();

  optimizer.lr = lr;
  optimizer.step(collectParamEntries(model));

  return {
    step,
    loss: total.data,
    dataLoss: dataLoss.data,
    accuracy: accuracy(scores.map((s) => s.data), labels),
    lr,
    nodes: graph.size,
  };
}

/** Accuracy of the first output's sign over the whole dataset. */
export function evaluateAccuracy(params: MlpParams, dataset: Dataset): number {
  const scores = dataset.inputs.map((x) => predict(params, x)[0]);
  return accuracy(scores, dataset.labels);
}

function checkInputs(modelConfig: MlpConfig, trainConfig: TrainConfig, dataset: Dataset): void {
  validateMlpConfig(modelConfig);
  validateTrainConfig(trainConfig);
  if (modelConfig.nOut !== 1) {
    throw new ConfigError({ message: `classifier needs nOut = 1, got ${modelConfig.nOut}` });
  }
  if (dataset.inputs.length === 0) {
    throw new ConfigError({ message: "dataset has no examples" });
  }
  const width = dataset.inputs[0].length;
  if (width !== modelConfig.nIn) {
    throw new ConfigError({ message: `dataset has ${width} features but nIn = ${modelConfig.nIn}` });
  }
}

export function train(
  modelConfig: MlpConfig,
  trainConfig: TrainConfig,
  dataset: Dataset,
): Effect.Effect<TrainResult, TrainError | ConfigError, RngService | OptimizerService> {
  return Effect.gen(function* () {
    yield* Effect.try({
      try: () => checkInputs(modelConfig, trainConfig, dataset),
      catch: (e) => (e instanceof ConfigError ? e : new ConfigError({ message: String(e), cause: e })),
    });
    const rng = yield* RngService;
    const optimizer = yield* OptimizerService;

    const params = initMLP(modelConfig, rng);
    yield* Effect.logInfo(
      `model: ${layerSizes(modelConfig).join("-")} ${modelConfig.activation} (${countParams(params)} params), ` +
      `optimizer: ${optimizer.name}, examples: ${dataset.labels.length}`,
    );

    const history: StepMetrics[] = [];
    for (let step = 0; step < trainConfig.steps; step++) {
      const indices = sampleBatch(dataset, trainConfig.batchSize, rng);
      const metrics = trainStep(params, optimizer, trainConfig, dataset, indices, step, learningRate(trainConfig, step));
      if (!Number.isFinite(metrics.loss)) {
        return yield* Effect.fail(
          new TrainError({ message: `loss became ${metrics.loss} at step ${step} (lr=${metrics.lr})` }),
        );
      }
      history.push(metrics);
      if (step % trainConfig.logInterval === 0 || step === trainConfig.steps - 1) {
        yield* Effect.logInfo(
          `step ${step} | loss ${metrics.loss.toFixed(4)} | acc ${(metrics.accuracy * 100).toFixed(1)}% | lr ${metrics.lr.toFixed(4)}`,
        );
      }
      yield* Effect.logDebug(`step ${step}: ${metrics.nodes} graph nodes`);
    }

    const finalAccuracy = evaluateAccuracy(params, dataset);
    yield* Effect.logInfo(`final accuracy ${(finalAccuracy * 100).toFixed(1)}%`);
    return { params, history, accuracy: finalAccuracy };
  }).pipe(Effect.withSpan("train"));
}
