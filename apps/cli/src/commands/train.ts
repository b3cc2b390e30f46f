/**
 * Command: scalargrad train
 *
 * Usage:
 *   scalargrad train --dataset=moons --n=100 --hidden=16,16 --steps=100
 *   scalargrad train --data=points.csv --optim=adam --lr=0.05 --out=runs/mlp.json
 */
import { Effect, Layer } from "effect";
import {
  ConfigError, SeededRng, defaultMlpConfig, defaultTrainConfig,
  type Activation, type LossKind, type MlpConfig, type TrainConfig,
} from "@scalargrad/core";
import { FileCheckpoint, loadDataset, train, type Dataset } from "@scalargrad/train";
import { OptimizerFrom, RngLive, isLogLevelName, parseLogLevel, prettyLoggerLayer } from "@scalargrad/effect-runtime";
import { parseKV, loadConfig, intArg, floatArg, strArg, listArg } from "../parse.js";
import { resolveDataset, resolveOptimizer, listImplementations } from "../resolve.js";

function activationArg(value: string): Activation {
  if (value === "tanh" || value === "relu") return value;
  throw new ConfigError({ message: `--activation must be tanh or relu, got "${value}"` });
}

function lossArg(value: string): LossKind {
  if (value === "hinge" || value === "mse") return value;
  throw new ConfigError({ message: `--loss must be hinge or mse, got "${value}"` });
}

async function resolveData(kv: Record<string, string>, seed: number): Promise<Dataset> {
  const dataPath = kv["data"];
  if (dataPath) return Effect.runPromise(loadDataset(dataPath));
  const generate = resolveDataset(strArg(kv, "dataset", "moons"));
  return generate(intArg(kv, "n", 100), floatArg(kv, "noise", 0.1), new SeededRng(seed));
}

export async function trainCmd(args: string[]): Promise<void> {
  let kv = parseKV(args);
  kv = await loadConfig(kv);

  const logLevel = strArg(kv, "log", defaultTrainConfig.logLevel);
  if (!isLogLevelName(logLevel)) {
    throw new ConfigError({ message: `--log must be debug, info, warn, error or none, got "${logLevel}"` });
  }

  const trainConfig: TrainConfig = {
    steps: intArg(kv, "steps", defaultTrainConfig.steps),
    lr: floatArg(kv, "lr", defaultTrainConfig.lr),
    lrMinRatio: floatArg(kv, "lrMinRatio", defaultTrainConfig.lrMinRatio),
    momentum: floatArg(kv, "momentum", defaultTrainConfig.momentum),
    optimizer: strArg(kv, "optim", defaultTrainConfig.optimizer),
    loss: lossArg(strArg(kv, "loss", defaultTrainConfig.loss)),
    alpha: floatArg(kv, "alpha", defaultTrainConfig.alpha),
    batchSize: intArg(kv, "batch", defaultTrainConfig.batchSize),
    logInterval: intArg(kv, "logInterval", defaultTrainConfig.logInterval),
    seed: intArg(kv, "seed", defaultTrainConfig.seed),
    logLevel,
  };

  const dataset = await resolveData(kv, trainConfig.seed);

  const modelConfig: MlpConfig = {
    nIn: dataset.inputs[0].length,
    hidden: listArg(kv, "hidden", defaultMlpConfig.hidden),
    nOut: 1,
    activation: activationArg(strArg(kv, "activation", defaultMlpConfig.activation)),
  };

  console.log(`Implementations available:\n${listImplementations()}\n`);

  const optimizer = resolveOptimizer(trainConfig.optimizer, trainConfig.lr, trainConfig.momentum);
  const services = Layer.mergeAll(
    RngLive(trainConfig.seed),
    OptimizerFrom(optimizer),
    prettyLoggerLayer(parseLogLevel(trainConfig.logLevel)),
  );

  const result = await Effect.runPromise(train(modelConfig, trainConfig, dataset).pipe(Effect.provide(services)));

  const last = result.history[result.history.length - 1];
  console.log(`Loss:     ${last.loss.toFixed(4)}`);
  console.log(`Accuracy: ${(result.accuracy * 100).toFixed(1)}%`);

  const outPath = kv["out"];
  if (outPath) {
    await Effect.runPromise(new FileCheckpoint().save(outPath, result.params));
    console.log(`Parameters saved to ${outPath}`);
  }
}
