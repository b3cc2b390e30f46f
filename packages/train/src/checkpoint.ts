/**
 * Save and load trained MLP parameters as JSON.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { CheckpointError, validateMlpConfig, type MlpConfig } from "@scalargrad/core";
import { layerSizes, type LayerParams, type MlpParams } from "@scalargrad/model";

interface CheckpointFile {
  readonly config: MlpConfig;
  readonly layers: { weight: number[]; bias: number[] }[];
}

function isNumberArray(x: unknown): x is number[] {
  return Array.isArray(x) && x.every((v) => typeof v === "number");
}

function isMlpConfig(x: unknown): x is MlpConfig {
  return typeof x === "object" && x !== null &&
    "nIn" in x && typeof x.nIn === "number" &&
    "nOut" in x && typeof x.nOut === "number" &&
    "hidden" in x && isNumberArray(x.hidden) &&
    "activation" in x && (x.activation === "tanh" || x.activation === "relu");
}

/** Rebuild MlpParams from parsed JSON, checking every block's size against the config. */
export function restoreParams(raw: unknown): MlpParams {
  if (typeof raw !== "object" || raw === null || !("config" in raw) || !("layers" in raw)) {
    throw new CheckpointError({ message: "checkpoint must have `config` and `layers`" });
  }
  const config = raw.config;
  if (!isMlpConfig(config)) {
    throw new CheckpointError({ message: "checkpoint config is missing model fields" });
  }
  try {
    validateMlpConfig(config);
  } catch (cause) {
    throw new CheckpointError({ message: "checkpoint has an invalid model config", cause });
  }
  const sizes = layerSizes(config);
  if (!Array.isArray(raw.layers) || raw.layers.length !== sizes.length - 1) {
    throw new CheckpointError({ message: `expected ${sizes.length - 1} layers` });
  }
  const layers = raw.layers.map((layer: unknown, i): LayerParams => {
    const nIn = sizes[i], nOut = sizes[i + 1];
    if (typeof layer !== "object" || layer === null || !("weight" in layer) || !("bias" in layer)) {
      throw new CheckpointError({ message: `layer ${i}: missing weight or bias` });
    }
    const { weight, bias } = layer;
    if (!isNumberArray(weight) || weight.length !== nIn * nOut) {
      throw new CheckpointError({ message: `layer ${i}: weight must hold ${nIn * nOut} numbers` });
    }
    if (!isNumberArray(bias) || bias.length !== nOut) {
      throw new CheckpointError({ message: `layer ${i}: bias must hold ${nOut} numbers` });
    }
    return { nIn, nOut, weight: Float64Array.from(weight), bias: Float64Array.from(bias) };
  });
  return { config, layers };
}

export class FileCheckpoint {
  save(path: string, params: MlpParams): Effect.Effect<void, CheckpointError> {
    return Effect.tryPromise({
      try: async () => {
        await mkdir(dirname(path), { recursive: true });
        const file: CheckpointFile = {
          config: params.config,
          layers: params.layers.map((l) => ({ weight: Array.from(l.weight), bias: Array.from(l.bias) })),
        };
        await writeFile(path, JSON.stringify(file, null, 2), "utf-8");
      },
      catch: (e) => new CheckpointError({ message: `Failed to save checkpoint: ${e}`, cause: e }),
    });
  }

  load(path: string): Effect.Effect<MlpParams, CheckpointError> {
    return Effect.tryPromise({
      try: async () => restoreParams(JSON.parse(await readFile(path, "utf-8"))),
      catch: (e) =>
        e instanceof CheckpointError ? e : new CheckpointError({ message: `Failed to load checkpoint: ${e}`, cause: e }),
    });
  }
}
