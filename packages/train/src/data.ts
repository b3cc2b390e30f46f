/**
 * Toy 2-D classification datasets and a CSV loader.
 *
 * Labels are always -1 or +1 so the same data works with the hinge and
 * mse losses.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError, DatasetError, Registry, type Rng } from "@scalargrad/core";

export interface Dataset {
  /** One row of features per example. */
  readonly inputs: number[][];
  /** -1 or +1 per example. */
  readonly labels: number[];
}

export type DatasetGenerator = (n: number, noise: number, rng: Rng) => Dataset;

function checkCount(name: string, n: number): void {
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError({ message: `${name}: n must be an integer >= 1, got ${n}` });
  }
}

/** Two interleaving half circles: the outer one labelled -1, the inner +1. */
export const makeMoons: DatasetGenerator = (n, noise, rng) => {
  checkCount("moons", n);
  const nOuter = Math.floor(n / 2);
  const inputs: number[][] = [];
  const labels: number[] = [];
  for (let i = 0; i < n; i++) {
    const outer = i < nOuter;
    const count = outer ? nOuter : n - nOuter;
    const idx = outer ? i : i - nOuter;
    const t = count > 1 ? (Math.PI * idx) / (count - 1) : 0;
    const x = outer ? Math.cos(t) : 1 - Math.cos(t);
    const y = outer ? Math.sin(t) : 0.5 - Math.sin(t);
    inputs.push([x + noise * rng.nextGauss(), y + noise * rng.nextGauss()]);
    labels.push(outer ? -1 : 1);
  }
  return { inputs, labels };
};

/** Two concentric circles: radius 1 labelled -1, radius 0.5 labelled +1. */
export const makeCircles: DatasetGenerator = (n, noise, rng) => {
  checkCount("circles", n);
  const nOuter = Math.floor(n / 2);
  const inputs: number[][] = [];
  const labels: number[] = [];
  for (let i = 0; i < n; i++) {
    const outer = i < nOuter;
    const count = outer ? nOuter : n - nOuter;
    const idx = outer ? i : i - nOuter;
    const t = (2 * Math.PI * idx) / count;
    const r = outer ? 1 : 0.5;
    inputs.push([r * Math.cos(t) + noise * rng.nextGauss(), r * Math.sin(t) + noise * rng.nextGauss()]);
    labels.push(outer ? -1 : 1);
  }
  return { inputs, labels };
};

/** Uniform points in [-1, 1]^2, labelled by the sign of x * y. */
export const makeXor: DatasetGenerator = (n, noise, rng) => {
  checkCount("xor", n);
  const inputs: number[][] = [];
  const labels: number[] = [];
  for (let i = 0; i < n; i++) {
    const x = rng.uniform(-1, 1), y = rng.uniform(-1, 1);
    labels.push(x * y > 0 ? 1 : -1);
    inputs.push([x + noise * rng.nextGauss(), y + noise * rng.nextGauss()]);
  }
  return { inputs, labels };
};

export const datasetRegistry = new Registry<DatasetGenerator>("dataset");
datasetRegistry.register("moons", () => makeMoons);
datasetRegistry.register("circles", () => makeCircles);
datasetRegistry.register("xor", () => makeXor);

// ── CSV ────────────────────────────────────────────────────────────────────

/**
 * Parse rows of `x1,...,xn,label`. Blank lines and lines starting with `#`
 * are skipped; every row must have the same width and a label of -1 or 1.
 */
export function parseDataset(text: string): Dataset {
  const inputs: number[][] = [];
  const labels: number[] = [];
  let width = -1;
  const lines = text.split("\n");
  for (let lineNo = 1; lineNo <= lines.length; lineNo++) {
    const line = lines[lineNo - 1].trim();
    if (!line || line.startsWith("#")) continue;
    const cells = line.split(",").map((c) => c.trim());
    const nums = cells.map(Number);
    if (cells.some((c) => c === "") || nums.some((x) => !Number.isFinite(x))) {
      throw new DatasetError({ message: `line ${lineNo}: non-numeric value in "${line}"` });
    }
    if (nums.length < 2) {
      throw new DatasetError({ message: `line ${lineNo}: need at least one feature and a label` });
    }
    if (width === -1) width = nums.length;
    else if (nums.length !== width) {
      throw new DatasetError({ message: `line ${lineNo}: expected ${width} columns, got ${nums.length}` });
    }
    const label = nums[nums.length - 1];
    if (label !== 1 && label !== -1) {
      throw new DatasetError({ message: `line ${lineNo}: label must be -1 or 1, got ${label}` });
    }
    inputs.push(nums.slice(0, -1));
    labels.push(label);
  }
  if (inputs.length === 0) {
    throw new DatasetError({ message: "dataset is empty" });
  }
  return { inputs, labels };
}

export function loadDataset(path: string): Effect.Effect<Dataset, DatasetError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new DatasetError({ message: `Failed to read dataset "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((text) =>
      Effect.try({
        try: () => parseDataset(text),
        catch: (cause) =>
          cause instanceof DatasetError
            ? new DatasetError({ message: `${path}: ${cause.message}`, cause })
            : new DatasetError({ message: `Failed to parse dataset "${path}"`, cause }),
      }),
    ),
  );
}

/** Example indices for one step: all of them, or a random subset of `batchSize`. */
export function sampleBatch(dataset: Dataset, batchSize: number, rng: Rng): number[] {
  const all = dataset.labels.map((_, i) => i);
  if (batchSize <= 0 || batchSize >= all.length) return all;
  return rng.shuffle(all).slice(0, batchSize);
}
