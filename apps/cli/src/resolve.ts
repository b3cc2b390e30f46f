/**
 * Resolve pluggable implementations from CLI args.
 */
import type { Optimizer } from "@scalargrad/core";
import { createOptimizerRegistry, datasetRegistry, type DatasetGenerator } from "@scalargrad/train";

export function resolveOptimizer(name: string, lr: number, momentum: number): Optimizer {
  return createOptimizerRegistry({ lr, momentum }).get(name);
}

export function resolveDataset(name: string): DatasetGenerator {
  return datasetRegistry.get(name);
}

export function listImplementations(): string {
  return [
    `Datasets:   ${datasetRegistry.list().join(", ")}`,
    `Optimizers: ${createOptimizerRegistry({ lr: 0, momentum: 0 }).list().join(", ")}`,
  ].join("\n");
}
