/**
 * Optimizers: SGD (with optional momentum) and Adam.
 *
 * Both work on named parameter blocks and update `data` in place from the
 * `grad` copied out of the last backward pass.
 */
import type { Optimizer, ParamEntry } from "@scalargrad/core";
import { Registry } from "@scalargrad/core";

// ── SGD ────────────────────────────────────────────────────────────────────

export interface SGDConfig {
  lr: number;
  momentum: number;
}

export class SGD implements Optimizer {
  readonly name = "sgd";
  lr: number;
  private readonly momentum: number;
  private _velocity = new Map<string, Float64Array>();

  constructor(config: Partial<SGDConfig> = {}) {
    this.lr = config.lr ?? 0.01;
    this.momentum = config.momentum ?? 0;
  }

  step(entries: readonly ParamEntry[]): void {
    for (const [name, { data, grad }] of entries) {
      if (this.momentum === 0) {
        for (let i = 0; i < data.length; i++) data[i] -= this.lr * grad[i];
        continue;
      }
      let v = this._velocity.get(name);
      if (!v) {
        v = new Float64Array(data.length);
        this._velocity.set(name, v);
      }
      for (let i = 0; i < data.length; i++) {
        v[i] = this.momentum * v[i] + grad[i];
        data[i] -= this.lr * v[i];
      }
    }
  }

}

// ── Adam ───────────────────────────────────────────────────────────────────

export interface AdamConfig {
  lr: number;
  beta1: number;
  beta2: number;
  eps: number;
  weightDecay: number;
}

export class Adam implements Optimizer {
  readonly name = "adam";
  lr: number;
  private _beta1Pow = 1;
  private _beta2Pow = 1;
  private _m = new Map<string, Float64Array>();
  private _v = new Map<string, Float64Array>();
  private readonly config: Omit<AdamConfig, "lr">;

  constructor(config: Partial<AdamConfig> = {}) {
    this.lr = config.lr ?? 1e-3;
    this.config = {
      beta1: config.beta1 ?? 0.9,
      beta2: config.beta2 ?? 0.999,
      eps: config.eps ?? 1e-8,
      weightDecay: config.weightDecay ?? 0,
    };
  }

  step(entries: readonly ParamEntry[]): void {
    const { beta1, beta2, eps, weightDecay } = this.config;
    this._beta1Pow *= beta1;
    this._beta2Pow *= beta2;
    const bc1 = 1 - this._beta1Pow;
    const bc2 = 1 - this._beta2Pow;

    for (const [name, { data, grad }] of entries) {
      const m = this.buffer(this._m, name, data.length);
      const v = this.buffer(this._v, name, data.length);
      for (let i = 0; i < data.length; i++) {
        const g = grad[i];
        if (weightDecay > 0) data[i] -= this.lr * weightDecay * data[i];
        m[i] = beta1 * m[i] + (1 - beta1) * g;
        v[i] = beta2 * v[i] + (1 - beta2) * g * g;
        data[i] -= this.lr * (m[i] / bc1) / (Math.sqrt(v[i] / bc2) + eps);
      }
    }
  }

  private buffer(map: Map<string, Float64Array>, name: string, size: number): Float64Array {
    let buf = map.get(name);
    if (!buf) {
      buf = new Float64Array(size);
      map.set(name, buf);
    }
    return buf;
  }
}

// ── Registry ───────────────────────────────────────────────────────────────

export function createOptimizerRegistry(config: { lr: number; momentum: number }): Registry<Optimizer> {
  const registry = new Registry<Optimizer>("optimizer");
  registry.register("sgd", () => new SGD({ lr: config.lr, momentum: config.momentum }));
  registry.register("adam", () => new Adam({ lr: config.lr }));
  return registry;
}
