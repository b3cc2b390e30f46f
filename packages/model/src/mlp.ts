/**
 * Multi-layer perceptron built from scalar graph nodes.
 *
 * Parameters live outside any graph as named Float64Arrays. Each training
 * step binds them into a fresh Graph as leaves, runs the forward pass, and
 * reads the leaf gradients back after backward().
 *
 * Layer i computes act(W·x + b) with W stored row-major [nOut, nIn]. The
 * last layer is linear.
 */
import type { MlpConfig, ParamEntry, Rng } from "@scalargrad/core";
import { validateMlpConfig } from "@scalargrad/core";
import { Graph, type Operand, type Value } from "@scalargrad/autograd";

// ── Parameter initialization ───────────────────────────────────────────────

export interface LayerParams {
  readonly nIn: number;
  readonly nOut: number;
  /** [nOut, nIn], row-major */
  readonly weight: Float64Array;
  /** [nOut] */
  readonly bias: Float64Array;
}

export interface MlpParams {
  readonly config: MlpConfig;
  readonly layers: LayerParams[];
}

/** Layer widths including input and output: [nIn, ...hidden, nOut]. */
export function layerSizes(config: MlpConfig): number[] {
  return [config.nIn, ...config.hidden, config.nOut];
}

export function initMLP(config: MlpConfig, rng: Rng): MlpParams {
  validateMlpConfig(config);
  const sizes = layerSizes(config);
  const layers: LayerParams[] = [];
  for (let i = 0; i < sizes.length - 1; i++) {
    const nIn = sizes[i], nOut = sizes[i + 1];
    const weight = new Float64Array(nIn * nOut);
    for (let j = 0; j < weight.length; j++) weight[j] = rng.uniform(-1, 1);
    layers.push({ nIn, nOut, weight, bias: new Float64Array(nOut) });
  }
  return { config, layers };
}

// ── Binding into a graph ───────────────────────────────────────────────────

export interface BoundLayer {
  readonly weight: Value[];
  readonly bias: Value[];
}

export interface BoundMLP {
  readonly params: MlpParams;
  readonly graph: Graph;
  readonly layers: BoundLayer[];
}

/** Lift every parameter into `graph` as a labelled leaf. */
export function bindParams(graph: Graph, params: MlpParams): BoundMLP {
  const layers = params.layers.map((layer, i): BoundLayer => ({
    weight: Array.from(layer.weight, (w, j) => graph.value(w, `layer.${i}.weight[${j}]`)),
    bias: Array.from(layer.bias, (b, j) => graph.value(b, `layer.${i}.bias[${j}]`)),
  }));
  return { params, graph, layers };
}

// ── Forward ────────────────────────────────────────────────────────────────

function activate(v: Value, activation: MlpConfig["activation"]): Value {
  return activation === "tanh" ? v.tanh() : v.relu();
}

export function mlpForward(model: BoundMLP, inputs: readonly Operand[]): Value[] {
  const { config } = model.params;
  if (inputs.length !== config.nIn) {
    throw new RangeError(`mlpForward: expected ${config.nIn} inputs, got ${inputs.length}`);
  }
  let x: Value[] = inputs.map((v) => model.graph.lift(v, "mlpForward"));
  const last = model.layers.length - 1;
  for (let i = 0; i <= last; i++) {
    const { nIn, nOut } = model.params.layers[i];
    const { weight, bias } = model.layers[i];
    const out: Value[] = [];
    for (let o = 0; o < nOut; o++) {
      let act = bias[o];
      for (let k = 0; k < nIn; k++) act = act.add(weight[o * nIn + k].mul(x[k]));
      out.push(i === last ? act : activate(act, config.activation));
    }
    x = out;
  }
  return x;
}

// ── Parameter access ───────────────────────────────────────────────────────

/**
 * Named parameter entries with gradients copied out of a bound graph. The
 * `data` arrays are the live parameter storage, so optimizers update in place.
 */
export function collectParamEntries(model: BoundMLP): ParamEntry[] {
  const entries: ParamEntry[] = [];
  model.params.layers.forEach((layer, i) => {
    const bound = model.layers[i];
    entries.push([`layer.${i}.weight`, { data: layer.weight, grad: Float64Array.from(bound.weight, (v) => v.grad) }]);
    entries.push([`layer.${i}.bias`, { data: layer.bias, grad: Float64Array.from(bound.bias, (v) => v.grad) }]);
  });
  return entries;
}

export function collectParams(params: MlpParams): Map<string, Float64Array> {
  const map = new Map<string, Float64Array>();
  params.layers.forEach((layer, i) => {
    map.set(`layer.${i}.weight`, layer.weight);
    map.set(`layer.${i}.bias`, layer.bias);
  });
  return map;
}

export function countParams(params: MlpParams): number {
  let total = 0;
  for (const [, data] of collectParams(params)) total += data.length;
  return total;
}

/** Forward pass on plain numbers, on a throwaway graph. */
export function predict(params: MlpParams, inputs: readonly number[]): number[] {
  return mlpForward(bindParams(new Graph(), params), inputs).map((v) => v.data);
}
