import { describe, it, expect } from "vitest";
import { ConfigError, SeededRng, type MlpConfig } from "@scalargrad/core";
import { Graph } from "@scalargrad/autograd";
import {
  bindParams, collectParamEntries, collectParams, countParams, initMLP, layerSizes, mlpForward, predict,
} from "@scalargrad/model";

describe("MLP", () => {
  const rng = new SeededRng(42);

  it("initializes weights in [-1, 1) and biases at 0", () => {
    const config: MlpConfig = { nIn: 2, hidden: [3], nOut: 1, activation: "tanh" };
    const params = initMLP(config, rng);

    expect(layerSizes(config)).toEqual([2, 3, 1]);
    expect(params.layers.map((l) => [l.weight.length, l.bias.length])).toEqual([[6, 3], [3, 1]]);
    expect(countParams(params)).toBe(13);
    expect([...collectParams(params).keys()]).toEqual([
      "layer.0.weight", "layer.0.bias", "layer.1.weight", "layer.1.bias",
    ]);
    for (const l of params.layers) {
      for (const w of l.weight) {
        expect(w).toBeGreaterThanOrEqual(-1);
        expect(w).toBeLessThan(1);
      }
      expect(Array.from(l.bias)).toEqual(new Array(l.bias.length).fill(0));
    }
  });

  it("rejects invalid configs", () => {
    expect(() => initMLP({ nIn: 0, hidden: [], nOut: 1, activation: "relu" }, rng)).toThrow(ConfigError);
    expect(() => initMLP({ nIn: 2, hidden: [0], nOut: 1, activation: "relu" }, rng)).toThrow(ConfigError);
  });

  it("a single linear layer computes W·x + b", () => {
    const params = initMLP({ nIn: 2, hidden: [], nOut: 1, activation: "tanh" }, rng);
    params.layers[0].weight.set([2, -1]);
    params.layers[0].bias[0] = 0.5;

    expect(predict(params, [3, 4])).toEqual([2.5]);
  });

  it("backpropagates into every parameter through the hidden activation", () => {
    const params = initMLP({ nIn: 1, hidden: [2], nOut: 1, activation: "relu" }, rng);
    params.layers[0].weight.set([1, -1]);
    params.layers[1].weight.set([1, 1]);

    const graph = new Graph();
    const model = bindParams(graph, params);
    const [out] = mlpForward(model, [3]);
    out.backward();

    expect(out.data).toBe(3);
    const grads = Object.fromEntries(collectParamEntries(model).map(([name, slot]) => [name, Array.from(slot.grad)]));
    expect(grads).toEqual({
      "layer.0.weight": [3, 0],
      "layer.0.bias": [1, 0],
      "layer.1.weight": [3, 0],
      "layer.1.bias": [1],
    });
  });

  it("parameter entries share storage with the model", () => {
    const params = initMLP({ nIn: 1, hidden: [], nOut: 1, activation: "relu" }, rng);
    const entries = collectParamEntries(bindParams(new Graph(), params));
    expect(entries[0][1].data).toBe(params.layers[0].weight);
  });

  it("labels bound leaves by parameter name", () => {
    const params = initMLP({ nIn: 1, hidden: [], nOut: 1, activation: "relu" }, rng);
    const model = bindParams(new Graph(), params);
    expect(model.layers[0].weight[0].label).toBe("layer.0.weight[0]");
    expect(model.layers[0].bias[0].label).toBe("layer.0.bias[0]");
  });

  it("checks the input width", () => {
    const params = initMLP({ nIn: 2, hidden: [], nOut: 1, activation: "relu" }, rng);
    expect(() => predict(params, [1])).toThrow(RangeError);
  });
});
