import { describe, it, expect } from "vitest";
import {
  ConfigError, Registry, defaultGradcheckConfig, defaultMlpConfig, defaultTrainConfig,
  validateGradcheckConfig, validateMlpConfig, validateTrainConfig,
} from "@scalargrad/core";

describe("config validation", () => {
  it("accepts the defaults", () => {
    expect(() => validateMlpConfig(defaultMlpConfig)).not.toThrow();
    expect(() => validateTrainConfig(defaultTrainConfig)).not.toThrow();
    expect(() => validateGradcheckConfig(defaultGradcheckConfig)).not.toThrow();
  });

  it("rejects out-of-range training values", () => {
    expect(() => validateTrainConfig({ ...defaultTrainConfig, steps: 0 })).toThrow("steps must be an integer >= 1, got 0");
    expect(() => validateTrainConfig({ ...defaultTrainConfig, lr: 0 })).toThrow(ConfigError);
    expect(() => validateTrainConfig({ ...defaultTrainConfig, momentum: 1 })).toThrow("momentum must be in [0,1), got 1");
    expect(() => validateTrainConfig({ ...defaultTrainConfig, batchSize: 2.5 })).toThrow(ConfigError);
  });

  it("rejects NaN for bounded training values", () => {
    expect(() => validateTrainConfig({ ...defaultTrainConfig, alpha: NaN })).toThrow("alpha must be >= 0, got NaN");
    expect(() => validateTrainConfig({ ...defaultTrainConfig, momentum: NaN })).toThrow("momentum must be in [0,1), got NaN");
    expect(() => validateTrainConfig({ ...defaultTrainConfig, lrMinRatio: NaN })).toThrow(
      "lrMinRatio must be in [0,1], got NaN",
    );
  });

  it("rejects bad layer widths", () => {
    expect(() => validateMlpConfig({ ...defaultMlpConfig, hidden: [4, 0] })).toThrow(
      "hidden layer widths must be integers >= 1, got 4,0",
    );
  });

  it("rejects a non-positive tolerance", () => {
    expect(() => validateGradcheckConfig({ ...defaultGradcheckConfig, tolerance: 0 })).toThrow(ConfigError);
  });
});

describe("Registry", () => {
  it("creates implementations by name and lists them in order", () => {
    const registry = new Registry<number>("thing");
    registry.register("one", () => 1);
    registry.register("two", () => 2);

    expect(registry.get("two")).toBe(2);
    expect(registry.has("one")).toBe(true);
    expect(registry.has("three")).toBe(false);
    expect(registry.list()).toEqual(["one", "two"]);
    expect(() => registry.get("three")).toThrow('[thing] Unknown implementation "three". Available: one, two');
  });
});
