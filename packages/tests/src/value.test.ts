import { describe, it, expect } from "vitest";
import { Graph } from "@scalargrad/autograd";

describe("Value", () => {
  it("constructs a leaf with zero gradient", () => {
    const g = new Graph();
    const a = g.value(2.5, "a");

    expect(a.data).toBe(2.5);
    expect(a.grad).toBe(0);
    expect(a.label).toBe("a");
    expect(a.parents).toEqual([]);
    expect(a.op).toEqual({ kind: "leaf" });
    expect(g.size).toBe(1);
  });

  it("accepts non-finite numbers without validation", () => {
    const g = new Graph();
    expect(g.value(NaN).data).toBeNaN();
    expect(g.value(Infinity).data).toBe(Infinity);
  });

  it("records operands in slot order and keeps duplicates", () => {
    const g = new Graph();
    const x = g.value(3);
    const y = x.add(x);

    expect(y.parents.map((p) => p.id)).toEqual([x.id, x.id]);
    expect(y.parents[0]).toBe(x);
    expect(y.op.kind).toBe("add");
  });

  it("lifts number operands to new leaves", () => {
    const g = new Graph();
    const a = g.value(2);
    const c = a.mul(3);

    expect(c.data).toBe(6);
    expect(c.parents[0]).toBe(a);
    expect(c.parents[1].data).toBe(3);
    expect(c.parents[1].op.kind).toBe("leaf");
    expect(g.size).toBe(3);
  });

  it("prints its data", () => {
    const g = new Graph();
    expect(g.value(2.5).toString()).toBe("Value(data=2.5)");
  });

  it("label is cosmetic and settable", () => {
    const g = new Graph();
    const a = g.value(1);
    expect(a.label).toBe("");
    a.label = "a";
    expect(a.label).toBe("a");
    expect(a.data).toBe(1);
  });

  it("gradient can be written and zeroGrad resets every node", () => {
    const g = new Graph();
    const a = g.value(2);
    const b = g.value(3);
    const c = a.mul(b);
    c.backward();
    expect(a.grad).toBe(3);

    a.grad = 0;
    expect(a.grad).toBe(0);
    expect(b.grad).toBe(2);

    g.zeroGrad();
    expect([a.grad, b.grad, c.grad]).toEqual([0, 0, 0]);
  });

  it("nodes() lists handles in creation order", () => {
    const g = new Graph();
    const a = g.value(1);
    const b = g.value(2);
    const c = a.add(b);
    expect(g.nodes()).toEqual([a, b, c]);
    expect(g.nodes().map((v) => v.id)).toEqual([0, 1, 2]);
  });
});
