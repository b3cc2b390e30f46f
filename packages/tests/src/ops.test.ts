import { describe, it, expect } from "vitest";
import { InvalidOperandError } from "@scalargrad/core";
import {
  Graph, add, sub, mul, div, pow, neg, exp, tanh, relu, sum,
  arity, forward, localGradients, opSymbol,
} from "@scalargrad/autograd";

describe("forward values", () => {
  const g = new Graph();
  const a = g.value(2);
  const b = g.value(3);

  it("arithmetic", () => {
    expect(a.add(b).data).toBe(5);
    expect(a.mul(b).data).toBe(6);
    expect(g.value(5).sub(b).data).toBe(2);
    expect(a.pow(3).data).toBe(8);
    expect(b.neg().data).toBe(-3);
    expect(g.value(6).div(b).data).toBeCloseTo(2, 12);
  });

  it("exp, tanh and relu", () => {
    expect(g.value(0).exp().data).toBe(1);
    expect(g.value(0).tanh().data).toBe(0);
    expect(g.value(0.5).tanh().data).toBeCloseTo(Math.tanh(0.5), 12);
    expect(g.value(-2).relu().data).toBe(0);
    expect(g.value(3).relu().data).toBe(3);
  });

  it("free functions accept a number in either slot", () => {
    const x = g.value(4);
    expect(add(2, x).data).toBe(6);
    expect(sub(1, x).data).toBe(-3);
    expect(mul(2, x).data).toBe(8);
    expect(div(1, x).data).toBe(0.25);
    expect(div(x, 2).data).toBe(2);
    expect(pow(x, 0.5).data).toBe(2);
    expect(neg(x).data).toBe(-4);
    expect(exp(g.value(0)).data).toBe(1);
    expect(tanh(g.value(0)).data).toBe(0);
    expect(relu(g.value(-1)).data).toBe(0);
    expect(sum([x, g.value(1), g.value(2)]).data).toBe(7);
  });

  it("negate, subtract and divide are composed from add, mul and pow", () => {
    const x = g.value(4);
    expect(x.neg().op.kind).toBe("mul");
    expect(x.sub(1).op.kind).toBe("add");
    const q = x.div(2);
    expect(q.op.kind).toBe("mul");
    expect(q.parents[1].op).toEqual({ kind: "pow", exponent: -1 });
  });
});

describe("IEEE-754 results instead of errors", () => {
  it("division by zero gives infinite value and gradients", () => {
    const g = new Graph();
    const a = g.value(1);
    const b = g.value(0);
    const c = a.div(b);
    c.backward();

    expect(c.data).toBe(Infinity);
    expect(a.grad).toBe(Infinity);
    expect(b.grad).toBe(-Infinity);
  });

  it("negative base to a fractional power gives NaN", () => {
    const g = new Graph();
    const a = g.value(-8);
    const c = a.pow(0.5);
    c.backward();

    expect(c.data).toBeNaN();
    expect(a.grad).toBeNaN();
  });
});

describe("invalid operands", () => {
  it("rejects a non-number, non-Value operand", () => {
    const g = new Graph();
    const x = g.value(1);
    expect(() => x.add("3" as unknown as number)).toThrow(InvalidOperandError);
    expect(() => mul(x, null as unknown as number)).toThrow(InvalidOperandError);
  });

  it("rejects a Value exponent", () => {
    const g = new Graph();
    const x = g.value(2);
    const y = g.value(3);
    expect(() => x.pow(y as unknown as number)).toThrow(InvalidOperandError);
  });

  it("rejects operands from another graph", () => {
    const x = new Graph().value(1);
    const y = new Graph().value(2);
    expect(() => x.add(y)).toThrow(InvalidOperandError);
    expect(() => add(x, y)).toThrow("add: operand belongs to a different graph");
  });

  it("rejects free-function calls with no Value operand", () => {
    expect(() => add(1, 2)).toThrow("add: at least one operand must be a Value");
    expect(() => sum([])).toThrow(InvalidOperandError);
  });

  it("errors carry their tag", () => {
    const x = new Graph().value(1);
    try {
      x.mul({} as unknown as number);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidOperandError);
      expect(e).toMatchObject({ _tag: "InvalidOperandError", message: "mul: expected a Value or a number, got Object" });
    }
  });
});

describe("local gradient rules", () => {
  it("returns one contribution per operand slot", () => {
    expect(localGradients({ kind: "leaf" }, [], 1, 1)).toEqual([]);
    expect(localGradients({ kind: "add" }, [2, 3], 5, 4)).toEqual([4, 4]);
    expect(localGradients({ kind: "mul" }, [2, 3], 6, 1)).toEqual([3, 2]);
    expect(localGradients({ kind: "pow", exponent: 3 }, [2], 8, 1)).toEqual([12]);
    expect(localGradients({ kind: "exp" }, [0], 1, 2)).toEqual([2]);
    expect(localGradients({ kind: "tanh" }, [0.3], 0.5, 2)).toEqual([1.5]);
    expect(localGradients({ kind: "relu" }, [-1], 0, 5)).toEqual([0]);
    expect(localGradients({ kind: "relu" }, [2], 2, 5)).toEqual([5]);
  });

  it("forward matches the node constructors", () => {
    expect(forward({ kind: "add" }, [1, 2])).toBe(3);
    expect(forward({ kind: "pow", exponent: 2 }, [3])).toBe(9);
    expect(forward({ kind: "relu" }, [-4])).toBe(0);
  });

  it("arity and symbols", () => {
    expect(arity({ kind: "leaf" })).toBe(0);
    expect(arity({ kind: "mul" })).toBe(2);
    expect(arity({ kind: "tanh" })).toBe(1);
    expect(opSymbol({ kind: "leaf" })).toBe("");
    expect(opSymbol({ kind: "add" })).toBe("+");
    expect(opSymbol({ kind: "mul" })).toBe("*");
    expect(opSymbol({ kind: "pow", exponent: -1 })).toBe("**-1");
    expect(opSymbol({ kind: "relu" })).toBe("relu");
  });
});
