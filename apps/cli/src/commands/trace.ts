/**
 * Command: scalargrad trace
 *
 * Builds a single tanh neuron, runs backward, and prints the graph's nodes
 * and edges as JSON for an external renderer.
 *
 * Usage:
 *   scalargrad trace --x1=2 --x2=0 --w1=-3 --w2=1 --b=6.8813735870195432
 */
import { Graph, trace } from "@scalargrad/autograd";
import { parseKV, floatArg } from "../parse.js";

export async function traceCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const g = new Graph();
  const x1 = g.value(floatArg(kv, "x1", 2.0), "x1");
  const x2 = g.value(floatArg(kv, "x2", 0.0), "x2");
  const w1 = g.value(floatArg(kv, "w1", -3.0), "w1");
  const w2 = g.value(floatArg(kv, "w2", 1.0), "w2");
  const b = g.value(floatArg(kv, "b", 6.8813735870195432), "b");

  const x1w1 = x1.mul(w1);
  x1w1.label = "x1*w1";
  const x2w2 = x2.mul(w2);
  x2w2.label = "x2*w2";
  const n = x1w1.add(x2w2).add(b);
  n.label = "n";
  const o = n.tanh();
  o.label = "o";
  o.backward();

  console.log(JSON.stringify(trace(o), null, 2));
}
