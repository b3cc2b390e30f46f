/**
 * Read-only snapshot of a graph for external renderers.
 */
import type { Value } from "./graph.js";
import { topologicalOrder } from "./backward.js";
import { opSymbol } from "./ops.js";

export interface TraceNode {
  readonly id: number;
  readonly label: string;
  readonly data: number;
  readonly grad: number;
  /** "+", "*", "**k", "exp", "tanh", "relu", or "" for leaves. */
  readonly op: string;
}

/** Parent → child, one edge per operand slot. */
export interface TraceEdge {
  readonly from: number;
  readonly to: number;
}

export interface GraphTrace {
  readonly nodes: TraceNode[];
  readonly edges: TraceEdge[];
}

/** Nodes (parents first) and edges reachable from `root`. */
export function trace(root: Value): GraphTrace {
  const nodes: TraceNode[] = [];
  const edges: TraceEdge[] = [];
  for (const v of topologicalOrder(root)) {
    nodes.push({ id: v.id, label: v.label, data: v.data, grad: v.grad, op: opSymbol(v.op) });
    for (const p of v.parents) edges.push({ from: p.id, to: v.id });
  }
  return { nodes, edges };
}
