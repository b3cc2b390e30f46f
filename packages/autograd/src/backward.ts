/**
 * Reverse-mode backward pass.
 *
 * The traversal builds a post-order over the terminal's ancestors, so every
 * node appears after all of its parents. Walking that order in reverse means
 * a node's gradient is complete (every child has pushed into it) before its
 * own rule runs.
 *
 * Gradients for one pass are summed in a scratch buffer and added onto the
 * persistent `grad` column at the end. Repeated passes therefore accumulate
 * exactly: two runs without `zeroGrad()` give twice the gradients of one.
 */
import type { Graph, Value } from "./graph.js";
import { localGradients } from "./ops.js";

/** Post-order ids of `rootId` and its ancestors. Iterative, so deep chains are fine. */
function postOrder(graph: Graph, rootId: number): number[] {
  const visited = new Uint8Array(graph.size);
  const order: number[] = [];
  const stack: number[] = [rootId];
  const cursor: number[] = [0];
  visited[rootId] = 1;

  while (stack.length > 0) {
    const top = stack.length - 1;
    const id = stack[top];
    const parents = graph.parentIdsOf(id);
    const next = cursor[top];
    if (next < parents.length) {
      cursor[top] = next + 1;
      const p = parents[next];
      if (!visited[p]) {
        visited[p] = 1;
        stack.push(p);
        cursor.push(0);
      }
    } else {
      order.push(id);
      stack.pop();
      cursor.pop();
    }
  }
  return order;
}

/** Topological order of `root` and its ancestors: parents before children, root last. */
export function topologicalOrder(root: Value): Value[] {
  const graph = root.graph;
  return postOrder(graph, root.id).map((id) => graph.handle(id));
}

/** Backpropagate from `root`, adding d(root)/d(node) onto every ancestor's grad. */
export function backward(root: Value): void {
  const graph = root.graph;
  const order = postOrder(graph, root.id);
  const pass = new Float64Array(graph.size);
  pass[root.id] = 1;

  for (let i = order.length - 1; i >= 0; i--) {
    const id = order[i];
    const parents = graph.parentIdsOf(id);
    if (parents.length === 0) continue;
    const inputs = parents.map((p) => graph.dataOf(p));
    const contributions = localGradients(graph.opOf(id), inputs, graph.dataOf(id), pass[id]);
    for (let j = 0; j < parents.length; j++) {
      pass[parents[j]] += contributions[j];
    }
  }

  for (const id of order) graph.accumulateGrad(id, pass[id]);
}
