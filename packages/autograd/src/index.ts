export { Graph, Value, type Operand } from "./graph.js";
export {
  type Op,
  type OpKind,
  arity,
  forward,
  localGradients,
  opSymbol,
} from "./ops.js";
export { add, sub, mul, div, pow, neg, exp, tanh, relu, sum } from "./builder.js";
export { backward, topologicalOrder } from "./backward.js";
export { trace, type TraceNode, type TraceEdge, type GraphTrace } from "./trace.js";
export {
  type Expression,
  type GradcheckOptions,
  type GradcheckResult,
  numericalGradient,
  evaluate,
  gradcheck,
  randomExpression,
} from "./gradcheck.js";
