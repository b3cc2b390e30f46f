#!/usr/bin/env node
/**
 * scalargrad CLI entry point.
 *
 * Commands: train, predict, gradcheck, trace
 */
import { trainCmd } from "./commands/train.js";
import { predictCmd } from "./commands/predict.js";
import { gradcheckCmd } from "./commands/gradcheck.js";
import { traceCmd } from "./commands/trace.js";

const USAGE = `
scalargrad: scalar reverse-mode autodiff with a tiny MLP trainer

Commands:
  train            Train an MLP classifier on a toy or CSV dataset
  predict          Run a saved MLP on one input
  gradcheck        Check backward() against finite differences on random graphs
  trace            Print the nodes and edges of a traced neuron as JSON

Options:
  --help, -h       Show this help
  --config=FILE    Read options from a JSON file (flags override it)

Examples:
  scalargrad train --dataset=moons --n=100 --hidden=16,16 --steps=100 --out=runs/mlp.json
  scalargrad train --data=points.csv --optim=adam --lr=0.05 --loss=mse
  scalargrad predict --checkpoint=runs/mlp.json --input=0.5,-0.25
  scalargrad gradcheck --trials=50 --depth=6
  scalargrad trace --x1=2 --w1=-3
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "predict") {
    await predictCmd(args.slice(1));
  } else if (command === "gradcheck") {
    await gradcheckCmd(args.slice(1));
  } else if (command === "trace") {
    await traceCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
