/**
 * Command: scalargrad predict
 *
 * Usage:
 *   scalargrad predict --checkpoint=runs/mlp.json --input=0.5,-0.25
 */
import { Effect } from "effect";
import { ConfigError } from "@scalargrad/core";
import { predict } from "@scalargrad/model";
import { FileCheckpoint } from "@scalargrad/train";
import { parseKV, requireArg, listArg } from "../parse.js";

export async function predictCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const checkpointPath = requireArg(kv, "checkpoint", "path to saved parameters");
  const input = listArg(kv, "input", []);

  const params = await Effect.runPromise(new FileCheckpoint().load(checkpointPath));
  if (input.length !== params.config.nIn) {
    throw new ConfigError({ message: `--input needs ${params.config.nIn} values, got ${input.length}` });
  }

  const out = predict(params, input);
  console.log(out.map((v) => v.toFixed(6)).join(", "));
}
