/**
 * Command: scalargrad gradcheck
 *
 * Compares backward-pass gradients against central differences on random
 * expression graphs.
 *
 * Usage:
 *   scalargrad gradcheck --trials=50 --depth=6 --tolerance=1e-5
 */
import { SeededRng, defaultGradcheckConfig, validateGradcheckConfig, type GradcheckConfig } from "@scalargrad/core";
import { gradcheck, randomExpression } from "@scalargrad/autograd";
import { parseKV, loadConfig, intArg, floatArg } from "../parse.js";

const N_INPUTS = 3;

export async function gradcheckCmd(args: string[]): Promise<void> {
  let kv = parseKV(args);
  kv = await loadConfig(kv);

  const config: GradcheckConfig = {
    trials: intArg(kv, "trials", defaultGradcheckConfig.trials),
    depth: intArg(kv, "depth", defaultGradcheckConfig.depth),
    eps: floatArg(kv, "eps", defaultGradcheckConfig.eps),
    tolerance: floatArg(kv, "tolerance", defaultGradcheckConfig.tolerance),
    seed: intArg(kv, "seed", defaultGradcheckConfig.seed),
  };
  validateGradcheckConfig(config);

  const rng = new SeededRng(config.seed);
  let failures = 0;
  let worst = 0;
  for (let t = 0; t < config.trials; t++) {
    const expr = randomExpression(rng, N_INPUTS, config.depth);
    const point = Array.from({ length: N_INPUTS }, () => rng.uniform(-1, 1));
    const result = gradcheck(expr, point, { eps: config.eps, tolerance: config.tolerance });
    worst = Math.max(worst, result.maxError);
    if (!result.ok) {
      failures++;
      console.log(`trial ${t}: FAIL maxError=${result.maxError.toExponential(3)}`);
      console.log(`  analytic: ${result.analytic.join(", ")}`);
      console.log(`  numeric:  ${result.numeric.join(", ")}`);
    }
  }

  console.log(`${config.trials - failures}/${config.trials} passed (worst error ${worst.toExponential(3)})`);
  if (failures > 0) process.exitCode = 1;
}
