/**
 * Runtime law checking
 *
 * `checkLaws` runs every law against `iterations` generated inputs and
 * reports the first counterexample of each; `assertLaws` throws on the
 * first one instead. Inputs come from the caller's `Arbitrary`, so a run is
 * as deterministic as its generator.
 */

import { config } from "../config.js";
import { LawViolationError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Arbitrary, CheckLawsOptions, LawReport, LawResult, LawSet } from "./types.js";

const log = createLogger("laws");

function iterationsFor(options: CheckLawsOptions): number {
  return options.iterations ?? config.get("laws.iterations");
}

export function checkLaws<A>(
  laws: LawSet<A>,
  generator: Arbitrary<A>,
  options: CheckLawsOptions = {},
): LawReport<A> {
  const iterations = iterationsFor(options);
  const results: LawResult<A>[] = [];

  for (const law of laws) {
    let failure: LawResult<A> | undefined;
    for (let i = 0; i < iterations && failure === undefined; i++) {
      const input = generator.arbitrary(i);
      if (!law.check(input)) {
        failure = { law: law.name, status: "failed", iteration: i, counterexample: input };
      }
    }
    const result: LawResult<A> = failure ?? { law: law.name, status: "passed", iterations };
    log.debug(`${law.name}: ${result.status}`);
    results.push(result);
  }

  return {
    passed: results.every((r) => r.status === "passed"),
    iterations,
    results,
  };
}

/**
 * @throws LawViolationError with the failing law, input and iteration
 */
export function assertLaws<A>(
  laws: LawSet<A>,
  generator: Arbitrary<A>,
  options: CheckLawsOptions = {},
): void {
  const iterations = iterationsFor(options);
  for (let i = 0; i < iterations; i++) {
    const input = generator.arbitrary(i);
    for (const law of laws) {
      if (!law.check(input)) {
        throw new LawViolationError(law.name, input, i);
      }
    }
  }
  log.debug(`${laws.length} laws held for ${iterations} inputs`);
}
