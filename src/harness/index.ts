/**
 * A self-check that puts every algorithm through its paces on a set of
 * fixture sequences, cross-checking the results against lodash and the
 * built-in `Array` methods.
 *
 * A failing check does not stop the run; its error is logged and kept
 * in the report.
 */

import config from "../config";
import { dew } from "../utils/dew";
import { createLogger } from "../utils/logging";
import { checks as defaultChecks } from "./checks";
import { createFixtures } from "./fixtures";

import type { SelfCheck } from "./checks";

export type { SelfCheck } from "./checks";
export type { Fixtures } from "./fixtures";
export { createFixtures, isEven, isOdd } from "./fixtures";

export interface SelfCheckFailure {
  readonly name: string;
  readonly error: unknown;
}

export interface SelfCheckReport {
  /** Names of the checks that passed, in the order they ran. */
  readonly passed: readonly string[];
  /** The checks that threw, in the order they ran. */
  readonly failed: readonly SelfCheckFailure[];
}

export interface SelfCheckOptions {
  /** Only run the checks with these names. */
  only?: readonly string[];
  /** Overrides `config.selfCheck.fixtureSize`. */
  fixtureSize?: number;
  /** The checks to pick from; defaults to a check for every algorithm. */
  checks?: readonly SelfCheck[];
}

const logger = createLogger("Self-Check");

/** Runs the self-check and reports which checks passed. */
export const runSelfCheck = (options: SelfCheckOptions = {}): SelfCheckReport => {
  const {
    only,
    fixtureSize = config.selfCheck.fixtureSize,
    checks = defaultChecks
  } = options;

  const selected = dew(() => {
    if (!only) return checks;
    const unknown = only.filter((name) => !checks.some((check) => check.name === name));
    if (unknown.length) logger.warn(`No check exists for: ${unknown.join(", ")}`);
    return checks.filter((check) => only.includes(check.name));
  });
  const passed: string[] = [];
  const failed: SelfCheckFailure[] = [];

  const stopWatch = logger.stopWatch("Self-check");
  logger.info("Running the self-check for the algorithms...");
  stopWatch.start();

  for (const check of selected) {
    logger.info(`Testing the ${check.label} function...`);
    // Each check gets fresh fixtures, as they may be mutated.
    const fixtures = createFixtures(fixtureSize);
    try {
      logger.measure(check.name, () => check.run(fixtures));
      passed.push(check.name);
    }
    catch (error) {
      logger.error(`The ${check.label} check failed.`, error);
      failed.push(Object.freeze({ name: check.name, error }));
    }
  }

  stopWatch.stop();
  if (failed.length) logger.warn(`${failed.length} of ${selected.length} checks failed.`);
  else logger.info(`All ${selected.length} checks passed.`);

  return Object.freeze({
    passed: Object.freeze(passed),
    failed: Object.freeze(failed)
  });
};
