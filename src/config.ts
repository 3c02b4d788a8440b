/** Configuration options affecting the algorithms. */
const algorithms = {
  /**
   * How deep `rfind` is allowed to recurse before it gives up on the
   * recursive form and walks the rest of the range with `find`.
   *
   * JavaScript engines do not eliminate tail calls, so every step of
   * the recursion costs a stack frame.  Keep this well under the
   * engine's stack limit.
   */
  recursionBudget: 1000
};

/** Configuration options affecting the self-check harness. */
const selfCheck = {
  /**
   * How many elements the `odds`, `evens` and `zeros` fixtures are
   * built from.  The `ascending` and `descending` fixtures are always
   * ten elements long.
   */
  fixtureSize: 21
};

export interface Config {
  /** Enables debug logging. */
  debugLogging: boolean;
  /**
   * Whether we're in a test environment.
   * 
   * See `spec-resources/_setup.ts` to see where this gets overridden.
   */
  inTestEnv: boolean;
  /** Configuration options affecting the algorithms. */
  algorithms: typeof algorithms;
  /** Configuration options affecting the self-check harness. */
  selfCheck: typeof selfCheck;
}

const config: Config = {
  debugLogging: true,
  inTestEnv: false,
  algorithms,
  selfCheck
};

export default config;
