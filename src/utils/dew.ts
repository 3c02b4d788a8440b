/**
 * Immediately calls the given function and returns its result.  Lets
 * you build a value with some local scratch-work inside an expression.
 */
export const dew = <T>(fn: () => T): T => fn();
