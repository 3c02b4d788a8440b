import { isInstance, isNumber } from "./is";

/**
 * Validates a basic assertion.  If it fails, an error with `msg` is thrown.
 */
const assert = (msg: string, check: boolean): void => {
  if (check) return;
  throw new Error(msg);
};

/**
 * Validates that `value` is not `null` or `undefined`.
 */
const assertExists = <T>(msg: string, value: T): Exclude<T, undefined | null> => {
  if (isInstance(value)) return value;
  throw new Error(msg);
};

type Lengthy = { length: number };

/** Validates that `value` is between `0` and `max`. */
function assertInBounds(
  /** The message to use as the error. */
  msg: string,
  /** The value to be tested. */
  value: number,
  /** The maximum allowed value. */
  max: number,
  /**
   * By default, it allows between `0` and up-to-but-excluding `max`.
   * This is how you'd do it when checking against a `length`.
   * 
   * Set this to `true` to allow between `0` and up-to-and-including `max`.
   */
  inclusive?: boolean
): void;
/** Validates that `value` is in the bounds of the given collection. */
function assertInBounds(
  /** The message to use as the error. */
  msg: string,
  /** The value to be tested. */
  value: number,
  /** An array-like object that provides the reference length. */
  ref: Lengthy,
  /**
   * By default, it checks against `ref.length` exclusively.
   * 
   * Set this to `true` to check it inclusively, which is what you want
   * when the value may be the past-the-end position.
   */
  inclusive?: boolean
): void;
function assertInBounds(
  msg: string,
  value: number,
  ref: number | Lengthy,
  inclusive = false
) {
  const max = isNumber(ref) ? ref : ref.length;
  assert(msg, value >= 0 && (inclusive ? value <= max : value < max));
}

export { assert, assertExists, assertInBounds };
