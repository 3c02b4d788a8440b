import { isBigInt, isNumber, isString } from "../../utils/is";

import type { InputCursor } from "../../cursors";
import type { ReduceFn } from "../../utils/functions";

/** Folds with `+`, the way `acc += value` would for these primitives. */
const plus = (acc: unknown, value: unknown): unknown => {
  if (isString(acc)) return acc + String(value);
  if (isNumber(acc) && isNumber(value)) return acc + value;
  if (isBigInt(acc) && isBigInt(value)) return acc + value;
  throw new TypeError(`Cannot add a ${typeof value} to a ${typeof acc}.`);
};

/** Sums the numbers of `[b, e)` onto `a`. */
export function accumulate(b: InputCursor<number>, e: InputCursor<number>, a: number): number;
/** Sums the big integers of `[b, e)` onto `a`. */
export function accumulate(b: InputCursor<bigint>, e: InputCursor<bigint>, a: bigint): bigint;
/** Concatenates the strings of `[b, e)` onto `a`. */
export function accumulate(b: InputCursor<string>, e: InputCursor<string>, a: string): string;
/**
 * Folds the elements of `[b, e)`, left to right, into `a` using the
 * given operation.
 */
export function accumulate<T, A>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  a: A,
  op: ReduceFn<T, A>
): A;
export function accumulate(
  b: InputCursor<unknown>,
  e: InputCursor<unknown>,
  a: unknown,
  op: ReduceFn<unknown, unknown> = plus
): unknown {
  let acc = a;
  for (let cur = b; !cur.equals(e); cur = cur.next())
    acc = op(acc, cur.read());
  return acc;
}
