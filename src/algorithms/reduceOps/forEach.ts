import type { InputCursor } from "../../cursors";

/**
 * Calls `f` with each element of `[b, e)`, in order.
 *
 * Returns `f` itself, so any state it keeps on itself can be inspected
 * once the walk is done.
 */
export const forEach = <T, TFn extends (value: T) => unknown>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  f: TFn
): TFn => {
  for (let cur = b; !cur.equals(e); cur = cur.next()) f(cur.read());
  return f;
};
