import type { InputCursor } from "../../cursors";

/**
 * Searches `[b, e)` for the first element equal to `x`.
 *
 * Returns a cursor to that element, or `e` if there is none.
 */
export const find = <T>(b: InputCursor<T>, e: InputCursor<T>, x: T): InputCursor<T> => {
  let cur = b;
  while (!cur.equals(e) && cur.read() !== x) cur = cur.next();
  return cur;
};
