import type { InputCursor } from "../../cursors";
import type { PredicateFn } from "../../utils/functions";

/**
 * Searches `[b, e)` for the first element that passes `p`.
 *
 * Returns a cursor to that element, or `e` if there is none.
 */
export const findIf = <T>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  p: PredicateFn<T>
): InputCursor<T> => {
  let cur = b;
  while (!cur.equals(e) && !p(cur.read())) cur = cur.next();
  return cur;
};
