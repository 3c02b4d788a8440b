import config from "../../config";
import { find } from "./find";

import type { InputCursor } from "../../cursors";

const rfindFrom = <T>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  x: T,
  budget: number
): InputCursor<T> => {
  if (b.equals(e) || b.read() === x) return b;
  // Out of stack to spend; finish the walk without recursing.
  if (budget <= 0) return find(b.next(), e, x);
  return rfindFrom(b.next(), e, x, budget - 1);
};

/**
 * Searches `[b, e)` for the first element equal to `x`, recursing once
 * per element instead of looping.  It produces exactly what
 * {@link find} produces.
 *
 * The recursion is limited by `config.algorithms.recursionBudget`; for
 * longer ranges, the rest of the search is done by {@link find}.
 */
export const rfind = <T>(b: InputCursor<T>, e: InputCursor<T>, x: T): InputCursor<T> =>
  rfindFrom(b, e, x, config.algorithms.recursionBudget);
