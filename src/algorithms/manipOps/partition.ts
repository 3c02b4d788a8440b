import { swap } from "../leafOps";

import type { BidirectionalCursor } from "../../cursors";
import type { PredicateFn } from "../../utils/functions";

/**
 * Rearranges `[b, e)` so every element that passes `p` comes before
 * every element that fails it.
 *
 * Returns a cursor to the first element of the failing group, or `e`
 * if every element passed.  The order within each group is not kept.
 */
export const partition = <T>(
  b: BidirectionalCursor<T>,
  e: BidirectionalCursor<T>,
  p: PredicateFn<T>
): BidirectionalCursor<T> => {
  let front = b;
  let back = e;
  while (!front.equals(back)) {
    // Skip over everything already in the passing group.
    while (p(front.read())) {
      front = front.next();
      if (front.equals(back)) return front;
    }

    // Skip back over everything already in the failing group.
    do {
      back = back.prev();
      if (front.equals(back)) return front;
    } while (!p(back.read()));

    swap(front, back);
    front = front.next();
  }
  return front;
};
