import { swap } from "../leafOps";

import type { BidirectionalCursor } from "../../cursors";

/**
 * Reverses the order of `[b, e)` in place, swapping elements from both
 * ends until the cursors meet.
 */
export const reverse = <T>(b: BidirectionalCursor<T>, e: BidirectionalCursor<T>): void => {
  let front = b;
  let back = e;
  while (!front.equals(back)) {
    back = back.prev();
    if (front.equals(back)) return;
    swap(front, back);
    front = front.next();
  }
};
