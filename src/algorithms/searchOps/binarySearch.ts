import type { RandomAccessCursor } from "../../cursors";
import type { Comparable } from "../_types";

/**
 * Checks if `x` is in `[b, e)` by repeatedly halving the range.
 *
 * The range must already be sorted in non-decreasing order by `<`.
 * If it is not, the answer is meaningless.
 */
export const binarySearch = <T extends Comparable>(
  b: RandomAccessCursor<T>,
  e: RandomAccessCursor<T>,
  x: T
): boolean => {
  let lo = b;
  let hi = e;
  while (lo.compare(hi) < 0) {
    // Midpoint is measured from `lo`, never as `(lo + hi) / 2`.
    const mid = lo.advance(Math.trunc(lo.distanceTo(hi) / 2));
    const value = mid.read();
    if (x < value) hi = mid;
    else if (value < x) lo = mid.next();
    else return true;
  }
  return false;
};
