import type { InputCursor } from "../../cursors";

/**
 * Tests two sequences of the same length for equality, element by
 * element.
 *
 * Only the first range has an end; the second is assumed to be at
 * least as long.  If it is not, the walk will run off its end.
 */
export const equal = <T>(
  b1: InputCursor<T>,
  e: InputCursor<T>,
  b2: InputCursor<T>
): boolean => {
  let cur1 = b1;
  let cur2 = b2;
  while (!cur1.equals(e)) {
    if (cur1.read() !== cur2.read()) return false;
    cur1 = cur1.next();
    cur2 = cur2.next();
  }
  return true;
};
