import type { InputCursor, OutputCursor } from "../../cursors";
import type { PredicateFn } from "../../utils/functions";

/**
 * Copies the elements of `[b, e)` that fail `p` to the positions
 * starting at `d`, keeping their order.
 *
 * Returns the destination cursor just past the last write, or `d` if
 * nothing was written.
 */
export const removeCopyIf = <T>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  d: OutputCursor<T>,
  p: PredicateFn<T>
): OutputCursor<T> => {
  let dest = d;
  for (let src = b; !src.equals(e); src = src.next()) {
    const value = src.read();
    if (p(value)) continue;
    dest.write(value);
    dest = dest.next();
  }
  return dest;
};
