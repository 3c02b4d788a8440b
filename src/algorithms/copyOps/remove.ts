import type { ForwardCursor } from "../../cursors";

/**
 * Removes the elements equal to `x` from `[b, e)` by shifting the
 * remaining elements toward the front, keeping their order.
 *
 * Returns the new end of the range.  The positions from there up to `e`
 * still hold whatever they held before; the sequence itself does not
 * shrink.  Truncate it yourself if you need to.
 */
export const remove = <T>(
  b: ForwardCursor<T>,
  e: ForwardCursor<T>,
  x: T
): ForwardCursor<T> => {
  let kept = b;
  for (let cur = b; !cur.equals(e); cur = cur.next()) {
    const value = cur.read();
    if (value === x) continue;
    if (!kept.equals(cur)) kept.write(value);
    kept = kept.next();
  }
  return kept;
};
