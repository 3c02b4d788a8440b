import type { ForwardCursor } from "../../cursors";
import type { PredicateFn } from "../../utils/functions";

/**
 * Removes the elements that pass `p` from `[b, e)` by shifting the
 * remaining elements toward the front, keeping their order.
 *
 * Returns the new end of the range.  Like {@link remove}, nothing past
 * the new end is cleared and the sequence does not shrink.
 */
export const removeIf = <T>(
  b: ForwardCursor<T>,
  e: ForwardCursor<T>,
  p: PredicateFn<T>
): ForwardCursor<T> => {
  let kept = b;
  for (let cur = b; !cur.equals(e); cur = cur.next()) {
    const value = cur.read();
    if (p(value)) continue;
    if (!kept.equals(cur)) kept.write(value);
    kept = kept.next();
  }
  return kept;
};
