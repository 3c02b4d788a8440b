import type { ForwardCursor } from "../../cursors";

/**
 * Searches `[b1, e1)` for the first occurrence of the sequence `[b2, e2)`.
 *
 * Returns a cursor to the start of the occurrence in the first range.
 * An empty needle matches immediately at `b1`.  When there is no
 * occurrence, `e1` is returned.
 *
 * Each candidate start is checked by walking both ranges together until
 * they disagree, so the worst case is the product of their lengths.
 */
export const search = <T>(
  b1: ForwardCursor<T>,
  e1: ForwardCursor<T>,
  b2: ForwardCursor<T>,
  e2: ForwardCursor<T>
): ForwardCursor<T> => {
  if (b2.equals(e2)) return b1;

  for (let start = b1; !start.equals(e1); start = start.next()) {
    let hay = start;
    let needle = b2;
    while (hay.read() === needle.read()) {
      hay = hay.next();
      needle = needle.next();
      // The whole needle matched.
      if (needle.equals(e2)) return start;
      // The haystack ran out first; no later start can fit the needle.
      if (hay.equals(e1)) return e1;
    }
  }

  return e1;
};
