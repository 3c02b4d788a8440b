import type { ForwardCursor } from "../../cursors";

/** Replaces every element of `[b, e)` equal to `x` with `y`. */
export const replace = <T>(
  b: ForwardCursor<T>,
  e: ForwardCursor<T>,
  x: T,
  y: T
): void => {
  for (let cur = b; !cur.equals(e); cur = cur.next())
    if (cur.read() === x) cur.write(y);
};
