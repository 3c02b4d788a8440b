import type { InputCursor, OutputCursor } from "../../cursors";

/**
 * Copies the elements of `[b, e)` that are not equal to `x` to the
 * positions starting at `d`, keeping their order.
 *
 * Returns the destination cursor just past the last write, or `d` if
 * nothing was written.
 */
export const removeCopy = <T>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  d: OutputCursor<T>,
  x: T
): OutputCursor<T> => {
  let dest = d;
  for (let src = b; !src.equals(e); src = src.next()) {
    const value = src.read();
    if (value === x) continue;
    dest.write(value);
    dest = dest.next();
  }
  return dest;
};
