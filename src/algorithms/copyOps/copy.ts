import type { InputCursor, OutputCursor } from "../../cursors";

/**
 * Writes every element of `[b, e)` to the positions starting at `d`,
 * in order.
 *
 * The destination must have room for all of them.  Returns the
 * destination cursor just past the last write.
 */
export const copy = <T>(
  b: InputCursor<T>,
  e: InputCursor<T>,
  d: OutputCursor<T>
): OutputCursor<T> => {
  let src = b;
  let dest = d;
  while (!src.equals(e)) {
    dest.write(src.read());
    dest = dest.next();
    src = src.next();
  }
  return dest;
};
