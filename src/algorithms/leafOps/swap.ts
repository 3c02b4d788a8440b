import type { ForwardCursor } from "../../cursors";

/**
 * Exchanges the elements that two cursors point at.
 *
 * Both cursors may point at the same position; the element is
 * written back to itself and nothing changes.
 */
export const swap = <T>(x: ForwardCursor<T>, y: ForwardCursor<T>): void => {
  const temp = x.read();
  x.write(y.read());
  y.write(temp);
};
