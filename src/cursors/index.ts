/**
 * Cursors mark a position in some sequence.  The algorithms only ever
 * talk to a sequence through a pair of them, a `[begin, end)` range.
 *
 * Each kind of cursor supports a different set of operations, from
 * the read-once {@link InputCursor} up to the {@link RandomAccessCursor}.
 * This module provides those interfaces and the adapters that let
 * JavaScript's own collections be used through them.
 */

import type * as TheBasics from "./theBasics";
import type { ArrayCursor } from "./Array";
import type { IterableCursor } from "./Iterable";
import type { BackInsertCursor } from "./BackInsert";

/** Quick access to cursor types. */
export namespace Cursor {
  export type Input<T> = TheBasics.InputCursor<T>;
  export type Output<T> = TheBasics.OutputCursor<T>;
  export type Forward<T> = TheBasics.ForwardCursor<T>;
  export type Bidirectional<T> = TheBasics.BidirectionalCursor<T>;
  export type RandomAccess<T> = TheBasics.RandomAccessCursor<T>;
  export type Range<TCursor> = TheBasics.Range<TCursor>;
  export type OfArray<T> = ArrayCursor<T>;
  export type OfIterable<T> = IterableCursor<T>;
  export type BackInsert<T> = BackInsertCursor<T>;
}

export type {
  InputCursor,
  OutputCursor,
  ForwardCursor,
  BidirectionalCursor,
  RandomAccessCursor,
  Range
} from "./theBasics";

export { isRandomAccess, distance, advance } from "./theBasics";
export { ArrayCursor, begin, end, cursorAt, rangeOf } from "./Array";
export { IterableCursor, fromIterable } from "./Iterable";
export { BackInsertCursor, backInserter } from "./BackInsert";
