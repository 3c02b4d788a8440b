import { assert } from "../utils/assert";

import type { InputCursor, Range } from "./theBasics";

/** The iterator shared by every cursor created from one iterable. */
interface SharedSource<T> {
  readonly iterator: Iterator<T>;
  /** The position of the element in `current`. */
  position: number;
  current: IteratorResult<T>;
}

/** The position given to the past-the-end sentinel. */
const END_POSITION = Number.POSITIVE_INFINITY;

/**
 * A single-pass, read-only cursor over any {@link Iterable}.
 *
 * All the cursors of a range share one iterator, so stepping any of
 * them forward moves the whole sequence along.  Once a cursor has been
 * stepped past, it is stale and can no longer be read or stepped; it
 * can still be compared.
 */
export class IterableCursor<T> implements InputCursor<T> {
  readonly #source: SharedSource<T>;
  readonly #position: number;

  constructor(source: SharedSource<T>, position: number) {
    this.#source = source;
    this.#position = position;
    Object.freeze(this);
  }

  /** Whether this cursor is at, or is, the end of its sequence. */
  get isDone(): boolean {
    if (this.#position === END_POSITION) return true;
    if (this.#position !== this.#source.position) return false;
    return this.#source.current.done === true;
  }

  read(): T {
    this.#assertCurrent();
    const { current } = this.#source;
    if (current.done) throw new Error("Cannot read past the end of the sequence.");
    return current.value;
  }

  next(): IterableCursor<T> {
    this.#assertCurrent();
    assert("Cannot advance past the end of the sequence.", !this.isDone);
    const source = this.#source;
    source.current = source.iterator.next();
    source.position += 1;
    return new IterableCursor(source, source.position);
  }

  equals(other: InputCursor<T>): boolean {
    if (!(other instanceof IterableCursor)) return false;
    if (other.#source !== this.#source) return false;
    if (this.isDone && other.isDone) return true;
    return other.#position === this.#position;
  }

  #assertCurrent(): void {
    assert(
      "This cursor has been stepped past and is no longer readable.",
      this.#position === this.#source.position
    );
  }
}

/**
 * Creates a `[begin, end)` range over an iterable.  The first element is
 * pulled from its iterator right away.
 */
export const fromIterable = <T>(iterable: Iterable<T>): Range<IterableCursor<T>> => {
  const iterator = iterable[Symbol.iterator]();
  const source: SharedSource<T> = {
    iterator,
    position: 0,
    current: iterator.next()
  };

  return Object.freeze([
    new IterableCursor(source, 0),
    new IterableCursor(source, END_POSITION)
  ] as const);
};
