import { assertInBounds } from "../utils/assert";

import type { InputCursor, RandomAccessCursor } from "./theBasics";

/**
 * A random-access cursor into a plain JavaScript array.
 *
 * Writing through a cursor at or past the end of the array assigns
 * to that index, growing the array the same way `array[i] = value`
 * would.  Nothing stops you from doing that by accident.
 */
export class ArrayCursor<T> implements RandomAccessCursor<T> {
  readonly #array: T[];

  /** The index into the array this cursor points at. */
  readonly offset: number;

  constructor(array: T[], offset: number) {
    this.#array = array;
    this.offset = offset;
    Object.freeze(this);
  }

  /** The array being viewed. */
  get source(): T[] {
    return this.#array;
  }

  read(): T {
    return this.#array[this.offset];
  }

  write(value: T): void {
    this.#array[this.offset] = value;
  }

  next(): ArrayCursor<T> {
    return new ArrayCursor(this.#array, this.offset + 1);
  }

  prev(): ArrayCursor<T> {
    return new ArrayCursor(this.#array, this.offset - 1);
  }

  advance(count: number): ArrayCursor<T> {
    return new ArrayCursor(this.#array, this.offset + count);
  }

  equals(other: InputCursor<T>): boolean {
    if (!(other instanceof ArrayCursor)) return false;
    return other.#array === this.#array && other.offset === this.offset;
  }

  distanceTo(other: RandomAccessCursor<T>): number {
    return this.#offsetOf(other) - this.offset;
  }

  compare(other: RandomAccessCursor<T>): number {
    return this.offset - this.#offsetOf(other);
  }

  /**
   * Arithmetic only means something between cursors of the same array,
   * as with pointers into two different buffers.
   */
  #offsetOf(other: RandomAccessCursor<T>): number {
    return other instanceof ArrayCursor ? other.offset : Number.NaN;
  }
}

/** Creates a cursor at the first element of `array`. */
export const begin = <T>(array: T[]): ArrayCursor<T> =>
  new ArrayCursor(array, 0);

/** Creates the past-the-end cursor of `array`. */
export const end = <T>(array: T[]): ArrayCursor<T> =>
  new ArrayCursor(array, array.length);

/**
 * Creates a cursor at `index` of `array`.  The index may be the
 * past-the-end position but no further.
 */
export const cursorAt = <T>(array: T[], index: number): ArrayCursor<T> => {
  assertInBounds("Cursor index is out of bounds.", index, array, true);
  return new ArrayCursor(array, index);
};

/** Gets the `[begin, end)` range covering all of `array`. */
export const rangeOf = <T>(array: T[]): [ArrayCursor<T>, ArrayCursor<T>] =>
  [begin(array), end(array)];
