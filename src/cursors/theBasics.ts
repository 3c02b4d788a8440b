/**
 * A cursor that can be read and stepped forward.  This is the weakest
 * kind of cursor an algorithm can read through.
 *
 * Cursors are immutable; `next` produces a new cursor and leaves the
 * current one where it was.
 */
export interface InputCursor<T> {
  /** Reads the element at this position. */
  read(): T;
  /** Gets a cursor for the following position. */
  next(): InputCursor<T>;
  /** Whether `other` points to the same position of the same sequence. */
  equals(other: InputCursor<T>): boolean;
}

/** A cursor that can be written through and stepped forward. */
export interface OutputCursor<T> {
  /** Replaces the element at this position. */
  write(value: T): void;
  /** Gets a cursor for the following position. */
  next(): OutputCursor<T>;
}

/**
 * A cursor that can both read and write, and that can be stepped
 * over the same range more than once.
 */
export interface ForwardCursor<T> extends InputCursor<T>, OutputCursor<T> {
  next(): ForwardCursor<T>;
}

/** A {@link ForwardCursor} that can also step backward. */
export interface BidirectionalCursor<T> extends ForwardCursor<T> {
  next(): BidirectionalCursor<T>;
  /** Gets a cursor for the preceding position. */
  prev(): BidirectionalCursor<T>;
}

/** A {@link BidirectionalCursor} that can jump and measure in constant time. */
export interface RandomAccessCursor<T> extends BidirectionalCursor<T> {
  next(): RandomAccessCursor<T>;
  prev(): RandomAccessCursor<T>;
  /** Gets a cursor `count` positions away; negative values step backward. */
  advance(count: number): RandomAccessCursor<T>;
  /** The number of steps from this cursor to `other`. */
  distanceTo(other: RandomAccessCursor<T>): number;
  /**
   * Orders this cursor against `other`, `Array#sort` style: negative when
   * this cursor comes first, `0` when they are equal, and positive when it
   * comes after.
   */
  compare(other: RandomAccessCursor<T>): number;
}

/** A half-open range, `[begin, end)`. */
export type Range<TCursor> = readonly [begin: TCursor, end: TCursor];

/** Checks if a cursor supports the {@link RandomAccessCursor} operations. */
export const isRandomAccess = <T>(
  cursor: InputCursor<T>
): cursor is RandomAccessCursor<T> =>
  "advance" in cursor && "distanceTo" in cursor && "compare" in cursor;

/**
 * Counts the steps it takes to get from `begin` to `end`.
 *
 * Random-access cursors are measured directly.  Anything else is walked,
 * which will consume a single-pass cursor.
 */
export const distance = <T>(begin: InputCursor<T>, end: InputCursor<T>): number => {
  if (isRandomAccess(begin) && isRandomAccess(end))
    return begin.distanceTo(end);

  let count = 0;
  for (let cur = begin; !cur.equals(end); cur = cur.next()) count += 1;
  return count;
};

/** Steps a cursor forward `count` times. */
export function advance<T>(cursor: RandomAccessCursor<T>, count: number): RandomAccessCursor<T>;
export function advance<T>(cursor: BidirectionalCursor<T>, count: number): BidirectionalCursor<T>;
export function advance<T>(cursor: ForwardCursor<T>, count: number): ForwardCursor<T>;
export function advance<T>(cursor: InputCursor<T>, count: number): InputCursor<T>;
export function advance<T>(cursor: InputCursor<T>, count: number): InputCursor<T> {
  if (isRandomAccess(cursor)) return cursor.advance(count);

  let cur = cursor;
  for (let i = 0; i < count; i++) cur = cur.next();
  return cur;
}
