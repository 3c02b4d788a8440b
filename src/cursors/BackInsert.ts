import type { OutputCursor } from "./theBasics";

/**
 * An output cursor that appends everything written through it to the
 * end of an array.  Stepping it forward changes nothing; every write
 * lands after the last.
 */
export class BackInsertCursor<T> implements OutputCursor<T> {
  readonly #target: T[];

  constructor(target: T[]) {
    this.#target = target;
    Object.freeze(this);
  }

  /** The array being appended to. */
  get target(): T[] {
    return this.#target;
  }

  write(value: T): void {
    this.#target.push(value);
  }

  next(): BackInsertCursor<T> {
    return this;
  }
}

/** Creates a cursor that appends to `target`. */
export const backInserter = <T>(target: T[]): BackInsertCursor<T> =>
  new BackInsertCursor(target);
