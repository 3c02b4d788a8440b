export type PredicateFn<T> = (value: T) => boolean;

/**
 * Folds an element into an accumulated value.  The shape mirrors the
 * callback of `Array#reduce`, minus the index and array arguments.
 */
export type ReduceFn<TIn, TOut> = (accumulator: TOut, currentValue: TIn) => TOut;

/** Does nothing.  Useful as a stand-in callback. */
export const noop = (..._args: unknown[]): void => {};

