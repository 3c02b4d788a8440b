export const isInstance = <T>(value: T): value is Exclude<T, undefined | null> =>
  value != null;

export const isString = (value: unknown): value is string =>
  typeof value === "string";

export const isNumber = (value: unknown): value is number =>
  typeof value === "number";

export const isBigInt = (value: unknown): value is bigint =>
  typeof value === "bigint";
