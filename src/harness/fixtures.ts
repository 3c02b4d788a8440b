import _range from "lodash/range";
import config from "../config";

/** The sequences every check is given to work on. */
export interface Fixtures {
  /** `0` through `9`. */
  ascending: number[];
  /** Another `0` through `9`, as a separate array. */
  ascendingCopy: number[];
  /** `10` down through `1`. */
  descending: number[];
  /** The odd numbers below the fixture size. */
  odds: number[];
  /** The even numbers below the fixture size. */
  evens: number[];
  /** As many zeroes as the fixture size. */
  zeros: number[];
}

export const isEven = (value: number) => value % 2 === 0;

export const isOdd = (value: number) => value % 2 !== 0;

export const doubleValue = (value: number) => value * 2;

/**
 * Builds a fresh set of fixtures.  Checks are free to mutate them, so
 * every check should get its own set.
 */
export const createFixtures = (size: number = config.selfCheck.fixtureSize): Fixtures => {
  const all = _range(0, size);
  return {
    ascending: _range(0, 10),
    ascendingCopy: _range(0, 10),
    descending: _range(10, 0, -1),
    odds: all.filter(isOdd),
    evens: all.filter(isEven),
    zeros: all.map(() => 0)
  };
};
