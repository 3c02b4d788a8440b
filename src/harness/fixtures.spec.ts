import { describe, it, expect } from "@jest/globals";

import { createFixtures, isEven, isOdd, doubleValue } from "./fixtures";

describe("createFixtures", () => {
  it("should build the fixed-size sequences", () => {
    const { ascending, ascendingCopy, descending } = createFixtures(21);

    expect(ascending).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(ascendingCopy).toEqual(ascending);
    expect(ascendingCopy).not.toBe(ascending);
    expect(descending).toEqual([10, 9, 8, 7, 6, 5, 4, 3, 2, 1]);
  });

  it("should size the remaining sequences by the fixture size", () => {
    const { odds, evens, zeros } = createFixtures(7);

    expect(odds).toEqual([1, 3, 5]);
    expect(evens).toEqual([0, 2, 4, 6]);
    expect(zeros).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });

  it("should default to the configured size", () => {
    const { zeros, evens } = createFixtures();

    expect(zeros).toHaveLength(21);
    expect(evens[evens.length - 1]).toBe(20);
  });
});

describe("fixture functions", () => {
  it("should tell evens from odds", () => {
    expect([0, 1, 2, -3].map(isEven)).toEqual([true, false, true, false]);
    expect([0, 1, 2, -3].map(isOdd)).toEqual([false, true, false, true]);
  });

  it("should double values", () => {
    expect(doubleValue(21)).toBe(42);
  });
});
