import { describe, it, expect } from "@jest/globals";
import _range from "lodash/range";
import { ArrayCursor, begin, cursorAt, end, backInserter } from "../../cursors";

import { removeCopy } from "./removeCopy";

describe("removeCopy", () => {
  const ascending = _range(0, 10);

  it("should copy everything but the matching elements, in order", () => {
    const target: number[] = [];
    removeCopy(begin(ascending), end(ascending), backInserter(target), 3);
    expect(target).toEqual([0, 1, 2, 4, 5, 6, 7, 8, 9]);
  });

  it("should drop every occurrence", () => {
    const source = [1, 2, 1, 3, 1];
    const target: number[] = [];
    removeCopy(begin(source), end(source), backInserter(target), 1);
    expect(target).toEqual([2, 3]);
  });

  it("should copy everything when nothing matches", () => {
    const target: number[] = [];
    removeCopy(begin(ascending), end(ascending), backInserter(target), 13);
    expect(target).toEqual(ascending);
  });

  it("should return the destination position after the last write", () => {
    const source = [1, 2, 1, 3];
    const target = [0, 0, 0, 0];
    const result = removeCopy(begin(source), end(source), begin(target), 1);

    expect(target).toEqual([2, 3, 0, 0]);
    expect(result instanceof ArrayCursor && result.equals(cursorAt(target, 2))).toBe(true);
  });

  it("should return the starting destination when everything was removed", () => {
    const source = [1, 1];
    const dest = begin([0, 0]);
    expect(removeCopy(begin(source), end(source), dest, 1)).toBe(dest);
  });

  it("should leave the source untouched", () => {
    const source = [1, 2, 1];
    removeCopy(begin(source), end(source), backInserter<number>([]), 1);
    expect(source).toEqual([1, 2, 1]);
  });
});
