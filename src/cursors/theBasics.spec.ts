import { describe, it, expect } from "@jest/globals";
import { mockList, listRange } from "@spec/helpers-cursors";

import { begin, end, rangeOf } from "./Array";
import { fromIterable } from "./Iterable";
import { isRandomAccess, distance, advance } from "./theBasics";

describe("isRandomAccess", () => {
  it("should recognize an array cursor", () => {
    expect(isRandomAccess(begin([1, 2]))).toBe(true);
  });

  it("should reject cursors without random access", () => {
    const [listBegin] = listRange(mockList([1, 2]));
    const [iterBegin] = fromIterable([1, 2]);

    expect(isRandomAccess(listBegin)).toBe(false);
    expect(isRandomAccess(iterBegin)).toBe(false);
  });
});

describe("distance", () => {
  it("should measure array cursors directly", () => {
    const [b, e] = rangeOf([1, 2, 3, 4]);
    expect(distance(b, e)).toBe(4);
    expect(distance(b, b)).toBe(0);
  });

  it("should walk cursors without random access", () => {
    const [b, e] = listRange(mockList(["a", "b", "c"]));
    expect(distance(b, e)).toBe(3);
  });

  it("should agree for single-pass cursors", () => {
    const [b, e] = fromIterable(new Set([5, 6, 7, 8]));
    expect(distance(b, e)).toBe(4);
  });
});

describe("advance", () => {
  it("should jump array cursors", () => {
    const data = [1, 2, 3, 4];
    expect(advance(begin(data), 4).equals(end(data))).toBe(true);
  });

  it("should step cursors without random access", () => {
    const [b, e] = listRange(mockList([1, 2, 3]));
    expect(advance(b, 1).read()).toBe(2);
    expect(advance(b, 3).equals(e)).toBe(true);
  });

  it("should return the same cursor for zero steps", () => {
    const [b] = listRange(mockList([1]));
    expect(advance(b, 0)).toBe(b);
  });
});
