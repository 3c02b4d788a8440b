import { describe, it, expect } from "@jest/globals";

import { ArrayCursor, begin, end, cursorAt, rangeOf } from "./Array";

describe("ArrayCursor", () => {
  it("should read and write the element at its offset", () => {
    const data = [10, 20, 30];
    const cursor = cursorAt(data, 1);

    expect(cursor.read()).toBe(20);

    cursor.write(25);
    expect(data).toEqual([10, 25, 30]);
  });

  it("should leave the original cursor in place when stepping", () => {
    const data = [10, 20, 30];
    const first = begin(data);
    const second = first.next();

    expect(first.offset).toBe(0);
    expect(second.offset).toBe(1);
    expect(second.prev().offset).toBe(0);
    expect(first.advance(2).read()).toBe(30);
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(begin([1]))).toBe(true);
  });

  it("should measure the distance to another cursor", () => {
    const data = [1, 2, 3, 4, 5];
    const [b, e] = rangeOf(data);

    expect(b.distanceTo(e)).toBe(5);
    expect(e.distanceTo(b)).toBe(-5);
    expect(b.distanceTo(b)).toBe(0);
  });

  it("should order cursors by their offset", () => {
    const data = [1, 2, 3];
    const [b, e] = rangeOf(data);

    expect(b.compare(e)).toBeLessThan(0);
    expect(e.compare(b)).toBeGreaterThan(0);
    expect(b.compare(cursorAt(data, 0))).toBe(0);
  });

  it("should only equal a cursor of the same array at the same offset", () => {
    const data = [1, 2, 3];
    const lookAlike = [1, 2, 3];

    expect(begin(data).equals(new ArrayCursor(data, 0))).toBe(true);
    expect(begin(data).equals(begin(lookAlike))).toBe(false);
    expect(begin(data).equals(end(data))).toBe(false);
  });

  it("should expose the array it views", () => {
    const data = ["a"];
    expect(begin(data).source).toBe(data);
  });
});

describe("cursorAt", () => {
  it("should accept the past-the-end index", () => {
    const data = [1, 2, 3];
    expect(cursorAt(data, 3).equals(end(data))).toBe(true);
  });

  it("should reject an index beyond the end", () => {
    expect(() => cursorAt([1, 2, 3], 4)).toThrow("Cursor index is out of bounds.");
  });

  it("should reject a negative index", () => {
    expect(() => cursorAt([1, 2, 3], -1)).toThrow("Cursor index is out of bounds.");
  });
});
