import { describe, it, expect } from "@jest/globals";
import _range from "lodash/range";
import { mockList, listValues, listRange } from "@spec/helpers-cursors";
import { rangeOf } from "../../cursors";

import { reverse } from "./reverse";

describe("reverse", () => {
  it("should reverse an even number of elements", () => {
    const data = [1, 2, 3, 4];
    const [b, e] = rangeOf(data);
    reverse(b, e);
    expect(data).toEqual([4, 3, 2, 1]);
  });

  it("should reverse an odd number of elements", () => {
    const data = [1, 2, 3, 4, 5];
    const [b, e] = rangeOf(data);
    reverse(b, e);
    expect(data).toEqual([5, 4, 3, 2, 1]);
  });

  it("should do nothing to an empty range", () => {
    const data: number[] = [];
    const [b, e] = rangeOf(data);
    reverse(b, e);
    expect(data).toEqual([]);
  });

  it("should do nothing to a single element", () => {
    const data = [1];
    const [b, e] = rangeOf(data);
    reverse(b, e);
    expect(data).toEqual([1]);
  });

  it("should restore the original when applied twice", () => {
    const data = _range(10, 0, -1);
    const [b, e] = rangeOf(data);
    reverse(b, e);
    reverse(b, e);
    expect(data).toEqual(_range(10, 0, -1));
  });

  it("should only touch the given range", () => {
    const data = [1, 2, 3, 4, 5];
    const [b, e] = rangeOf(data);
    reverse(b.next(), e.prev());
    expect(data).toEqual([1, 4, 3, 2, 5]);
  });

  it("should work with bidirectional cursors", () => {
    const list = mockList(["a", "b", "c"]);
    const [b, e] = listRange(list);
    reverse(b, e);
    expect(listValues(list)).toEqual(["c", "b", "a"]);
  });
});
