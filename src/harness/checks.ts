import _isEqual from "lodash/isEqual";
import _without from "lodash/without";
import _reject from "lodash/reject";
import _sum from "lodash/sum";
import _sortBy from "lodash/sortBy";
import _sortedIndexOf from "lodash/sortedIndexOf";
import _findIndex from "lodash/findIndex";
import { assert } from "../utils/assert";
import { ArrayCursor, begin, end, rangeOf, backInserter, distance } from "../cursors";
import * as algs from "../algorithms";
import { isEven, isOdd, doubleValue } from "./fixtures";

import type { Fixtures } from "./fixtures";

/** A single named check of one algorithm. */
export interface SelfCheck {
  /** The name of the algorithm being checked. */
  readonly name: string;
  /** How the algorithm is described when narrating the run. */
  readonly label: string;
  /** Runs the check, throwing if anything came out wrong. */
  run(fixtures: Fixtures): void;
}

/** Asserts two values are deeply equal, putting both in the message. */
const assertSame = (what: string, actual: unknown, expected: unknown) => {
  const details = `expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`;
  assert(`${what}: ${details}`, _isEqual(actual, expected));
};

const checkEqual: SelfCheck = {
  name: "equal",
  label: "equal",
  run: ({ ascending, ascendingCopy, descending }) => {
    const same = algs.equal(begin(ascending), end(ascending), begin(ascendingCopy));
    assertSame("matching sequences", same, _isEqual(ascending, ascendingCopy));

    const different = algs.equal(begin(ascending), end(ascending), begin(descending));
    assertSame("different sequences", different, false);
  }
};

const checkFind: SelfCheck = {
  name: "find",
  label: "find",
  run: ({ ascending }) => {
    const [b, e] = rangeOf(ascending);
    assertSame("index of 3", distance(b, algs.find(b, e, 3)), ascending.indexOf(3));
    assert("13 should not be found", algs.find(b, e, 13).equals(e));
  }
};

const checkRfind: SelfCheck = {
  name: "rfind",
  label: "recursive find",
  run: ({ ascending }) => {
    const [b, e] = rangeOf(ascending);
    assert("should agree with find for 3", algs.rfind(b, e, 3).equals(algs.find(b, e, 3)));
    assert("13 should not be found", algs.rfind(b, e, 13).equals(e));
  }
};

const checkFindIf: SelfCheck = {
  name: "findIf",
  label: "find if",
  run: ({ ascending, odds }) => {
    const [b, e] = rangeOf(ascending);
    assertSame("first even", distance(b, algs.findIf(b, e, isEven)), _findIndex(ascending, isEven));

    const [oddsB, oddsE] = rangeOf(odds);
    assertSame("first odd", distance(oddsB, algs.findIf(oddsB, oddsE, isOdd)), 0);
    assert("no even among the odds", algs.findIf(oddsB, oddsE, isEven).equals(oddsE));
  }
};

const checkSearch: SelfCheck = {
  name: "search",
  label: "search",
  run: ({ ascending }) => {
    const [b, e] = rangeOf(ascending);

    const needle = [3, 4, 5];
    const found = algs.search(b, e, begin(needle), end(needle));
    assertSame("offset of [3, 4, 5]", distance(b, found), 3);

    const empty: number[] = [];
    assert("empty needle matches at the start", algs.search(b, e, begin(empty), end(empty)).equals(b));

    const missing = [4, 3];
    assert("[4, 3] should not be found", algs.search(b, e, begin(missing), end(missing)).equals(e));
  }
};

const checkCopy: SelfCheck = {
  name: "copy",
  label: "copy",
  run: ({ ascending, zeros }) => {
    const appended: number[] = [];
    algs.copy(begin(ascending), end(ascending), backInserter(appended));
    assertSame("appended copy", appended, ascending);

    const target = begin(zeros);
    const after = algs.copy(begin(ascending), end(ascending), target);
    assert(
      "should stop after the last write",
      after instanceof ArrayCursor && after.offset === ascending.length
    );
    assertSame("overwritten prefix", zeros.slice(0, ascending.length), ascending);
  }
};

const checkRemoveCopy: SelfCheck = {
  name: "removeCopy",
  label: "remove copy",
  run: ({ ascending }) => {
    const result: number[] = [];
    algs.removeCopy(begin(ascending), end(ascending), backInserter(result), 3);
    assertSame("copy without 3", result, _without(ascending, 3));

    const untouched: number[] = [];
    algs.removeCopy(begin(ascending), end(ascending), backInserter(untouched), 13);
    assertSame("copy without 13", untouched, ascending);
  }
};

const checkRemoveCopyIf: SelfCheck = {
  name: "removeCopyIf",
  label: "remove copy if",
  run: ({ ascending, evens }) => {
    const result: number[] = [];
    algs.removeCopyIf(begin(ascending), end(ascending), backInserter(result), isEven);
    assertSame("copy without evens", result, _reject(ascending, isEven));

    const nothing: number[] = [];
    algs.removeCopyIf(begin(evens), end(evens), backInserter(nothing), isEven);
    assertSame("copy of evens without evens", nothing, []);
  }
};

const checkRemove: SelfCheck = {
  name: "remove",
  label: "remove",
  run: ({ ascending, zeros }) => {
    const expected = _without(ascending, 3);
    const [b, e] = rangeOf(ascending);
    const newEnd = algs.remove(b, e, 3);
    assertSame("kept count", distance(b, newEnd), expected.length);
    assertSame("kept elements", ascending.slice(0, expected.length), expected);

    const [zb, ze] = rangeOf(zeros);
    assert("removing every element leaves nothing", algs.remove(zb, ze, 0).equals(zb));
  }
};

const checkRemoveIf: SelfCheck = {
  name: "removeIf",
  label: "remove if",
  run: ({ ascending }) => {
    const expected = _reject(ascending, isOdd);
    const [b, e] = rangeOf(ascending);
    const newEnd = algs.removeIf(b, e, isOdd);
    assertSame("kept count", distance(b, newEnd), expected.length);
    assertSame("kept elements", ascending.slice(0, expected.length), expected);
  }
};

const checkPartition: SelfCheck = {
  name: "partition",
  label: "partition",
  run: ({ ascending }) => {
    const original = [...ascending];
    const [b, e] = rangeOf(ascending);
    const split = distance(b, algs.partition(b, e, isEven));
    assertSame("split point", split, original.filter(isEven).length);
    assert("front group passes", ascending.slice(0, split).every(isEven));
    assert("back group fails", !ascending.slice(split).some(isEven));
    assertSame("same elements", _sortBy(ascending), original);
  }
};

const checkReverse: SelfCheck = {
  name: "reverse",
  label: "reverse",
  run: ({ ascending, descending }) => {
    const expected = [...ascending].reverse();
    algs.reverse(begin(ascending), end(ascending));
    assertSame("reversed", ascending, expected);

    const original = [...descending];
    algs.reverse(begin(descending), end(descending));
    algs.reverse(begin(descending), end(descending));
    assertSame("reversed twice", descending, original);
  }
};

const checkReplace: SelfCheck = {
  name: "replace",
  label: "replace",
  run: ({ zeros, ascending }) => {
    algs.replace(begin(zeros), end(zeros), 0, 1);
    assertSame("all replaced", zeros, zeros.map(() => 1));

    const original = [...ascending];
    algs.replace(begin(ascending), end(ascending), 13, 1);
    assertSame("nothing replaced", ascending, original);
  }
};

const checkAccumulate: SelfCheck = {
  name: "accumulate",
  label: "accumulate",
  run: ({ ascending }) => {
    const [b, e] = rangeOf(ascending);
    assertSame("sum", algs.accumulate(b, e, 0), _sum(ascending));
    assertSame("sum with seed", algs.accumulate(b, e, 10), _sum(ascending) + 10);
    assertSame("empty range", algs.accumulate(b, b, 7), 7);
  }
};

const checkForEach: SelfCheck = {
  name: "forEach",
  label: "for each",
  run: ({ ascending }) => {
    const doubled: number[] = [];
    const record = (value: number) => { doubled.push(doubleValue(value)); };
    const returned = algs.forEach(begin(ascending), end(ascending), record);
    assert("should return the same function", returned === record);
    assertSame("visited in order", doubled, ascending.map(doubleValue));
  }
};

const checkBinarySearch: SelfCheck = {
  name: "binarySearch",
  label: "binary search",
  run: ({ evens }) => {
    const [b, e] = rangeOf(evens);
    for (const value of evens)
      assertSame(`${value} is present`, algs.binarySearch(b, e, value), _sortedIndexOf(evens, value) !== -1);
    assertSame("7 is absent", algs.binarySearch(b, e, 7), false);
    assertSame("empty range", algs.binarySearch(b, b, evens[0]), false);
  }
};

const checkSwap: SelfCheck = {
  name: "swap",
  label: "swap",
  run: ({ ascending }) => {
    const first = begin(ascending);
    const last = end(ascending).prev();
    algs.swap(first, last);
    assertSame("ends swapped", [ascending[0], ascending[9]], [9, 0]);

    algs.swap(first, first);
    assertSame("self swap", ascending[0], 9);
  }
};

const checkMax: SelfCheck = {
  name: "max",
  label: "max",
  run: () => {
    assertSame("max of 5 and 10", algs.max(5, 10), 10);
    assertSame("max of 10 and 5", algs.max(10, 5), 10);
    assertSame("max of a tie", algs.max(5, 5), 5);
  }
};

const checkMin: SelfCheck = {
  name: "min",
  label: "min",
  run: () => {
    assertSame("min of 5 and 10", algs.min(5, 10), 5);
    assertSame("min of 10 and 5", algs.min(10, 5), 5);
    assertSame("min of a tie", algs.min(5, 5), 5);
  }
};

/** Every check, in the order they are run. */
export const checks: readonly SelfCheck[] = Object.freeze([
  checkEqual,
  checkFind,
  checkRfind,
  checkFindIf,
  checkSearch,
  checkCopy,
  checkRemoveCopy,
  checkRemoveCopyIf,
  checkRemove,
  checkRemoveIf,
  checkPartition,
  checkReverse,
  checkReplace,
  checkAccumulate,
  checkForEach,
  checkBinarySearch,
  checkSwap,
  checkMax,
  checkMin
]);
