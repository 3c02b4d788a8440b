import { describe, it, expect, jest } from "@jest/globals";
import { checks } from "./checks";

import { runSelfCheck } from "./index";

import type { SelfCheck } from "./checks";
import type { Fixtures } from "./fixtures";

const passing: SelfCheck = {
  name: "passing",
  label: "passing",
  run: () => {}
};

const failing: SelfCheck = {
  name: "failing",
  label: "failing",
  run: () => { throw new Error("Test failure."); }
};

describe("runSelfCheck", () => {
  it("should pass every check with the default fixtures", () => {
    const report = runSelfCheck();

    expect(report.failed).toEqual([]);
    expect(report.passed).toEqual(checks.map((check) => check.name));
  });

  it("should have a check for every algorithm", () => {
    expect(checks.map((check) => check.name)).toEqual([
      "equal", "find", "rfind", "findIf", "search",
      "copy", "removeCopy", "removeCopyIf", "remove", "removeIf",
      "partition", "reverse", "replace",
      "accumulate", "forEach",
      "binarySearch", "swap", "max", "min"
    ]);
  });

  it("should only run the checks named in `only`, in their usual order", () => {
    const report = runSelfCheck({ only: ["swap", "find", "not-a-check"] });

    expect(report.passed).toEqual(["find", "swap"]);
    expect(report.failed).toEqual([]);
  });

  it("should record a failure and keep running", () => {
    const report = runSelfCheck({ checks: [failing, passing] });

    expect(report.passed).toEqual(["passing"]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].name).toBe("failing");
    expect(report.failed[0].error).toEqual(new Error("Test failure."));
  });

  it("should build fixtures of the requested size", () => {
    const run = jest.fn<(fixtures: Fixtures) => void>();
    runSelfCheck({ checks: [{ name: "spy", label: "spy", run }], fixtureSize: 5 });

    expect(run).toHaveBeenCalledTimes(1);
    const [fixtures] = run.mock.calls[0];
    expect(fixtures.zeros).toEqual([0, 0, 0, 0, 0]);
    expect(fixtures.odds).toEqual([1, 3]);
    expect(fixtures.evens).toEqual([0, 2, 4]);
  });

  it("should give every check its own fixtures", () => {
    const run = jest.fn((fixtures: Fixtures) => { fixtures.ascending[0] = 99; });
    runSelfCheck({
      checks: [
        { name: "first", label: "first", run },
        { name: "second", label: "second", run }
      ]
    });

    const [[first], [second]] = run.mock.calls;
    expect(first).not.toBe(second);
    expect(first.ascending).not.toBe(second.ascending);
  });

  it("should return a frozen report", () => {
    const report = runSelfCheck({ checks: [passing] });
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.passed)).toBe(true);
  });
});
