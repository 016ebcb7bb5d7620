import { describe, it, expect } from "vitest";
import {
  accumulateScaled,
  checkedAdd,
  checkedMul,
  divideAll,
  saturatingIncrement,
  scaledDot,
  truncDiv,
} from "./fixedPoint.js";
import { ArithmeticOverflowError, ClassifierError } from "../errors.js";

describe("truncDiv", () => {
  it("truncates toward zero for every sign combination", () => {
    expect(truncDiv(7, 2)).toBe(3);
    expect(truncDiv(-7, 2)).toBe(-3);
    expect(truncDiv(7, -2)).toBe(-3);
    expect(truncDiv(-7, -2)).toBe(3);
  });

  it("never returns negative zero", () => {
    expect(truncDiv(-1, 1000)).toBe(0);
    expect(truncDiv(0, -5)).toBe(0);
  });

  it("throws on a zero denominator", () => {
    expect(() => truncDiv(1, 0)).toThrow(ClassifierError);
    expect(() => truncDiv(1, 0)).toThrow("Division by zero");
  });
});

describe("scaledDot", () => {
  it("divides every term by the scale before summing", () => {
    // Per term: trunc(1500 / 1000) = 1, twice. A single division would give 3.
    expect(scaledDot([1500, 1500], [1, 1])).toBe(2);
  });

  it("truncates negative terms toward zero", () => {
    expect(scaledDot([-1500, 999], [1, 1])).toBe(-1);
  });

  it("multiplies scaled values back to the scale", () => {
    expect(scaledDot([1000, 2000], [1000, -500])).toBe(0);
    expect(scaledDot([1000, 2000], [1000, 500])).toBe(2000);
  });
});

describe("saturatingIncrement", () => {
  it("adds one below the cap", () => {
    expect(saturatingIncrement(5, 10)).toBe(6);
  });

  it("stays at the cap", () => {
    expect(saturatingIncrement(65_535, 65_535)).toBe(65_535);
    expect(saturatingIncrement(70_000, 65_535)).toBe(65_535);
  });
});

describe("checked arithmetic", () => {
  it("returns exact safe-integer results", () => {
    expect(checkedAdd(2, 3)).toBe(5);
    expect(checkedMul(-4, 6)).toBe(-24);
  });

  it("throws when a result leaves the safe integer range", () => {
    expect(() => checkedMul(Number.MAX_SAFE_INTEGER, 2)).toThrow(ArithmeticOverflowError);
    expect(() => checkedAdd(Number.MAX_SAFE_INTEGER, 1)).toThrow(ArithmeticOverflowError);
  });
});

describe("vector helpers", () => {
  it("accumulateScaled adds a scaled vector in place", () => {
    const target = [1, 2];
    accumulateScaled(target, [3, 4], 2);
    expect(target).toEqual([7, 10]);
  });

  it("divideAll truncates each component", () => {
    expect(divideAll([10, -10, 0], 3)).toEqual([3, -3, 0]);
  });

  it("divideAll leaves the vector unchanged for a zero divisor", () => {
    expect(divideAll([5, -2], 0)).toEqual([5, -2]);
  });
});
