import { describe, expect, it } from "vitest";

import {
  assertFiniteNumber,
  assertNonNegative,
  clamp,
  roundCurrency,
  roundTo,
  sum,
} from "../../src/core/math-utils.js";

describe("math-utils", () => {
  it("rounds half away from zero", () => {
    expect(roundTo(1.005, 2)).toBe(1.01);
    expect(roundTo(2.5, 0)).toBe(3);
    expect(roundTo(-2.5, 0)).toBe(-3);
    expect(roundTo(-17.7302, 2)).toBe(-17.73);
  });

  it("never returns negative zero", () => {
    expect(Object.is(roundTo(-0.001, 2), 0)).toBe(true);
  });

  it("rounds currency to cents", () => {
    expect(roundCurrency(368513.2985)).toBe(368513.3);
    expect(roundCurrency(154105)).toBe(154105);
    expect(() => roundTo(1, -1)).toThrow(RangeError);
  });

  it("clamps to the unit interval by default", () => {
    expect(clamp(1.4)).toBe(1);
    expect(clamp(-0.2)).toBe(0);
    expect(clamp(0.25)).toBe(0.25);
    expect(clamp(12, 0, 10)).toBe(10);
  });

  it("sums values", () => {
    expect(sum([])).toBe(0);
    expect(sum([18000, 78600, 16200, 2500, 6000])).toBe(121300);
  });

  it("asserts finite and non-negative numbers", () => {
    expect(() => assertFiniteNumber(Number.NaN, "price")).toThrow("price must be a finite number");
    expect(() => assertNonNegative(-1, "cost")).toThrow(RangeError);
    expect(() => assertNonNegative(0, "cost")).not.toThrow();
  });
});
