import { describe, it, expect } from "vitest";
import {
  mean,
  standardDeviation,
  standardErrorOfMean,
  computeStatistics,
} from "./statistics.js";

const SPREAD = [2, 4, 4, 4, 5, 5, 7, 9];

describe("mean", () => {
  it("averages the values", () => {
    expect(mean([1, 2, 3])).toEqual({ ok: true, value: 2 });
  });

  it("returns the single value for a one-element set", () => {
    expect(mean([4.5])).toEqual({ ok: true, value: 4.5 });
  });

  it("fails with insufficient data for an empty set", () => {
    const result = mean([]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      kind: "insufficient-data",
      count: 0,
      required: 1,
      message: "insufficient data: 0 accepted values, at least 1 required",
    });
  });
});

describe("standardDeviation", () => {
  it("uses the n - 1 divisor", () => {
    const result = standardDeviation(SPREAD, 5);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // sum of squared deviations is 32; sqrt(32 / 7)
    expect(result.value).toBeCloseTo(2.1381, 4);
    expect(result.value).toBe(Math.sqrt(32 / 7));
  });

  it("is zero when every value is equal", () => {
    expect(standardDeviation([3, 3, 3], 3)).toEqual({ ok: true, value: 0 });
  });

  it("fails with insufficient data for a single value", () => {
    const result = standardDeviation([1.5], 1.5);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.count).toBe(1);
    expect(result.error.required).toBe(2);
    expect(result.error.message).toBe("insufficient data: 1 accepted value, at least 2 required");
  });
});

describe("standardErrorOfMean", () => {
  it("divides the mean by sqrt(n)", () => {
    const result = standardErrorOfMean(5, 8);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe(5 / Math.sqrt(8));
    expect(result.value).toBeCloseTo(1.7678, 4);
  });

  it("fails when n is zero", () => {
    const result = standardErrorOfMean(1, 0);
    expect(result.ok).toBe(false);
  });
});

describe("computeStatistics", () => {
  it("combines the three statistics", () => {
    const result = computeStatistics(SPREAD);
    expect(result).toEqual({
      ok: true,
      value: {
        count: 8,
        mean: 5,
        standardDeviation: Math.sqrt(32 / 7),
        standardErrorOfMean: 5 / Math.sqrt(8),
      },
    });
  });

  it("requires at least two values", () => {
    const result = computeStatistics([2]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("insufficient-data");
    expect(result.error.required).toBe(2);
  });

  it("is deterministic for the same input", () => {
    expect(computeStatistics([1.1, 2.2, 3.3])).toEqual(computeStatistics([1.1, 2.2, 3.3]));
  });
});
