import { describe, it, expect } from "vitest";
import { maxPrice, minPrice, priceDifference, windowedSma } from "../index.js";

describe("priceDifference", () => {
  it("should return null for an empty series", () => {
    expect(priceDifference([])).toBeNull();
  });

  it("should compute absolute and relative change between first and last value", () => {
    expect(priceDifference([2, 7, 3])).toEqual({ absolute: 1, relative: 0.5 });
  });

  it("should report a loss as a negative fraction", () => {
    expect(priceDifference([5, 6, 4])).toEqual({ absolute: -1, relative: -0.2 });
  });

  it("should divide by 1 when the first value is 0", () => {
    expect(priceDifference([0, 3, 5, 6, 1, 2, 1])).toEqual({ absolute: 1, relative: 1 });
  });

  it("should return zero change for a single value", () => {
    expect(priceDifference([42])).toEqual({ absolute: 0, relative: 0 });
  });
});

describe("minPrice / maxPrice", () => {
  it("should find the extremes regardless of position", () => {
    const series = [5, 2, 9, 1, 7];
    expect(minPrice(series)).toBe(1);
    expect(maxPrice(series)).toBe(9);
  });

  it("should return null for an empty series", () => {
    expect(minPrice([])).toBeNull();
    expect(maxPrice([])).toBeNull();
  });

  it("should handle negative values", () => {
    expect(minPrice([-3, -1, -7])).toBe(-7);
    expect(maxPrice([-3, -1, -7])).toBe(-1);
  });
});

describe("windowedSma", () => {
  it("should average every full window", () => {
    expect(windowedSma([1, 2, 3, 4, 5], 2)).toEqual([1.5, 2.5, 3.5, 4.5]);
  });

  it("should produce a single value when the window equals the series length", () => {
    expect(windowedSma([1, 2, 3, 4], 4)).toEqual([2.5]);
  });

  it("should produce nothing when the series is shorter than the window", () => {
    expect(windowedSma([1, 2, 3, 4], 5)).toEqual([]);
  });

  it("should produce nothing for a window of 1 or less", () => {
    expect(windowedSma([1, 2, 3], 1)).toEqual([]);
    expect(windowedSma([1, 2, 3], 0)).toEqual([]);
  });

  it("should average a 30-value window", () => {
    const series = Array.from({ length: 31 }, (_, i) => i + 1);
    expect(windowedSma(series, 30)).toEqual([15.5, 16.5]);
  });
});
