export interface PriceDifference {
  absolute: number;
  /** Relative to the first value; a first value of 0 is treated as 1 */
  relative: number;
}

/**
 * Absolute and relative difference between the first and last value of a series.
 * @returns null for an empty series
 */
export function priceDifference(series: readonly number[]): PriceDifference | null {
  if (series.length === 0) return null;
  const first = series[0];
  const last = series[series.length - 1];
  const absolute = last - first;
  const denominator = first === 0 ? 1 : first;
  return { absolute, relative: absolute / denominator };
}
