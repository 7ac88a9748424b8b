/** Smallest value of the series, null when empty. */
export function minPrice(series: readonly number[]): number | null {
  if (series.length === 0) return null;
  let min = series[0];
  for (const v of series) if (v < min) min = v;
  return min;
}

/** Largest value of the series, null when empty. */
export function maxPrice(series: readonly number[]): number | null {
  if (series.length === 0) return null;
  let max = series[0];
  for (const v of series) if (v > max) max = v;
  return max;
}
