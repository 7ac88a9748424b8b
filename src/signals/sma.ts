/**
 * Simple moving average over every full window of `windowSize` consecutive values.
 * Produces `series.length - windowSize + 1` values, or none at all when the
 * window is 1 or smaller or longer than the series.
 */
export function windowedSma(series: readonly number[], windowSize: number): number[] {
  if (windowSize <= 1 || series.length < windowSize) return [];
  const out: number[] = [];
  for (let start = 0; start + windowSize <= series.length; start++) {
    let sum = 0;
    for (let i = start; i < start + windowSize; i++) sum += series[i];
    out.push(sum / windowSize);
  }
  return out;
}
