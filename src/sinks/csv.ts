import type { PerformanceIndicators } from "../pipeline/types.js";

export const CSV_HEADER = "period start,symbol,price,change %,min,max,30d avg";

/** `2024-01-03T00:00:00.000Z,AAPL,$9.00,-10.00%,$9.00,$12.00,$0.00` */
export function formatCsvRow(pi: PerformanceIndicators): string {
  return [
    pi.timestamp.toISOString(),
    pi.symbol,
    `$${pi.price.toFixed(2)}`,
    `${(pi.pct_change * 100).toFixed(2)}%`,
    `$${pi.period_min.toFixed(2)}`,
    `$${pi.period_max.toFixed(2)}`,
    `$${pi.last_sma.toFixed(2)}`,
  ].join(",");
}
