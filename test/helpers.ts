import type { Deliverable } from "../src/actors/mailbox.js";
import type { PerformanceIndicators, PricePoint } from "../src/pipeline/types.js";

/**
 * Builds a PerformanceIndicators record with sensible defaults.
 * Pass overrides for the fields a test cares about.
 */
export function makeIndicators(overrides: Partial<PerformanceIndicators> = {}): PerformanceIndicators {
  return {
    symbol: "AAPL",
    timestamp: new Date("2024-01-03T00:00:00Z"),
    price: 9,
    pct_change: -0.1,
    period_min: 9,
    period_max: 12,
    last_sma: 0,
    ...overrides,
  };
}

/** Daily closes starting at `start`, one point per value. */
export function dailyPoints(start: string, closes: number[]): PricePoint[] {
  const first = new Date(start).getTime();
  return closes.map((close, i) => ({ timestamp: new Date(first + i * 86_400_000), close }));
}

/**
 * A bus subscriber that records everything it receives.
 * `accept` = false makes it refuse every message.
 */
export function collector<T>(name = "collector", accept = true): Deliverable<T> & { received: T[] } {
  const received: T[] = [];
  return {
    name,
    received,
    post(msg: T): boolean {
      if (!accept) return false;
      received.push(msg);
      return true;
    },
  };
}
