/**
 * Messages that travel over the pipeline bus.
 *
 * Everything here is immutable once published; the bus hands every subscriber
 * its own copy.
 */

/** One fetch for one symbol, created per scheduler tick. */
export interface FetchRequest {
  readonly symbol: string;
  readonly from: Date;
  readonly to: Date;
}

export interface PricePoint {
  readonly timestamp: Date;
  readonly close: number;
}

/**
 * Raw closes for one symbol. `points` may be empty (provider failure or no
 * data) and is not guaranteed to be sorted.
 */
export interface QuoteSeries {
  readonly symbol: string;
  readonly points: readonly PricePoint[];
}

export interface PerformanceIndicators {
  readonly symbol: string;
  /** Timestamp of the latest point in the series */
  readonly timestamp: Date;
  /** Last close */
  readonly price: number;
  /** Fraction, not percent: -0.1 is -10% */
  readonly pct_change: number;
  readonly period_min: number;
  readonly period_max: number;
  /** 0 when the series is shorter than the SMA window */
  readonly last_sma: number;
}

/** JSON shape served by the query endpoint */
export interface PerformanceIndicatorsJson {
  symbol: string;
  timestamp: string;
  price: number;
  pct_change: number;
  period_min: number;
  period_max: number;
  last_sma: number;
}

/** Topic → payload map for the pipeline bus */
export interface PipelineTopics {
  "fetch-request": FetchRequest;
  "quote-series": QuoteSeries;
  "performance-indicators": PerformanceIndicators;
}

export function toJson(pi: PerformanceIndicators): PerformanceIndicatorsJson {
  return {
    symbol: pi.symbol,
    timestamp: pi.timestamp.toISOString(),
    price: pi.price,
    pct_change: pi.pct_change,
    period_min: pi.period_min,
    period_max: pi.period_max,
    last_sma: pi.last_sma,
  };
}
