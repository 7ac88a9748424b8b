/**
 * Raw quote series in, performance indicators out.
 */
import type { Actor, ActorContext } from "../actors/actor.js";
import { logProcessor } from "../logging.js";
import { maxPrice, minPrice, priceDifference, windowedSma } from "../signals/index.js";
import { formatCsvRow } from "../sinks/csv.js";
import type { PerformanceIndicators, PipelineTopics, QuoteSeries } from "./types.js";

export const DEFAULT_SMA_WINDOW = 30;

/**
 * Indicators for one series, or null when it has no points.
 * Points are sorted by timestamp before anything is computed.
 */
export function computeIndicators(
  series: QuoteSeries,
  smaWindow: number = DEFAULT_SMA_WINDOW,
): PerformanceIndicators | null {
  if (series.points.length === 0) return null;

  const sorted = [...series.points].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const closes = sorted.map((p) => p.close);
  const latest = sorted[sorted.length - 1];
  const sma = windowedSma(closes, smaWindow);

  return {
    symbol: series.symbol,
    timestamp: latest.timestamp,
    price: latest.close,
    pct_change: priceDifference(closes)?.relative ?? 0,
    period_min: minPrice(closes) ?? 0,
    period_max: maxPrice(closes) ?? 0,
    last_sma: sma.length > 0 ? sma[sma.length - 1] : 0,
  };
}

export class ProcessorActor implements Actor<QuoteSeries, PipelineTopics> {
  constructor(private readonly smaWindow: number = DEFAULT_SMA_WINDOW) {}

  started(ctx: ActorContext<QuoteSeries, PipelineTopics>): void {
    ctx.subscribe("quote-series", (series) => series);
  }

  handle(series: QuoteSeries, ctx: ActorContext<QuoteSeries, PipelineTopics>): void {
    const indicators = computeIndicators(series, this.smaWindow);
    if (!indicators) {
      logProcessor.info({ symbol: series.symbol }, "Got nothing — no quotes to process");
      return;
    }
    ctx.bus.publish("performance-indicators", indicators);
    logProcessor.info({ symbol: series.symbol, points: series.points.length }, formatCsvRow(indicators));
  }
}
