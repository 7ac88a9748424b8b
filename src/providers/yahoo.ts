import YahooFinance from "yahoo-finance2";
import { z } from "zod";
import { ProviderError } from "../errors.js";
import { logDownloader } from "../logging.js";
import type { PricePoint } from "../pipeline/types.js";
import { withRetry } from "../shared/retry.js";
import type { QuoteProvider } from "./types.js";

const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });

// ─── Payload validation ──────────────────────────────────────

const chartRowSchema = z.object({
  date: z.coerce.date(),
  close: z.number().nullable().optional(),
});

const chartSchema = z.object({
  quotes: z.array(chartRowSchema),
});

// Don't retry on client errors (bad symbol, invalid params)
function isRetryable(err: Error): boolean {
  const msg = err.message;
  return !(
    err instanceof ProviderError ||
    msg.includes("Not Found") ||
    msg.includes("Invalid") ||
    msg.toLowerCase().includes("no data")
  );
}

export interface YahooProviderOptions {
  retries: number;
  retryDelayMs: number;
}

/** Daily closes from Yahoo Finance's chart endpoint. */
export class YahooQuoteProvider implements QuoteProvider {
  readonly name = "yahoo-finance";

  constructor(private readonly opts: YahooProviderOptions = { retries: 2, retryDelayMs: 500 }) {}

  async fetch(symbol: string, from: Date, to: Date): Promise<PricePoint[]> {
    const raw: unknown = await withRetry(
      () => yf.chart(symbol, { period1: from, period2: to, interval: "1d" }),
      { retries: this.opts.retries, delayMs: this.opts.retryDelayMs, label: `Yahoo chart ${symbol}`, shouldRetry: isRetryable },
    );
    return parseChart(symbol, raw);
  }
}

/**
 * Turn a chart payload into price points. Rows without a close (halts,
 * the still-open current bar) are skipped.
 */
export function parseChart(symbol: string, raw: unknown): PricePoint[] {
  const parsed = chartSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`Malformed chart payload for ${symbol}: ${parsed.error.issues[0]?.message ?? "invalid"}`, symbol);
  }
  const points: PricePoint[] = [];
  let skipped = 0;
  for (const row of parsed.data.quotes) {
    if (typeof row.close !== "number" || !Number.isFinite(row.close) || Number.isNaN(row.date.getTime())) {
      skipped++;
      continue;
    }
    points.push({ timestamp: row.date, close: row.close });
  }
  if (skipped > 0) logDownloader.debug({ symbol, skipped }, "Skipped chart rows without a close");
  return points;
}
