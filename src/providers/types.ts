import type { PricePoint } from "../pipeline/types.js";

/**
 * Market data source. May resolve to an empty or unsorted list and may
 * reject; the downloader treats every failure as "no data".
 */
export interface QuoteProvider {
  readonly name: string;
  fetch(symbol: string, from: Date, to: Date): Promise<PricePoint[]>;
}
