/**
 * One fetch request at a time per instance.
 *
 * Instances run as a pool in one queue group, so the pool size caps the
 * number of provider calls in flight. Whatever goes wrong with a fetch, a
 * QuoteSeries is published (empty on failure) and the handler never throws
 * for provider reasons.
 */
import type { Actor, ActorContext } from "../actors/actor.js";
import { errorMessage } from "../errors.js";
import { logDownloader } from "../logging.js";
import type { QuoteProvider } from "../providers/types.js";
import { withTimeout } from "../shared/retry.js";
import type { FetchRequest, PipelineTopics, PricePoint } from "./types.js";

export const DOWNLOADER_GROUP = "downloaders";

export interface DownloaderOptions {
  timeoutMs: number;
}

export class DownloaderActor implements Actor<FetchRequest, PipelineTopics> {
  constructor(
    private readonly provider: QuoteProvider,
    private readonly opts: DownloaderOptions,
  ) {}

  started(ctx: ActorContext<FetchRequest, PipelineTopics>): void {
    ctx.subscribe("fetch-request", (req) => req, { group: DOWNLOADER_GROUP });
  }

  async handle(req: FetchRequest, ctx: ActorContext<FetchRequest, PipelineTopics>): Promise<void> {
    const points = await this.download(req, ctx.name);
    ctx.bus.publish("quote-series", { symbol: req.symbol, points });
  }

  private async download(req: FetchRequest, worker: string): Promise<PricePoint[]> {
    const started = Date.now();
    try {
      const points = await withTimeout(
        this.provider.fetch(req.symbol, req.from, req.to),
        this.opts.timeoutMs,
        `${this.provider.name} fetch for ${req.symbol}`,
      );
      const usable = points.filter((p) => Number.isFinite(p.close) && !Number.isNaN(p.timestamp.getTime()));
      logDownloader.debug(
        { worker, symbol: req.symbol, points: usable.length, duration_ms: Date.now() - started },
        "Quotes downloaded",
      );
      return usable;
    } catch (err) {
      logDownloader.warn(
        { worker, symbol: req.symbol, err: errorMessage(err), duration_ms: Date.now() - started },
        `Ignoring API error for symbol '${req.symbol}'`,
      );
      return [];
    }
  }
}
