import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { ActorRef } from "../actors/actor.js";
import type { WorkerStatus } from "../actors/supervisor.js";
import { CallTimeoutError, MailboxClosedError, errorMessage } from "../errors.js";
import { logRest } from "../logging.js";
import { getMetrics } from "../ops/metrics.js";
import { isReady } from "../ops/readiness.js";
import { toJson } from "../pipeline/types.js";
import { requestSize, requestTail, type BufferSinkMessage } from "../sinks/buffer-sink.js";

export interface RouteDeps {
  buffer: ActorRef<BufferSinkMessage>;
  symbols: readonly string[];
  workers: () => WorkerStatus[];
  outputFile?: () => string | null;
}

const tailParamsSchema = z.object({
  n: z.string().regex(/^\d+$/, "n must be a non-negative integer"),
});

const startTime = Date.now();

function unavailable(err: unknown): boolean {
  return err instanceof CallTimeoutError || err instanceof MailboxClosedError;
}

export function createRouter(deps: RouteDeps): Router {
  const router = Router();

  // GET /tail/:n: newest-first, at most n entries
  router.get("/tail/:n", async (req: Request, res: Response) => {
    const parsed = tailParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message ?? "invalid n" });
      return;
    }
    const n = Number(parsed.data.n);
    if (!Number.isSafeInteger(n)) {
      res.status(400).json({ error: "n is too large" });
      return;
    }
    if (n === 0) {
      res.json([]);
      return;
    }
    try {
      const entries = await requestTail(deps.buffer, n);
      res.json(entries.map(toJson));
    } catch (err) {
      if (unavailable(err)) {
        logRest.warn({ err: errorMessage(err) }, "Buffer sink unavailable");
        res.status(503).json({ error: "Buffer temporarily unavailable" });
        return;
      }
      logRest.error({ err: errorMessage(err) }, "tail failed");
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  // GET /health: worker states and bus counters
  router.get("/health", async (_req: Request, res: Response) => {
    const workers = deps.workers();
    let buffered: number | null = null;
    try {
      buffered = await requestSize(deps.buffer);
    } catch (err) {
      logRest.warn({ err: errorMessage(err) }, "Buffer size unavailable for health check");
    }
    const metrics = getMetrics();
    const healthy = buffered !== null && workers.every((w) => w.state === "running");
    res.json({
      status: healthy ? "ok" : "degraded",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      symbols: deps.symbols,
      buffered,
      output_file: deps.outputFile ? deps.outputFile() : null,
      workers,
      bus: { published: metrics.published, delivered: metrics.delivered, dropped: metrics.dropped },
      restarts: metrics.restarts,
      timestamp: new Date().toISOString(),
    });
  });

  // GET /health/ready: 503 until startup is complete
  router.get("/health/ready", (_req: Request, res: Response) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({ ready, timestamp: new Date().toISOString() });
  });

  return router;
}
