import express, { type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Server } from "node:http";
import { errorMessage } from "../errors.js";
import { logRest, requestLogger } from "../logging.js";
import { createRouter, type RouteDeps } from "./routes.js";

export function createApp(deps: RouteDeps): express.Express {
  const app = express();

  app.use(cors());
  app.use(requestLogger);
  app.use(
    rateLimit({
      windowMs: 60_000, // 1 minute
      max: 120,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Rate limit exceeded — 120 requests/minute" },
    }),
  );
  app.use(createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Express recognises error middleware by its four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logRest.error({ err: errorMessage(err) }, "Unhandled route error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

export function startRestServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const httpServer = app.listen(port, host, () => {
      logRest.info({ url: `http://${host}:${port}/tail/10` }, "REST server listening");
      resolve(httpServer);
    });
    httpServer.once("error", reject);
  });
}

export function stopRestServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
