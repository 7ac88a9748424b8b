import pino, { type Logger } from "pino";
import path from "path";
import { fileURLToPath } from "url";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";
import { recordRequest } from "./ops/metrics.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const logsDir = path.join(__dirname, "../data/logs");
const underTest = process.env.VITEST !== undefined;

// Rotate log file daily, filename: quote-stream-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `quote-stream-${date}.log`);
}

function createLogger(): Logger {
  // No transport worker under the test runner
  if (underTest) {
    return pino({ level: process.env.LOG_LEVEL ?? "silent", base: { service: "quote-stream" } });
  }

  if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });

  // Multi-destination: stderr (human-readable) + file (JSON for parsing)
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level: process.env.LOG_LEVEL ?? "info",
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug", // file gets everything
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "quote-stream" },
    },
    transport,
  );
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logBus = logger.child({ subsystem: "bus" });
export const logSupervisor = logger.child({ subsystem: "supervisor" });
export const logScheduler = logger.child({ subsystem: "scheduler" });
export const logDownloader = logger.child({ subsystem: "downloader" });
export const logProcessor = logger.child({ subsystem: "processor" });
export const logSink = logger.child({ subsystem: "sink" });
export const logRest = logger.child({ subsystem: "rest" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    recordRequest(res.statusCode);
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30) {
  if (!fs.existsSync(logsDir)) return;
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("quote-stream-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/quote-stream-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
