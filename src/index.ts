#!/usr/bin/env node
import type { Server } from "node:http";
import { USAGE, loadConfig, parseCli, readPackageInfo, type AppConfig } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { setReady } from "./ops/readiness.js";
import { createPipeline, type Pipeline } from "./pipeline/index.js";
import { YahooQuoteProvider } from "./providers/yahoo.js";
import { createApp, startRestServer, stopRestServer } from "./rest/server.js";

function configure(): AppConfig | null {
  const cli = parseCli(process.argv.slice(2));
  if (cli.help) {
    process.stdout.write(`${USAGE}\n`);
    return null;
  }
  if (cli.version) {
    const pkg = readPackageInfo();
    process.stdout.write(`${pkg.name} ${pkg.version}\n`);
    return null;
  }

  const config = loadConfig(cli);
  const validation = validateConfig(config);
  for (const warning of validation.warnings) logger.warn(warning);
  if (validation.errors.length > 0) {
    for (const error of validation.errors) logger.error(error);
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }
  return config;
}

async function main() {
  // A bad `from` or config error throws here, before any worker starts
  const config = configure();
  if (!config) return;

  logger.info({ symbols: config.symbols, from: config.from.toISOString() }, "quote-stream starting");
  pruneOldLogs();

  const provider = new YahooQuoteProvider({
    retries: config.provider.retries,
    retryDelayMs: config.provider.retryDelayMs,
  });

  const pipeline: Pipeline = await createPipeline(
    {
      symbols: config.symbols,
      from: config.from,
      intervalMs: config.pipeline.intervalMs,
      fetchOnStart: config.pipeline.fetchOnStart,
      downloadWorkers: config.pipeline.downloadWorkers,
      providerTimeoutMs: config.provider.timeoutMs,
      smaWindow: config.pipeline.smaWindow,
      bufferCapacity: config.pipeline.bufferCapacity,
      outputDir: config.pipeline.outputDir,
      supervisor: {
        mailboxCapacity: config.actors.mailboxCapacity,
        callTimeoutMs: config.actors.callTimeoutMs,
        restartBackoffMs: config.actors.restartBackoffMs,
      },
    },
    { provider },
  );

  const app = createApp({
    buffer: pipeline.buffer,
    symbols: config.symbols,
    workers: () => pipeline.status(),
    outputFile: () => pipeline.outputFile(),
  });
  const server: Server = await startRestServer(app, config.rest.host, config.rest.port).catch(async (err: unknown) => {
    await pipeline.stop();
    throw err;
  });

  setReady(true);
  logger.info({ output: pipeline.outputFile() }, "quote-stream running — press Ctrl+C to stop");

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down...");
    setReady(false);
    try {
      await stopRestServer(server);
    } catch (err) {
      logger.error({ err }, "REST server close failed");
    }
    await pipeline.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown("SIGINT").catch((e) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown("SIGTERM").catch((e) => logger.error({ err: e }, "Shutdown error")); });

  // Worker crashes are handled by their supervisors; anything reaching here is logged only
  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
  process.on("uncaughtException", (err) => {
    logger.fatal({ err }, "Uncaught exception");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
