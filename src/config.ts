import dotenv from "dotenv";
import { readFileSync } from "fs";
import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenv.config();

export const DEFAULT_SYMBOLS = "AAPL,MSFT,UBER,GOOG";

const packageSchema = z.object({ name: z.string(), version: z.string() });

export function readPackageInfo(): { name: string; version: string } {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return packageSchema.parse(raw);
}

const rfc3339 = z.string().trim().datetime({ offset: true });

export interface CliOptions {
  symbols?: string;
  from?: string;
  port?: string;
  help: boolean;
  version: boolean;
}

export const USAGE = `Usage: quote-stream --from <RFC3339> [--symbols AAPL,MSFT] [--port 4321]

Options:
  -s, --symbols <list>   comma-separated tickers (default ${DEFAULT_SYMBOLS})
  -f, --from <time>      start of the observed period, e.g. 2024-01-01T00:00:00Z
  -p, --port <port>      port of the /tail endpoint (default 4321)
  -h, --help             show this help
  -V, --version          show the version`;

export function parseCli(argv: string[]): CliOptions {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        symbols: { type: "string", short: "s" },
        from: { type: "string", short: "f" },
        port: { type: "string", short: "p" },
        help: { type: "boolean", short: "h", default: false },
        version: { type: "boolean", short: "V", default: false },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      symbols: values.symbols,
      from: values.from,
      port: values.port,
      help: values.help ?? false,
      version: values.version ?? false,
    };
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/** Trim, upper-case, drop empties and duplicates (first occurrence wins). */
export function parseSymbols(list: string): string[] {
  const seen = new Set<string>();
  for (const raw of list.split(",")) {
    const symbol = raw.trim().toUpperCase();
    if (symbol) seen.add(symbol);
  }
  return [...seen];
}

export function parseFrom(value: string | undefined): Date {
  if (value === undefined || value.trim() === "") {
    throw new ConfigError("Missing start of period: pass --from or set FROM (RFC3339, e.g. 2024-01-01T00:00:00Z)");
  }
  const parsed = rfc3339.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Couldn't parse 'from' date '${value}': expected RFC3339, e.g. 2024-01-01T00:00:00Z`);
  }
  return new Date(parsed.data);
}

function int(value: string | undefined, fallback: string): number {
  return parseInt(value ?? fallback, 10);
}

export interface AppConfig {
  symbols: string[];
  from: Date;
  pipeline: {
    intervalMs: number;
    fetchOnStart: boolean;
    downloadWorkers: number;
    smaWindow: number;
    bufferCapacity: number;
    outputDir: string;
  };
  provider: {
    timeoutMs: number;
    retries: number;
    retryDelayMs: number;
  };
  actors: {
    mailboxCapacity: number;
    callTimeoutMs: number;
    restartBackoffMs: number;
  };
  rest: {
    host: string;
    port: number;
  };
}

/**
 * Build the runtime configuration: CLI flags first, then environment, then
 * defaults. Throws ConfigError when `from` is missing or not RFC3339.
 */
export function loadConfig(cli: CliOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    symbols: parseSymbols(cli.symbols ?? env.SYMBOLS ?? DEFAULT_SYMBOLS),
    from: parseFrom(cli.from ?? env.FROM),
    pipeline: {
      intervalMs: int(env.FETCH_INTERVAL_MS, "30000"),
      fetchOnStart: (env.FETCH_ON_START ?? "true") !== "false",
      downloadWorkers: int(env.DOWNLOAD_WORKERS, "4"),
      smaWindow: int(env.SMA_WINDOW, "30"),
      bufferCapacity: int(env.BUFFER_CAPACITY, "50"),
      outputDir: env.OUTPUT_DIR ?? ".",
    },
    provider: {
      timeoutMs: int(env.PROVIDER_TIMEOUT_MS, "10000"),
      retries: int(env.PROVIDER_RETRIES, "2"),
      retryDelayMs: int(env.PROVIDER_RETRY_DELAY_MS, "500"),
    },
    actors: {
      mailboxCapacity: int(env.MAILBOX_CAPACITY, "1000"),
      callTimeoutMs: int(env.CALL_TIMEOUT_MS, "5000"),
      restartBackoffMs: int(env.RESTART_BACKOFF_MS, "1000"),
    },
    rest: {
      host: env.REST_HOST ?? "localhost",
      port: int(cli.port ?? env.REST_PORT, "4321"),
    },
  };
}
