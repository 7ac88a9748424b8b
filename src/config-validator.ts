import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - at least one symbol is tracked
 * - `from` is not in the future
 * - interval, timeouts, capacities and worker count are positive integers
 * - retries is not negative
 * - SMA window of 1 (warning: no average is ever produced)
 * - buffer capacity is not excessive (warning)
 */
export function validateConfig(cfg: AppConfig, now: Date = new Date()): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  if (cfg.symbols.length === 0) {
    errors.push("At least one symbol is required");
  }

  if (cfg.from.getTime() > now.getTime()) {
    errors.push(`'from' (${cfg.from.toISOString()}) is in the future`);
  }

  const positives: Array<[string, number]> = [
    ["FETCH_INTERVAL_MS", cfg.pipeline.intervalMs],
    ["DOWNLOAD_WORKERS", cfg.pipeline.downloadWorkers],
    ["BUFFER_CAPACITY", cfg.pipeline.bufferCapacity],
    ["SMA_WINDOW", cfg.pipeline.smaWindow],
    ["PROVIDER_TIMEOUT_MS", cfg.provider.timeoutMs],
    ["MAILBOX_CAPACITY", cfg.actors.mailboxCapacity],
    ["CALL_TIMEOUT_MS", cfg.actors.callTimeoutMs],
    ["RESTART_BACKOFF_MS", cfg.actors.restartBackoffMs],
  ];
  for (const [name, value] of positives) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (!Number.isInteger(cfg.provider.retries) || cfg.provider.retries < 0) {
    errors.push(`PROVIDER_RETRIES must be 0 or more, got ${cfg.provider.retries}`);
  }

  if (!Number.isInteger(cfg.provider.retryDelayMs) || cfg.provider.retryDelayMs < 0) {
    errors.push(`PROVIDER_RETRY_DELAY_MS must be 0 or more, got ${cfg.provider.retryDelayMs}`);
  }

  if (Number.isInteger(cfg.pipeline.smaWindow) && cfg.pipeline.smaWindow === 1) {
    warnings.push("SMA_WINDOW is 1 — no moving average will be produced (last_sma stays 0)");
  }

  if (cfg.pipeline.bufferCapacity > 10_000) {
    warnings.push(`BUFFER_CAPACITY ${cfg.pipeline.bufferCapacity} is large — every entry is held in memory`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
