import { logger } from "../logging.js";

/**
 * Wrap a promise with a timeout. The underlying work is not cancelled; its
 * late result is ignored.
 * @param label Label for the error message
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string = "operation",
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
  /** Return false to give up immediately (e.g. on a client error). */
  shouldRetry?: (err: Error) => boolean;
}

/**
 * Retry an async operation with linear backoff (delayMs, 2×delayMs, …).
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 500, label = "operation", shouldRetry = () => true } = opts;
  let lastErr = new Error(`${label} failed`);
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (e: unknown) {
      lastErr = e instanceof Error ? e : new Error(String(e));
      if (!shouldRetry(lastErr)) throw lastErr;
      if (attempt < retries) {
        const wait = delayMs * (attempt + 1);
        logger.warn(`${label} attempt ${attempt + 1} failed, retrying in ${wait}ms: ${lastErr.message}`);
        await new Promise((r) => setTimeout(r, wait));
      }
    }
  }
  throw lastErr;
}
