/** Invalid startup configuration. Always fatal. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Posting to a worker whose mailbox is stopped, full, or between incarnations. */
export class MailboxClosedError extends Error {
  constructor(readonly target: string) {
    super(`Mailbox '${target}' is not accepting messages`);
    this.name = "MailboxClosedError";
  }
}

export class CallTimeoutError extends Error {
  constructor(readonly target: string, readonly timeoutMs: number) {
    super(`Call to '${target}' timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

/** Publishing on a bus that has been shut down. */
export class BusClosedError extends Error {
  constructor(topic: string) {
    super(`Bus is closed — cannot publish '${topic}'`);
    this.name = "BusClosedError";
  }
}

/** The market data provider answered with something we cannot use. */
export class ProviderError extends Error {
  constructor(message: string, readonly symbol: string) {
    super(message);
    this.name = "ProviderError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
