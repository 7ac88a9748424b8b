/**
 * A worker's private inbound queue.
 *
 * Bounded FIFO drained by a single loop, so the handler never runs twice at
 * once. `post()` only enqueues; the drain starts on a later microtask, which
 * keeps posting non-blocking for the producer. A handler that throws closes
 * the mailbox: the backlog is dropped and `onCrash` decides what happens next.
 *
 * A mailbox starts held: it queues but does not drain until `release()`, so a
 * worker never sees a message before its startup hook has finished. `seal()`
 * refuses new messages but lets the backlog drain (graceful stop); `close()`
 * refuses and discards.
 */

export type MailboxHandler<M> = (msg: M) => Promise<void> | void;

export interface MailboxOptions {
  capacity: number;
  onCrash: (err: unknown, dropped: number) => void;
}

/** Anything a message can be delivered to. The bus only sees this. */
export interface Deliverable<M> {
  readonly name: string;
  post(msg: M): boolean;
}

export class Mailbox<M> implements Deliverable<M> {
  private readonly queue: M[] = [];
  private draining = false;
  private held = true;
  private sealed = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    readonly name: string,
    private readonly handler: MailboxHandler<M>,
    private readonly opts: MailboxOptions,
  ) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Enqueue without waiting. False when sealed, closed or full. */
  post(msg: M): boolean {
    if (this.closed || this.sealed || this.queue.length >= this.opts.capacity) return false;
    this.queue.push(msg);
    this.schedule();
    return true;
  }

  /** Begin draining. */
  release(): void {
    this.held = false;
    this.schedule();
  }

  /** Refuse new messages; queued ones are still handled. */
  seal(): void {
    this.sealed = true;
  }

  /** Stop accepting messages. Returns the number of queued messages discarded. */
  close(): number {
    this.closed = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.notifyIdle();
    return dropped;
  }

  /** Resolves once the queue is empty and no handler is running. */
  idle(): Promise<void> {
    if (!this.draining && (this.queue.length === 0 || this.held)) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.held || this.draining || this.closed || this.queue.length === 0) return;
    this.draining = true;
    queueMicrotask(() => {
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    while (!this.closed) {
      const msg = this.queue.shift();
      if (msg === undefined) break;
      try {
        await this.handler(msg);
      } catch (err) {
        this.draining = false;
        const dropped = this.close();
        this.opts.onCrash(err, dropped);
        return;
      }
    }
    this.draining = false;
    this.notifyIdle();
  }

  private notifyIdle(): void {
    if (this.draining) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
