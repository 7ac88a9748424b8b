/**
 * Restart shell around one worker.
 *
 * Owns the worker's stable address and recreates the worker from its factory
 * whenever the current instance crashes. Restart policy: immediate, unlimited.
 * Only a failing startup hook during a restart backs off, so a worker that
 * cannot acquire its resources does not spin.
 */
import type { Broker, SubscribeOptions, Unsubscribe } from "../bus/broker.js";
import { CallTimeoutError, MailboxClosedError, errorMessage } from "../errors.js";
import { logSupervisor } from "../logging.js";
import { recordRestart } from "../ops/metrics.js";
import { Mailbox } from "./mailbox.js";
import type { Actor, ActorContext, ActorFactory, ActorRef, ActorState, Reply } from "./actor.js";

export interface SupervisorOptions {
  mailboxCapacity: number;
  restartBackoffMs: number;
  callTimeoutMs: number;
}

export const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  mailboxCapacity: 1000,
  restartBackoffMs: 1000,
  callTimeoutMs: 5000,
};

interface Incarnation<M, Topics extends object> {
  actor: Actor<M, Topics>;
  mailbox: Mailbox<M>;
  ctx: ActorContext<M, Topics>;
  unsubscribes: Unsubscribe[];
  /** Set once the stop hook has been started; every caller waits on the same run */
  releasing: Promise<void> | null;
}

export interface WorkerStatus {
  name: string;
  state: ActorState;
  restarts: number;
}

export class Supervisor<M, Topics extends object> {
  readonly ref: ActorRef<M>;
  private current: Incarnation<M, Topics> | null = null;
  private _state: ActorState = "created";
  private _restarts = 0;
  private stopRequested = false;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  /** A start or restart whose `started()` hook has not settled yet */
  private starting: Promise<void> | null = null;
  /** Stop hook of the last crashed instance */
  private cleanup: Promise<void> | null = null;

  private constructor(
    readonly name: string,
    private readonly factory: ActorFactory<M, Topics>,
    private readonly bus: Broker<Topics>,
    private readonly opts: SupervisorOptions,
  ) {
    this.ref = {
      name,
      send: (msg) => this.send(msg),
      call: (make, timeoutMs) => this.call(make, timeoutMs),
    };
  }

  /**
   * Start a supervised worker. A failure of this first start is returned to
   * the caller. Only later crashes restart.
   */
  static async start<M, Topics extends object>(
    name: string,
    factory: ActorFactory<M, Topics>,
    bus: Broker<Topics>,
    opts: Partial<SupervisorOptions> = {},
  ): Promise<Supervisor<M, Topics>> {
    const sup = new Supervisor(name, factory, bus, { ...DEFAULT_SUPERVISOR_OPTIONS, ...opts });
    await sup.spawn();
    return sup;
  }

  get state(): ActorState {
    return this._state;
  }

  get restarts(): number {
    return this._restarts;
  }

  status(): WorkerStatus {
    return { name: this.name, state: this._state, restarts: this._restarts };
  }

  /** Resolves when the current instance has nothing queued or in flight. */
  idle(): Promise<void> {
    return this.current ? this.current.mailbox.idle() : Promise.resolve();
  }

  /** Graceful stop: no new messages, drain the backlog, release, no restart. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    // Let a restart in flight finish acquiring before it is released; its failure is logged by restart()
    if (this.starting) await this.starting.catch(() => undefined);
    const inc = this.current;
    if (!inc) {
      if (this.cleanup) await this.cleanup;
      this._state = "stopped";
      return;
    }
    this._state = "stopping";
    for (const unsubscribe of inc.unsubscribes) unsubscribe();
    inc.mailbox.seal();
    await inc.mailbox.idle();
    await this.release(inc);
    this.current = null;
    this._state = "stopped";
    logSupervisor.info({ worker: this.name }, "Worker stopped");
  }

  private send(msg: M): boolean {
    return this.current !== null && this.current.mailbox.post(msg);
  }

  private call<R>(make: (reply: Reply<R>) => M, timeoutMs: number = this.opts.callTimeoutMs): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const timer = setTimeout(() => reject(new CallTimeoutError(this.name, timeoutMs)), timeoutMs);
      const reply: Reply<R> = {
        resolve: (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
      if (!this.send(make(reply))) {
        clearTimeout(timer);
        reject(new MailboxClosedError(this.name));
      }
    });
  }

  private spawn(): Promise<void> {
    const starting: Promise<void> = this.startIncarnation().finally(() => {
      if (this.starting === starting) this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  private async startIncarnation(): Promise<void> {
    const actor = this.factory();
    const unsubscribes: Unsubscribe[] = [];
    const mailbox: Mailbox<M> = new Mailbox<M>(this.name, (msg) => actor.handle(msg, ctx), {
      capacity: this.opts.mailboxCapacity,
      onCrash: (err, dropped) => this.onCrash(inc, err, dropped),
    });
    const bus = this.bus;
    const name = this.name;
    const ctx: ActorContext<M, Topics> = {
      name,
      self: this.ref,
      bus,
      subscribe<K extends keyof Topics>(topic: K, wrap: (payload: Topics[K]) => M, opts?: SubscribeOptions) {
        unsubscribes.push(bus.subscribe(topic, { name, post: (payload) => mailbox.post(wrap(payload)) }, opts));
      },
    };
    const inc: Incarnation<M, Topics> = { actor, mailbox, ctx, unsubscribes, releasing: null };

    this.current = inc;
    this._state = "started";
    try {
      await actor.started?.(ctx);
    } catch (err) {
      this.current = null;
      this._state = "stopped";
      for (const unsubscribe of unsubscribes) unsubscribe();
      mailbox.close();
      await this.release(inc);
      throw err;
    }
    this._state = "running";
    mailbox.release();
    logSupervisor.debug({ worker: this.name, restarts: this._restarts }, "Worker running");
  }

  private onCrash(inc: Incarnation<M, Topics>, err: unknown, dropped: number): void {
    logSupervisor.error(
      { worker: this.name, err: errorMessage(err), droppedMessages: dropped },
      `Worker '${this.name}' crashed`,
    );
    for (const unsubscribe of inc.unsubscribes) unsubscribe();
    if (this.current === inc) this.current = null;
    this._state = "stopping";

    const cleanup = this.release(inc);
    this.cleanup = cleanup;
    cleanup
      .then(() => {
        this._state = "stopped";
        if (this.stopRequested) return;
        this._restarts++;
        recordRestart();
        this.restart();
      })
      .catch((e) => logSupervisor.error({ worker: this.name, err: errorMessage(e) }, "Crash cleanup failed"));
  }

  private restart(): void {
    if (this.stopRequested) return;
    this.spawn()
      .then(() => {
        logSupervisor.warn({ worker: this.name, restarts: this._restarts }, `Worker '${this.name}' restarted`);
      })
      .catch((err) => {
        if (this.stopRequested) {
          logSupervisor.error({ worker: this.name, err: errorMessage(err) }, "Restart failed during stop");
          return;
        }
        logSupervisor.error(
          { worker: this.name, err: errorMessage(err), retryInMs: this.opts.restartBackoffMs },
          "Restart failed — retrying",
        );
        this.restartTimer = setTimeout(() => {
          this.restartTimer = null;
          this.restart();
        }, this.opts.restartBackoffMs);
      });
  }

  /** Run the stop hook once per instance; its failure is logged, not rethrown. */
  private release(inc: Incarnation<M, Topics>): Promise<void> {
    if (!inc.releasing) inc.releasing = this.runStopHook(inc);
    return inc.releasing;
  }

  private async runStopHook(inc: Incarnation<M, Topics>): Promise<void> {
    try {
      await inc.actor.stopped?.(inc.ctx);
    } catch (err) {
      logSupervisor.error({ worker: this.name, err: errorMessage(err) }, "Stop hook failed");
    }
  }
}
