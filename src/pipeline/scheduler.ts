/**
 * One FetchRequest per tracked symbol per tick.
 *
 * The interval timer only posts a `tick` into the scheduler's own mailbox;
 * publishing happens in the handler, so ticks are handled one at a time and
 * the timer dies with the instance that created it.
 */
import type { Actor, ActorContext } from "../actors/actor.js";
import { logScheduler } from "../logging.js";
import type { PipelineTopics } from "./types.js";

export interface SchedulerTick {
  type: "tick";
}

export interface SchedulerOptions {
  symbols: readonly string[];
  from: Date;
  intervalMs: number;
  /** Fire one tick right after start instead of waiting a full interval */
  fetchOnStart: boolean;
  now?: () => Date;
}

export class SchedulerActor implements Actor<SchedulerTick, PipelineTopics> {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;

  constructor(private readonly opts: SchedulerOptions) {}

  started(ctx: ActorContext<SchedulerTick, PipelineTopics>): void {
    this.timer = setInterval(() => {
      if (!ctx.self.send({ type: "tick" })) {
        logScheduler.warn("Tick skipped — scheduler mailbox not accepting");
      }
    }, this.opts.intervalMs);
    if (this.opts.fetchOnStart) ctx.self.send({ type: "tick" });
    logScheduler.info(
      { symbols: this.opts.symbols, intervalMs: this.opts.intervalMs, from: this.opts.from.toISOString() },
      "Scheduler armed",
    );
  }

  handle(_tick: SchedulerTick, ctx: ActorContext<SchedulerTick, PipelineTopics>): void {
    const to = this.opts.now ? this.opts.now() : new Date();
    this.ticks++;
    let unclaimed = 0;
    for (const symbol of this.opts.symbols) {
      // Delivery failures are logged by the bus; only a closed bus throws
      if (ctx.bus.publish("fetch-request", { symbol, from: this.opts.from, to }) === 0) unclaimed++;
    }
    if (unclaimed > 0) {
      logScheduler.warn({ tick: this.ticks, unclaimed }, "Fetch requests not taken by any downloader");
    } else {
      logScheduler.debug({ tick: this.ticks, symbols: this.opts.symbols.length, to: to.toISOString() }, "Tick");
    }
  }

  stopped(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
