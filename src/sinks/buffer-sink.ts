/**
 * The most recent PerformanceIndicators, newest first.
 *
 * Inserts and reads go through the same mailbox, so a `tail` answer is always
 * a consistent copy taken between two inserts.
 */
import type { Actor, ActorContext, ActorRef, Reply } from "../actors/actor.js";
import type { PerformanceIndicators, PipelineTopics } from "../pipeline/types.js";

export const DEFAULT_BUFFER_CAPACITY = 50;

export type BufferSinkMessage =
  | { type: "insert"; indicators: PerformanceIndicators }
  | { type: "tail"; n: number; reply: Reply<PerformanceIndicators[]> }
  | { type: "size"; reply: Reply<number> };

/** Bounded newest-first store. Owned by one worker. */
export class RetentionBuffer {
  private readonly entries: PerformanceIndicators[] = [];

  constructor(readonly capacity: number = DEFAULT_BUFFER_CAPACITY) {}

  get size(): number {
    return this.entries.length;
  }

  insert(pi: PerformanceIndicators): void {
    this.entries.unshift(pi);
    if (this.entries.length > this.capacity) this.entries.length = this.capacity;
  }

  /** Copy of the first `n` entries (newest first). */
  tail(n: number): PerformanceIndicators[] {
    return structuredClone(this.entries.slice(0, Math.max(0, n)));
  }
}

export class BufferSinkActor implements Actor<BufferSinkMessage, PipelineTopics> {
  private readonly buffer: RetentionBuffer;

  constructor(capacity: number = DEFAULT_BUFFER_CAPACITY) {
    this.buffer = new RetentionBuffer(capacity);
  }

  started(ctx: ActorContext<BufferSinkMessage, PipelineTopics>): void {
    ctx.subscribe("performance-indicators", (indicators) => ({ type: "insert", indicators }));
  }

  handle(msg: BufferSinkMessage): void {
    switch (msg.type) {
      case "insert":
        this.buffer.insert(msg.indicators);
        return;
      case "tail":
        msg.reply.resolve(this.buffer.tail(msg.n));
        return;
      case "size":
        msg.reply.resolve(this.buffer.size);
        return;
    }
  }
}

export function requestTail(
  ref: ActorRef<BufferSinkMessage>,
  n: number,
  timeoutMs?: number,
): Promise<PerformanceIndicators[]> {
  return ref.call<PerformanceIndicators[]>((reply) => ({ type: "tail", n, reply }), timeoutMs);
}

export function requestSize(ref: ActorRef<BufferSinkMessage>, timeoutMs?: number): Promise<number> {
  return ref.call<number>((reply) => ({ type: "size", reply }), timeoutMs);
}
