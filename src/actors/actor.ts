import type { Broker, SubscribeOptions } from "../bus/broker.js";

/**
 * created → started (startup hook running) → running → stopping → stopped.
 * A crashed worker passes through stopping/stopped and comes back as a
 * fresh instance.
 */
export type ActorState = "created" | "started" | "running" | "stopping" | "stopped";

export interface Reply<R> {
  resolve(value: R): void;
  reject(err: Error): void;
}

/** Stable address of a supervised worker; survives restarts. */
export interface ActorRef<M> {
  readonly name: string;
  /** Post without waiting. False when the worker cannot take it right now. */
  send(msg: M): boolean;
  /** Request/response through the mailbox. */
  call<R>(make: (reply: Reply<R>) => M, timeoutMs?: number): Promise<R>;
}

export interface ActorContext<M, Topics extends object> {
  readonly name: string;
  readonly self: ActorRef<M>;
  readonly bus: Broker<Topics>;
  /**
   * Route a bus topic into this worker's mailbox. `wrap` turns the payload
   * into the worker's own message type. Removed automatically on stop.
   */
  subscribe<K extends keyof Topics>(topic: K, wrap: (payload: Topics[K]) => M, opts?: SubscribeOptions): void;
}

export interface Actor<M, Topics extends object> {
  /** Acquire resources and register subscriptions. A throw here fails the start. */
  started?(ctx: ActorContext<M, Topics>): Promise<void> | void;
  /** One message at a time. A throw crashes this instance. */
  handle(msg: M, ctx: ActorContext<M, Topics>): Promise<void> | void;
  /** Release resources. Runs on every exit path, crashes included. */
  stopped?(ctx: ActorContext<M, Topics>): Promise<void> | void;
}

export type ActorFactory<M, Topics extends object> = () => Actor<M, Topics>;
