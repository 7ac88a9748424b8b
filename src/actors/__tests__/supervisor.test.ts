import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Supervisor } from "../supervisor.js";
import type { Actor, ActorContext, Reply } from "../actor.js";
import { Broker } from "../../bus/broker.js";
import { CallTimeoutError, MailboxClosedError } from "../../errors.js";
import { getMetrics, resetMetrics } from "../../ops/metrics.js";

interface TestTopics {
  numbers: number;
}

type CounterMsg =
  | { type: "add"; by: number }
  | { type: "boom" }
  | { type: "ignore"; reply: Reply<number> }
  | { type: "get"; reply: Reply<number> };

/** Record of every instance the factory produced. */
interface Lifecycle {
  created: number;
  released: number[];
}

class CounterActor implements Actor<CounterMsg, TestTopics> {
  private count = 0;

  constructor(
    private readonly life: Lifecycle,
    private readonly failStart = false,
  ) {
    life.created++;
  }

  started(ctx: ActorContext<CounterMsg, TestTopics>): void {
    if (this.failStart) throw new Error("no disk");
    ctx.subscribe("numbers", (by) => ({ type: "add", by }));
  }

  handle(msg: CounterMsg): void {
    switch (msg.type) {
      case "add":
        this.count += msg.by;
        return;
      case "boom":
        throw new Error("boom");
      case "ignore":
        return;
      case "get":
        msg.reply.resolve(this.count);
        return;
    }
  }

  stopped(): void {
    this.life.released.push(this.count);
  }
}

type SlowMsg = { type: "crash"; afterMs: number } | { type: "noop" };

interface SlowTimings {
  startMs: number;
  stopMs: number;
}

/** Worker whose hooks take time, recording when its resource is opened and closed. */
class SlowActor implements Actor<SlowMsg, TestTopics> {
  constructor(
    private readonly id: number,
    private readonly events: string[],
    private readonly timings: SlowTimings,
  ) {}

  async started(ctx: ActorContext<SlowMsg, TestTopics>): Promise<void> {
    await sleep(this.timings.startMs);
    this.events.push(`opened ${this.id}`);
    ctx.subscribe("numbers", () => ({ type: "noop" }));
  }

  async handle(msg: SlowMsg): Promise<void> {
    if (msg.type === "noop") return;
    await sleep(msg.afterMs);
    throw new Error("late boom");
  }

  async stopped(): Promise<void> {
    await sleep(this.timings.stopMs);
    this.events.push(`closed ${this.id}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function get(sup: Supervisor<CounterMsg, TestTopics>): Promise<number> {
  return sup.ref.call<number>((reply) => ({ type: "get", reply }));
}

describe("Supervisor", () => {
  let bus: Broker<TestTopics>;
  let life: Lifecycle;

  beforeEach(() => {
    bus = new Broker<TestTopics>();
    life = { created: 0, released: [] };
    resetMetrics();
  });

  afterEach(() => {
    bus.close();
  });

  it("should start a worker and answer calls", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);

    expect(sup.state).toBe("running");
    sup.ref.send({ type: "add", by: 2 });
    sup.ref.send({ type: "add", by: 3 });
    expect(await get(sup)).toBe(5);
    await sup.stop();
  });

  it("should route subscribed topics into the mailbox", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);

    bus.publish("numbers", 4);
    bus.publish("numbers", 6);

    expect(await get(sup)).toBe(10);
    await sup.stop();
  });

  it("should restart a crashed worker with fresh state behind the same ref", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);
    const ref = sup.ref;
    ref.send({ type: "add", by: 7 });
    ref.send({ type: "boom" });

    await vi.waitFor(() => {
      expect(sup.restarts).toBe(1);
      expect(sup.state).toBe("running");
    });

    expect(sup.ref).toBe(ref);
    expect(await get(sup)).toBe(0);
    expect(life.created).toBe(2);
    expect(life.released).toEqual([7]);
    expect(getMetrics().restarts).toBe(1);
    await sup.stop();
  });

  it("should re-register subscriptions after a restart", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);
    sup.ref.send({ type: "boom" });

    await vi.waitFor(() => expect(sup.state).toBe("running"));

    expect(bus.subscriberCount("numbers")).toBe(1);
    bus.publish("numbers", 5);
    expect(await get(sup)).toBe(5);
    await sup.stop();
  });

  it("should fail the first start and release the instance", async () => {
    await expect(Supervisor.start("counter", () => new CounterActor(life, true), bus)).rejects.toThrow("no disk");
    expect(life.released).toEqual([0]);
    expect(bus.subscriberCount("numbers")).toBe(0);
  });

  it("should back off and retry when a restart fails to start", async () => {
    let instance = 0;
    const sup = await Supervisor.start("counter", () => new CounterActor(life, ++instance === 2), bus, {
      restartBackoffMs: 10,
    });
    sup.ref.send({ type: "boom" });

    await vi.waitFor(() => {
      expect(life.created).toBe(3);
      expect(sup.state).toBe("running");
    });

    expect(await get(sup)).toBe(0);
    await sup.stop();
  });

  it("should time out a call that is never answered", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus, { callTimeoutMs: 20 });

    await expect(sup.ref.call<number>((reply) => ({ type: "ignore", reply }))).rejects.toBeInstanceOf(CallTimeoutError);
    await sup.stop();
  });

  it("should drain the backlog on stop and refuse calls afterwards", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);
    sup.ref.send({ type: "add", by: 1 });
    sup.ref.send({ type: "add", by: 1 });
    sup.ref.send({ type: "add", by: 1 });

    await sup.stop();

    expect(sup.state).toBe("stopped");
    expect(life.released).toEqual([3]);
    expect(sup.ref.send({ type: "add", by: 1 })).toBe(false);
    await expect(get(sup)).rejects.toBeInstanceOf(MailboxClosedError);
    expect(bus.subscriberCount("numbers")).toBe(0);
  });

  it("should not restart a worker after stop", async () => {
    const sup = await Supervisor.start("counter", () => new CounterActor(life), bus);
    await sup.stop();

    expect(sup.restarts).toBe(0);
    expect(life.created).toBe(1);
    expect(sup.status()).toEqual({ name: "counter", state: "stopped", restarts: 0 });
  });

  it("should wait for the stop hook of an instance that crashes while stopping", async () => {
    const events: string[] = [];
    const sup = await Supervisor.start("slow", () => new SlowActor(1, events, { startMs: 0, stopMs: 50 }), bus);
    sup.ref.send({ type: "crash", afterMs: 10 });

    await sup.stop();
    events.push("stop resolved");

    expect(events).toEqual(["opened 1", "closed 1", "stop resolved"]);
    expect(sup.state).toBe("stopped");
    expect(sup.restarts).toBe(0);
  });

  it("should wait for a pending crash cleanup when stopped between instances", async () => {
    const events: string[] = [];
    const sup = await Supervisor.start("slow", () => new SlowActor(1, events, { startMs: 0, stopMs: 200 }), bus);
    sup.ref.send({ type: "crash", afterMs: 0 });
    await vi.waitFor(() => expect(sup.state).toBe("stopping"), { interval: 5 });

    await sup.stop();
    events.push("stop resolved");

    expect(events).toEqual(["opened 1", "closed 1", "stop resolved"]);
    expect(sup.restarts).toBe(0);
  });

  it("should release an instance that was still starting when stop was requested", async () => {
    const events: string[] = [];
    let instance = 0;
    const sup = await Supervisor.start(
      "slow",
      () => {
        instance++;
        return new SlowActor(instance, events, { startMs: instance === 1 ? 0 : 100, stopMs: 0 });
      },
      bus,
    );
    sup.ref.send({ type: "crash", afterMs: 0 });
    await vi.waitFor(() => expect(instance).toBe(2));

    await sup.stop();

    expect(events).toEqual(["opened 1", "closed 1", "opened 2", "closed 2"]);
    expect(sup.state).toBe("stopped");
    expect(bus.subscriberCount("numbers")).toBe(0);
  });
});
