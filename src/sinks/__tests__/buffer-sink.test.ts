import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Supervisor } from "../../actors/supervisor.js";
import { Broker } from "../../bus/broker.js";
import type { PerformanceIndicators, PipelineTopics } from "../../pipeline/types.js";
import { BufferSinkActor, RetentionBuffer, requestSize, requestTail } from "../buffer-sink.js";
import { makeIndicators } from "../../../test/helpers.js";

describe("RetentionBuffer", () => {
  it("should keep the newest entries first and drop the oldest beyond capacity", () => {
    const buffer = new RetentionBuffer(50);
    for (let i = 0; i <= 50; i++) buffer.insert(makeIndicators({ price: i }));

    expect(buffer.size).toBe(50);
    const all = buffer.tail(100);
    expect(all).toHaveLength(50);
    expect(all[0].price).toBe(50);
    expect(all[49].price).toBe(1);
  });

  it("should return at most n entries", () => {
    const buffer = new RetentionBuffer(5);
    for (let i = 1; i <= 3; i++) buffer.insert(makeIndicators({ price: i }));

    expect(buffer.tail(2).map((e) => e.price)).toEqual([3, 2]);
    expect(buffer.tail(0)).toEqual([]);
  });

  it("should return copies rather than the stored records", () => {
    const buffer = new RetentionBuffer(5);
    const entry = makeIndicators();
    buffer.insert(entry);

    const [copy] = buffer.tail(1);
    expect(copy).toEqual(entry);
    expect(copy).not.toBe(entry);
  });
});

describe("BufferSinkActor", () => {
  let bus: Broker<PipelineTopics>;

  beforeEach(() => {
    bus = new Broker<PipelineTopics>();
  });

  afterEach(() => {
    bus.close();
  });

  it("should answer tail requests newest first", async () => {
    const sup = await Supervisor.start("buffer-sink", () => new BufferSinkActor(50), bus);
    for (const symbol of ["AAPL", "MSFT", "UBER"]) bus.publish("performance-indicators", makeIndicators({ symbol }));

    const tail = await requestTail(sup.ref, 2);
    expect(tail.map((e) => e.symbol)).toEqual(["UBER", "MSFT"]);
    expect(await requestSize(sup.ref)).toBe(3);
    await sup.stop();
  });

  it("should answer each query with the inserts that came before it", async () => {
    const sup = await Supervisor.start("buffer-sink", () => new BufferSinkActor(50), bus);

    bus.publish("performance-indicators", makeIndicators({ symbol: "AAPL" }));
    bus.publish("performance-indicators", makeIndicators({ symbol: "MSFT" }));
    const first = requestTail(sup.ref, 10);
    bus.publish("performance-indicators", makeIndicators({ symbol: "UBER" }));
    const second = requestTail(sup.ref, 10);

    const [a, b] = await Promise.all([first, second]);
    expect(a.map((e) => e.symbol)).toEqual(["MSFT", "AAPL"]);
    expect(b.map((e) => e.symbol)).toEqual(["UBER", "MSFT", "AAPL"]);
    await sup.stop();
  });

  it("should keep only the configured number of records", async () => {
    const sup = await Supervisor.start("buffer-sink", () => new BufferSinkActor(2), bus);
    for (let i = 1; i <= 4; i++) bus.publish("performance-indicators", makeIndicators({ price: i }));

    expect((await requestTail(sup.ref, 10)).map((e) => e.price)).toEqual([4, 3]);
    await sup.stop();
  });

  it("should never answer with more than the capacity under interleaved inserts and queries", async () => {
    const sup = await Supervisor.start("buffer-sink", () => new BufferSinkActor(50), bus);
    const queries: Array<Promise<PerformanceIndicators[]>> = [];
    for (let i = 1; i <= 120; i++) {
      bus.publish("performance-indicators", makeIndicators({ price: i }));
      if (i % 6 === 0) queries.push(requestTail(sup.ref, 100));
    }

    const answers = await Promise.all(queries);
    answers.forEach((answer, q) => {
      const inserted = (q + 1) * 6;
      expect(answer).toHaveLength(Math.min(inserted, 50));
      expect(answer[0]).toEqual(makeIndicators({ price: inserted }));
    });
    await sup.stop();
  });
});
