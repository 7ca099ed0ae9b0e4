/**
 * PerformancePublisher Unit Tests
 */

import { afterEach, describe, expect, test, vi } from "vitest";
import { errAsync, okAsync } from "neverthrow";
import type { PerformanceFillEvent, PerformanceEvent, PerformanceTrackerPort } from "@perp-mm/adapters";
import { InMemoryPerformanceTracker } from "@perp-mm/adapters";
import type { EventRepository } from "@perp-mm/repositories";

import {
  createFanOutPerformanceSink,
  createRepositoryPerformanceSink,
  PerformancePublisher,
} from "../../src/services/performance-publisher";
import { TEST_SYMBOL } from "../helpers/fake-execution-port";

const fillEvent = (clientOrderId: string, overrides: Partial<PerformanceFillEvent> = {}): PerformanceFillEvent => ({
  type: "fill",
  ts: new Date(1_000),
  symbol: TEST_SYMBOL,
  clientOrderId,
  exchangeOrderId: `ex-${clientOrderId}`,
  side: "buy",
  price: "50000",
  size: "0.1",
  fee: "0.5",
  inventoryAfter: "0.1",
  ...overrides,
});

function recordingSink() {
  const received: PerformanceEvent[] = [];
  const sink: PerformanceTrackerPort = {
    record: event => {
      received.push(event);
      return okAsync(undefined);
    },
  };
  return { sink, received };
}

describe("PerformancePublisher", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("should only deliver on drain", async () => {
    const { sink, received } = recordingSink();
    const publisher = new PerformancePublisher(sink, { capacity: 10 });

    publisher.publish(fillEvent("a"));
    expect(received).toEqual([]);
    expect(publisher.pendingCount()).toBe(1);

    expect(await publisher.drain()).toBe(1);
    expect(received.map(e => (e.type === "fill" ? e.clientOrderId : "-"))).toEqual(["a"]);
    expect(publisher.pendingCount()).toBe(0);
  });

  test("should drop the oldest event when full", async () => {
    const { sink, received } = recordingSink();
    const publisher = new PerformancePublisher(sink, { capacity: 2 });

    publisher.publish(fillEvent("a"));
    publisher.publish(fillEvent("b"));
    publisher.publish(fillEvent("c"));
    await publisher.drain();

    expect(publisher.droppedCount()).toBe(1);
    expect(received.map(e => (e.type === "fill" ? e.clientOrderId : "-"))).toEqual(["b", "c"]);
  });

  test("should requeue undelivered events when the sink fails", async () => {
    let failures = 1;
    const received: PerformanceEvent[] = [];
    const sink: PerformanceTrackerPort = {
      record: event => {
        if (failures > 0) {
          failures--;
          return errAsync({ type: "write_failed" as const, message: "disk full" });
        }
        received.push(event);
        return okAsync(undefined);
      },
    };
    const publisher = new PerformancePublisher(sink, { capacity: 10 });
    publisher.publish(fillEvent("a"));
    publisher.publish(fillEvent("b"));

    expect(await publisher.drain()).toBe(0);
    expect(publisher.pendingCount()).toBe(2);

    expect(await publisher.drain()).toBe(2);
    expect(received).toHaveLength(2);
  });

  test("should share a drain already in flight", async () => {
    const { sink } = recordingSink();
    const record = vi.spyOn(sink, "record");
    const publisher = new PerformancePublisher(sink, { capacity: 10 });
    publisher.publish(fillEvent("a"));

    const [first, second] = await Promise.all([publisher.drain(), publisher.drain()]);

    expect(first).toBe(1);
    expect(second).toBe(1);
    expect(record).toHaveBeenCalledTimes(1);
  });

  test("should drain on its interval and once more on stop", async () => {
    vi.useFakeTimers();
    const tracker = new InMemoryPerformanceTracker();
    const publisher = new PerformancePublisher(tracker, { capacity: 10 });
    publisher.start(100);

    publisher.publish(fillEvent("a"));
    await vi.advanceTimersByTimeAsync(100);
    expect(publisher.pendingCount()).toBe(0);
    await publisher.drain();
    expect(tracker.snapshot(TEST_SYMBOL).fills).toBe(1);

    publisher.publish(fillEvent("b"));
    await publisher.stop();
    expect(tracker.snapshot(TEST_SYMBOL).fills).toBe(2);
  });
});

describe("createFanOutPerformanceSink", () => {
  test("should record into every sink", async () => {
    const first = new InMemoryPerformanceTracker();
    const second = new InMemoryPerformanceTracker();
    const sink = createFanOutPerformanceSink([first, second]);

    const result = await sink.record(fillEvent("a"));

    expect(result.isOk()).toBe(true);
    expect(first.snapshot(TEST_SYMBOL).fills).toBe(1);
    expect(second.snapshot(TEST_SYMBOL).fills).toBe(1);
  });

  test("should retry an event only on the sinks that failed it", async () => {
    const steady = new InMemoryPerformanceTracker();
    let attempts = 0;
    const flaky: PerformanceTrackerPort = {
      record: () => {
        attempts++;
        return attempts === 1
          ? errAsync({ type: "write_failed" as const, message: "disk full" })
          : okAsync(undefined);
      },
    };
    const sink = createFanOutPerformanceSink([steady, flaky]);
    const event = fillEvent("a");

    expect((await sink.record(event)).isErr()).toBe(true);
    expect((await sink.record(event)).isOk()).toBe(true);

    expect(steady.snapshot(TEST_SYMBOL).fills).toBe(1);
    expect(attempts).toBe(2);
  });
});

describe("createRepositoryPerformanceSink", () => {
  const repository = () => {
    const repo: EventRepository = {
      queueOrderEvent: vi.fn(),
      queueFill: vi.fn(),
      flush: vi.fn(),
      startPeriodicFlush: vi.fn(),
      stop: vi.fn(),
      pendingCount: vi.fn(),
    };
    return repo;
  };

  test("should queue fills as fill records", async () => {
    const repo = repository();
    const sink = createRepositoryPerformanceSink(repo, "paper");

    await sink.record(fillEvent("a", { realizedPnlDelta: "-0.5", liquidity: "maker" }));

    expect(repo.queueFill).toHaveBeenCalledWith({
      ts: new Date(1_000),
      exchange: "paper",
      symbol: TEST_SYMBOL,
      clientOrderId: "a",
      exchangeOrderId: "ex-a",
      side: "buy",
      fillPx: "50000",
      fillSz: "0.1",
      fee: "0.5",
      liquidity: "maker",
      inventoryAfter: "0.1",
      realizedPnlDelta: "-0.5",
      rawJson: null,
    });
  });

  test("should not queue realized PnL events", async () => {
    const repo = repository();
    const sink = createRepositoryPerformanceSink(repo, "paper");

    await sink.record({ type: "realized_pnl", ts: new Date(1_000), symbol: TEST_SYMBOL, pnlDelta: "1", cumulativePnl: "1" });

    expect(repo.queueFill).not.toHaveBeenCalled();
  });
});
