/**
 * EventRepository Unit Tests
 *
 * Batching, re-queue on failure and periodic flush, over an in-process store.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "@perp-mm/utils";

import { createEventRepository } from "../src/postgres/event-repository";
import type { EventStore, FillRecord, OrderEventRecord } from "../src/interfaces/event-repository";

// ─────────────────────────────────────────────────────────────────────────────
// In-process store
// ─────────────────────────────────────────────────────────────────────────────

function createMemoryStore() {
  const orderEvents: OrderEventRecord[] = [];
  const fills: FillRecord[] = [];
  let failNext = 0;

  const store: EventStore = {
    insertOrderEvents(records) {
      if (failNext > 0) {
        failNext--;
        return Promise.reject(new Error("connection refused"));
      }
      orderEvents.push(...records);
      return Promise.resolve();
    },
    insertFills(records) {
      if (failNext > 0) {
        failNext--;
        return Promise.reject(new Error("connection refused"));
      }
      fills.push(...records);
      return Promise.resolve();
    },
  };

  return {
    store,
    orderEvents,
    fills,
    failTimes: (n: number) => {
      failNext = n;
    },
  };
}

const createOrderEvent = (clientOrderId = "client-1"): OrderEventRecord => ({
  ts: new Date("2024-01-01T12:00:00Z"),
  exchange: "paper",
  symbol: "BTC-PERP",
  clientOrderId,
  exchangeOrderId: null,
  eventType: "place",
  side: "buy",
  level: 0,
  generation: 1,
  px: "50000",
  sz: "0.1",
  postOnly: true,
  reduceOnly: false,
  reason: null,
  directive: "CONTINUE",
  rawJson: {},
});

const createFill = (): FillRecord => ({
  ts: new Date("2024-01-01T12:00:01Z"),
  exchange: "paper",
  symbol: "BTC-PERP",
  clientOrderId: "client-1",
  exchangeOrderId: "paper_1",
  side: "buy",
  fillPx: "50000",
  fillSz: "0.1",
  fee: "0.1",
  liquidity: "maker",
  inventoryAfter: "0.1",
  realizedPnlDelta: null,
  rawJson: null,
});

describe("createEventRepository", () => {
  beforeEach(() => {
    logger.setSink({ write: () => undefined });
  });

  afterEach(() => {
    logger.clearSink();
    vi.useRealTimers();
  });

  it("should write queued events and fills on flush", async () => {
    const memory = createMemoryStore();
    const repo = createEventRepository(memory.store);

    repo.queueOrderEvent(createOrderEvent("a"));
    repo.queueOrderEvent(createOrderEvent("b"));
    repo.queueFill(createFill());

    const result = await repo.flush();

    expect(result.isOk()).toBe(true);
    expect(memory.orderEvents.map(e => e.clientOrderId)).toEqual(["a", "b"]);
    expect(memory.fills).toHaveLength(1);
    expect(repo.pendingCount()).toEqual({ orderEvents: 0, fills: 0 });
  });

  it("should succeed without touching the store when nothing is queued", async () => {
    const memory = createMemoryStore();
    memory.failTimes(1);

    const result = await createEventRepository(memory.store).flush();

    expect(result.isOk()).toBe(true);
  });

  it("should re-queue a failed batch and write it on the next flush", async () => {
    const memory = createMemoryStore();
    const repo = createEventRepository(memory.store);
    memory.failTimes(1);

    repo.queueOrderEvent(createOrderEvent("a"));
    repo.queueFill(createFill());

    const failed = await repo.flush();
    expect(failed.isErr() && failed.error).toEqual({ type: "DB_ERROR", message: "connection refused" });
    expect(repo.pendingCount()).toEqual({ orderEvents: 1, fills: 1 });

    repo.queueOrderEvent(createOrderEvent("b"));
    const retried = await repo.flush();

    expect(retried.isOk()).toBe(true);
    expect(memory.orderEvents.map(e => e.clientOrderId)).toEqual(["a", "b"]);
    expect(memory.fills).toHaveLength(1);
  });

  it("should not re-write order events when only the fill insert failed", async () => {
    const memory = createMemoryStore();
    const repo = createEventRepository(memory.store);

    repo.queueOrderEvent(createOrderEvent("a"));
    repo.queueFill(createFill());

    // First insert (order events) succeeds, the fill insert fails
    const originalInsertFills = memory.store.insertFills;
    memory.store.insertFills = () => Promise.reject(new Error("timeout"));
    await repo.flush();
    memory.store.insertFills = originalInsertFills;

    expect(repo.pendingCount()).toEqual({ orderEvents: 0, fills: 1 });
    await repo.flush();

    expect(memory.orderEvents).toHaveLength(1);
    expect(memory.fills).toHaveLength(1);
  });

  it("should flush periodically and on stop", async () => {
    vi.useFakeTimers();
    const memory = createMemoryStore();
    const repo = createEventRepository(memory.store);

    repo.startPeriodicFlush(1000);
    repo.queueOrderEvent(createOrderEvent("a"));
    await vi.advanceTimersByTimeAsync(1000);

    expect(memory.orderEvents).toHaveLength(1);

    repo.queueOrderEvent(createOrderEvent("b"));
    const result = await repo.stop();

    expect(result.isOk()).toBe(true);
    expect(memory.orderEvents.map(e => e.clientOrderId)).toEqual(["a", "b"]);
  });
});
