/**
 * In-memory Performance Tracker Unit Tests
 */

import { describe, expect, test } from "vitest";

import { InMemoryPerformanceTracker } from "../src/performance/in-memory-performance-tracker";
import type { PerformanceFillEvent } from "../src/ports";

const fill = (overrides: Partial<PerformanceFillEvent> = {}): PerformanceFillEvent => ({
  type: "fill",
  ts: new Date(1000),
  symbol: "BTC-PERP",
  clientOrderId: "c-1",
  exchangeOrderId: "x-1",
  side: "buy",
  price: "100",
  size: "0.5",
  fee: "0.01",
  inventoryAfter: "0.5",
  ...overrides,
});

describe("InMemoryPerformanceTracker", () => {
  test("should aggregate fills and realized pnl per symbol", async () => {
    const tracker = new InMemoryPerformanceTracker();

    await tracker.record(fill());
    await tracker.record(fill({ side: "sell", price: "102", size: "0.5", inventoryAfter: "0", ts: new Date(2000) }));
    await tracker.record({
      type: "realized_pnl",
      ts: new Date(2000),
      symbol: "BTC-PERP",
      pnlDelta: "0.98",
      cumulativePnl: "0.98",
    });

    expect(tracker.snapshot("BTC-PERP")).toEqual({
      fills: 2,
      buyVolume: "0.5",
      sellVolume: "0.5",
      notional: "101",
      fees: "0.02",
      realizedPnl: "0.98",
      lastInventory: "0",
      lastEventAt: new Date(2000),
    });
  });

  test("should sum across symbols when no symbol is given", async () => {
    const tracker = new InMemoryPerformanceTracker();

    await tracker.record(fill());
    await tracker.record(fill({ symbol: "ETH-PERP", price: "10", size: "2", ts: new Date(3000) }));

    const snapshot = tracker.snapshot();
    expect(snapshot.fills).toBe(2);
    expect(snapshot.buyVolume).toBe("2.5");
    expect(snapshot.notional).toBe("70");
    expect(snapshot.lastEventAt).toEqual(new Date(3000));
    expect(tracker.symbols()).toEqual(["BTC-PERP", "ETH-PERP"]);
  });

  test("should return an empty snapshot for an unknown symbol", () => {
    expect(new InMemoryPerformanceTracker().snapshot("SOL-PERP").fills).toBe(0);
  });
});
