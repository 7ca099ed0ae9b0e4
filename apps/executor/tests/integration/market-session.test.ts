/**
 * MarketSession Integration Tests
 *
 * Full ticks (quote → risk → reconcile) against an in-process gateway.
 */

import { describe, expect, test, vi } from "vitest";
import type { QuoteConfig, RiskLimits } from "@perp-mm/core";
import { QUOTE_STRATEGIES } from "@perp-mm/core";

import { MarketSession } from "../../src/services/market-session";
import type { SessionAlert } from "../../src/usecases/decision-cycle";
import { FakeExecutionPort, TEST_SYMBOL } from "../helpers/fake-execution-port";
import { bbo, funding, quoteConfig, RecordingPublisher, riskLimits, sequentialIds, venue } from "../helpers/fixtures";

const START_MS = 1_000_000;

function setup(options: { quote?: Partial<QuoteConfig>; risk?: Partial<RiskLimits> } = {}) {
  const gateway = new FakeExecutionPort();
  const performance = new RecordingPublisher();
  const clock = { now: START_MS };
  const alerts: SessionAlert[] = [];
  const onAlert = vi.fn((alert: SessionAlert) => {
    alerts.push(alert);
  });

  const session = new MarketSession({
    exchange: "test",
    symbol: TEST_SYMBOL,
    strategy: QUOTE_STRATEGIES["skewed-ladder"],
    quoteConfig: quoteConfig(options.quote),
    riskLimits: riskLimits(options.risk),
    venue: venue(),
    toleranceBps: "2",
    placeTimeoutMs: 5_000,
    startingEquity: "100000",
    gateway,
    performance,
    onAlert,
    now: () => clock.now,
    newClientOrderId: sequentialIds(),
  });

  const book = (bid = "49999", ask = "50001") => {
    session.handleMarketData(bbo(bid, ask, clock.now));
  };

  const tick = async () => {
    const outcome = await session.tick();
    if (!outcome) throw new Error("tick was skipped");
    return outcome;
  };

  return { gateway, performance, clock, alerts, onAlert, session, book, tick };
}

describe("MarketSession", () => {
  describe("quoting", () => {
    test("should quote symmetrically around mid when flat with zero funding", async () => {
      const { gateway, book, tick } = setup();
      book();

      const outcome = await tick();

      expect(outcome.directive).toBe("CONTINUE");
      expect(outcome.reasonCodes).toEqual(["NORMAL_CONDITIONS"]);
      expect(outcome.generation).toBe(1);
      expect(gateway.places.map(p => [p.side, p.price, p.size, p.postOnly])).toEqual([
        ["buy", "49975.0", "0.100", true],
        ["sell", "50025.0", "0.100", true],
      ]);
    });

    test("should lean both quotes down on positive funding", async () => {
      const { gateway, session, book, tick, clock } = setup();
      book();
      session.handleMarketData(funding("0.0005", clock.now));

      await tick();

      expect(gateway.places.map(p => p.price)).toEqual(["49950.0", "50000.0"]);
    });

    test("should leave resting orders alone while targets are unchanged", async () => {
      const { gateway, book, tick } = setup();
      book();
      await tick();
      gateway.ackAll();

      const outcome = await tick();

      expect(outcome.generation).toBe(1);
      expect(outcome.reconcile).toEqual({ placed: 0, cancelled: 0, amended: 0, failed: 0 });
      expect(gateway.places).toHaveLength(2);
    });

    test("should cancel orders of a superseded generation", async () => {
      const { gateway, session, book, tick } = setup();
      book();
      await tick();
      gateway.ackAll();

      book("50099", "50101");
      const outcome = await tick();

      expect(outcome.generation).toBe(2);
      expect(gateway.cancels.map(c => c.clientOrderId)).toEqual(["ord-1", "ord-2"]);
      expect(gateway.places.slice(2).map(p => p.price)).toEqual(["50075.0", "50125.1"]);

      gateway.cancelled("ord-1");
      gateway.cancelled("ord-2");
      expect(session.openOrders().map(o => [o.clientOrderId, o.generation])).toEqual([
        ["ord-3", 2],
        ["ord-4", 2],
      ]);
    });

    test("should pull quotes when market data goes stale", async () => {
      const { gateway, clock, book, tick } = setup();
      book();
      await tick();
      gateway.ackAll();

      clock.now += 3_000;
      const outcome = await tick();

      expect(outcome.approved).toEqual([]);
      expect(outcome.reasonCodes).toEqual(["NORMAL_CONDITIONS", "MARKET_DATA_STALE"]);
      expect(gateway.cancels).toHaveLength(2);
    });

    test("should report a missing book", async () => {
      const { gateway, tick } = setup();

      const outcome = await tick();

      expect(outcome.reasonCodes).toEqual(["NORMAL_CONDITIONS", "NO_BOOK"]);
      expect(gateway.places).toEqual([]);
    });
  });

  describe("inventory limits", () => {
    test("should only quote the reducing side near the inventory limit", async () => {
      const { gateway, session, book, tick } = setup();
      gateway.fill("manual", { side: "buy", size: "0.9", price: "50000", seq: 1, exchangeOrderId: "ex-manual" });
      book();

      const outcome = await tick();

      expect(session.marketState().inventory).toBe("0.9");
      expect(outcome.directive).toBe("REDUCE_ONLY");
      expect(outcome.reasonCodes).toEqual(["INVENTORY_SOFT_LIMIT"]);
      expect(gateway.places).toEqual([
        {
          clientOrderId: "ord-1",
          symbol: TEST_SYMBOL,
          side: "sell",
          price: "50000.0",
          size: "0.100",
          postOnly: true,
          reduceOnly: true,
        },
      ]);
    });

    test("should flatten a hard breach until inventory is flat", async () => {
      const { gateway, session, book, tick } = setup();
      gateway.fill("manual", { side: "buy", size: "1.2", price: "50000", seq: 1, exchangeOrderId: "ex-manual" });
      book();

      const first = await tick();
      expect(first.directive).toBe("FLATTEN");
      expect(first.reasonCodes).toEqual(["INVENTORY_HARD_LIMIT"]);
      expect(gateway.lastPlace()).toMatchObject({
        side: "sell",
        price: "49900.0",
        size: "1.200",
        postOnly: false,
        reduceOnly: true,
      });

      gateway.ack("ord-1");
      gateway.fill("ord-1", { side: "sell", size: "0.7", price: "49900.0" });

      const second = await tick();
      expect(second.directive).toBe("FLATTEN");
      expect(second.reasonCodes).toEqual(["FLATTEN_IN_PROGRESS"]);
      expect(gateway.cancels.map(c => c.clientOrderId)).toEqual(["ord-1"]);
      expect(gateway.lastPlace()).toMatchObject({ clientOrderId: "ord-2", size: "0.500", price: "49900.0" });

      gateway.ack("ord-2");
      gateway.fill("ord-2", { side: "sell", size: "0.500", price: "49900.0" });
      expect(session.marketState().inventory).toBe("0");

      const third = await tick();
      expect(third.directive).toBe("CONTINUE");
      expect(gateway.places.slice(2).map(p => p.side)).toEqual(["buy", "sell"]);
    });
  });

  describe("halt", () => {
    test("should halt after too many consecutive rejects and stay halted until reset", async () => {
      const { gateway, session, book, tick, onAlert } = setup();
      book();
      gateway.placeError = { type: "network", message: "connection reset" };

      await tick();
      await tick();
      expect(session.consecutiveRejects()).toBe(4);

      const halted = await tick();
      expect(halted.directive).toBe("HALT");
      expect(halted.reasonCodes).toEqual(["SYSTEMIC_FAILURE"]);
      expect(onAlert).toHaveBeenCalledTimes(1);
      expect(onAlert).toHaveBeenCalledWith(
        expect.objectContaining({ symbol: TEST_SYMBOL, directive: "HALT", consecutiveRejects: 4 }),
      );

      gateway.placeError = undefined;
      expect((await tick()).directive).toBe("HALT");
      expect(onAlert).toHaveBeenCalledTimes(1);
      expect(gateway.places).toHaveLength(4);

      session.resetHalt();
      const resumed = await tick();
      expect(resumed.directive).toBe("CONTINUE");
      expect(session.consecutiveRejects()).toBe(0);
      expect(gateway.places).toHaveLength(6);
    });

    test("should cancel resting orders while halted", async () => {
      const { gateway, session, book, tick } = setup({ risk: { maxConsecutiveRejects: 1 } });
      book();
      await tick();
      gateway.ack("ord-1");
      gateway.reject("ord-2");
      await tick();
      gateway.reject("ord-3");

      const halted = await tick();

      expect(halted.directive).toBe("HALT");
      expect(halted.haltCancels).toBe(1);
      expect(gateway.cancels.map(c => c.clientOrderId)).toEqual(["ord-1"]);
      expect(session.status().directive).toBe("HALT");
    });

    test("should keep an operator reset made while a halted tick is cancelling", async () => {
      const { gateway, session, book, tick } = setup({ risk: { maxConsecutiveRejects: 1 } });
      book();
      await tick();
      gateway.ack("ord-1");
      gateway.reject("ord-2");
      await tick();
      gateway.reject("ord-3");
      gateway.cancelError = { type: "network", message: "connection reset" };
      expect((await tick()).directive).toBe("HALT");
      expect(session.riskState().halted).toBe(true);

      gateway.cancelError = undefined;
      const release = gateway.holdCancels();
      const inFlight = session.tick();
      expect(gateway.cancels.map(c => c.clientOrderId)).toEqual(["ord-1", "ord-1"]);

      session.resetHalt();
      expect(session.riskState().halted).toBe(false);
      release();

      expect((await inFlight)?.directive).toBe("HALT");
      expect(session.riskState()).toMatchObject({ halted: false, directive: "CONTINUE" });
      expect(session.consecutiveRejects()).toBe(0);
      expect((await tick()).directive).toBe("CONTINUE");
    });
  });

  describe("order lifecycle", () => {
    test("should apply a duplicated fill once", async () => {
      const { gateway, session, book, tick } = setup();
      book();
      await tick();
      gateway.ack("ord-1");

      gateway.fill("ord-1", { side: "buy", size: "0.05", price: "49975.0", seq: 2 });
      gateway.fill("ord-1", { side: "buy", size: "0.05", price: "49975.0", seq: 2 });

      expect(session.getOrder("ord-1")?.filledSize).toBe("0.05");
      expect(session.marketState().inventory).toBe("0.05");
    });

    test("should cancel an order acked after its timeout without counting another reject", async () => {
      const { gateway, clock, session, book, tick } = setup();
      book();
      await tick();

      clock.now += 5_000;
      book();
      await tick();
      expect(session.consecutiveRejects()).toBe(2);

      gateway.ack("ord-1");
      await session.whenIdle();

      expect(session.getOrder("ord-1")).toMatchObject({ status: "live", cancelRequested: true });
      expect(gateway.cancels.map(c => c.clientOrderId)).toEqual(["ord-1"]);
      expect(session.consecutiveRejects()).toBe(2);
    });

    test("should skip a tick while the previous one is still running", async () => {
      const { session, book } = setup();
      book();

      const first = session.tick();
      const second = session.tick();

      expect(await second).toBeUndefined();
      expect((await first)?.directive).toBe("CONTINUE");
      expect(session.status().skippedTicks).toBe(1);
    });

    test("should cancel every open order on request", async () => {
      const { gateway, session, book, tick } = setup();
      book();
      await tick();
      gateway.ackAll();

      expect(await session.cancelAll()).toBe(2);
      gateway.cancelled("ord-1");
      gateway.cancelled("ord-2");

      expect(gateway.cancels).toHaveLength(2);
      expect(session.openOrders()).toEqual([]);
    });
  });
});
