/**
 * In-memory Performance Tracker
 *
 * Aggregates fill and realized PnL events per symbol and exposes a snapshot.
 */

import Decimal from "decimal.js";
import { okAsync } from "neverthrow";
import type { ResultAsync } from "neverthrow";

import type { PerformanceEvent, PerformanceSinkError, PerformanceTrackerPort } from "../ports";

export interface PerformanceSnapshot {
  fills: number;
  buyVolume: string;
  sellVolume: string;
  notional: string;
  fees: string;
  realizedPnl: string;
  lastInventory: string;
  lastEventAt?: Date;
}

interface Totals {
  fills: number;
  buyVolume: Decimal;
  sellVolume: Decimal;
  notional: Decimal;
  fees: Decimal;
  realizedPnl: Decimal;
  lastInventory: string;
  lastEventAt?: Date;
}

const emptyTotals = (): Totals => ({
  fills: 0,
  buyVolume: new Decimal(0),
  sellVolume: new Decimal(0),
  notional: new Decimal(0),
  fees: new Decimal(0),
  realizedPnl: new Decimal(0),
  lastInventory: "0",
});

export class InMemoryPerformanceTracker implements PerformanceTrackerPort {
  private totals: Map<string, Totals> = new Map();

  record(event: PerformanceEvent): ResultAsync<void, PerformanceSinkError> {
    const totals = this.totals.get(event.symbol) ?? emptyTotals();

    switch (event.type) {
      case "fill": {
        const size = new Decimal(event.size);
        totals.fills++;
        if (event.side === "buy") totals.buyVolume = totals.buyVolume.plus(size);
        else totals.sellVolume = totals.sellVolume.plus(size);
        totals.notional = totals.notional.plus(size.mul(new Decimal(event.price)));
        totals.fees = totals.fees.plus(new Decimal(event.fee));
        totals.lastInventory = event.inventoryAfter;
        break;
      }
      case "realized_pnl":
        totals.realizedPnl = totals.realizedPnl.plus(new Decimal(event.pnlDelta));
        break;
    }

    totals.lastEventAt = event.ts;
    this.totals.set(event.symbol, totals);
    return okAsync(undefined);
  }

  /**
   * Snapshot one symbol, or the sum over all symbols when omitted
   */
  snapshot(symbol?: string): PerformanceSnapshot {
    if (symbol !== undefined) {
      return toSnapshot(this.totals.get(symbol) ?? emptyTotals());
    }

    const sum = emptyTotals();
    for (const totals of this.totals.values()) {
      sum.fills += totals.fills;
      sum.buyVolume = sum.buyVolume.plus(totals.buyVolume);
      sum.sellVolume = sum.sellVolume.plus(totals.sellVolume);
      sum.notional = sum.notional.plus(totals.notional);
      sum.fees = sum.fees.plus(totals.fees);
      sum.realizedPnl = sum.realizedPnl.plus(totals.realizedPnl);
      if (totals.lastEventAt && (!sum.lastEventAt || totals.lastEventAt > sum.lastEventAt)) {
        sum.lastEventAt = totals.lastEventAt;
      }
    }
    // Inventory is per symbol; an aggregate has none
    return toSnapshot(sum);
  }

  symbols(): string[] {
    return [...this.totals.keys()];
  }
}

function toSnapshot(totals: Totals): PerformanceSnapshot {
  return {
    fills: totals.fills,
    buyVolume: totals.buyVolume.toFixed(),
    sellVolume: totals.sellVolume.toFixed(),
    notional: totals.notional.toFixed(),
    fees: totals.fees.toFixed(),
    realizedPnl: totals.realizedPnl.toFixed(),
    lastInventory: totals.lastInventory,
    lastEventAt: totals.lastEventAt,
  };
}
