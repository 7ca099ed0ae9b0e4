/**
 * Market State Store - Latest state of one market for the hot path
 *
 * Single writer (ingestion and the lifecycle manager), lock-free readers:
 * every update builds a new frozen MarketState and swaps the reference, so a
 * tick never sees a half-applied update.
 */

import type { MarketState, SizeStr } from "@perp-mm/core";
import { calculateInventoryNotional, calculateMid, createEmptyMarketState, isCrossed, toDecimal } from "@perp-mm/core";
import type { BboEvent, FundingRateEvent } from "@perp-mm/adapters";
import { logger } from "@perp-mm/utils";
import type { Logger } from "@perp-mm/utils";

export type IngestResult = "applied" | "ignored";

export class MarketStateStore {
  private current: MarketState;
  private readonly log: Logger;

  constructor(
    readonly marketId: string,
    log: Logger = logger,
  ) {
    this.current = createEmptyMarketState(marketId);
    this.log = log;
  }

  /**
   * Current immutable snapshot
   */
  snapshot(): MarketState {
    return this.current;
  }

  /**
   * Apply a top-of-book update
   *
   * Crossed or non-positive books and updates older than the current book are dropped.
   */
  applyBbo(event: BboEvent): IngestResult {
    if (event.symbol !== this.marketId) return "ignored";

    const bid = toDecimal(event.bestBidPx);
    const ask = toDecimal(event.bestAskPx);
    if (bid.lte(0) || ask.lte(0) || isCrossed(event.bestBidPx, event.bestAskPx)) {
      this.log.warn("Dropping invalid book update", {
        marketId: this.marketId,
        bestBidPx: event.bestBidPx,
        bestAskPx: event.bestAskPx,
      });
      return "ignored";
    }

    const tsMs = event.ts.getTime();
    if (tsMs < this.current.lastPriceUpdateMs) {
      this.log.debug("Dropping out-of-order book update", { marketId: this.marketId, tsMs });
      return "ignored";
    }

    const midPx = calculateMid(event.bestBidPx, event.bestAskPx);
    this.swap({
      midPx,
      bestBidPx: event.bestBidPx,
      bestBidSz: event.bestBidSz,
      bestAskPx: event.bestAskPx,
      bestAskSz: event.bestAskSz,
      inventoryNotional: calculateInventoryNotional(this.current.inventory, midPx),
      lastPriceUpdateMs: tsMs,
    });
    return "applied";
  }

  /**
   * Apply a funding signal; non-increasing timestamps are dropped
   */
  applyFunding(event: FundingRateEvent): IngestResult {
    if (event.symbol !== this.marketId) return "ignored";

    const tsMs = event.ts.getTime();
    if (this.current.fundingTsMs !== undefined && tsMs <= this.current.fundingTsMs) {
      this.log.debug("Dropping stale funding update", {
        marketId: this.marketId,
        tsMs,
        lastTsMs: this.current.fundingTsMs,
      });
      return "ignored";
    }

    const rate = toDecimal(event.fundingRate, "NaN");
    if (!rate.isFinite()) {
      this.log.warn("Dropping invalid funding rate", { marketId: this.marketId, fundingRate: event.fundingRate });
      return "ignored";
    }

    this.swap({ fundingRate: rate.toFixed(), fundingTsMs: tsMs });
    return "applied";
  }

  /**
   * Record own inventory after a fill
   */
  setInventory(inventory: SizeStr): void {
    this.swap({
      inventory,
      inventoryNotional: calculateInventoryNotional(inventory, this.current.midPx),
    });
  }

  private swap(patch: Partial<Omit<MarketState, "marketId" | "version">>): void {
    this.current = Object.freeze({
      ...this.current,
      ...patch,
      version: this.current.version + 1,
    });
  }
}
