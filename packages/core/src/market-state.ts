/**
 * Market State - Pure helpers over the MarketState value
 *
 * - mid / spread derivation
 * - Data stale detection
 * - Book presence check
 *
 * This module is pure (no I/O, no throw).
 */

import { BPS_DENOMINATOR, toDecimal } from "./decimal";
import type { BpsStr, MarketState, Ms, PriceStr, SizeStr } from "./types";

/**
 * Calculate mid price
 *
 * mid = (best_bid + best_ask) / 2
 */
export function calculateMid(bestBid: PriceStr, bestAsk: PriceStr): PriceStr {
  return toDecimal(bestBid).plus(toDecimal(bestAsk)).div(2).toFixed();
}

/**
 * Calculate spread in bps
 *
 * spread_bps = (best_ask - best_bid) / mid * 10000
 */
export function calculateSpreadBps(bestBid: PriceStr, bestAsk: PriceStr): BpsStr {
  const mid = toDecimal(calculateMid(bestBid, bestAsk));
  if (mid.isZero()) return "0";
  return toDecimal(bestAsk).minus(toDecimal(bestBid)).div(mid).mul(BPS_DENOMINATOR).toFixed(4);
}

/**
 * Calculate inventory notional
 */
export function calculateInventoryNotional(inventory: SizeStr, midPx: PriceStr | undefined): string {
  if (midPx === undefined) return "0";
  return toDecimal(inventory).mul(toDecimal(midPx)).toFixed();
}

/**
 * Whether the book is crossed (bid above ask)
 */
export function isCrossed(bestBid: PriceStr, bestAsk: PriceStr): boolean {
  return toDecimal(bestBid).gt(toDecimal(bestAsk));
}

/**
 * Whether both sides of the book and a mid are present
 */
export function hasBook(
  state: MarketState,
): state is MarketState & { midPx: PriceStr; bestBidPx: PriceStr; bestAskPx: PriceStr } {
  return state.midPx !== undefined && state.bestBidPx !== undefined && state.bestAskPx !== undefined;
}

/**
 * Check if data is stale
 *
 * A state that never saw a price update is stale.
 */
export function isDataStale(lastUpdateMs: Ms, nowMs: Ms, staleAfterMs: Ms): boolean {
  if (lastUpdateMs <= 0) return true;
  return nowMs - lastUpdateMs > staleAfterMs;
}

/**
 * Create an empty market state (no book, flat)
 */
export function createEmptyMarketState(marketId: string): MarketState {
  return Object.freeze({
    marketId,
    fundingRate: "0",
    inventory: "0",
    inventoryNotional: "0",
    lastPriceUpdateMs: 0,
    version: 0,
  });
}
