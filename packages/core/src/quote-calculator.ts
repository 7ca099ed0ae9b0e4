/**
 * Quote Calculator - Pure logic for quote price calculation
 *
 * - Inventory skew and funding skew, each bounded by max_skew_bps
 * - Multi-level post-only ladder around mid
 * - Prices on the tick grid, sizes truncated to the lot grid
 *
 * This module is pure (no I/O, no throw).
 */

import {
  BPS_DENOMINATOR,
  ceilToTick,
  clampAbs,
  Decimal,
  floorToTick,
  formatPrice,
  formatSize,
  roundToTick,
  toDecimal,
  truncateToLot,
  ZERO,
} from "./decimal";
import { hasBook, isDataStale } from "./market-state";
import type { MarketState, PriceStr, QuoteConfig, QuoteInput, QuoteSpec, QuoteStrategy, VenueRules } from "./types";

/**
 * Calculate inventory skew in bps
 *
 * skew_bps = clamp(inventory / max_inventory * max_skew_bps, ±max_skew_bps)
 *
 * Positive inventory → positive skew → both quotes move down (sell cheaper, buy cheaper)
 */
export function calculateInventorySkewBps(inventory: string, config: QuoteConfig): Decimal {
  const maxInventory = toDecimal(config.maxInventory);
  const maxSkew = toDecimal(config.maxSkewBps);
  if (maxInventory.lte(0)) return ZERO;

  return clampAbs(toDecimal(inventory).div(maxInventory).mul(maxSkew), maxSkew);
}

/**
 * Calculate funding skew in bps
 *
 * skew_bps = clamp(funding_rate * coefficient, ±max_skew_bps)
 *
 * Positive funding (longs pay) → positive skew → lean short.
 * Rates below the configured threshold are treated as noise.
 */
export function calculateFundingSkewBps(fundingRate: string, config: QuoteConfig): Decimal {
  const rate = toDecimal(fundingRate);
  if (rate.abs().lt(toDecimal(config.fundingThreshold))) return ZERO;

  return clampAbs(rate.mul(toDecimal(config.fundingSkewCoefficient)), toDecimal(config.maxSkewBps));
}

/**
 * Calculate total skew in bps, bounded again after summing
 */
export function calculateTotalSkewBps(state: MarketState, config: QuoteConfig): Decimal {
  const inventorySkew = calculateInventorySkewBps(state.inventory, config);
  const fundingSkew = calculateFundingSkewBps(state.fundingRate, config);

  return clampAbs(inventorySkew.plus(fundingSkew), toDecimal(config.maxSkewBps));
}

/**
 * Calculate bid and ask prices for one level
 *
 * bid_px = mid * (1 - (base_spread/2 + skew + level*step) / 10000)
 * ask_px = mid * (1 + (base_spread/2 - skew + level*step) / 10000)
 *
 * Each side's offset is floored at 0, rounding never moves a quote through
 * mid, and the bid stays strictly below the ask.
 */
export function calculateLevelPrices(
  midPx: PriceStr,
  skewBps: Decimal,
  level: number,
  config: QuoteConfig,
  venue: VenueRules,
): { bidPx: PriceStr; askPx: PriceStr } {
  const mid = toDecimal(midPx);
  const tick = toDecimal(venue.tickSize);
  const halfSpread = toDecimal(config.baseSpreadBps).div(2);
  const step = toDecimal(config.levelStepBps).mul(level);

  const bidOffsetBps = Decimal.max(ZERO, halfSpread.plus(skewBps).plus(step));
  const askOffsetBps = Decimal.max(ZERO, halfSpread.minus(skewBps).plus(step));

  let bid = roundToTick(mid.mul(BPS_DENOMINATOR.minus(bidOffsetBps)).div(BPS_DENOMINATOR), venue.tickSize);
  let ask = roundToTick(mid.mul(BPS_DENOMINATOR.plus(askOffsetBps)).div(BPS_DENOMINATOR), venue.tickSize);

  if (bid.gt(mid)) bid = floorToTick(mid, venue.tickSize);
  if (ask.lt(mid)) ask = ceilToTick(mid, venue.tickSize);
  if (bid.gte(ask) && tick.gt(0)) bid = ask.minus(tick);

  return {
    bidPx: formatPrice(bid, venue.tickSize),
    askPx: formatPrice(ask, venue.tickSize),
  };
}

/**
 * Generate the quote ladder
 *
 * Returns an empty sequence when the book is missing or stale.
 * Order: level ascending, bid before ask.
 */
export function generateQuotes(input: QuoteInput, skewBps?: Decimal): QuoteSpec[] {
  const { nowMs, state, config, venue, generation } = input;

  if (!hasBook(state)) return [];
  if (isDataStale(state.lastPriceUpdateMs, nowMs, config.staleAfterMs)) return [];

  const size = truncateToLot(toDecimal(config.orderSize), venue.lotSize);
  if (size.lte(0)) return [];
  const sizeStr = formatSize(size, venue.lotSize);

  const skew = skewBps ?? calculateTotalSkewBps(state, config);
  const quotes: QuoteSpec[] = [];

  for (let level = 0; level < config.levels; level++) {
    const { bidPx, askPx } = calculateLevelPrices(state.midPx, skew, level, config, venue);

    const bid: QuoteSpec = { side: "buy", level, price: bidPx, size: sizeStr, generation };
    const ask: QuoteSpec = { side: "sell", level, price: askPx, size: sizeStr, generation };

    if (toDecimal(bidPx).gt(0)) quotes.push(Object.freeze(bid));
    quotes.push(Object.freeze(ask));
  }

  return quotes;
}

/**
 * Default strategy: inventory + funding skewed ladder
 */
export const skewedLadderStrategy: QuoteStrategy = {
  name: "skewed-ladder",
  computeQuotes: input => generateQuotes(input),
};

/**
 * Symmetric ladder that ignores inventory and funding
 */
export const symmetricLadderStrategy: QuoteStrategy = {
  name: "symmetric-ladder",
  computeQuotes: input => generateQuotes(input, ZERO),
};

export const QUOTE_STRATEGIES = {
  "skewed-ladder": skewedLadderStrategy,
  "symmetric-ladder": symmetricLadderStrategy,
} as const satisfies Record<string, QuoteStrategy>;

export type QuoteStrategyName = keyof typeof QUOTE_STRATEGIES;
