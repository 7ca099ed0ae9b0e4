/**
 * Shared builders for core tests
 */

import type { MarketState, QuoteConfig, RiskLimits, VenueRules } from "../src/types";
import { calculateInventoryNotional, calculateMid } from "../src/market-state";

export const createDefaultConfig = (overrides: Partial<QuoteConfig> = {}): QuoteConfig => ({
  baseSpreadBps: "10",
  maxSkewBps: "20",
  fundingSkewCoefficient: "10000",
  fundingThreshold: "0",
  orderSize: "0.1",
  levels: 1,
  levelStepBps: "5",
  maxInventory: "1",
  staleAfterMs: 2000,
  ...overrides,
});

export const createDefaultVenue = (overrides: Partial<VenueRules> = {}): VenueRules => ({
  tickSize: "0.1",
  lotSize: "0.001",
  ...overrides,
});

export const createDefaultLimits = (overrides: Partial<RiskLimits> = {}): RiskLimits => ({
  maxInventory: "1",
  maxInventoryNotional: "100000",
  maxDrawdown: "0.05",
  maxConsecutiveRejects: 3,
  softInventoryRatio: "0.8",
  flattenMaxSlippageBps: "20",
  maxQuoteNotional: "0",
  lossCooldownMs: 0,
  ...overrides,
});

/**
 * Market state with a book around the given bid/ask
 */
export const createMarketState = (
  params: { bid?: string; ask?: string; inventory?: string; fundingRate?: string; lastPriceUpdateMs?: number } = {},
): MarketState => {
  const bid = params.bid ?? "49999";
  const ask = params.ask ?? "50001";
  const inventory = params.inventory ?? "0";
  const midPx = calculateMid(bid, ask);

  return {
    marketId: "BTC-PERP",
    midPx,
    bestBidPx: bid,
    bestBidSz: "1",
    bestAskPx: ask,
    bestAskSz: "1",
    fundingRate: params.fundingRate ?? "0",
    inventory,
    inventoryNotional: calculateInventoryNotional(inventory, midPx),
    lastPriceUpdateMs: params.lastPriceUpdateMs ?? 1000,
    version: 1,
  };
};
