/**
 * Shared builders for executor tests
 */

import type { QuoteConfig, RiskLimits, VenueRules } from "@perp-mm/core";
import type { BboEvent, FundingRateEvent, PerformanceEvent } from "@perp-mm/adapters";
import { InMemoryPerformanceTracker } from "@perp-mm/adapters";

import { PerformancePublisher } from "../../src/services/performance-publisher";
import { TEST_SYMBOL } from "./fake-execution-port";

export const quoteConfig = (overrides: Partial<QuoteConfig> = {}): QuoteConfig => ({
  baseSpreadBps: "10",
  maxSkewBps: "20",
  fundingSkewCoefficient: "10000",
  fundingThreshold: "0",
  orderSize: "0.1",
  levels: 1,
  levelStepBps: "5",
  maxInventory: "1",
  staleAfterMs: 2_000,
  ...overrides,
});

export const riskLimits = (overrides: Partial<RiskLimits> = {}): RiskLimits => ({
  maxInventory: "1",
  maxInventoryNotional: "1000000",
  maxDrawdown: "0",
  maxConsecutiveRejects: 3,
  softInventoryRatio: "0.8",
  flattenMaxSlippageBps: "20",
  maxQuoteNotional: "0",
  lossCooldownMs: 0,
  ...overrides,
});

export const venue = (): VenueRules => ({ tickSize: "0.1", lotSize: "0.001" });

export const bbo = (bid: string, ask: string, tsMs: number, symbol = TEST_SYMBOL): BboEvent => ({
  type: "bbo",
  ts: new Date(tsMs),
  exchange: "test",
  symbol,
  bestBidPx: bid,
  bestBidSz: "1",
  bestAskPx: ask,
  bestAskSz: "1",
});

export const funding = (rate: string, tsMs: number, symbol = TEST_SYMBOL): FundingRateEvent => ({
  type: "funding",
  ts: new Date(tsMs),
  exchange: "test",
  symbol,
  fundingRate: rate,
});

/**
 * Publisher that records every published event synchronously
 */
export class RecordingPublisher extends PerformancePublisher {
  readonly events: PerformanceEvent[] = [];

  constructor() {
    super(new InMemoryPerformanceTracker(), { capacity: 1_000 });
  }

  override publish(event: PerformanceEvent): void {
    this.events.push(event);
    super.publish(event);
  }
}

/**
 * Deterministic client order ids: ord-1, ord-2, ...
 */
export const sequentialIds = (): (() => string) => {
  let n = 0;
  return () => `ord-${String(++n)}`;
};
