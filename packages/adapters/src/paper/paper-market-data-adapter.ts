/**
 * Paper Market Data Adapter
 *
 * Synthetic BBO random walk and funding rate feed for dry runs.
 * Randomness is injectable so runs can be reproduced.
 */

import Decimal from "decimal.js";
import { err, ok } from "neverthrow";
import type { Result } from "neverthrow";
import { logger } from "@perp-mm/utils";

import type { MarketDataError, MarketDataEvent, MarketDataPort, MarketDataSubscription } from "../ports";

export interface PaperMarketConfig {
  symbol: string;
  initialMid: string;
  tickSize: string;
  /** Full quoted spread of the synthetic book */
  spreadBps: string;
  /** Max mid move per BBO update */
  stepBps: string;
  /** Displayed size on each side */
  displaySize: string;
}

export interface PaperMarketDataConfig {
  exchange: string;
  markets: PaperMarketConfig[];
  bboIntervalMs: number;
  fundingIntervalMs: number;
  /** Funding rate random walk is bounded by ±maxFundingRate */
  maxFundingRate: string;
  random?: () => number;
  now?: () => number;
}

interface SymbolState {
  market: PaperMarketConfig;
  mid: Decimal;
  fundingRate: Decimal;
  seq: number;
}

const BPS = new Decimal(10_000);

export class PaperMarketDataAdapter implements MarketDataPort {
  private readonly config: PaperMarketDataConfig;
  private readonly random: () => number;
  private readonly now: () => number;
  private eventHandlers: ((event: MarketDataEvent) => void)[] = [];
  private states: Map<string, SymbolState> = new Map();
  private subscriptions: Map<string, Set<"bbo" | "funding">> = new Map();
  private bboTimer: ReturnType<typeof setInterval> | null = null;
  private fundingTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: PaperMarketDataConfig) {
    this.config = config;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;

    for (const market of config.markets) {
      this.states.set(market.symbol, {
        market,
        mid: new Decimal(market.initialMid),
        fundingRate: new Decimal(0),
        seq: 0,
      });
    }
  }

  subscribe(subscription: MarketDataSubscription): Result<void, MarketDataError> {
    if (!this.states.has(subscription.symbol)) {
      return err({ type: "subscription_failed", message: `Unknown paper market: ${subscription.symbol}` });
    }
    const channels = this.subscriptions.get(subscription.symbol) ?? new Set<"bbo" | "funding">();
    for (const channel of subscription.channels) channels.add(channel);
    this.subscriptions.set(subscription.symbol, channels);
    return ok(undefined);
  }

  unsubscribe(subscription: MarketDataSubscription): Result<void, MarketDataError> {
    const channels = this.subscriptions.get(subscription.symbol);
    if (!channels) return ok(undefined);
    for (const channel of subscription.channels) channels.delete(channel);
    if (channels.size === 0) this.subscriptions.delete(subscription.symbol);
    return ok(undefined);
  }

  connect(): Promise<Result<void, MarketDataError>> {
    if (this.isConnected()) return Promise.resolve(ok(undefined));

    this.bboTimer = setInterval(() => {
      this.stepBbo();
    }, this.config.bboIntervalMs);
    this.fundingTimer = setInterval(() => {
      this.stepFunding();
    }, this.config.fundingIntervalMs);

    this.emit({ type: "connected", ts: new Date(this.now()), exchange: this.config.exchange });
    logger.info("Paper market data connected", {
      markets: this.config.markets.map(m => m.symbol),
      bboIntervalMs: this.config.bboIntervalMs,
    });

    // Publish an initial book so sessions can quote without waiting a full interval
    this.publishBbo();
    this.publishFunding();
    return Promise.resolve(ok(undefined));
  }

  disconnect(): Promise<Result<void, MarketDataError>> {
    if (this.bboTimer) clearInterval(this.bboTimer);
    if (this.fundingTimer) clearInterval(this.fundingTimer);
    const wasConnected = this.bboTimer !== null;
    this.bboTimer = null;
    this.fundingTimer = null;

    if (wasConnected) {
      this.emit({ type: "disconnected", ts: new Date(this.now()), exchange: this.config.exchange });
    }
    return Promise.resolve(ok(undefined));
  }

  onEvent(handler: (event: MarketDataEvent) => void): void {
    this.eventHandlers.push(handler);
  }

  isConnected(): boolean {
    return this.bboTimer !== null;
  }

  /**
   * Advance every mid by one random step and publish books
   */
  stepBbo(): void {
    for (const state of this.states.values()) {
      const move = new Decimal(this.random() * 2 - 1).mul(new Decimal(state.market.stepBps)).div(BPS);
      const next = state.mid.mul(new Decimal(1).plus(move));
      if (next.gt(0)) state.mid = next;
    }
    this.publishBbo();
  }

  /**
   * Advance every funding rate by one bounded random step and publish
   */
  stepFunding(): void {
    const max = new Decimal(this.config.maxFundingRate);
    for (const state of this.states.values()) {
      const move = new Decimal(this.random() * 2 - 1).mul(max).div(4);
      state.fundingRate = Decimal.max(max.neg(), Decimal.min(max, state.fundingRate.plus(move)));
    }
    this.publishFunding();
  }

  private publishBbo(): void {
    for (const state of this.states.values()) {
      if (!this.subscriptions.get(state.market.symbol)?.has("bbo")) continue;

      const tick = new Decimal(state.market.tickSize);
      const half = new Decimal(state.market.spreadBps).div(2).div(BPS);
      const bid = state.mid.mul(new Decimal(1).minus(half)).div(tick).floor().mul(tick);
      let ask = state.mid.mul(new Decimal(1).plus(half)).div(tick).ceil().mul(tick);
      if (ask.lte(bid)) ask = bid.plus(tick);

      state.seq++;
      this.emit({
        type: "bbo",
        ts: new Date(this.now()),
        exchange: this.config.exchange,
        symbol: state.market.symbol,
        bestBidPx: bid.toFixed(),
        bestBidSz: state.market.displaySize,
        bestAskPx: ask.toFixed(),
        bestAskSz: state.market.displaySize,
        seq: state.seq,
      });
    }
  }

  private publishFunding(): void {
    for (const state of this.states.values()) {
      if (!this.subscriptions.get(state.market.symbol)?.has("funding")) continue;

      this.emit({
        type: "funding",
        ts: new Date(this.now()),
        exchange: this.config.exchange,
        symbol: state.market.symbol,
        fundingRate: state.fundingRate.toDecimalPlaces(8).toFixed(),
      });
    }
  }

  private emit(event: MarketDataEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error("Paper market data event handler failed", { type: event.type, error });
      }
    }
  }
}
