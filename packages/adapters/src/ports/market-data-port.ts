/**
 * Market Data Port - Interface for market data subscriptions
 *
 * - Adapters implement this port for venue-specific market data
 * - Funding rate events double as the funding signal feed
 */

import type { Result } from "neverthrow";

/**
 * BBO (Best Bid/Offer) event
 */
export interface BboEvent {
  type: "bbo";
  ts: Date;
  exchange: string;
  symbol: string;
  bestBidPx: string;
  bestBidSz: string;
  bestAskPx: string;
  bestAskSz: string;
  seq?: number;
}

/**
 * Funding rate event
 *
 * fundingRate is a signed fraction per funding period (positive = longs pay).
 */
export interface FundingRateEvent {
  type: "funding";
  ts: Date;
  exchange: string;
  symbol: string;
  fundingRate: string;
  seq?: number;
}

/**
 * Connection event
 */
export interface ConnectionEvent {
  type: "connected" | "disconnected";
  ts: Date;
  exchange: string;
  reason?: string;
}

export type MarketDataEvent = BboEvent | FundingRateEvent | ConnectionEvent;

/**
 * Market data subscription options
 */
export interface MarketDataSubscription {
  exchange: string;
  symbol: string;
  channels: ("bbo" | "funding")[];
}

/**
 * Market data adapter errors
 */
export type MarketDataError =
  | { type: "connection_failed"; message: string }
  | { type: "subscription_failed"; message: string }
  | { type: "invalid_message"; message: string };

/**
 * Market Data Port interface
 */
export interface MarketDataPort {
  /**
   * Subscribe to market data
   */
  subscribe(subscription: MarketDataSubscription): Result<void, MarketDataError>;

  /**
   * Unsubscribe from market data
   */
  unsubscribe(subscription: MarketDataSubscription): Result<void, MarketDataError>;

  /**
   * Connect to market data stream
   */
  connect(): Promise<Result<void, MarketDataError>>;

  /**
   * Disconnect from market data stream
   */
  disconnect(): Promise<Result<void, MarketDataError>>;

  /**
   * Register event handler
   */
  onEvent(handler: (event: MarketDataEvent) => void): void;

  /**
   * Check if connected
   */
  isConnected(): boolean;
}
