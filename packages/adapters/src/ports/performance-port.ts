/**
 * Performance Port - Observational sink for fills and realized PnL
 *
 * Events are immutable. Nothing on the trading path waits on this sink.
 */

import type { ResultAsync } from "neverthrow";

import type { OrderSide } from "./execution-port";

/**
 * One applied fill
 */
export interface PerformanceFillEvent {
  readonly type: "fill";
  readonly ts: Date;
  readonly symbol: string;
  readonly clientOrderId: string;
  readonly exchangeOrderId: string;
  readonly side: OrderSide;
  readonly price: string;
  readonly size: string;
  readonly fee: string;
  readonly liquidity?: "maker" | "taker";
  /** Inventory right after the fill */
  readonly inventoryAfter: string;
  /** Realized PnL booked by this fill, net of its fee */
  readonly realizedPnlDelta?: string;
}

/**
 * Realized PnL change caused by a fill (closing PnL net of the fill's fee)
 */
export interface RealizedPnlEvent {
  readonly type: "realized_pnl";
  readonly ts: Date;
  readonly symbol: string;
  /** Net of fees */
  readonly pnlDelta: string;
  readonly cumulativePnl: string;
}

export type PerformanceEvent = PerformanceFillEvent | RealizedPnlEvent;

export type PerformanceSinkError = { type: "write_failed"; message: string } | { type: "closed"; message: string };

/**
 * Performance tracker port
 */
export interface PerformanceTrackerPort {
  record(event: PerformanceEvent): ResultAsync<void, PerformanceSinkError>;
}
