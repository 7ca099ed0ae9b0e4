/**
 * Event Repository Interface
 *
 * - Persist order lifecycle events and fills
 * - Non-blocking async batch writes
 */

import type { Result } from "neverthrow";

export type OrderEventType =
  | "place"
  | "cancel"
  | "amend"
  | "ack"
  | "reject"
  | "cancelled"
  | "cancel_reject"
  | "fill"
  | "timeout";

/**
 * Order event for persistence
 */
export interface OrderEventRecord {
  ts: Date;
  exchange: string;
  symbol: string;
  clientOrderId: string;
  exchangeOrderId: string | null;
  eventType: OrderEventType;
  side: "buy" | "sell" | null;
  level: number | null;
  generation: number | null;
  px: string | null;
  sz: string | null;
  postOnly: boolean;
  reduceOnly: boolean;
  reason: string | null;
  directive: string | null;
  rawJson: unknown;
}

/**
 * Fill record for persistence
 */
export interface FillRecord {
  ts: Date;
  exchange: string;
  symbol: string;
  clientOrderId: string;
  exchangeOrderId: string | null;
  side: "buy" | "sell";
  fillPx: string;
  fillSz: string;
  fee: string | null;
  liquidity: "maker" | "taker" | null;
  inventoryAfter: string;
  realizedPnlDelta: string | null;
  rawJson: unknown;
}

/**
 * Repository error types
 */
export type EventRepositoryError = { type: "DB_ERROR"; message: string };

/**
 * Storage the repository writes batches into
 */
export interface EventStore {
  insertOrderEvents(records: OrderEventRecord[]): Promise<void>;
  insertFills(records: FillRecord[]): Promise<void>;
}

/**
 * Event Repository Interface
 *
 * Provides async batch writes for events to avoid blocking hot path.
 */
export interface EventRepository {
  /**
   * Queue an order event for batch write
   */
  queueOrderEvent(event: OrderEventRecord): void;

  /**
   * Queue a fill for batch write
   */
  queueFill(fill: FillRecord): void;

  /**
   * Flush all queued events to the database
   */
  flush(): Promise<Result<void, EventRepositoryError>>;

  /**
   * Start periodic flush
   */
  startPeriodicFlush(intervalMs: number): void;

  /**
   * Stop periodic flush and flush remaining events
   */
  stop(): Promise<Result<void, EventRepositoryError>>;

  /**
   * Queued, not yet written
   */
  pendingCount(): { orderEvents: number; fills: number };
}
