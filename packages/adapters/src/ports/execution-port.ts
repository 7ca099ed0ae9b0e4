/**
 * Execution Port - Interface for order execution
 *
 * - Adapters implement this port for venue-specific trading
 * - Request methods resolve once the venue accepted the submission;
 *   the outcome arrives later as an ExecutionEvent
 */

import type { ResultAsync } from "neverthrow";

/**
 * Order side
 */
export type OrderSide = "buy" | "sell";

/**
 * Place order request
 */
export interface PlaceOrderRequest {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  price: string;
  size: string;
  postOnly: boolean;
  reduceOnly: boolean;
}

/**
 * Cancel order request
 */
export interface CancelOrderRequest {
  clientOrderId: string;
  exchangeOrderId: string;
  symbol: string;
}

/**
 * Amend (atomic price/size replace) request
 */
export interface AmendOrderRequest {
  clientOrderId: string;
  exchangeOrderId: string;
  symbol: string;
  price: string;
  size: string;
}

/**
 * Fields common to every execution event
 *
 * seq is monotonic per order; redelivered events repeat their seq.
 */
interface ExecutionEventBase {
  ts: Date;
  symbol: string;
  clientOrderId: string;
  seq: number;
}

/**
 * Place accepted and resting
 */
export interface OrderAckEvent extends ExecutionEventBase {
  type: "ack";
  exchangeOrderId: string;
}

/**
 * Place refused by the venue
 */
export interface OrderRejectEvent extends ExecutionEventBase {
  type: "reject";
  reason: string;
}

/**
 * Order removed from the book
 */
export interface OrderCancelledEvent extends ExecutionEventBase {
  type: "cancelled";
  exchangeOrderId: string;
}

/**
 * Cancel refused (unknown or already terminal order)
 */
export interface CancelRejectEvent extends ExecutionEventBase {
  type: "cancel_reject";
  exchangeOrderId: string;
  reason: string;
}

/**
 * Fill event
 */
export interface FillEvent extends ExecutionEventBase {
  type: "fill";
  exchangeOrderId: string;
  side: OrderSide;
  filledSizeDelta: string;
  fillPrice: string;
  fee?: string;
  liquidity?: "maker" | "taker";
}

export type ExecutionEvent = OrderAckEvent | OrderRejectEvent | OrderCancelledEvent | CancelRejectEvent | FillEvent;

/**
 * Execution adapter errors
 */
export type ExecutionError =
  | { type: "network"; message: string }
  | { type: "rate_limit"; message: string; retryAfterMs?: number }
  | { type: "auth"; message: string }
  | { type: "invalid_order"; message: string }
  | { type: "unsupported"; message: string }
  | { type: "exchange_error"; message: string; code?: string }
  | { type: "unknown"; message: string };

/**
 * Execution Port interface
 *
 * - Venue-agnostic interface for order execution
 * - Events for one order are delivered in order, at least once
 */
export interface ExecutionPort {
  /**
   * Whether amendOrder is an atomic in-place replace
   */
  readonly supportsAmend: boolean;

  /**
   * Submit a new order
   */
  placeOrder(request: PlaceOrderRequest): ResultAsync<void, ExecutionError>;

  /**
   * Submit a cancel
   */
  cancelOrder(request: CancelOrderRequest): ResultAsync<void, ExecutionError>;

  /**
   * Submit an in-place price/size change
   */
  amendOrder(request: AmendOrderRequest): ResultAsync<void, ExecutionError>;

  /**
   * Register event handler for acks, rejects, cancels and fills
   */
  onEvent(handler: (event: ExecutionEvent) => void): void;
}
