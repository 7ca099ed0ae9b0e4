/**
 * Order State - Pure order lifecycle transitions
 *
 * pending → live → partially_filled → filled | cancelled | rejected
 * plus the local "abandoned" state for places that timed out without an ack.
 *
 * Every transition returns a new TrackedOrder together with the side effects
 * the caller must perform. Events that must be ignored come back as Err.
 */

import type { Result } from "neverthrow";
import { err, ok } from "neverthrow";

import { Decimal, toDecimal } from "./decimal";
import type { Ms, PriceStr, Side, SizeStr } from "./types";

export type OrderStatus = "pending" | "live" | "partially_filled" | "filled" | "cancelled" | "rejected" | "abandoned";

/**
 * One order as seen by the lifecycle manager
 */
export interface TrackedOrder {
  readonly clientOrderId: string;
  readonly exchangeOrderId?: string;
  readonly side: Side;
  readonly level: number;
  readonly price: PriceStr;
  readonly size: SizeStr;
  readonly filledSize: SizeStr;
  readonly generation: number;
  readonly reduceOnly: boolean;
  readonly status: OrderStatus;
  /** Highest gateway sequence applied (0 = none) */
  readonly lastSeq: number;
  /** A cancel was requested locally and is not yet resolved */
  readonly cancelRequested: boolean;
  /** The cancel request has been handed to the gateway */
  readonly cancelSubmitted: boolean;
  readonly createdAtMs: Ms;
  readonly updatedAtMs: Ms;
}

/**
 * Gateway (and local timeout) events for a single order
 */
export type OrderEvent =
  | { type: "ack"; exchangeOrderId: string; seq: number; ts: Ms }
  | { type: "reject"; reason: string; seq: number; ts: Ms }
  | {
      type: "fill";
      exchangeOrderId?: string;
      filledSizeDelta: SizeStr;
      fillPrice: PriceStr;
      fee?: string;
      seq: number;
      ts: Ms;
    }
  | { type: "cancelled"; seq: number; ts: Ms }
  | { type: "cancel_reject"; reason: string; seq: number; ts: Ms }
  | { type: "timeout"; ts: Ms };

/**
 * Side effects requested by a transition
 */
export interface TransitionEffects {
  /** Increment the consecutive-reject counter */
  countReject: boolean;
  /** A normal ack: reset the consecutive-reject counter */
  resetRejects: boolean;
  /** Size actually applied by a fill ("0" when none) */
  filledDelta: SizeStr;
  /** Submit a cancel for this order now */
  queueCancel: boolean;
  /** Ack or fill for an order already abandoned locally */
  lateAck: boolean;
}

export interface OrderTransition {
  order: TrackedOrder;
  effects: TransitionEffects;
}

export type OrderTransitionError =
  | { type: "duplicate"; message: string }
  | { type: "terminal"; message: string }
  | { type: "invalid_transition"; message: string };

const NO_EFFECTS: TransitionEffects = Object.freeze({
  countReject: false,
  resetRejects: false,
  filledDelta: "0",
  queueCancel: false,
  lateAck: false,
});

const EXCHANGE_TERMINAL: ReadonlySet<OrderStatus> = new Set(["filled", "cancelled", "rejected"]);

/**
 * Exchange-terminal or locally abandoned
 */
export function isTerminal(status: OrderStatus): boolean {
  return EXCHANGE_TERMINAL.has(status) || status === "abandoned";
}

/**
 * Resting on the book
 */
export function isWorking(status: OrderStatus): boolean {
  return status === "live" || status === "partially_filled";
}

/**
 * Counts toward the live set (may still rest on the book)
 */
export function isOpen(status: OrderStatus): boolean {
  return status === "pending" || isWorking(status);
}

export function remainingSize(order: TrackedOrder): Decimal {
  return Decimal.max(0, toDecimal(order.size).minus(toDecimal(order.filledSize)));
}

/**
 * Create a pending order from a place intent
 */
export function createPendingOrder(params: {
  clientOrderId: string;
  side: Side;
  level: number;
  price: PriceStr;
  size: SizeStr;
  generation: number;
  reduceOnly?: boolean;
  nowMs: Ms;
}): TrackedOrder {
  return Object.freeze({
    clientOrderId: params.clientOrderId,
    side: params.side,
    level: params.level,
    price: params.price,
    size: params.size,
    filledSize: "0",
    generation: params.generation,
    reduceOnly: params.reduceOnly ?? false,
    status: "pending",
    lastSeq: 0,
    cancelRequested: false,
    cancelSubmitted: false,
    createdAtMs: params.nowMs,
    updatedAtMs: params.nowMs,
  });
}

function next(order: TrackedOrder, patch: Partial<TrackedOrder>, effects: Partial<TransitionEffects> = {}): OrderTransition {
  return {
    order: Object.freeze({ ...order, ...patch }),
    effects: { ...NO_EFFECTS, ...effects },
  };
}

function applyAck(order: TrackedOrder, event: Extract<OrderEvent, { type: "ack" }>): Result<OrderTransition, OrderTransitionError> {
  const base = { exchangeOrderId: event.exchangeOrderId, lastSeq: event.seq, updatedAtMs: event.ts };

  switch (order.status) {
    case "pending":
      return ok(next(order, { ...base, status: "live" }, { resetRejects: true, queueCancel: order.cancelRequested }));
    case "abandoned":
      // Already counted as a reject by the timeout
      return ok(next(order, { ...base, status: "live", cancelRequested: true }, { queueCancel: true, lateAck: true }));
    case "live":
    case "partially_filled":
      // A fill may arrive before the ack; only record the id
      return ok(next(order, base));
    case "filled":
    case "cancelled":
    case "rejected":
      return err({ type: "terminal", message: `ack for ${order.status} order ${order.clientOrderId}` });
  }
}

function applyReject(
  order: TrackedOrder,
  event: Extract<OrderEvent, { type: "reject" }>,
): Result<OrderTransition, OrderTransitionError> {
  const patch = { status: "rejected" as const, lastSeq: event.seq, updatedAtMs: event.ts, cancelRequested: false };

  switch (order.status) {
    case "pending":
      return ok(next(order, patch, { countReject: true }));
    case "abandoned":
      return ok(next(order, patch));
    case "live":
    case "partially_filled":
      return err({ type: "invalid_transition", message: `reject for ${order.status} order ${order.clientOrderId}` });
    case "filled":
    case "cancelled":
    case "rejected":
      return err({ type: "terminal", message: `reject for ${order.status} order ${order.clientOrderId}` });
  }
}

function applyFill(order: TrackedOrder, event: Extract<OrderEvent, { type: "fill" }>): Result<OrderTransition, OrderTransitionError> {
  if (order.status === "rejected") {
    return err({ type: "terminal", message: `fill for rejected order ${order.clientOrderId}` });
  }

  const remaining = remainingSize(order);
  const delta = Decimal.min(toDecimal(event.filledSizeDelta), remaining);
  if (delta.lte(0)) {
    return err({ type: "invalid_transition", message: `fill with no remaining size on ${order.clientOrderId}` });
  }

  const filled = toDecimal(order.filledSize).plus(delta);
  const complete = filled.gte(toDecimal(order.size));
  const base = {
    exchangeOrderId: order.exchangeOrderId ?? event.exchangeOrderId,
    filledSize: filled.toFixed(),
    lastSeq: event.seq,
    updatedAtMs: event.ts,
  };
  const effects = { filledDelta: delta.toFixed() };

  switch (order.status) {
    case "cancelled":
      // Fill raced the cancel: inventory moves, the terminal state stays
      return ok(next(order, base, effects));
    case "filled":
      return err({ type: "terminal", message: `fill for filled order ${order.clientOrderId}` });
    case "abandoned":
      if (complete) return ok(next(order, { ...base, status: "filled", cancelRequested: false }, { ...effects, lateAck: true }));
      return ok(
        next(
          order,
          { ...base, status: "partially_filled", cancelRequested: true },
          { ...effects, queueCancel: true, lateAck: true },
        ),
      );
    case "pending":
    case "live":
    case "partially_filled":
      if (complete) return ok(next(order, { ...base, status: "filled", cancelRequested: false }, effects));
      return ok(next(order, { ...base, status: "partially_filled" }, effects));
  }
}

function applyCancelled(
  order: TrackedOrder,
  event: Extract<OrderEvent, { type: "cancelled" }>,
): Result<OrderTransition, OrderTransitionError> {
  if (EXCHANGE_TERMINAL.has(order.status)) {
    // Filled always wins over a late cancel ack
    return err({ type: "terminal", message: `cancelled for ${order.status} order ${order.clientOrderId}` });
  }
  return ok(
    next(order, {
      status: "cancelled",
      lastSeq: event.seq,
      updatedAtMs: event.ts,
      cancelRequested: false,
      cancelSubmitted: false,
    }),
  );
}

function applyCancelReject(
  order: TrackedOrder,
  event: Extract<OrderEvent, { type: "cancel_reject" }>,
): Result<OrderTransition, OrderTransitionError> {
  if (isTerminal(order.status)) {
    return err({ type: "terminal", message: `cancel_reject for ${order.status} order ${order.clientOrderId}` });
  }
  // The next reconcile decides whether to cancel again
  return ok(next(order, { lastSeq: event.seq, updatedAtMs: event.ts, cancelRequested: false, cancelSubmitted: false }));
}

function applyTimeout(
  order: TrackedOrder,
  event: Extract<OrderEvent, { type: "timeout" }>,
): Result<OrderTransition, OrderTransitionError> {
  if (order.status !== "pending") {
    return err({ type: "invalid_transition", message: `timeout for ${order.status} order ${order.clientOrderId}` });
  }
  return ok(next(order, { status: "abandoned", updatedAtMs: event.ts }, { countReject: true }));
}

/**
 * Apply one event to an order
 *
 * Events whose seq is not above lastSeq are duplicates and are rejected.
 */
export function applyOrderEvent(order: TrackedOrder, event: OrderEvent): Result<OrderTransition, OrderTransitionError> {
  if (event.type !== "timeout" && event.seq <= order.lastSeq) {
    return err({
      type: "duplicate",
      message: `seq ${String(event.seq)} <= ${String(order.lastSeq)} on ${order.clientOrderId}`,
    });
  }

  switch (event.type) {
    case "ack":
      return applyAck(order, event);
    case "reject":
      return applyReject(order, event);
    case "fill":
      return applyFill(order, event);
    case "cancelled":
      return applyCancelled(order, event);
    case "cancel_reject":
      return applyCancelReject(order, event);
    case "timeout":
      return applyTimeout(order, event);
  }
}

/**
 * Outcome of a local cancel request
 *
 * - submit: hand a cancel to the gateway now
 * - deferred: no exchange id yet; the ack will queue the cancel
 * - noop: terminal or already being cancelled
 */
export type CancelRequestOutcome = "submit" | "deferred" | "noop";

/**
 * Request cancellation of an order. Idempotent.
 */
export function requestCancel(order: TrackedOrder, nowMs: Ms): { order: TrackedOrder; outcome: CancelRequestOutcome } {
  if (EXCHANGE_TERMINAL.has(order.status)) {
    return { order, outcome: "noop" };
  }

  if (order.status === "pending" || order.status === "abandoned" || order.exchangeOrderId === undefined) {
    if (order.cancelRequested) return { order, outcome: "noop" };
    return { order: Object.freeze({ ...order, cancelRequested: true, updatedAtMs: nowMs }), outcome: "deferred" };
  }

  if (order.cancelSubmitted) {
    return { order, outcome: "noop" };
  }

  return {
    order: Object.freeze({ ...order, cancelRequested: true, cancelSubmitted: true, updatedAtMs: nowMs }),
    outcome: "submit",
  };
}

/**
 * Roll back a cancel whose submission failed so the next reconcile retries it
 */
export function cancelSubmissionFailed(order: TrackedOrder, nowMs: Ms): TrackedOrder {
  if (isTerminal(order.status)) return order;
  return Object.freeze({ ...order, cancelSubmitted: false, updatedAtMs: nowMs });
}
