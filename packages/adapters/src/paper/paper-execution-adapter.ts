/**
 * Paper Execution Adapter
 *
 * In-process venue for dry runs:
 * - Acks after a configurable latency, post-only places that would cross are rejected
 * - Touch fills: a resting BUY fills when best ask <= order price,
 *   a resting SELL fills when best bid >= order price, at the order price (maker),
 *   limited by the displayed size on the touching side
 * - Atomic amend of resting orders
 */

import Decimal from "decimal.js";
import { errAsync, okAsync } from "neverthrow";
import type { ResultAsync } from "neverthrow";
import { logger } from "@perp-mm/utils";

import type {
  AmendOrderRequest,
  BboEvent,
  CancelOrderRequest,
  ExecutionError,
  ExecutionEvent,
  ExecutionPort,
  OrderSide,
  PlaceOrderRequest,
} from "../ports";

export interface PaperExecutionConfig {
  /** Delay before acks, rejects and cancel confirmations */
  latencyMs: number;
  /** Maker fee in bps of notional */
  makerFeeBps: string;
  /** Clock for event timestamps */
  now?: () => number;
}

interface PaperOrder {
  clientOrderId: string;
  exchangeOrderId: string;
  symbol: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  filled: Decimal;
  postOnly: boolean;
  resting: boolean;
}

interface PaperBook {
  bestBidPx: Decimal;
  bestBidSz: Decimal;
  bestAskPx: Decimal;
  bestAskSz: Decimal;
}

export class PaperExecutionAdapter implements ExecutionPort {
  readonly supportsAmend = true;

  private readonly config: PaperExecutionConfig;
  private readonly now: () => number;
  private eventHandlers: ((event: ExecutionEvent) => void)[] = [];
  private orders: Map<string, PaperOrder> = new Map();
  private seqs: Map<string, number> = new Map();
  private books: Map<string, PaperBook> = new Map();
  private timers: Set<ReturnType<typeof setTimeout>> = new Set();
  private orderIdCounter = 0;
  private closed = false;

  constructor(config: PaperExecutionConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
  }

  placeOrder(request: PlaceOrderRequest): ResultAsync<void, ExecutionError> {
    if (this.closed) {
      return errAsync({ type: "network", message: "Paper venue closed" });
    }

    const price = parsePositive(request.price);
    const size = parsePositive(request.size);
    if (!price || !size) {
      return errAsync({
        type: "invalid_order",
        message: `Invalid price/size: ${request.price}/${request.size}`,
      });
    }

    this.orderIdCounter++;
    const order: PaperOrder = {
      clientOrderId: request.clientOrderId,
      exchangeOrderId: `paper_${String(this.orderIdCounter)}`,
      symbol: request.symbol,
      side: request.side,
      price,
      size,
      filled: new Decimal(0),
      postOnly: request.postOnly,
      resting: false,
    };
    this.orders.set(order.exchangeOrderId, order);

    this.schedule(() => {
      if (order.postOnly && this.wouldCross(order)) {
        this.orders.delete(order.exchangeOrderId);
        this.emit({
          type: "reject",
          ts: new Date(this.now()),
          symbol: order.symbol,
          clientOrderId: order.clientOrderId,
          seq: this.nextSeq(order.exchangeOrderId),
          reason: "POST_ONLY_REJECTED",
        });
        return;
      }

      order.resting = true;
      this.emit({
        type: "ack",
        ts: new Date(this.now()),
        symbol: order.symbol,
        clientOrderId: order.clientOrderId,
        exchangeOrderId: order.exchangeOrderId,
        seq: this.nextSeq(order.exchangeOrderId),
      });
      this.matchOrder(order);
    });

    return okAsync(undefined);
  }

  cancelOrder(request: CancelOrderRequest): ResultAsync<void, ExecutionError> {
    if (this.closed) {
      return errAsync({ type: "network", message: "Paper venue closed" });
    }

    this.schedule(() => {
      const order = this.orders.get(request.exchangeOrderId);
      if (!order?.resting) {
        this.emit({
          type: "cancel_reject",
          ts: new Date(this.now()),
          symbol: request.symbol,
          clientOrderId: request.clientOrderId,
          exchangeOrderId: request.exchangeOrderId,
          seq: this.nextSeq(request.exchangeOrderId),
          reason: "UNKNOWN_ORDER",
        });
        return;
      }

      this.orders.delete(order.exchangeOrderId);
      this.emit({
        type: "cancelled",
        ts: new Date(this.now()),
        symbol: order.symbol,
        clientOrderId: order.clientOrderId,
        exchangeOrderId: order.exchangeOrderId,
        seq: this.nextSeq(order.exchangeOrderId),
      });
    });

    return okAsync(undefined);
  }

  amendOrder(request: AmendOrderRequest): ResultAsync<void, ExecutionError> {
    const order = this.orders.get(request.exchangeOrderId);
    if (!order?.resting) {
      return errAsync({ type: "invalid_order", message: `Unknown order: ${request.exchangeOrderId}` });
    }

    const price = parsePositive(request.price);
    const size = parsePositive(request.size);
    if (!price || !size || size.lte(order.filled)) {
      return errAsync({
        type: "invalid_order",
        message: `Invalid amend price/size: ${request.price}/${request.size}`,
      });
    }

    const amended = { ...order, price, size };
    if (order.postOnly && this.wouldCross(amended)) {
      return errAsync({ type: "invalid_order", message: "Amend would cross the book" });
    }

    order.price = price;
    order.size = size;
    return okAsync(undefined);
  }

  onEvent(handler: (event: ExecutionEvent) => void): void {
    this.eventHandlers.push(handler);
  }

  /**
   * Feed top of book; resting orders on the symbol are matched against it
   */
  updateBook(event: BboEvent): void {
    this.books.set(event.symbol, {
      bestBidPx: new Decimal(event.bestBidPx),
      bestBidSz: new Decimal(event.bestBidSz),
      bestAskPx: new Decimal(event.bestAskPx),
      bestAskSz: new Decimal(event.bestAskSz),
    });

    for (const order of [...this.orders.values()]) {
      if (order.symbol === event.symbol && order.resting) {
        this.matchOrder(order);
      }
    }
  }

  /**
   * Orders currently resting on the paper book
   */
  getRestingOrders(symbol: string): { exchangeOrderId: string; side: OrderSide; price: string; size: string }[] {
    return [...this.orders.values()]
      .filter(o => o.symbol === symbol && o.resting)
      .map(o => ({
        exchangeOrderId: o.exchangeOrderId,
        side: o.side,
        price: o.price.toFixed(),
        size: o.size.minus(o.filled).toFixed(),
      }));
  }

  /**
   * Stop delivering events and drop pending timers
   */
  close(): void {
    this.closed = true;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }

  private wouldCross(order: Pick<PaperOrder, "symbol" | "side" | "price">): boolean {
    const book = this.books.get(order.symbol);
    if (!book) return false;
    return order.side === "buy" ? order.price.gte(book.bestAskPx) : order.price.lte(book.bestBidPx);
  }

  private matchOrder(order: PaperOrder): void {
    const book = this.books.get(order.symbol);
    if (!book) return;

    const touched = order.side === "buy" ? book.bestAskPx.lte(order.price) : book.bestBidPx.gte(order.price);
    if (!touched) return;

    const available = order.side === "buy" ? book.bestAskSz : book.bestBidSz;
    const delta = Decimal.min(order.size.minus(order.filled), available);
    if (delta.lte(0)) return;

    order.filled = order.filled.plus(delta);
    if (order.filled.gte(order.size)) {
      this.orders.delete(order.exchangeOrderId);
    }

    const fee = order.price.mul(delta).mul(new Decimal(this.config.makerFeeBps)).div(10_000);
    this.emit({
      type: "fill",
      ts: new Date(this.now()),
      symbol: order.symbol,
      clientOrderId: order.clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      side: order.side,
      filledSizeDelta: delta.toFixed(),
      fillPrice: order.price.toFixed(),
      fee: fee.toFixed(),
      liquidity: "maker",
      seq: this.nextSeq(order.exchangeOrderId),
    });
  }

  private nextSeq(exchangeOrderId: string): number {
    const seq = (this.seqs.get(exchangeOrderId) ?? 0) + 1;
    this.seqs.set(exchangeOrderId, seq);
    return seq;
  }

  private schedule(fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (!this.closed) fn();
    }, this.config.latencyMs);
    this.timers.add(timer);
  }

  private emit(event: ExecutionEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error("Paper execution event handler failed", { type: event.type, error });
      }
    }
  }
}

function parsePositive(value: string): Decimal | undefined {
  try {
    const d = new Decimal(value);
    return d.isFinite() && d.gt(0) ? d : undefined;
  } catch {
    return undefined;
  }
}
