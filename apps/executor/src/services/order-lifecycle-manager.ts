/**
 * Order Lifecycle Manager - Owns the live order set of one market
 *
 * - Reconciles approved targets with tracked orders through the planner
 * - Applies gateway events in delivery order, dropping duplicates by per-order seq
 * - Applies fills to inventory and publishes performance events
 * - Abandons places that outlive the ack timeout
 * - Keeps pruned orders as tombstones so redelivered fills and late acks still resolve
 * - Counts consecutive rejects for the risk manager
 *
 * Only this class writes the live-order set and inventory.
 */

import { v4 as uuidv4 } from "uuid";
import type { ResultAsync } from "neverthrow";
import type { Ms, OrderEvent, QuoteSpec, RiskDirective, Side, TrackedOrder } from "@perp-mm/core";
import {
  applyOrderEvent,
  cancelSubmissionFailed,
  createPendingOrder,
  isOpen,
  isTerminal,
  isWorking,
  requestCancel,
  toDecimal,
} from "@perp-mm/core";
import type { ExecutionError, ExecutionEvent, ExecutionPort, FillEvent } from "@perp-mm/adapters";
import type { EventRepository, OrderEventRecord } from "@perp-mm/repositories";
import { logger } from "@perp-mm/utils";
import type { Logger } from "@perp-mm/utils";

import type { ExecutionAction } from "./execution-planner";
import { planReconciliation } from "./execution-planner";
import type { MarketStateStore } from "./market-state-store";
import type { PerformancePublisher } from "./performance-publisher";
import type { PositionTracker } from "./position-tracker";

/** Terminal orders are kept this long for late fills before being pruned */
const TERMINAL_RETENTION_MS = 60_000;
/** Abandoned orders wait longer for a late ack */
const ABANDONED_RETENTION_MS = 600_000;
/** Untracked fill keys remembered for dedup */
const MAX_UNTRACKED_FILL_KEYS = 10_000;
/** Pruned orders remembered for dedup and late acks */
const MAX_PRUNED_ORDERS = 10_000;

export interface OrderLifecycleDeps {
  exchange: string;
  symbol: string;
  gateway: ExecutionPort;
  marketState: MarketStateStore;
  position: PositionTracker;
  performance: PerformancePublisher;
  placeTimeoutMs: Ms;
  eventRepository?: EventRepository;
  log?: Logger;
  now?: () => Ms;
  newClientOrderId?: () => string;
}

export interface ReconcileInput {
  targets: readonly QuoteSpec[];
  generation: number;
  midPx: string | undefined;
  toleranceBps: string;
  directive: RiskDirective;
}

export interface ReconcileSummary {
  placed: number;
  cancelled: number;
  amended: number;
  failed: number;
}

export class OrderLifecycleManager {
  private readonly orders = new Map<string, TrackedOrder>();
  private readonly pruned = new Map<string, TrackedOrder>();
  private readonly untrackedFillKeys = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly log: Logger;
  private readonly now: () => Ms;
  private readonly newClientOrderId: () => string;
  private rejects = 0;
  private directive: RiskDirective = "CONTINUE";

  constructor(private readonly deps: OrderLifecycleDeps) {
    this.log = deps.log ?? logger.child("orders", { symbol: deps.symbol });
    this.now = deps.now ?? Date.now;
    this.newClientOrderId = deps.newClientOrderId ?? uuidv4;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Orders that are pending or resting
   */
  openOrders(): TrackedOrder[] {
    return [...this.orders.values()].filter(o => isOpen(o.status));
  }

  /**
   * Every tracked order, including recently terminal ones
   */
  allOrders(): TrackedOrder[] {
    return [...this.orders.values()];
  }

  getOrder(clientOrderId: string): TrackedOrder | undefined {
    return this.orders.get(clientOrderId);
  }

  consecutiveRejects(): number {
    return this.rejects;
  }

  resetRejects(): void {
    this.rejects = 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move the live set toward the targets
   *
   * Resolves once every intent has been handed to the gateway; acks arrive later.
   */
  async reconcile(input: ReconcileInput): Promise<ReconcileSummary> {
    this.directive = input.directive;
    await this.retryPendingCancels();

    const actions = planReconciliation({
      targets: input.targets,
      orders: this.allOrders(),
      generation: input.generation,
      midPx: input.midPx,
      toleranceBps: input.toleranceBps,
      supportsAmend: this.deps.gateway.supportsAmend,
    });

    if (actions.length > 0) {
      this.log.debug("Reconcile plan", {
        generation: input.generation,
        actions: actions.map(describeAction),
      });
    }

    const results = await Promise.all(
      actions.map(async action => ({ action, success: await this.execute(action, input.directive) })),
    );
    const summary: ReconcileSummary = { placed: 0, cancelled: 0, amended: 0, failed: 0 };
    for (const { action, success } of results) {
      if (!success) summary.failed++;
      else if (action.type === "place") summary.placed++;
      else if (action.type === "cancel") summary.cancelled++;
      else summary.amended++;
    }
    return summary;
  }

  /**
   * Cancel every open order; pending ones are cancelled once acked
   *
   * @returns number of cancels handed to the gateway
   */
  async cancelAll(): Promise<number> {
    const outcomes = await Promise.all(this.openOrders().map(order => this.cancel(order.clientOrderId)));
    return outcomes.filter(Boolean).length;
  }

  /**
   * Abandon places whose ack is overdue and prune terminal orders past retention
   */
  sweepTimeouts(nowMs: Ms = this.now()): void {
    for (const order of [...this.orders.values()]) {
      if (order.status === "pending" && nowMs - order.createdAtMs >= this.deps.placeTimeoutMs) {
        this.log.warn("Place timed out without ack", {
          clientOrderId: order.clientOrderId,
          ageMs: nowMs - order.createdAtMs,
        });
        this.applyEvent(order, { type: "timeout", ts: nowMs }, null);
      }

      const current = this.orders.get(order.clientOrderId) ?? order;
      const retentionMs = current.status === "abandoned" ? ABANDONED_RETENTION_MS : TERMINAL_RETENTION_MS;
      if (isTerminal(current.status) && nowMs - current.updatedAtMs >= retentionMs) {
        this.prune(current);
      }
    }
  }

  /**
   * Apply one gateway event
   */
  handleEvent(event: ExecutionEvent): void {
    if (event.symbol !== this.deps.symbol) return;

    const order = this.orders.get(event.clientOrderId) ?? this.pruned.get(event.clientOrderId);
    if (!order) {
      if (event.type === "fill") this.applyUntrackedFill(event);
      else this.log.debug("Event for unknown order", { type: event.type, clientOrderId: event.clientOrderId });
      return;
    }

    this.applyEvent(order, toOrderEvent(event), event);
  }

  /**
   * Resolve once every submission handed to the gateway has settled
   */
  async whenIdle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private execute(action: ExecutionAction, directive: RiskDirective): Promise<boolean> {
    switch (action.type) {
      case "place":
        return this.place(action.quote, directive);
      case "cancel":
        return this.cancel(action.clientOrderId);
      case "amend":
        return this.amend(action.clientOrderId, action.quote, directive);
    }
  }

  private place(quote: QuoteSpec, directive: RiskDirective): Promise<boolean> {
    const nowMs = this.now();
    const order = createPendingOrder({
      clientOrderId: this.newClientOrderId(),
      side: quote.side,
      level: quote.level,
      price: quote.price,
      size: quote.size,
      generation: quote.generation,
      reduceOnly: quote.reduceOnly,
      nowMs,
    });
    this.orders.set(order.clientOrderId, order);

    // Flatten orders must be able to cross; quotes never may
    const postOnly = directive !== "FLATTEN";
    this.record("place", order, { postOnly, directive });

    return this.track(
      this.deps.gateway.placeOrder({
        clientOrderId: order.clientOrderId,
        symbol: this.deps.symbol,
        side: order.side,
        price: order.price,
        size: order.size,
        postOnly,
        reduceOnly: order.reduceOnly,
      }),
      error => {
        this.log.warn("Place submission failed", { clientOrderId: order.clientOrderId, error });
        const current = this.orders.get(order.clientOrderId);
        if (current) {
          this.applyEvent(
            current,
            { type: "reject", reason: `SUBMIT_${error.type.toUpperCase()}`, seq: current.lastSeq + 1, ts: this.now() },
            null,
          );
        }
      },
    );
  }

  private cancel(clientOrderId: string): Promise<boolean> {
    const order = this.orders.get(clientOrderId);
    if (!order) return Promise.resolve(false);

    const { order: next, outcome } = requestCancel(order, this.now());
    this.orders.set(clientOrderId, next);

    if (outcome === "deferred") {
      this.log.debug("Cancel deferred until ack", { clientOrderId });
      return Promise.resolve(true);
    }
    if (outcome === "noop") return Promise.resolve(false);

    return this.submitCancel(next);
  }

  private submitCancel(order: TrackedOrder): Promise<boolean> {
    const { exchangeOrderId } = order;
    if (exchangeOrderId === undefined) return Promise.resolve(false);

    this.record("cancel", order, { directive: this.directive });
    return this.track(
      this.deps.gateway.cancelOrder({
        clientOrderId: order.clientOrderId,
        exchangeOrderId,
        symbol: this.deps.symbol,
      }),
      error => {
        this.log.warn("Cancel submission failed; will retry", { clientOrderId: order.clientOrderId, error });
        const current = this.orders.get(order.clientOrderId);
        if (current) this.orders.set(order.clientOrderId, cancelSubmissionFailed(current, this.now()));
      },
    );
  }

  private async amend(clientOrderId: string, quote: QuoteSpec, directive: RiskDirective): Promise<boolean> {
    const order = this.orders.get(clientOrderId);
    if (order?.exchangeOrderId === undefined || !isWorking(order.status)) return false;

    this.record("amend", { ...order, price: quote.price, size: quote.size }, { directive });
    const result = await this.deps.gateway.amendOrder({
      clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      symbol: this.deps.symbol,
      price: quote.price,
      size: quote.size,
    });

    if (result.isOk()) {
      const current = this.orders.get(clientOrderId);
      if (current && isWorking(current.status)) {
        this.orders.set(
          clientOrderId,
          Object.freeze({
            ...current,
            price: quote.price,
            size: quote.size,
            generation: quote.generation,
            updatedAtMs: this.now(),
          }),
        );
      }
      return true;
    }

    // Fall back to cancel/replace
    this.log.debug("Amend refused; replacing", { clientOrderId, error: result.error });
    const [cancelled, placed] = await Promise.all([this.cancel(clientOrderId), this.place(quote, directive)]);
    return cancelled && placed;
  }

  private async retryPendingCancels(): Promise<void> {
    const retries = [...this.orders.values()].filter(
      o => o.cancelRequested && !o.cancelSubmitted && isWorking(o.status) && o.exchangeOrderId !== undefined,
    );
    await Promise.all(retries.map(o => this.cancel(o.clientOrderId)));
  }

  private applyEvent(order: TrackedOrder, event: OrderEvent, source: ExecutionEvent | null): void {
    const result = applyOrderEvent(order, event);
    if (result.isErr()) {
      const { type, message } = result.error;
      if (type === "duplicate") this.log.debug("Duplicate event dropped", { message });
      else this.log.info("Event ignored", { type, message });
      return;
    }

    const { order: next, effects } = result.value;
    this.orders.set(next.clientOrderId, next);
    this.pruned.delete(next.clientOrderId);

    if (effects.countReject) {
      this.rejects++;
      this.log.warn(event.type === "timeout" ? "GATEWAY_TIMEOUT" : "GATEWAY_REJECT", {
        clientOrderId: next.clientOrderId,
        consecutiveRejects: this.rejects,
        reason: event.type === "reject" ? event.reason : undefined,
      });
    }
    if (effects.resetRejects) this.rejects = 0;
    if (effects.lateAck) {
      this.log.warn("Late ack for abandoned order; cancelling", { clientOrderId: next.clientOrderId });
    }

    this.record(event.type, next, {
      reason: event.type === "reject" || event.type === "cancel_reject" ? event.reason : undefined,
      px: event.type === "fill" ? event.fillPrice : undefined,
      sz: event.type === "fill" ? effects.filledDelta : undefined,
      raw: source,
    });

    if (event.type === "fill" && toDecimal(effects.filledDelta).gt(0)) {
      this.applyFill({
        clientOrderId: next.clientOrderId,
        exchangeOrderId: next.exchangeOrderId ?? event.exchangeOrderId ?? "",
        side: next.side,
        size: effects.filledDelta,
        price: event.fillPrice,
        fee: event.fee,
        ts: new Date(event.ts),
        liquidity: source?.type === "fill" ? source.liquidity : undefined,
      });
    }

    if (effects.queueCancel) {
      void this.cancel(next.clientOrderId);
    }
  }

  private prune(order: TrackedOrder): void {
    this.orders.delete(order.clientOrderId);
    this.pruned.set(order.clientOrderId, order);
    if (this.pruned.size > MAX_PRUNED_ORDERS) {
      const oldest = this.pruned.keys().next();
      if (!oldest.done) this.pruned.delete(oldest.value);
    }
  }

  private applyUntrackedFill(event: FillEvent): void {
    const key = `${event.exchangeOrderId}:${String(event.seq)}`;
    if (this.untrackedFillKeys.has(key)) {
      this.log.debug("Duplicate untracked fill dropped", { key });
      return;
    }
    this.untrackedFillKeys.add(key);
    if (this.untrackedFillKeys.size > MAX_UNTRACKED_FILL_KEYS) {
      const oldest = this.untrackedFillKeys.values().next();
      if (!oldest.done) this.untrackedFillKeys.delete(oldest.value);
    }

    this.log.warn("Fill for untracked order", {
      clientOrderId: event.clientOrderId,
      exchangeOrderId: event.exchangeOrderId,
      size: event.filledSizeDelta,
    });
    this.applyFill({
      clientOrderId: event.clientOrderId,
      exchangeOrderId: event.exchangeOrderId,
      side: event.side,
      size: event.filledSizeDelta,
      price: event.fillPrice,
      fee: event.fee,
      ts: event.ts,
      liquidity: event.liquidity,
    });
  }

  private applyFill(fill: {
    clientOrderId: string;
    exchangeOrderId: string;
    side: Side;
    size: string;
    price: string;
    fee?: string;
    ts: Date;
    liquidity?: "maker" | "taker";
  }): void {
    const applied = this.deps.position.applyFill({
      side: fill.side,
      size: fill.size,
      price: fill.price,
      fee: fill.fee,
      tsMs: fill.ts.getTime(),
    });
    this.deps.marketState.setInventory(applied.inventoryAfter);

    this.log.info("Fill applied", {
      clientOrderId: fill.clientOrderId,
      side: fill.side,
      price: fill.price,
      size: fill.size,
      inventory: applied.inventoryAfter,
    });

    this.deps.performance.publish({
      type: "fill",
      ts: fill.ts,
      symbol: this.deps.symbol,
      clientOrderId: fill.clientOrderId,
      exchangeOrderId: fill.exchangeOrderId,
      side: fill.side,
      price: fill.price,
      size: fill.size,
      fee: fill.fee ?? "0",
      liquidity: fill.liquidity,
      inventoryAfter: applied.inventoryAfter,
      realizedPnlDelta: applied.realizedPnlDelta,
    });
    if (!toDecimal(applied.realizedPnlDelta).isZero()) {
      this.deps.performance.publish({
        type: "realized_pnl",
        ts: fill.ts,
        symbol: this.deps.symbol,
        pnlDelta: applied.realizedPnlDelta,
        cumulativePnl: applied.realizedPnl,
      });
    }
  }

  /**
   * Track a submission until it settles
   */
  private track(submission: ResultAsync<void, ExecutionError>, onError: (error: ExecutionError) => void): Promise<boolean> {
    const settled = submission.match(
      () => true,
      error => {
        onError(error);
        return false;
      },
    );
    const tracked = settled.then(() => undefined);
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
    return settled;
  }

  private record(
    eventType: OrderEventRecord["eventType"],
    order: TrackedOrder,
    extra: {
      postOnly?: boolean;
      directive?: RiskDirective;
      reason?: string;
      px?: string;
      sz?: string;
      raw?: ExecutionEvent | null;
    } = {},
  ): void {
    const repository = this.deps.eventRepository;
    if (!repository) return;

    repository.queueOrderEvent({
      ts: new Date(this.now()),
      exchange: this.deps.exchange,
      symbol: this.deps.symbol,
      clientOrderId: order.clientOrderId,
      exchangeOrderId: order.exchangeOrderId ?? null,
      eventType,
      side: order.side,
      level: order.level,
      generation: order.generation,
      px: extra.px ?? order.price,
      sz: extra.sz ?? order.size,
      postOnly: extra.postOnly ?? true,
      reduceOnly: order.reduceOnly,
      reason: extra.reason ?? null,
      directive: extra.directive ?? this.directive,
      rawJson: extra.raw ?? null,
    });
  }
}

function toOrderEvent(event: ExecutionEvent): OrderEvent {
  const ts = event.ts.getTime();
  switch (event.type) {
    case "ack":
      return { type: "ack", exchangeOrderId: event.exchangeOrderId, seq: event.seq, ts };
    case "reject":
      return { type: "reject", reason: event.reason, seq: event.seq, ts };
    case "fill":
      return {
        type: "fill",
        exchangeOrderId: event.exchangeOrderId,
        filledSizeDelta: event.filledSizeDelta,
        fillPrice: event.fillPrice,
        fee: event.fee,
        seq: event.seq,
        ts,
      };
    case "cancelled":
      return { type: "cancelled", seq: event.seq, ts };
    case "cancel_reject":
      return { type: "cancel_reject", reason: event.reason, seq: event.seq, ts };
  }
}

function describeAction(action: ExecutionAction): string {
  switch (action.type) {
    case "place":
      return `place ${action.quote.side}:${String(action.quote.level)} ${action.quote.size}@${action.quote.price}`;
    case "cancel":
      return `cancel ${action.clientOrderId} (${action.reason})`;
    case "amend":
      return `amend ${action.clientOrderId} -> ${action.quote.size}@${action.quote.price}`;
  }
}
