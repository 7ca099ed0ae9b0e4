/**
 * Market Session - All state of one quoted market
 *
 * Composition of the market state store, position tracker, lifecycle manager,
 * generation clock and risk state. tick() is not re-entrant: a call made while
 * the previous tick is still running is skipped.
 */

import type {
  MarketState,
  Ms,
  QuoteConfig,
  QuoteStrategy,
  RiskLimits,
  RiskState,
  TrackedOrder,
  VenueRules,
} from "@perp-mm/core";
import { createInitialRiskState, resetHalt } from "@perp-mm/core";
import type { ExecutionEvent, ExecutionPort, MarketDataEvent } from "@perp-mm/adapters";
import type { EventRepository } from "@perp-mm/repositories";
import { logger } from "@perp-mm/utils";
import type { Logger } from "@perp-mm/utils";

import type { SessionAlert, TickContext, TickOutcome } from "../usecases/decision-cycle";
import { executeTick } from "../usecases/decision-cycle";
import { GenerationClock } from "./generation-clock";
import { MarketStateStore } from "./market-state-store";
import { OrderLifecycleManager } from "./order-lifecycle-manager";
import type { PerformancePublisher } from "./performance-publisher";
import { PositionTracker } from "./position-tracker";
import type { PositionSummary } from "./position-tracker";

export interface MarketSessionOptions {
  exchange: string;
  symbol: string;
  strategy: QuoteStrategy;
  quoteConfig: Readonly<QuoteConfig>;
  riskLimits: Readonly<RiskLimits>;
  venue: Readonly<VenueRules>;
  toleranceBps: string;
  placeTimeoutMs: Ms;
  startingEquity: string;
  gateway: ExecutionPort;
  performance: PerformancePublisher;
  eventRepository?: EventRepository;
  onAlert?: (alert: SessionAlert) => void;
  log?: Logger;
  now?: () => Ms;
  newClientOrderId?: () => string;
}

export interface SessionStatus {
  symbol: string;
  directive: RiskState["directive"];
  generation: number;
  midPx?: string;
  openOrders: number;
  consecutiveRejects: number;
  position: PositionSummary;
  equity: string;
  drawdown: string;
  skippedTicks: number;
}

export class MarketSession {
  readonly symbol: string;
  private readonly context: TickContext;
  private readonly now: () => Ms;
  private running: Promise<TickOutcome> | null = null;
  private haltResetDuringTick = false;
  private skipped = 0;

  constructor(options: MarketSessionOptions) {
    this.symbol = options.symbol;
    this.now = options.now ?? Date.now;
    const log = options.log ?? logger.child("session", { symbol: options.symbol });

    const marketState = new MarketStateStore(options.symbol, log);
    const position = new PositionTracker();
    const orders = new OrderLifecycleManager({
      exchange: options.exchange,
      symbol: options.symbol,
      gateway: options.gateway,
      marketState,
      position,
      performance: options.performance,
      placeTimeoutMs: options.placeTimeoutMs,
      eventRepository: options.eventRepository,
      log,
      now: this.now,
      newClientOrderId: options.newClientOrderId,
    });

    this.context = {
      symbol: options.symbol,
      strategy: options.strategy,
      quoteConfig: options.quoteConfig,
      riskLimits: options.riskLimits,
      venue: options.venue,
      toleranceBps: options.toleranceBps,
      startingEquity: options.startingEquity,
      marketState,
      position,
      orders,
      generations: new GenerationClock(),
      riskState: createInitialRiskState(this.now(), options.startingEquity),
      log,
      onAlert: options.onAlert,
    };

    options.gateway.onEvent(event => {
      this.handleExecutionEvent(event);
    });
  }

  /**
   * Run one tick unless the previous one is still running
   *
   * @returns the outcome, or undefined when skipped
   */
  async tick(): Promise<TickOutcome | undefined> {
    if (this.running) {
      this.skipped++;
      this.context.log.debug("Tick skipped (previous still running)");
      return undefined;
    }

    this.haltResetDuringTick = false;
    this.running = executeTick(this.context, this.now());
    try {
      const outcome = await this.running;
      // The tick started from the halted state; an operator reset made meanwhile wins
      this.context.riskState =
        this.haltResetDuringTick && outcome.riskState.halted
          ? resetHalt(outcome.riskState, this.now())
          : outcome.riskState;
      return outcome;
    } finally {
      this.running = null;
      this.haltResetDuringTick = false;
    }
  }

  /**
   * Route a market data event into the state store
   */
  handleMarketData(event: MarketDataEvent): void {
    switch (event.type) {
      case "bbo":
        this.context.marketState.applyBbo(event);
        break;
      case "funding":
        this.context.marketState.applyFunding(event);
        break;
      case "connected":
      case "disconnected":
        break;
    }
  }

  handleExecutionEvent(event: ExecutionEvent): void {
    this.context.orders.handleEvent(event);
  }

  /**
   * Operator reset of a HALT; the next tick re-evaluates from scratch
   */
  resetHalt(): void {
    if (!this.context.riskState.halted) return;
    if (this.running) this.haltResetDuringTick = true;
    this.context.orders.resetRejects();
    this.context.riskState = resetHalt(this.context.riskState, this.now());
    this.context.log.warn("HALT reset by operator");
  }

  /**
   * Cancel every open order and wait for the submissions to settle
   */
  async cancelAll(): Promise<number> {
    const submitted = await this.context.orders.cancelAll();
    await this.context.orders.whenIdle();
    return submitted;
  }

  /**
   * Cancel everything, then wait until no order is open or the timeout passes
   */
  async shutdown(timeoutMs: Ms, pollMs: Ms = 50): Promise<void> {
    if (this.running) {
      await this.running.catch((error: unknown) => {
        this.context.log.warn("Last tick failed during shutdown", { error });
      });
    }

    const deadline = this.now() + timeoutMs;
    await this.cancelAll();
    while (this.openOrders().length > 0 && this.now() < deadline) {
      await new Promise(resolve => setTimeout(resolve, pollMs));
      await this.cancelAll();
    }

    const remaining = this.openOrders().length;
    if (remaining > 0) this.context.log.warn("Orders still open at shutdown", { remaining });
  }

  whenIdle(): Promise<void> {
    return this.context.orders.whenIdle();
  }

  marketState(): MarketState {
    return this.context.marketState.snapshot();
  }

  riskState(): RiskState {
    return this.context.riskState;
  }

  openOrders(): TrackedOrder[] {
    return this.context.orders.openOrders();
  }

  getOrder(clientOrderId: string): TrackedOrder | undefined {
    return this.context.orders.getOrder(clientOrderId);
  }

  consecutiveRejects(): number {
    return this.context.orders.consecutiveRejects();
  }

  status(): SessionStatus {
    const state = this.context.marketState.snapshot();
    return {
      symbol: this.symbol,
      directive: this.context.riskState.directive,
      generation: this.context.generations.current(),
      midPx: state.midPx,
      openOrders: this.openOrders().length,
      consecutiveRejects: this.consecutiveRejects(),
      position: this.context.position.summary(),
      equity: this.context.position.equity(this.context.startingEquity, state.midPx),
      drawdown: this.context.riskState.drawdown,
      skippedTicks: this.skipped,
    };
  }
}
