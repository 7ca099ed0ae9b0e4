/**
 * Decision Cycle - One control-loop tick of a market session
 *
 * Read → Quote → Risk → Reconcile
 *
 * The tick awaits hand-off of its intents to the gateway, never acks.
 */

import type {
  Ms,
  QuoteConfig,
  QuoteSpec,
  QuoteStrategy,
  ReasonCode,
  RiskDecision,
  RiskDirective,
  RiskLimits,
  RiskState,
  VenueRules,
} from "@perp-mm/core";
import { applyDecision, evaluateRisk, hasBook, isDataStale, updateRiskState } from "@perp-mm/core";
import type { Logger } from "@perp-mm/utils";

import type { GenerationClock } from "../services/generation-clock";
import type { MarketStateStore } from "../services/market-state-store";
import type { OrderLifecycleManager, ReconcileSummary } from "../services/order-lifecycle-manager";
import type { PositionTracker } from "../services/position-tracker";

/**
 * Outward alert raised once per entry into HALT
 */
export interface SessionAlert {
  symbol: string;
  directive: RiskDirective;
  reasonCodes: ReasonCode[];
  consecutiveRejects: number;
  ts: Date;
}

/**
 * Everything a tick reads and drives
 */
export interface TickContext {
  symbol: string;
  strategy: QuoteStrategy;
  quoteConfig: Readonly<QuoteConfig>;
  riskLimits: Readonly<RiskLimits>;
  venue: Readonly<VenueRules>;
  toleranceBps: string;
  startingEquity: string;
  marketState: MarketStateStore;
  position: PositionTracker;
  orders: OrderLifecycleManager;
  generations: GenerationClock;
  riskState: RiskState;
  log: Logger;
  onAlert?: (alert: SessionAlert) => void;
}

export interface TickOutcome {
  nowMs: Ms;
  directive: RiskDirective;
  reasonCodes: ReasonCode[];
  generation: number;
  proposed: QuoteSpec[];
  approved: QuoteSpec[];
  riskState: RiskState;
  reconcile?: ReconcileSummary;
  /** Cancels submitted because of HALT */
  haltCancels?: number;
}

/**
 * Data quality reason codes for a snapshot
 */
function dataReasonCodes(ctx: TickContext, nowMs: Ms): ReasonCode[] {
  const state = ctx.marketState.snapshot();
  if (!hasBook(state)) return ["NO_BOOK"];
  if (isDataStale(state.lastPriceUpdateMs, nowMs, ctx.quoteConfig.staleAfterMs)) return ["MARKET_DATA_STALE"];
  return [];
}

function logDirectiveChange(ctx: TickContext, from: RiskDirective, decision: RiskDecision): void {
  const fields = { from, to: decision.directive, reasonCodes: decision.reasonCodes };
  switch (decision.directive) {
    case "HALT":
      ctx.log.error("SYSTEMIC_FAILURE: session halted", {
        ...fields,
        consecutiveRejects: ctx.orders.consecutiveRejects(),
      });
      break;
    case "FLATTEN":
      ctx.log.warn("Directive changed", fields);
      break;
    case "REDUCE_ONLY":
    case "CONTINUE":
      ctx.log.info("Directive changed", fields);
      break;
  }
}

/**
 * Execute one tick
 *
 * @returns the outcome, including the risk state to carry into the next tick
 */
export async function executeTick(ctx: TickContext, nowMs: Ms): Promise<TickOutcome> {
  // Step 1: Local timeouts, then a consistent snapshot
  ctx.orders.sweepTimeouts(nowMs);
  const state = ctx.marketState.snapshot();

  // Step 2: Refresh risk inputs
  const observed = updateRiskState(
    ctx.riskState,
    {
      nowMs,
      equity: ctx.position.equity(ctx.startingEquity, state.midPx),
      consecutiveRejects: ctx.orders.consecutiveRejects(),
      lastLossAtMs: ctx.position.getLastLossAtMs(),
    },
    ctx.riskLimits,
  );

  // Step 3: Quote
  const proposed = ctx.strategy.computeQuotes({
    nowMs,
    state,
    config: ctx.quoteConfig,
    venue: ctx.venue,
    generation: ctx.generations.current(),
  });

  // Step 4: Risk
  const decision = evaluateRisk(proposed, observed, ctx.riskLimits, {
    nowMs,
    state,
    venue: ctx.venue,
    generation: ctx.generations.current(),
  });
  const riskState = applyDecision(observed, decision, nowMs);
  const reasonCodes = [...decision.reasonCodes, ...dataReasonCodes(ctx, nowMs)];

  if (decision.directive !== ctx.riskState.directive) {
    logDirectiveChange(ctx, ctx.riskState.directive, decision);
    if (decision.directive === "HALT") {
      ctx.onAlert?.({
        symbol: ctx.symbol,
        directive: decision.directive,
        reasonCodes: decision.reasonCodes,
        consecutiveRejects: ctx.orders.consecutiveRejects(),
        ts: new Date(nowMs),
      });
    }
  }

  // Step 5: Execute
  if (decision.directive === "HALT") {
    const haltCancels = await ctx.orders.cancelAll();
    return {
      nowMs,
      directive: decision.directive,
      reasonCodes,
      generation: ctx.generations.current(),
      proposed,
      approved: [],
      riskState,
      haltCancels,
    };
  }

  const generation = ctx.generations.advance(decision.approved, state.midPx, ctx.toleranceBps);
  const approved = ctx.generations.stamp(decision.approved);

  const reconcile = await ctx.orders.reconcile({
    targets: approved,
    generation,
    midPx: state.midPx,
    toleranceBps: ctx.toleranceBps,
    directive: decision.directive,
  });

  ctx.log.debug("Tick", {
    directive: decision.directive,
    generation,
    midPx: state.midPx ?? "-",
    inventory: state.inventory,
    proposed: proposed.length,
    approved: approved.length,
    placed: reconcile.placed,
    cancelled: reconcile.cancelled,
  });

  return {
    nowMs,
    directive: decision.directive,
    reasonCodes,
    generation,
    proposed,
    approved,
    riskState,
    reconcile,
  };
}
