/**
 * Risk Policy - Pure logic for risk evaluation
 *
 * - Directive priority: HALT > FLATTEN > REDUCE_ONLY > CONTINUE
 * - HALT is sticky until an operator calls resetHalt
 * - FLATTEN holds until inventory is flat and the breach has cleared
 * - Approved quotes are filtered/shrunk, never enlarged
 *
 * This module is pure (no I/O, no throw).
 */

import {
  BPS_DENOMINATOR,
  ceilToTick,
  Decimal,
  floorToTick,
  formatPrice,
  formatSize,
  toDecimal,
  truncateToLot,
  ZERO,
} from "./decimal";
import type {
  Ms,
  QuoteSpec,
  ReasonCode,
  RiskContext,
  RiskDecision,
  RiskDirective,
  RiskLimits,
  RiskObservation,
  RiskState,
  Side,
  SizeStr,
} from "./types";

/**
 * Default ratio of max inventory above which only reducing quotes are allowed
 */
export const DEFAULT_SOFT_INVENTORY_RATIO = "0.8";

/**
 * Create the session-start risk state
 */
export function createInitialRiskState(nowMs: Ms, startingEquity: string): RiskState {
  return {
    directive: "CONTINUE",
    directiveSinceMs: nowMs,
    equity: startingEquity,
    peakEquity: startingEquity,
    drawdown: "0",
    consecutiveRejects: 0,
    flattenInProgress: false,
    halted: false,
  };
}

/**
 * Calculate drawdown from peak equity
 *
 * drawdown = max(0, 1 - equity / peak), 0 when peak <= 0
 */
export function calculateDrawdown(equity: string, peakEquity: string): Decimal {
  const peak = toDecimal(peakEquity);
  if (peak.lte(0)) return ZERO;
  return Decimal.max(ZERO, new Decimal(1).minus(toDecimal(equity).div(peak)));
}

/**
 * Recompute derived risk state from this tick's observations
 *
 * The directive itself is decided by evaluateRisk; this only refreshes inputs
 * and latches HALT once the reject count exceeds the limit.
 */
export function updateRiskState(prev: RiskState, obs: RiskObservation, limits: RiskLimits): RiskState {
  const equity = toDecimal(obs.equity);
  const peak = Decimal.max(toDecimal(prev.peakEquity), equity);
  const drawdown = calculateDrawdown(equity.toFixed(), peak.toFixed());

  const lossCooldownUntilMs =
    obs.lastLossAtMs !== undefined && limits.lossCooldownMs > 0 ?
      Math.max(prev.lossCooldownUntilMs ?? 0, obs.lastLossAtMs + limits.lossCooldownMs)
    : prev.lossCooldownUntilMs;

  return {
    ...prev,
    equity: equity.toFixed(),
    peakEquity: peak.toFixed(),
    drawdown: drawdown.toFixed(),
    consecutiveRejects: obs.consecutiveRejects,
    halted: prev.halted || obs.consecutiveRejects > limits.maxConsecutiveRejects,
    lossCooldownUntilMs,
  };
}

/**
 * Operator reset of a HALT
 *
 * The next tick re-evaluates from scratch; a standing inventory breach sends
 * the session straight back to FLATTEN.
 */
export function resetHalt(state: RiskState, nowMs: Ms): RiskState {
  return {
    ...state,
    directive: "CONTINUE",
    directiveSinceMs: nowMs,
    consecutiveRejects: 0,
    flattenInProgress: false,
    halted: false,
  };
}

/**
 * Whether inventory is below one lot
 */
export function isFlat(inventory: SizeStr, lotSize: SizeStr): boolean {
  return truncateToLot(toDecimal(inventory).abs(), lotSize).isZero();
}

/**
 * Side that reduces inventory, undefined when flat
 */
export function reducingSide(inventory: SizeStr): Side | undefined {
  const inv = toDecimal(inventory);
  if (inv.gt(0)) return "sell";
  if (inv.lt(0)) return "buy";
  return undefined;
}

/**
 * Determine the directive for this tick
 */
export function determineDirective(
  riskState: RiskState,
  limits: RiskLimits,
  ctx: RiskContext,
): { directive: RiskDirective; reasonCodes: ReasonCode[] } {
  if (riskState.halted) {
    return { directive: "HALT", reasonCodes: ["SYSTEMIC_FAILURE"] };
  }

  const absInventory = toDecimal(ctx.state.inventory).abs();
  const absNotional = toDecimal(ctx.state.inventoryNotional).abs();
  const maxInventory = toDecimal(limits.maxInventory);
  const maxNotional = toDecimal(limits.maxInventoryNotional);
  const maxDrawdown = toDecimal(limits.maxDrawdown);

  // ─────────────────────────────────────────────────────────────────────────
  // Hard breaches → FLATTEN
  // ─────────────────────────────────────────────────────────────────────────
  const hard: ReasonCode[] = [];
  if (absInventory.gt(maxInventory)) hard.push("INVENTORY_HARD_LIMIT");
  if (maxNotional.gt(0) && absNotional.gt(maxNotional)) hard.push("NOTIONAL_LIMIT");
  if (maxDrawdown.gt(0) && toDecimal(riskState.drawdown).gt(maxDrawdown)) hard.push("DRAWDOWN_LIMIT");

  if (hard.length > 0) {
    return { directive: "FLATTEN", reasonCodes: hard };
  }

  if (riskState.directive === "FLATTEN" && !isFlat(ctx.state.inventory, ctx.venue.lotSize)) {
    return { directive: "FLATTEN", reasonCodes: ["FLATTEN_IN_PROGRESS"] };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Soft conditions → REDUCE_ONLY
  // ─────────────────────────────────────────────────────────────────────────
  const soft: ReasonCode[] = [];
  if (absInventory.gt(maxInventory.mul(toDecimal(limits.softInventoryRatio, DEFAULT_SOFT_INVENTORY_RATIO)))) {
    soft.push("INVENTORY_SOFT_LIMIT");
  }
  if (riskState.lossCooldownUntilMs !== undefined && ctx.nowMs < riskState.lossCooldownUntilMs) {
    soft.push("LOSS_COOLDOWN");
  }

  if (soft.length > 0) {
    return { directive: "REDUCE_ONLY", reasonCodes: soft };
  }

  return { directive: "CONTINUE", reasonCodes: ["NORMAL_CONDITIONS"] };
}

/**
 * Cap the cumulative size of quotes (in order) at capacity
 *
 * Sizes are truncated to lot; quotes shrunk to zero are dropped.
 */
export function capCumulativeSize(quotes: QuoteSpec[], capacity: Decimal, lotSize: SizeStr): QuoteSpec[] {
  const out: QuoteSpec[] = [];
  let remaining = Decimal.max(ZERO, capacity);

  for (const quote of quotes) {
    const size = toDecimal(quote.size);
    const allowed = truncateToLot(Decimal.min(size, remaining), lotSize);
    if (allowed.lte(0)) continue;

    out.push(allowed.eq(size) ? quote : Object.freeze({ ...quote, size: formatSize(allowed, lotSize) }));
    remaining = remaining.minus(allowed);
  }

  return out;
}

/**
 * Cap the cumulative notional of quotes (in order) at capacity
 */
export function capCumulativeNotional(quotes: QuoteSpec[], capacity: Decimal, lotSize: SizeStr): QuoteSpec[] {
  const out: QuoteSpec[] = [];
  let remaining = Decimal.max(ZERO, capacity);

  for (const quote of quotes) {
    const price = toDecimal(quote.price);
    if (price.lte(0)) continue;

    const size = toDecimal(quote.size);
    const allowed = truncateToLot(Decimal.min(size, remaining.div(price)), lotSize);
    if (allowed.lte(0)) continue;

    out.push(allowed.eq(size) ? quote : Object.freeze({ ...quote, size: formatSize(allowed, lotSize) }));
    remaining = remaining.minus(allowed.mul(price));
  }

  return out;
}

/**
 * Build the flatten order
 *
 * One reduce-only limit order on the reducing side, sized to close the whole
 * position, priced at most flattenMaxSlippageBps through mid.
 */
export function buildFlattenQuotes(limits: RiskLimits, ctx: RiskContext): QuoteSpec[] {
  const { state, venue, generation } = ctx;
  const side = reducingSide(state.inventory);
  if (side === undefined || state.midPx === undefined) return [];

  const size = truncateToLot(toDecimal(state.inventory).abs(), venue.lotSize);
  if (size.lte(0)) return [];

  const mid = toDecimal(state.midPx);
  const slip = toDecimal(limits.flattenMaxSlippageBps).div(BPS_DENOMINATOR);

  // Round toward mid so the bound is never exceeded
  const price =
    side === "sell" ?
      ceilToTick(mid.mul(new Decimal(1).minus(slip)), venue.tickSize)
    : floorToTick(mid.mul(new Decimal(1).plus(slip)), venue.tickSize);

  if (price.lte(0)) return [];

  const flatten: QuoteSpec = {
    side,
    level: 0,
    price: formatPrice(price, venue.tickSize),
    size: formatSize(size, venue.lotSize),
    generation,
    reduceOnly: true,
  };
  return [Object.freeze(flatten)];
}

/**
 * Keep only the reducing side, capped at |inventory|
 */
function approveReduceOnly(proposed: QuoteSpec[], ctx: RiskContext): QuoteSpec[] {
  const side = reducingSide(ctx.state.inventory);
  if (side === undefined) return [];

  const reducing = proposed.filter(q => q.side === side);
  const capped = capCumulativeSize(reducing, toDecimal(ctx.state.inventory).abs(), ctx.venue.lotSize);
  return capped.map(q => Object.freeze({ ...q, reduceOnly: true }));
}

/**
 * Shrink both sides to inventory headroom and the optional notional cap
 */
function approveContinue(proposed: QuoteSpec[], limits: RiskLimits, ctx: RiskContext): QuoteSpec[] {
  const inventory = toDecimal(ctx.state.inventory);
  const maxInventory = toDecimal(limits.maxInventory);
  const maxQuoteNotional = toDecimal(limits.maxQuoteNotional);
  const lot = ctx.venue.lotSize;

  const sides: Side[] = ["buy", "sell"];
  const approvedBySide = sides.map(side => {
    const headroom = side === "buy" ? maxInventory.minus(inventory) : maxInventory.plus(inventory);
    let quotes = capCumulativeSize(
      proposed.filter(q => q.side === side),
      headroom,
      lot,
    );
    if (maxQuoteNotional.gt(0)) {
      quotes = capCumulativeNotional(quotes, maxQuoteNotional, lot);
    }
    return quotes;
  });

  // Restore the engine's ordering (level ascending, bid before ask)
  const bySideLevel = new Map(approvedBySide.flat().map(q => [`${q.side}:${String(q.level)}`, q]));
  return proposed.flatMap(q => {
    const approved = bySideLevel.get(`${q.side}:${String(q.level)}`);
    return approved ? [approved] : [];
  });
}

/**
 * Evaluate risk and gate the proposed quotes
 *
 * @param proposed - Quote engine output
 * @param riskState - State refreshed by updateRiskState for this tick
 * @param limits - Session limits
 * @param ctx - Market snapshot, venue rules and generation for flatten orders
 */
export function evaluateRisk(
  proposed: QuoteSpec[],
  riskState: RiskState,
  limits: RiskLimits,
  ctx: RiskContext,
): RiskDecision {
  const { directive, reasonCodes } = determineDirective(riskState, limits, ctx);

  switch (directive) {
    case "HALT":
      return { directive, approved: [], reasonCodes };
    case "FLATTEN":
      return { directive, approved: buildFlattenQuotes(limits, ctx), reasonCodes };
    case "REDUCE_ONLY":
      return { directive, approved: approveReduceOnly(proposed, ctx), reasonCodes };
    case "CONTINUE":
      return { directive, approved: approveContinue(proposed, limits, ctx), reasonCodes };
  }
}

/**
 * Record the decided directive on the risk state
 */
export function applyDecision(state: RiskState, decision: RiskDecision, nowMs: Ms): RiskState {
  if (decision.directive === state.directive) {
    return { ...state, flattenInProgress: decision.directive === "FLATTEN" };
  }
  return {
    ...state,
    directive: decision.directive,
    directiveSinceMs: nowMs,
    flattenInProgress: decision.directive === "FLATTEN",
  };
}
