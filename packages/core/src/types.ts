/**
 * Core Domain Types
 *
 * Pure type definitions for the quoting/risk core.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Price as decimal string to avoid floating point issues */
export type PriceStr = string;

/** Size as decimal string to avoid floating point issues */
export type SizeStr = string;

/** Basis points as decimal string */
export type BpsStr = string;

/** Milliseconds */
export type Ms = number;

/** Side of an order */
export type Side = "buy" | "sell";

// ─────────────────────────────────────────────────────────────────────────────
// Market State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Latest observed state of one market, including own inventory.
 *
 * Readers always receive a complete frozen value; ingestion replaces it
 * wholesale instead of mutating fields.
 */
export interface MarketState {
  marketId: string;
  /** (best_bid + best_ask) / 2, absent when either side of the book is missing */
  midPx?: PriceStr;
  bestBidPx?: PriceStr;
  bestBidSz?: SizeStr;
  bestAskPx?: PriceStr;
  bestAskSz?: SizeStr;
  /** Signed fraction per funding period (positive = longs pay shorts) */
  fundingRate: string;
  fundingTsMs?: Ms;
  /** Signed position size (positive = long) */
  inventory: SizeStr;
  /** inventory * mid, "0" without a mid */
  inventoryNotional: string;
  /** Time of the last top-of-book update (0 = never) */
  lastPriceUpdateMs: Ms;
  /** Bumped on every replacement */
  version: number;
}

/**
 * Venue increments for rounding
 */
export interface VenueRules {
  /** Minimum price increment */
  tickSize: PriceStr;
  /** Minimum order-size increment */
  lotSize: SizeStr;
}

// ─────────────────────────────────────────────────────────────────────────────
// Quotes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Quote engine configuration
 */
export interface QuoteConfig {
  /** Full spread between level-0 bid and ask with zero skew */
  baseSpreadBps: BpsStr;
  /** Bound on every skew component and on their sum */
  maxSkewBps: BpsStr;
  /** bps of skew per unit of funding rate */
  fundingSkewCoefficient: string;
  /** |funding| below this contributes no skew */
  fundingThreshold: string;
  /** Size per quote, in base units */
  orderSize: SizeStr;
  /** Number of bid/ask pairs */
  levels: number;
  /** Extra offset per level beyond level 0 */
  levelStepBps: BpsStr;
  /** Inventory at which inventory skew saturates */
  maxInventory: SizeStr;
  /** Quotes are withheld when the book is older than this */
  staleAfterMs: Ms;
}

/**
 * One target resting order. Immutable.
 */
export interface QuoteSpec {
  readonly side: Side;
  /** 0 = closest to mid */
  readonly level: number;
  readonly price: PriceStr;
  readonly size: SizeStr;
  /** Control-loop generation that produced this quote */
  readonly generation: number;
  readonly reduceOnly?: boolean;
}

/**
 * Input for a quote strategy
 */
export interface QuoteInput {
  nowMs: Ms;
  state: MarketState;
  config: QuoteConfig;
  venue: VenueRules;
  generation: number;
}

/**
 * Strategy capability. Alternate strategies are alternate implementations,
 * chosen once at session start.
 */
export interface QuoteStrategy {
  readonly name: string;
  computeQuotes(input: QuoteInput): QuoteSpec[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Risk
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Risk directive
 *
 * - CONTINUE: quote normally (sizes may be shrunk)
 * - REDUCE_ONLY: only the side that reduces inventory
 * - FLATTEN: ignore quotes, close inventory with bounded aggressive orders
 * - HALT: no new orders, cancel everything; cleared only by an operator
 */
export type RiskDirective = "CONTINUE" | "REDUCE_ONLY" | "FLATTEN" | "HALT";

/**
 * Reason codes for directive changes and withheld quotes
 *
 * Used for audit logs and test assertions.
 */
export type ReasonCode =
  | "MARKET_DATA_STALE"
  | "NO_BOOK"
  | "GATEWAY_REJECT"
  | "GATEWAY_TIMEOUT"
  | "INVENTORY_SOFT_LIMIT"
  | "INVENTORY_HARD_LIMIT"
  | "NOTIONAL_LIMIT"
  | "DRAWDOWN_LIMIT"
  | "LOSS_COOLDOWN"
  | "SYSTEMIC_FAILURE"
  | "FLATTEN_IN_PROGRESS"
  | "NORMAL_CONDITIONS";

/**
 * Static per-session limits. Never mutated by the core.
 */
export interface RiskLimits {
  maxInventory: SizeStr;
  maxInventoryNotional: string;
  /** Fraction of peak equity, e.g. "0.05" */
  maxDrawdown: string;
  maxConsecutiveRejects: number;
  /** REDUCE_ONLY above maxInventory * softInventoryRatio */
  softInventoryRatio: string;
  /** Flatten orders cross mid by at most this much */
  flattenMaxSlippageBps: BpsStr;
  /** Per-side cumulative quote notional cap ("0" = unlimited) */
  maxQuoteNotional: string;
  /** REDUCE_ONLY for this long after a realized loss (0 = disabled) */
  lossCooldownMs: Ms;
}

/**
 * Derived risk state, recomputed every tick
 */
export interface RiskState {
  directive: RiskDirective;
  directiveSinceMs: Ms;
  equity: string;
  peakEquity: string;
  /** 1 - equity / peak, "0" when at peak */
  drawdown: string;
  consecutiveRejects: number;
  flattenInProgress: boolean;
  /** Sticky until resetHalt */
  halted: boolean;
  lossCooldownUntilMs?: Ms;
}

/**
 * Per-tick observations feeding updateRiskState
 */
export interface RiskObservation {
  nowMs: Ms;
  equity: string;
  consecutiveRejects: number;
  /** Time of the most recent realized loss, if any */
  lastLossAtMs?: Ms;
}

/**
 * Market context the risk policy needs besides quotes
 */
export interface RiskContext {
  nowMs: Ms;
  state: MarketState;
  venue: VenueRules;
  generation: number;
}

/**
 * Risk evaluation result
 */
export interface RiskDecision {
  directive: RiskDirective;
  approved: QuoteSpec[];
  reasonCodes: ReasonCode[];
}
