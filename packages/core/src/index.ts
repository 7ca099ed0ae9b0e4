/**
 * packages/core - Pure Quoting and Risk Logic
 *
 * This package contains all pure business logic for the market maker.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  PriceStr,
  SizeStr,
  BpsStr,
  Ms,
  Side,
  // Market
  MarketState,
  VenueRules,
  // Quotes
  QuoteConfig,
  QuoteSpec,
  QuoteInput,
  QuoteStrategy,
  // Risk
  RiskDirective,
  ReasonCode,
  RiskLimits,
  RiskState,
  RiskObservation,
  RiskContext,
  RiskDecision,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Fixed-point helpers
// ─────────────────────────────────────────────────────────────────────────────
export {
  Decimal,
  BPS_DENOMINATOR,
  ZERO,
  toDecimal,
  clampAbs,
  roundToTick,
  floorToTick,
  ceilToTick,
  truncateToLot,
  formatPrice,
  formatSize,
  diffBps,
} from "./decimal";

// ─────────────────────────────────────────────────────────────────────────────
// Market State
// ─────────────────────────────────────────────────────────────────────────────
export {
  calculateMid,
  calculateSpreadBps,
  calculateInventoryNotional,
  isCrossed,
  hasBook,
  isDataStale,
  createEmptyMarketState,
} from "./market-state";

// ─────────────────────────────────────────────────────────────────────────────
// Quote Calculator
// ─────────────────────────────────────────────────────────────────────────────
export type { QuoteStrategyName } from "./quote-calculator";
export {
  calculateInventorySkewBps,
  calculateFundingSkewBps,
  calculateTotalSkewBps,
  calculateLevelPrices,
  generateQuotes,
  skewedLadderStrategy,
  symmetricLadderStrategy,
  QUOTE_STRATEGIES,
} from "./quote-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// Risk Policy
// ─────────────────────────────────────────────────────────────────────────────
export {
  DEFAULT_SOFT_INVENTORY_RATIO,
  createInitialRiskState,
  calculateDrawdown,
  updateRiskState,
  resetHalt,
  isFlat,
  reducingSide,
  determineDirective,
  buildFlattenQuotes,
  evaluateRisk,
  applyDecision,
} from "./risk-policy";

// ─────────────────────────────────────────────────────────────────────────────
// Order State
// ─────────────────────────────────────────────────────────────────────────────
export type {
  OrderStatus,
  TrackedOrder,
  OrderEvent,
  TransitionEffects,
  OrderTransition,
  OrderTransitionError,
  CancelRequestOutcome,
} from "./order-state";
export {
  isTerminal,
  isWorking,
  isOpen,
  remainingSize,
  createPendingOrder,
  applyOrderEvent,
  requestCancel,
  cancelSubmissionFailed,
} from "./order-state";
