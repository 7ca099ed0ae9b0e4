/**
 * Port interfaces for adapters
 *
 * - Defines venue-agnostic interfaces
 * - Adapters implement these ports
 */

export type {
  BboEvent,
  ConnectionEvent,
  FundingRateEvent,
  MarketDataError,
  MarketDataEvent,
  MarketDataPort,
  MarketDataSubscription,
} from "./market-data-port";

export type {
  AmendOrderRequest,
  CancelOrderRequest,
  CancelRejectEvent,
  ExecutionError,
  ExecutionEvent,
  ExecutionPort,
  FillEvent,
  OrderAckEvent,
  OrderCancelledEvent,
  OrderRejectEvent,
  OrderSide,
  PlaceOrderRequest,
} from "./execution-port";

export type {
  PerformanceEvent,
  PerformanceFillEvent,
  PerformanceSinkError,
  PerformanceTrackerPort,
  RealizedPnlEvent,
} from "./performance-port";
