/**
 * Executor Services
 */

export { MarketStateStore } from "./market-state-store";
export type { IngestResult } from "./market-state-store";
export { PositionTracker } from "./position-tracker";
export type { FillApplication, PositionFill, PositionSummary } from "./position-tracker";
export { GenerationClock, quoteKey } from "./generation-clock";
export { planReconciliation, withinTolerance } from "./execution-planner";
export type { CancelReason, ExecutionAction, PlanInput } from "./execution-planner";
export { OrderLifecycleManager } from "./order-lifecycle-manager";
export type { OrderLifecycleDeps, ReconcileInput, ReconcileSummary } from "./order-lifecycle-manager";
export {
  PerformancePublisher,
  createFanOutPerformanceSink,
  createRepositoryPerformanceSink,
} from "./performance-publisher";
export type { PerformancePublisherOptions } from "./performance-publisher";
export { MarketSession } from "./market-session";
export type { MarketSessionOptions, SessionStatus } from "./market-session";
