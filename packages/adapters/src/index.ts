/**
 * packages/adapters - Venue Adapters
 *
 * - Port interfaces for venue-agnostic trading
 * - Paper venue implementation for dry runs
 * - In-memory performance tracker
 */

// Port interfaces
export * from "./ports";

// Paper venue
export { PaperExecutionAdapter } from "./paper/paper-execution-adapter";
export type { PaperExecutionConfig } from "./paper/paper-execution-adapter";
export { PaperMarketDataAdapter } from "./paper/paper-market-data-adapter";
export type { PaperMarketConfig, PaperMarketDataConfig } from "./paper/paper-market-data-adapter";

// Performance
export { InMemoryPerformanceTracker } from "./performance/in-memory-performance-tracker";
export type { PerformanceSnapshot } from "./performance/in-memory-performance-tracker";
