/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - All tables use (exchange, symbol) and timestamptz(UTC)
 * - Time column named 'ts'
 */

// Execution Events
export * from "./ex-order-event";
export * from "./ex-fill";
