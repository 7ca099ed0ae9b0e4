/**
 * ex_order_event - Order lifecycle events
 *
 * - Every place/cancel/amend intent and every gateway ack/reject/cancel/fill
 * - Used for audit and post-session reconstruction
 */

import { boolean, index, integer, jsonb, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const exOrderEvent = pgTable(
  "ex_order_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    exchange: text("exchange").notNull(),
    symbol: text("symbol").notNull(),
    clientOrderId: text("client_order_id").notNull(),
    exchangeOrderId: text("exchange_order_id"),
    // place/cancel/amend/ack/reject/cancelled/cancel_reject/fill/timeout
    eventType: text("event_type").notNull(),
    side: text("side"),
    level: integer("level"),
    generation: integer("generation"),
    px: numeric("px"),
    sz: numeric("sz"),
    postOnly: boolean("post_only").notNull(),
    reduceOnly: boolean("reduce_only").notNull().default(false),
    reason: text("reason"),
    directive: text("directive"), // CONTINUE/REDUCE_ONLY/FLATTEN/HALT
    rawJson: jsonb("raw_json"),
  },
  table => [
    index("ex_order_event_exchange_symbol_ts_idx").on(table.exchange, table.symbol, table.ts.desc()),
    index("ex_order_event_client_order_id_idx").on(table.clientOrderId),
  ],
);

export type ExOrderEvent = typeof exOrderEvent.$inferSelect;
export type NewExOrderEvent = typeof exOrderEvent.$inferInsert;
