/**
 * ex_fill - Fills
 *
 * - All applied fills with the inventory and realized PnL they produced
 */

import { index, jsonb, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const exFill = pgTable(
  "ex_fill",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    exchange: text("exchange").notNull(),
    symbol: text("symbol").notNull(),
    clientOrderId: text("client_order_id").notNull(),
    exchangeOrderId: text("exchange_order_id"),
    side: text("side").notNull(), // buy/sell
    fillPx: numeric("fill_px").notNull(),
    fillSz: numeric("fill_sz").notNull(),
    fee: numeric("fee"),
    liquidity: text("liquidity"), // maker/taker
    inventoryAfter: numeric("inventory_after").notNull(),
    realizedPnlDelta: numeric("realized_pnl_delta"),
    rawJson: jsonb("raw_json"),
  },
  table => [index("ex_fill_exchange_symbol_ts_idx").on(table.exchange, table.symbol, table.ts.desc())],
);

export type ExFill = typeof exFill.$inferSelect;
export type NewExFill = typeof exFill.$inferInsert;
