// Export schema
export * from "./schema";

// Connection helper (Node-only)
export { getDb } from "./get-db";
export type { Db, DbHandle } from "./get-db";
