/**
 * packages/db - DB connection helper
 *
 * Builds the `Pool` / `drizzle` pair in one place.
 * Callers pass only the connection string; the schema is attached automatically.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = ReturnType<typeof drizzle<typeof schema>>;

export interface DbHandle {
  db: Db;
  /** End the underlying pool */
  close: () => Promise<void>;
}

export function getDb(connectionString: string): DbHandle {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });

  return {
    db,
    close: () => pool.end(),
  };
}
