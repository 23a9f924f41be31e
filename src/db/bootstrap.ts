import { sql } from "drizzle-orm";
import type { DrizzleDb } from "./index.js";

/**
 * DDL for every table the service owns. Additive only: new columns go in as
 * nullable or with a DEFAULT so the previous release keeps working.
 * Statements run one at a time; PGlite's extended protocol rejects batches.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS games (
    id TEXT PRIMARY KEY,
    prompt TEXT NOT NULL,
    name TEXT NOT NULL,
    script TEXT NOT NULL,
    script_source TEXT NOT NULL,
    model TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    webgl_url TEXT,
    apk_url TEXT,
    error TEXT,
    created_at BIGINT NOT NULL,
    updated_at BIGINT NOT NULL
  )`,
  "CREATE INDEX IF NOT EXISTS idx_games_created_at ON games (created_at)",
  "CREATE INDEX IF NOT EXISTS idx_games_status ON games (status)",
];

/** Create missing tables and indexes. Safe to run on every boot. */
export async function ensureSchema(db: DrizzleDb): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}
