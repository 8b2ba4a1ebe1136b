import { Kysely, PostgresDialect, sql } from "kysely";
import pg from "pg";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Parse JSON/JSONB columns into objects
types.setTypeParser(types.builtins.JSON, (val: string): unknown =>
  JSON.parse(val)
);
types.setTypeParser(types.builtins.JSONB, (val: string): unknown =>
  JSON.parse(val)
);

// ============================================================================
// Configuration
// ============================================================================

const DATABASE_URL = loadConfig().databaseUrl;

const poolConfig: pg.PoolConfig = {
  connectionString: DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
};

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

export const pool = new Pool(poolConfig);

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

// ============================================================================
// Connection Management
// ============================================================================

export async function checkConnection(): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      "Database connection check failed"
    );
    return false;
  }
}

export async function closeConnection(): Promise<void> {
  try {
    // destroy() also ends the pool
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Database URL for display, password masked
 */
export function getDatabaseUrl(): string {
  const url = new URL(DATABASE_URL);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
