import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import { dbLogger } from "../logger.js";
import { pool } from "./connection.js";

const currentDirPath = dirname(fileURLToPath(import.meta.url));

// tsc does not copy the SQL file, so a build falls back to the source tree
const SCHEMA_CANDIDATES = [
  join(currentDirPath, "postgres-schema.sql"),
  join(currentDirPath, "..", "..", "..", "src", "db", "postgres-schema.sql"),
];

function readSchema(): string {
  const path = SCHEMA_CANDIDATES.find((candidate) => existsSync(candidate));
  if (path === undefined) {
    throw new Error(
      `postgres-schema.sql not found (looked in ${SCHEMA_CANDIDATES.join(", ")})`
    );
  }
  return readFileSync(path, "utf8");
}

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Apply postgres-schema.sql in one transaction. `fresh` drops the graph
 * tables first.
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const schema = readSchema();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    if (options?.fresh === true) {
      dbLogger.info("Dropping graph tables (--fresh mode)");
      await client.query(
        "DROP TABLE IF EXISTS graph_edges, graph_nodes, sync_metadata CASCADE"
      );
    }

    dbLogger.info("Running PostgreSQL schema migration");
    await client.query(schema);
    await client.query("COMMIT");

    dbLogger.info("Schema migration completed successfully");
  } catch (error) {
    await client.query("ROLLBACK");
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

const GRAPH_TABLES = ["graph_nodes", "graph_edges", "sync_metadata"];

/**
 * True when every graph table exists
 */
export async function hasSchema(): Promise<boolean> {
  const result = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count
     FROM information_schema.tables
     WHERE table_schema = 'public' AND table_name = ANY($1)`,
    [GRAPH_TABLES]
  );
  const row = result.rows[0];
  return row !== undefined && row.count === GRAPH_TABLES.length;
}

export async function getTableStats(): Promise<TableStat[]> {
  const result = await pool.query<TableStat>(
    `SELECT relname AS table_name, n_live_tup::int AS row_count
     FROM pg_stat_user_tables
     WHERE schemaname = 'public' AND relname = ANY($1)
     ORDER BY relname`,
    [GRAPH_TABLES]
  );
  return result.rows;
}
