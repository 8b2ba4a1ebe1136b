import ora from "ora";

import {
  checkConnection,
  closeConnection,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import { runMigration, hasSchema, getTableStats } from "../../db/migrate.js";
import { errorMessage } from "../../services/sync/errors.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the graph tables from postgres-schema.sql")
    .option("--fresh", "Drop the graph tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        if (options.fresh === true) {
          spinner.text = "Dropping graph tables...";
        }

        await runMigration({ fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        const stats = await getTableStats();
        if (stats.length > 0) {
          console.log("\nTables:");
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show table statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const connected = await checkConnection();

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${getDatabaseUrl()}`);

        const poolStats = getPoolStats();
        console.log("\nPool statistics:");
        console.log(`  Total connections: ${String(poolStats.totalCount)}`);
        console.log(`  Idle connections: ${String(poolStats.idleCount)}`);
        console.log(`  Waiting requests: ${String(poolStats.waitingCount)}`);

        if (!(await hasSchema())) {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        } else {
          const stats = await getTableStats();
          console.log("\nTable statistics:");
          for (const row of stats) {
            console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
          }
        }
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
