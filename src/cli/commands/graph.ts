import ora from "ora";

import { closeConnection, db } from "../../db/connection.js";
import { PostgresGraphStore } from "../../graph/store.js";
import { errorMessage } from "../../services/sync/errors.js";
import { displayGraphStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Graph Commands
// ============================================================================

export function registerGraphCommand(program: Command): void {
  const graph = program.command("graph").description("Inspect the synced graph");

  // graph stats
  graph
    .command("stats")
    .description("Show node counts per label and edge counts per type")
    .action(async () => {
      const spinner = ora("Counting nodes and edges...").start();

      try {
        const stats = await new PostgresGraphStore(db).getStats();
        spinner.stop();
        displayGraphStats(stats);
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
