import chalk from "chalk";
import ora from "ora";

import { closeConnection } from "../../db/connection.js";
import { createAppContext } from "../../services/context.js";
import { errorMessage } from "../../services/sync/errors.js";
import { displaySyncResult } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Synchronize CRM records into the graph")
    .addHelpText(
      "after",
      `
Every run is a full resync of the listed entity types. Nodes are written
first; relationships are only created between nodes that exist.

  crm-graph-sync sync run Users Accounts Contacts Deals
  crm-graph-sync sync run Leads --max-pages 2
`
    );

  // sync run
  sync
    .command("run")
    .description("Run a sync of the given entity types")
    .argument("[entityTypes...]", "Entity types to sync (default: every mapped type)")
    .option("--max-pages <n>", "Stop after this many pages per type", parsePositiveInt)
    .action(async (entityTypes: string[], options: { maxPages?: number }) => {
      const spinner = ora("Loading schema mapping...").start();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling: finishing in-flight batches...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const { orchestrator, registry } = createAppContext();
        const types =
          entityTypes.length > 0 ? entityTypes : registry.snapshot().entityTypes();

        orchestrator.setProgressCallback((progress) => {
          spinner.text = `${progress.phase}: ${String(progress.current)}/${String(progress.total)}${
            progress.currentItem !== undefined ? ` (${progress.currentItem})` : ""
          }`;
        });

        spinner.text = `Syncing ${types.join(", ")}...`;
        const result = await orchestrator.sync(types, {
          maxPages: options.maxPages,
          signal: controller.signal,
        });

        if (result.status === "DONE") {
          spinner.succeed("Sync completed");
        } else if (result.status === "PARTIAL_FAILURE") {
          spinner.warn("Sync completed with failures");
        } else {
          spinner.fail("Sync failed");
          process.exitCode = 1;
        }

        displaySyncResult(result);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await closeConnection();
      }
    });

  // sync status
  sync
    .command("status")
    .description("Show when the graph was last synced")
    .action(async () => {
      const spinner = ora("Reading sync metadata...").start();

      try {
        const { store } = createAppContext();
        const lastSyncAt = await store.getLastSyncTime();
        spinner.stop();

        console.log(
          lastSyncAt === null
            ? chalk.yellow("The graph has never been synced")
            : `Last sync: ${chalk.bold(lastSyncAt.toISOString())}`
        );
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
