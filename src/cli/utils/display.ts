/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { GraphStats } from "../../graph/store.js";
import type { SchemaSnapshot } from "../../services/sync/schema-registry.js";
import type { SyncResult, SyncStatus } from "../../types/index.js";

function colorStatus(status: SyncStatus): string {
  switch (status) {
    case "DONE":
      return chalk.green(status);
    case "PARTIAL_FAILURE":
      return chalk.yellow(status);
    case "FAILED":
      return chalk.red(status);
  }
}

/**
 * Display the outcome of a sync run: per entity type, per edge type, errors
 */
export function displaySyncResult(result: SyncResult): void {
  console.log(
    `\n${chalk.bold("Run")} ${result.runId}  ${colorStatus(result.status)}` +
      (result.cancelled ? chalk.yellow("  (cancelled)") : "") +
      chalk.gray(`  ${String(result.durationMs)}ms`)
  );

  const types = new CliTable3({
    head: [
      chalk.cyan("Entity type"),
      chalk.cyan("Label"),
      chalk.cyan("Outcome"),
      chalk.cyan("Fetched"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Skipped"),
    ],
  });

  for (const t of result.entityTypes) {
    types.push([
      t.entityType,
      t.label ?? chalk.gray("-"),
      t.outcome === "SUCCEEDED" ? chalk.green(t.outcome) : chalk.red(t.outcome),
      String(t.fetched),
      String(t.created),
      String(t.updated),
      String(t.skipped),
    ]);
  }

  console.log(types.toString());

  const { relationships } = result;
  if (relationships.byEdgeType.length > 0) {
    const edges = new CliTable3({
      head: [
        chalk.cyan("Edge type"),
        chalk.cyan("Candidates"),
        chalk.cyan("Linked"),
        chalk.cyan("Existing"),
        chalk.cyan("Skipped"),
        chalk.cyan("Failed"),
      ],
    });
    for (const e of relationships.byEdgeType) {
      edges.push([
        e.edgeType,
        String(e.candidates),
        String(e.linked),
        String(e.existing),
        String(e.skipped),
        e.failed > 0 ? chalk.red(String(e.failed)) : "0",
      ]);
    }
    console.log(edges.toString());
  }

  if (result.errors.length > 0) {
    console.log(chalk.bold.red("\nErrors:"));
    for (const message of result.errors) {
      console.log(`  ${chalk.red("•")} ${message}`);
    }
  }
  console.log();
}

export function displayGraphStats(stats: GraphStats): void {
  const lastSync =
    stats.lastSyncAt === null ? chalk.gray("never") : stats.lastSyncAt.toISOString();

  console.log(`\n${chalk.bold("Last sync:")} ${lastSync}`);
  console.log(
    `${chalk.bold("Nodes:")} ${String(stats.totalNodes)}  ${chalk.bold("Edges:")} ${String(stats.totalEdges)}\n`
  );

  const table = new CliTable3({
    head: [chalk.cyan("Kind"), chalk.cyan("Name"), chalk.cyan("Count")],
  });
  for (const row of stats.nodesByLabel) {
    table.push(["node", row.label, String(row.count)]);
  }
  for (const row of stats.edgesByType) {
    table.push(["edge", row.edgeType, String(row.count)]);
  }
  console.log(table.toString());
}

export function displaySchema(snapshot: SchemaSnapshot): void {
  console.log(
    chalk.bold(`\nSchema mapping v${String(snapshot.version)}`) +
      chalk.gray(` (loaded ${snapshot.loadedAt.toISOString()})\n`)
  );

  const table = new CliTable3({
    head: [
      chalk.cyan("Entity type"),
      chalk.cyan("Label"),
      chalk.cyan("Fields"),
      chalk.cyan("Relations"),
    ],
    colWidths: [16, 14, 40, 40],
    wordWrap: true,
  });

  for (const entry of snapshot.entries.values()) {
    const relations = entry.relations
      .map((r) =>
        r.direction === "OUTGOING"
          ? `${r.field} -[${r.edgeType}]-> ${r.targetLabel}`
          : `${r.field} <-[${r.edgeType}]- ${r.targetLabel}`
      )
      .join("\n");
    table.push([
      entry.entityType,
      entry.nodeLabel,
      [...entry.fields].join(", "),
      relations === "" ? chalk.gray("-") : relations,
    ]);
  }

  console.log(table.toString());
}
