#!/usr/bin/env node

/**
 * CRM Graph Sync CLI
 *
 * Runs syncs from the CRM into the graph and inspects the mapping and the
 * graph store.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerGraphCommand } from "./commands/graph.js";
import { registerSchemaCommand } from "./commands/schema.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("crm-graph-sync")
  .description("Synchronize CRM records into a property graph")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);
registerSchemaCommand(program);
registerGraphCommand(program);

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
