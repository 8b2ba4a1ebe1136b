import chalk from "chalk";

import { loadConfig } from "../../config.js";
import { SchemaRegistry } from "../../services/sync/schema-registry.js";
import { SchemaValidationError, errorMessage } from "../../services/sync/errors.js";
import { displaySchema } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Schema Commands
// ============================================================================

export function registerSchemaCommand(program: Command): void {
  const schema = program
    .command("schema")
    .description("Inspect and validate the entity mapping file");

  // schema show
  schema
    .command("show")
    .description("Print the entity mapping")
    .option("-f, --file <path>", "Mapping file (default: SCHEMA_MAPPING_PATH)")
    .action((options: { file?: string }) => {
      try {
        const registry = SchemaRegistry.fromFile(
          options.file ?? loadConfig().schemaMappingPath
        );
        displaySchema(registry.snapshot());
      } catch (error) {
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  // schema validate
  schema
    .command("validate")
    .description("Validate the mapping file and list every problem found")
    .argument("[file]", "Mapping file (default: SCHEMA_MAPPING_PATH)")
    .action((file: string | undefined) => {
      const path = file ?? loadConfig().schemaMappingPath;
      try {
        const snapshot = SchemaRegistry.fromFile(path).snapshot();
        console.log(
          chalk.green("✓") +
            ` ${path}: ${String(snapshot.entries.size)} entity types, ${String(snapshot.labels().length)} labels`
        );
      } catch (error) {
        if (error instanceof SchemaValidationError) {
          console.error(chalk.red(`✗ ${path}: ${String(error.issues.length)} problem(s)`));
          for (const issue of error.issues) {
            console.error(`  ${chalk.red("•")} ${issue}`);
          }
        } else {
          console.error(chalk.red(`Error: ${errorMessage(error)}`));
        }
        process.exitCode = 1;
      }
    });
}
