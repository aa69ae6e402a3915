#!/usr/bin/env node

/**
 * Warehouse Sync CLI
 *
 * Syncs API sources into the warehouse and backfills enrichment columns.
 */

import { Command } from "commander";

import { registerBackfillCommand } from "./commands/backfill.js";
import { registerSourcesCommand } from "./commands/sources.js";
import { registerSyncCommand, showSyncStatus } from "./commands/sync.js";
import { registerWarehouseCommand } from "./commands/warehouse.js";
import { parsePositiveInt } from "./utils/options.js";

const program = new Command();

program
  .name("warehouse-sync")
  .description("Idempotent source-to-warehouse sync and enrichment backfill")
  .version("0.1.0");

// Register all commands
registerSourcesCommand(program);
registerSyncCommand(program);
registerBackfillCommand(program);
registerWarehouseCommand(program);

// Top-level alias for 'sync status'
program
  .command("status")
  .description("Show recent sync runs (alias for 'sync status')")
  .option("--failed", "Show only failed runs")
  .option("--source <name>", "Show runs of one source")
  .option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
  .action(showSyncStatus);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

program.parse();
