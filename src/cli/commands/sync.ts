import ora from "ora";

import { createConnection } from "../../db/connection.js";
import { toError } from "../../errors.js";
import { getSource } from "../../sources/index.js";
import { SyncOrchestrator } from "../../services/sync/index.js";
import { WarehouseClient } from "../../services/warehouse/client.js";
import { SyncRunLog } from "../../services/warehouse/run-log.js";
import {
  displaySyncRuns,
  displaySyncRunsTable,
  printError,
} from "../utils/display.js";
import { parseNonNegativeInt, parsePositiveInt } from "../utils/options.js";

import type { SourceEntry } from "../../sources/index.js";
import type { SyncRun } from "../../types/index.js";
import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

interface SyncOptions {
  full?: boolean;
  lookbackDays?: number;
  batchSize?: number;
  timeout?: number;
}

export interface StatusOptions {
  failed?: boolean;
  limit?: number;
  source?: string;
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Sync source tables into the warehouse")
    .argument("<sources...>", "Source names (see 'sources')")
    .option("--full", "Full sync from the source's historical start")
    .option(
      "--lookback-days <days>",
      "Override the incremental lookback",
      parseNonNegativeInt
    )
    .option("--batch-size <rows>", "Rows per staging batch", parsePositiveInt)
    .option(
      "--timeout <seconds>",
      "Abort each run after this many seconds",
      parsePositiveInt
    )
    .addHelpText(
      "after",
      `
Each source runs on its own: one failing source does not stop the rest.
Re-running a sync over the same window is safe; rows are merged by key.

Examples:
  warehouse-sync sync linear-issues hn-comments
  warehouse-sync sync hn-comments --lookback-days 2
  warehouse-sync sync linear-issues --full --timeout 3600
`
    )
    .action(async (sourceNames: string[], options: SyncOptions) => {
      // Resolve every name before touching the warehouse
      let entries: SourceEntry[];
      try {
        entries = sourceNames.map((name) => getSource(name));
      } catch (error) {
        printError(toError(error).message);
        process.exitCode = 1;
        return;
      }

      const connection = createConnection();
      const warehouse = new WarehouseClient(connection);
      const orchestrator = new SyncOrchestrator(
        warehouse,
        new SyncRunLog(connection.db)
      );
      const mode = options.full === true ? "full" : "incremental";
      const runs: SyncRun[] = [];

      try {
        for (const entry of entries) {
          const name = entry.definition.name;
          const spinner = ora(`Syncing ${name} (${mode})...`).start();

          try {
            const adapter = entry.createAdapter(process.env);
            const run = await orchestrator.run(entry.definition, mode, adapter, {
              lookbackDays: options.lookbackDays,
              batchSize: options.batchSize,
              signal:
                options.timeout !== undefined
                  ? AbortSignal.timeout(options.timeout * 1000)
                  : undefined,
              onProgress: (progress) => {
                spinner.text = `Syncing ${name}: ${String(progress.fetched)} fetched, ${String(progress.merged)} merged, ${String(progress.batches)} batches`;
              },
            });
            runs.push(run);

            if (run.status === "succeeded") {
              spinner.succeed(
                `${name}: merged ${String(run.counts.merged)} rows (${String(run.counts.skipped)} skipped)`
              );
            } else {
              spinner.fail(`${name}: ${run.errors[0] ?? "sync failed"}`);
              process.exitCode = 1;
            }
          } catch (error) {
            spinner.fail(`${name}: ${toError(error).message}`);
            process.exitCode = 1;
          }
        }

        console.log();
        displaySyncRuns(runs);
      } finally {
        await connection.close();
      }
    });

  sync
    .command("status")
    .description("Show recent sync runs")
    .option("--failed", "Show only failed runs")
    .option("--source <name>", "Show runs of one source")
    .option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
    .action(showSyncStatus);
}

/**
 * Print the sync run log. Shared by `sync status` and the top-level alias.
 */
export async function showSyncStatus(options: StatusOptions): Promise<void> {
  const connection = createConnection();

  try {
    const rows = await new SyncRunLog(connection.db).list({
      source: options.source,
      failedOnly: options.failed,
      limit: options.limit,
    });
    displaySyncRunsTable(rows);
  } catch (error) {
    printError(toError(error).message);
    process.exitCode = 1;
  } finally {
    await connection.close();
  }
}
