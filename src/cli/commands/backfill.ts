import ora from "ora";

import { createConnection } from "../../db/connection.js";
import { toError } from "../../errors.js";
import {
  BackfillWorkerPool,
  WorkersAiSentimentClassifier,
  backfillWindow,
  selectUnenriched,
  sentimentTask,
} from "../../services/backfill/index.js";
import { tableTarget } from "../../services/sync/index.js";
import { WarehouseClient } from "../../services/warehouse/client.js";
import { BACKFILL_DEFAULTS } from "../../types/index.js";
import {
  displayBackfillSummary,
  printError,
  printWarning,
} from "../utils/display.js";
import { parsePositiveInt, parsePositiveNumber } from "../utils/options.js";

import type { Command } from "commander";

// ============================================================================
// Backfill Commands
// ============================================================================

interface SentimentOptions {
  days: number;
  endDate?: string;
  workers: number;
  rate: number;
  maxAttempts: number;
  limit?: number;
  dryRun?: boolean;
}

export function registerBackfillCommand(program: Command): void {
  const backfill = program
    .command("backfill")
    .description("Enrich existing warehouse rows through a rate-limited service");

  backfill
    .command("sentiment")
    .description("Classify Hacker News comments that have no sentiment yet")
    .option(
      "--days <n>",
      "Number of days to cover, ending with --end-date",
      parsePositiveInt,
      BACKFILL_DEFAULTS.days
    )
    .option("--end-date <YYYY-MM-DD>", "Last day covered (default: today, UTC)")
    .option(
      "--workers <n>",
      "Concurrent workers",
      parsePositiveInt,
      BACKFILL_DEFAULTS.workers
    )
    .option(
      "--rate <rps>",
      "Classifier requests per second, across all workers",
      parsePositiveNumber,
      BACKFILL_DEFAULTS.requestsPerSecond
    )
    .option(
      "--max-attempts <n>",
      "Attempts per comment before giving up",
      parsePositiveInt,
      BACKFILL_DEFAULTS.retry.maxAttempts
    )
    .option("--limit <n>", "Process at most this many comments", parsePositiveInt)
    .option("--dry-run", "Classify without writing results back")
    .addHelpText(
      "after",
      `
Requires CLOUDFLARE_ACCOUNT_ID and CLOUDFLARE_API_TOKEN.
Only rows without a sentiment label are selected, so an interrupted
backfill resumes where it stopped. Ctrl-C stops handing out new work and
waits for the calls already in flight.

Examples:
  warehouse-sync backfill sentiment --days 30 --workers 10 --rate 2
  warehouse-sync backfill sentiment --end-date 2024-06-30 --days 1 --dry-run
`
    )
    .action(async (options: SentimentOptions) => {
      const accountId = process.env.CLOUDFLARE_ACCOUNT_ID;
      const apiToken = process.env.CLOUDFLARE_API_TOKEN;
      if (
        accountId === undefined ||
        accountId === "" ||
        apiToken === undefined ||
        apiToken === ""
      ) {
        printError(
          "CLOUDFLARE_ACCOUNT_ID and CLOUDFLARE_API_TOKEN environment variables must be set"
        );
        process.exitCode = 1;
        return;
      }

      const connection = createConnection();
      const warehouse = new WarehouseClient(connection);
      const { definition } = sentimentTask;
      const spinner = ora("Selecting comments without sentiment...").start();

      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Stopping: waiting for in-flight requests...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const window = backfillWindow(options.days, options.endDate);

        if (!(await warehouse.tableExists(definition.dataset, definition.table))) {
          spinner.fail(
            `Table ${warehouse.tableName(definition.dataset, definition.table)} does not exist; run 'sync ${definition.name}' first`
          );
          process.exitCode = 1;
          return;
        }
        // Adds the enrichment columns to tables created before they existed
        await warehouse.ensureTarget(tableTarget(definition));

        const jobs = await selectUnenriched(
          warehouse,
          sentimentTask,
          window,
          options.limit
        );
        if (jobs.length === 0) {
          spinner.succeed(
            `No comments to classify between ${window.since.toISOString().slice(0, 10)} and ${window.until.toISOString().slice(0, 10)}`
          );
          return;
        }
        spinner.text = `Classifying ${String(jobs.length)} comments...`;

        const classifier = new WorkersAiSentimentClassifier({
          accountId,
          apiToken,
          apiUrl: process.env.CLOUDFLARE_API_URL,
        });
        const pool = new BackfillWorkerPool(warehouse, sentimentTask, classifier, {
          workers: options.workers,
          requestsPerSecond: options.rate,
          retry: { ...BACKFILL_DEFAULTS.retry, maxAttempts: options.maxAttempts },
          dryRun: options.dryRun === true,
          signal: controller.signal,
          onProgress: (progress) => {
            if (controller.signal.aborted) return;
            spinner.text = `Classifying: ${String(progress.done + progress.failedPermanently)}/${String(jobs.length)} (${String(progress.failedPermanently)} failed)`;
          },
        });

        const summary = await pool.run(jobs);

        if (summary.status === "completed" && summary.failedPermanently === 0) {
          spinner.succeed(
            `Classified ${String(summary.done)} comments${options.dryRun === true ? " (dry run, nothing written)" : ""}`
          );
        } else if (summary.status === "completed") {
          spinner.warn(
            `Classified ${String(summary.done)} comments, ${String(summary.failedPermanently)} failed`
          );
          process.exitCode = 1;
        } else {
          spinner.fail(`Backfill ${summary.status}`);
          process.exitCode = 1;
        }

        displayBackfillSummary(summary);
        if (summary.notProcessed > 0) {
          printWarning(
            `${String(summary.notProcessed)} comments were not processed; re-run the same command to resume`
          );
        }
      } catch (error) {
        spinner.fail(`Failed: ${toError(error).message}`);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await connection.close();
      }
    });
}
