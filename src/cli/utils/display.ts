/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { SyncRunRow } from "../../db/types.js";
import type { BackfillSummary } from "../../services/backfill/pool.js";
import type { SourceEntry } from "../../sources/types.js";
import type { SyncRun, SyncRunStatus } from "../../types/index.js";

function colorStatus(status: SyncRunStatus | BackfillSummary["status"]): string {
  switch (status) {
    case "succeeded":
    case "completed":
      return chalk.green(status);
    case "running":
    case "cancelled":
      return chalk.yellow(status);
    default:
      return chalk.red(status);
  }
}

function shortDate(iso: string): string {
  return iso.replace("T", " ").slice(0, 19);
}

/**
 * Display the outcome of one or more sync runs
 */
export function displaySyncRuns(runs: SyncRun[]): void {
  if (runs.length === 0) return;

  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Mode"),
      chalk.cyan("Status"),
      chalk.cyan("Fetched"),
      chalk.cyan("Transformed"),
      chalk.cyan("Skipped"),
      chalk.cyan("Merged"),
      chalk.cyan("Failed"),
    ],
  });

  for (const run of runs) {
    table.push([
      run.source,
      run.mode,
      colorStatus(run.status),
      String(run.counts.fetched),
      String(run.counts.transformed),
      String(run.counts.skipped),
      String(run.counts.merged),
      run.counts.failed > 0 ? chalk.red(String(run.counts.failed)) : "0",
    ]);
  }

  console.log(table.toString());

  for (const run of runs) {
    for (const error of run.errors) {
      console.log(chalk.red(`  ${run.source}: ${error}`));
    }
  }
}

/**
 * Display recent entries of the sync run log
 */
export function displaySyncRunsTable(rows: SyncRunRow[]): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No sync runs recorded"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Started"),
      chalk.cyan("Source"),
      chalk.cyan("Mode"),
      chalk.cyan("Status"),
      chalk.cyan("Window"),
      chalk.cyan("Merged"),
      chalk.cyan("Skipped"),
      chalk.cyan("Failed"),
      chalk.cyan("Error"),
    ],
    colWidths: [21, 16, 13, 11, 25, 9, 9, 8, 40],
    wordWrap: true,
  });

  for (const row of rows) {
    table.push([
      shortDate(row.started_at),
      row.source,
      row.mode,
      colorStatus(row.status),
      `${row.window_since.slice(0, 10)} → ${row.window_until.slice(0, 10)}`,
      String(row.merged),
      String(row.skipped),
      String(row.failed),
      row.error_message ?? chalk.gray("-"),
    ]);
  }

  console.log(table.toString());
}

/**
 * Display the summary of a backfill run
 */
export function displayBackfillSummary(summary: BackfillSummary): void {
  console.log(chalk.bold("\nBackfill summary:"));
  console.log(`  Status:              ${colorStatus(summary.status)}`);
  console.log(`  Jobs:                ${String(summary.total)}`);
  console.log(`  Done:                ${chalk.green(String(summary.done))}`);
  console.log(
    `  Failed permanently:  ${summary.failedPermanently > 0 ? chalk.red(String(summary.failedPermanently)) : "0"}`
  );
  console.log(`  Retries:             ${String(summary.retried)}`);
  console.log(`  Throttled responses: ${String(summary.throttled)}`);
  if (summary.notProcessed > 0) {
    console.log(
      `  Not processed:       ${chalk.yellow(String(summary.notProcessed))}`
    );
  }
  if (summary.abortReason !== undefined) {
    console.log(`  Abort reason:        ${chalk.red(summary.abortReason)}`);
  }
  console.log(
    `  Duration:            ${(summary.durationMs / 1000).toFixed(1)}s`
  );

  if (summary.failures.length > 0) {
    const table = new CliTable3({
      head: [chalk.cyan("Key"), chalk.cyan("Attempts"), chalk.cyan("Reason")],
      colWidths: [30, 10, 70],
      wordWrap: true,
    });
    const shown = summary.failures.slice(0, 20);
    for (const failure of shown) {
      table.push([
        JSON.stringify(failure.key),
        String(failure.attempts),
        failure.reason,
      ]);
    }
    console.log(table.toString());

    const remaining = summary.failures.length - shown.length;
    if (remaining > 0) {
      console.log(chalk.gray(`  ... and ${String(remaining)} more failures`));
    }
  }
  console.log();
}

/**
 * Display registered sources
 */
export function displaySourcesTable(entries: SourceEntry[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Source"),
      chalk.cyan("Target"),
      chalk.cyan("Key"),
      chalk.cyan("Incremental"),
      chalk.cyan("Full"),
      chalk.cyan("Description"),
    ],
  });

  for (const { definition, description } of entries) {
    const full =
      "since" in definition.fullSync
        ? `since ${definition.fullSync.since.slice(0, 10)}`
        : `${String(definition.fullSync.lookbackDays)} days`;

    table.push([
      chalk.green(definition.name),
      `${definition.dataset}.${definition.table}`,
      definition.primaryKey.join(", "),
      `${String(definition.incrementalLookbackDays)} days`,
      full,
      description,
    ]);
  }

  console.log(table.toString());
}

/**
 * Print an error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print a warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
