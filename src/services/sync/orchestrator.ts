/**
 * Sync Orchestrator - fetch → transform → stage → merge → cleanup
 *
 * Drives one source adapter through a window. Items are transformed as
 * they stream in and merged in fixed-size batches, each through its own
 * staging table. Batches are independent: a failed merge is counted and
 * the run moves on; only fatal errors (source unavailable or
 * unauthorized, staging refused, deadline) stop it early.
 */

import { randomUUID } from "node:crypto";

import { resolveWindow } from "./window.js";
import { MalformedRecord, isFatalSyncError, toError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { SYNC_DEFAULTS } from "../../types/index.js";

import type { SourceAdapter } from "../../sources/types.js";
import type {
  MergeTarget,
  RawRecord,
  SourceDefinition,
  SyncMode,
  SyncRun,
} from "../../types/index.js";
import type { WarehouseClient } from "../warehouse/client.js";
import type { SyncRunLog } from "../warehouse/run-log.js";
import type { Logger } from "pino";

// ============================================================================
// Types
// ============================================================================

export interface SyncProgress {
  runId: string;
  batches: number;
  fetched: number;
  merged: number;
  failed: number;
}

export interface RunOptions {
  /** Fixed clock for the window; defaults to the current time */
  now?: Date;
  /** Override of the definition's incremental lookback */
  lookbackDays?: number;
  batchSize?: number;
  /** Caller deadline or cancellation */
  signal?: AbortSignal;
  onProgress?: (progress: SyncProgress) => void;
}

/** Target of a sync merge: the source columns only, never enrichment */
export function syncTarget(definition: SourceDefinition): MergeTarget {
  return {
    dataset: definition.dataset,
    table: definition.table,
    columns: definition.columns,
    primaryKey: definition.primaryKey,
  };
}

/** Full target table shape, enrichment columns included */
export function tableTarget(definition: SourceDefinition): MergeTarget {
  return {
    ...syncTarget(definition),
    columns: [...definition.columns, ...(definition.enrichmentColumns ?? [])],
  };
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  constructor(
    private warehouse: WarehouseClient,
    private runLog?: SyncRunLog
  ) {}

  /**
   * Run one sync. Never throws for run-time failures: the returned
   * SyncRun carries the status, counts and error messages.
   */
  async run<TItem>(
    definition: SourceDefinition,
    mode: SyncMode,
    adapter: SourceAdapter<TItem>,
    options: RunOptions = {}
  ): Promise<SyncRun> {
    const window = resolveWindow(
      definition,
      mode,
      options.now ?? new Date(),
      options.lookbackDays
    );
    const batchSize = Math.max(1, options.batchSize ?? SYNC_DEFAULTS.batchSize);

    const run: SyncRun = {
      runId: randomUUID(),
      source: definition.name,
      mode,
      window,
      startedAt: new Date(),
      finishedAt: null,
      status: "running",
      counts: { fetched: 0, transformed: 0, skipped: 0, merged: 0, failed: 0 },
      batches: { merged: 0, failed: 0 },
      errors: [],
    };
    const log = syncLogger.child({ runId: run.runId, source: run.source });

    log.info(
      {
        mode,
        since: window.since.toISOString(),
        until: window.until.toISOString(),
        batchSize,
      },
      "Starting sync run"
    );

    let fatal: Error | undefined;
    try {
      await this.warehouse.ensureTarget(tableTarget(definition));

      const target = syncTarget(definition);
      let batch: RawRecord[] = [];

      for await (const item of adapter.fetch(window, options.signal)) {
        run.counts.fetched++;

        const record = this.transformItem(definition, adapter, item, log);
        if (record === null) {
          run.counts.skipped++;
          continue;
        }
        run.counts.transformed++;
        batch.push(record);

        if (batch.length >= batchSize) {
          await this.flush(run, target, batch, options, log);
          batch = [];
        }
      }

      if (batch.length > 0) {
        await this.flush(run, target, batch, options, log);
      }
    } catch (error) {
      fatal = toError(error);
      run.errors.push(fatal.message);
      log.error(
        { error: fatal.message, code: errorCode(fatal) },
        "Sync run aborted"
      );
    }

    run.finishedAt = new Date();
    run.status =
      fatal === undefined && run.batches.failed === 0 ? "succeeded" : "failed";

    await this.recordRun(run, log);

    log.info(
      {
        status: run.status,
        ...run.counts,
        batchesMerged: run.batches.merged,
        batchesFailed: run.batches.failed,
        duration: `${String(run.finishedAt.getTime() - run.startedAt.getTime())}ms`,
      },
      "Sync run finished"
    );

    return run;
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  /**
   * Transform one item. Malformed items and rows missing a primary-key
   * value come back as `null`; any other error propagates.
   */
  private transformItem<TItem>(
    definition: SourceDefinition,
    adapter: SourceAdapter<TItem>,
    item: TItem,
    log: Logger
  ): RawRecord | null {
    let record: RawRecord | null;
    try {
      record = adapter.transform(item);
    } catch (error) {
      if (error instanceof MalformedRecord) {
        log.debug({ error: error.message }, "Skipping malformed record");
        return null;
      }
      throw error;
    }

    if (record === null) {
      return null;
    }

    const row = record;
    const missing = definition.primaryKey.filter(
      (key) => row[key] === null || row[key] === undefined
    );
    if (missing.length > 0) {
      log.debug({ missing }, "Skipping record without primary key");
      return null;
    }

    return row;
  }

  /**
   * Stage and merge one batch. Merge failures are recorded against the
   * batch; fatal errors propagate and end the run.
   */
  private async flush(
    run: SyncRun,
    target: MergeTarget,
    batch: RawRecord[],
    options: RunOptions,
    log: Logger
  ): Promise<void> {
    const batchNumber = run.batches.merged + run.batches.failed + 1;

    try {
      const merged = await this.warehouse.stageAndMerge(target, batch, {
        signal: options.signal,
      });
      run.counts.merged += merged;
      run.batches.merged++;
      log.debug({ batch: batchNumber, rows: batch.length, merged }, "Batch merged");
    } catch (error) {
      if (isFatalSyncError(error)) {
        throw error;
      }
      const message = toError(error).message;
      run.counts.failed += batch.length;
      run.batches.failed++;
      run.errors.push(`batch ${String(batchNumber)}: ${message}`);
      log.error(
        { batch: batchNumber, rows: batch.length, error: message },
        "Batch merge failed"
      );
    }

    options.onProgress?.({
      runId: run.runId,
      batches: run.batches.merged + run.batches.failed,
      fetched: run.counts.fetched,
      merged: run.counts.merged,
      failed: run.counts.failed,
    });
  }

  private async recordRun(run: SyncRun, log: Logger): Promise<void> {
    if (this.runLog === undefined) return;
    try {
      await this.runLog.record(run);
    } catch (error) {
      log.warn(
        { error: toError(error).message },
        "Failed to record sync run in run log"
      );
    }
  }
}

function errorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}
