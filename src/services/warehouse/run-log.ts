/**
 * Sync run log - one row per finished SyncRun, for `sync status`.
 */

import { sql, type Kysely } from "kysely";

import type { Database, SyncRunRow } from "../../db/types.js";
import type { SyncRun } from "../../types/index.js";

export interface RunLogFilters {
  source?: string;
  failedOnly?: boolean;
  limit?: number;
}

export class SyncRunLog {
  private ready: Promise<void> | undefined;

  constructor(private db: Kysely<Database>) {}

  /** Create `sync_runs` on first use; later calls reuse the same promise */
  ensureTable(): Promise<void> {
    this.ready ??= this.createTable().catch((error: unknown) => {
      this.ready = undefined;
      throw error;
    });
    return this.ready;
  }

  private async createTable(): Promise<void> {
    await this.db.schema
      .createTable("sync_runs")
      .ifNotExists()
      .addColumn("run_id", "text", (col) => col.primaryKey())
      .addColumn("source", "text", (col) => col.notNull())
      .addColumn("mode", "text", (col) => col.notNull())
      .addColumn("status", "text", (col) => col.notNull())
      .addColumn("window_since", "text", (col) => col.notNull())
      .addColumn("window_until", "text", (col) => col.notNull())
      .addColumn("started_at", "text", (col) => col.notNull())
      .addColumn("finished_at", "text")
      .addColumn("fetched", "integer", (col) => col.notNull())
      .addColumn("transformed", "integer", (col) => col.notNull())
      .addColumn("skipped", "integer", (col) => col.notNull())
      .addColumn("merged", "integer", (col) => col.notNull())
      .addColumn("failed", "integer", (col) => col.notNull())
      .addColumn("batches_merged", "integer", (col) => col.notNull())
      .addColumn("batches_failed", "integer", (col) => col.notNull())
      .addColumn("error_message", "text")
      .execute();
  }

  /**
   * Append a finished run. Re-recording the same runId overwrites it.
   */
  async record(run: SyncRun): Promise<void> {
    await this.ensureTable();
    const row = {
      run_id: run.runId,
      source: run.source,
      mode: run.mode,
      status: run.status,
      window_since: run.window.since.toISOString(),
      window_until: run.window.until.toISOString(),
      started_at: run.startedAt.toISOString(),
      finished_at: run.finishedAt?.toISOString() ?? null,
      fetched: run.counts.fetched,
      transformed: run.counts.transformed,
      skipped: run.counts.skipped,
      merged: run.counts.merged,
      failed: run.counts.failed,
      batches_merged: run.batches.merged,
      batches_failed: run.batches.failed,
      error_message:
        run.errors.length > 0 ? run.errors.join("; ").slice(0, 1000) : null,
    };

    await this.db
      .insertInto("sync_runs")
      .values(row)
      .onConflict((oc) =>
        oc.column("run_id").doUpdateSet({
          status: sql`excluded.status`,
          finished_at: sql`excluded.finished_at`,
          fetched: sql`excluded.fetched`,
          transformed: sql`excluded.transformed`,
          skipped: sql`excluded.skipped`,
          merged: sql`excluded.merged`,
          failed: sql`excluded.failed`,
          batches_merged: sql`excluded.batches_merged`,
          batches_failed: sql`excluded.batches_failed`,
          error_message: sql`excluded.error_message`,
        })
      )
      .execute();
  }

  async list(filters: RunLogFilters = {}): Promise<SyncRunRow[]> {
    await this.ensureTable();
    let query = this.db
      .selectFrom("sync_runs")
      .selectAll()
      .orderBy("started_at", "desc");

    if (filters.source !== undefined) {
      query = query.where("source", "=", filters.source);
    }
    if (filters.failedOnly === true) {
      query = query.where("status", "=", "failed");
    }

    return query.limit(filters.limit ?? 20).execute();
  }
}
