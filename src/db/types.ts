import type { Insertable, Selectable } from "kysely";

// ============================================================================
// Table Types
// ============================================================================

/**
 * Append-only log of finished sync runs. Telemetry only: nothing reads it
 * back to decide what to fetch.
 */
export interface SyncRunsTable {
  run_id: string;
  source: string;
  mode: "incremental" | "full";
  status: "running" | "succeeded" | "failed";
  window_since: string;
  window_until: string;
  started_at: string;
  finished_at: string | null;
  fetched: number;
  transformed: number;
  skipped: number;
  merged: number;
  failed: number;
  batches_merged: number;
  batches_failed: number;
  error_message: string | null;
}

// ============================================================================
// Database Interface
// ============================================================================

/**
 * Statically known tables. Source and staging tables are created from
 * their column schema at run time and addressed through `sql` fragments.
 */
export interface Database {
  sync_runs: SyncRunsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type SyncRunRow = Selectable<SyncRunsTable>;
export type NewSyncRunRow = Insertable<SyncRunsTable>;
