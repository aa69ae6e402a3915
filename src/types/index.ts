/**
 * Core domain types shared by sources, the warehouse client, the sync
 * orchestrator and the backfill pool.
 */

// ============================================================================
// Column Schema
// ============================================================================

/** Semantic column type; each warehouse dialect maps it to a native type. */
export type ColumnType =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "timestamp"
  | "date"
  | "json"
  | "string[]";

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  nullable: boolean;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type CellValue =
  | string
  | number
  | boolean
  | Date
  | null
  | readonly string[]
  | { [key: string]: JsonValue };

/** One transformed row, keyed by column name. */
export type RawRecord = Record<string, CellValue>;

// ============================================================================
// Sources
// ============================================================================

export type SyncMode = "incremental" | "full";

export type FullSyncBound = { since: string } | { lookbackDays: number };

/**
 * Static descriptor of one source table. Frozen once built.
 */
export interface SourceDefinition {
  name: string;
  dataset: string;
  table: string;
  /** Columns written by a sync, in load order */
  columns: readonly ColumnDefinition[];
  primaryKey: readonly string[];
  /** Columns created on the target but only ever written by a backfill */
  enrichmentColumns?: readonly ColumnDefinition[];
  incrementalLookbackDays: number;
  fullSync: FullSyncBound;
}

/** Half-open time window `[since, until)` a fetch covers. */
export interface FetchWindow {
  since: Date;
  until: Date;
}

// ============================================================================
// Warehouse
// ============================================================================

/**
 * What a stage-and-merge writes to: the target table, the columns carried
 * by the staging table, and the key the merge matches on.
 */
export interface MergeTarget {
  dataset: string;
  table: string;
  columns: readonly ColumnDefinition[];
  primaryKey: readonly string[];
  /**
   * Only update rows whose key already exists; never insert. For targets
   * that carry a subset of the table's columns.
   */
  updateOnly?: boolean;
}

// ============================================================================
// Sync Runs
// ============================================================================

export type SyncRunStatus = "running" | "succeeded" | "failed";

export interface SyncCounts {
  fetched: number;
  transformed: number;
  skipped: number;
  merged: number;
  failed: number;
}

export interface SyncRun {
  runId: string;
  source: string;
  mode: SyncMode;
  window: FetchWindow;
  startedAt: Date;
  finishedAt: Date | null;
  status: SyncRunStatus;
  counts: SyncCounts;
  batches: { merged: number; failed: number };
  errors: string[];
}

// ============================================================================
// Enrichment
// ============================================================================

export type EnrichmentJobStatus =
  | "pending"
  | "in-flight"
  | "retry-scheduled"
  | "done"
  | "failed-permanently";

export interface EnrichmentJob {
  /** Primary-key values of the target row */
  key: RawRecord;
  /** Text sent to the classifier */
  payload: string;
  /** Calls made so far, throttled ones included */
  attempts: number;
  /** Throttled responses so far; they draw on their own budget */
  throttles?: number;
  status: EnrichmentJobStatus;
  lastError?: string;
}

// ============================================================================
// Defaults
// ============================================================================

export interface RetryPolicy {
  maxAttempts: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  /** Fraction of the computed delay added as random jitter */
  jitterRatio: number;
}

export const SYNC_DEFAULTS = {
  batchSize: 500,
  retry: {
    maxAttempts: 5,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 30_000,
    jitterRatio: 0.2,
  } satisfies RetryPolicy,
  requestTimeoutMs: 30_000,
} as const;

export const BACKFILL_DEFAULTS = {
  workers: 10,
  requestsPerSecond: 5,
  burst: 1,
  queueCapacity: 1000,
  /** Throttled responses tolerated per job, on top of `retry.maxAttempts` */
  maxThrottles: 100,
  days: 7,
  retry: {
    maxAttempts: 5,
    initialBackoffMs: 1000,
    backoffMultiplier: 2,
    maxBackoffMs: 60_000,
    jitterRatio: 0.2,
  } satisfies RetryPolicy,
} as const;
