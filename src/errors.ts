// ============================================================================
// Error Taxonomy
// ============================================================================

/** Base class for every error the sync engine raises on purpose */
export class SyncEngineError extends Error {
  readonly code: string;
  override readonly cause?: Error;

  constructor(message: string, code: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = cause;
  }
}

/** Source kept failing after every retry; fatal for the run */
export class SourceUnavailable extends SyncEngineError {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: Error) {
    super(message, "SOURCE_UNAVAILABLE", cause);
    this.attempts = attempts;
  }
}

/** Source rejected our credentials; fatal for the run */
export class SourceUnauthorized extends SyncEngineError {
  constructor(message: string, cause?: Error) {
    super(message, "SOURCE_UNAUTHORIZED", cause);
  }
}

/** One raw item could not be transformed; the item is skipped */
export class MalformedRecord extends SyncEngineError {
  constructor(message: string, cause?: Error) {
    super(message, "MALFORMED_RECORD", cause);
  }
}

/** Warehouse refused to create a staging table; fatal for the run */
export class StagingUnavailable extends SyncEngineError {
  readonly stagingTable: string;

  constructor(stagingTable: string, cause?: Error) {
    super(
      `Could not create staging table ${stagingTable}: ${cause?.message ?? "unknown error"}`,
      "STAGING_UNAVAILABLE",
      cause
    );
    this.stagingTable = stagingTable;
  }
}

/** Load or merge of one batch failed; the batch is counted as failed */
export class MergeFailed extends SyncEngineError {
  constructor(message: string, cause?: Error) {
    super(message, "MERGE_FAILED", cause);
  }
}

/** The caller's deadline fired or the run was cancelled */
export class RunAborted extends SyncEngineError {
  constructor(message = "Run aborted", cause?: Error) {
    super(message, "RUN_ABORTED", cause);
  }
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Errors that stop a sync run instead of failing a single batch */
export function isFatalSyncError(err: unknown): boolean {
  return (
    err instanceof SourceUnavailable ||
    err instanceof SourceUnauthorized ||
    err instanceof StagingUnavailable ||
    err instanceof RunAborted
  );
}
