export * from "./types/index.js";
export * from "./errors.js";
export {
  createConnection,
  checkConnection,
  type WarehouseConnection,
} from "./db/connection.js";
export { postgresDialect, sqliteDialect, type WarehouseDialect } from "./db/dialects.js";
export * from "./sources/index.js";
export * from "./services/sync/index.js";
export * from "./services/backfill/index.js";
export {
  WarehouseClient,
  STAGING_MARKER,
  type StagingTable,
  type StageAndMergeOptions,
} from "./services/warehouse/client.js";
export { SyncRunLog, type RunLogFilters } from "./services/warehouse/run-log.js";
export {
  Ok,
  Retryable,
  Fatal,
  computeBackoff,
  type Attempt,
} from "./utils/retry.js";
