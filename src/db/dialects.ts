/**
 * Warehouse dialects.
 *
 * The sync engine speaks one SQL shape (staging table + INSERT ... SELECT
 * ... ON CONFLICT DO UPDATE) to two backends. A dialect supplies what
 * differs between them: native column types, how a dataset/table pair is
 * named, and how values are bound.
 */

import type { CellValue, ColumnType } from "../types/index.js";

export type DialectName = "postgres" | "sqlite";

export interface WarehouseDialect {
  name: DialectName;
  /** Whether datasets are real schemas that must be created */
  supportsSchemas: boolean;
  columnType(type: ColumnType): string;
  /** Fully qualified table name, `schema.table` where schemas exist */
  qualify(dataset: string, table: string): string;
  encode(type: ColumnType, value: CellValue | undefined): unknown;
}

// ============================================================================
// Shared encoding helpers
// ============================================================================

function toIsoTimestamp(value: CellValue): string {
  const date = value instanceof Date ? value : new Date(String(value));
  if (Number.isNaN(date.getTime())) {
    throw new TypeError(`Invalid timestamp value: ${String(value)}`);
  }
  return date.toISOString();
}

function toIsoDate(value: CellValue): string {
  if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return value;
  }
  return toIsoTimestamp(value).slice(0, 10);
}

// ============================================================================
// PostgreSQL
// ============================================================================

const POSTGRES_TYPES: Record<ColumnType, string> = {
  string: "text",
  integer: "bigint",
  float: "double precision",
  boolean: "boolean",
  timestamp: "timestamptz",
  date: "date",
  json: "jsonb",
  "string[]": "text[]",
};

export const postgresDialect: WarehouseDialect = {
  name: "postgres",
  supportsSchemas: true,
  columnType: (type) => POSTGRES_TYPES[type],
  qualify: (dataset, table) => `${dataset}.${table}`,
  encode(type, value) {
    if (value === null || value === undefined) return null;
    switch (type) {
      case "timestamp":
        return toIsoTimestamp(value);
      case "date":
        return toIsoDate(value);
      case "json":
        return JSON.stringify(value);
      default:
        // pg serialises booleans, numbers and string arrays itself
        return value;
    }
  },
};

// ============================================================================
// SQLite
// ============================================================================

const SQLITE_TYPES: Record<ColumnType, string> = {
  string: "text",
  integer: "integer",
  float: "real",
  boolean: "integer",
  timestamp: "text",
  date: "text",
  json: "text",
  "string[]": "text",
};

export const sqliteDialect: WarehouseDialect = {
  name: "sqlite",
  supportsSchemas: false,
  columnType: (type) => SQLITE_TYPES[type],
  qualify: (dataset, table) => `${dataset}__${table}`,
  encode(type, value) {
    if (value === null || value === undefined) return null;
    switch (type) {
      case "boolean":
        return value === true || value === 1 ? 1 : 0;
      case "timestamp":
        return toIsoTimestamp(value);
      case "date":
        return toIsoDate(value);
      case "json":
      case "string[]":
        return JSON.stringify(value);
      default:
        return value;
    }
  },
};
