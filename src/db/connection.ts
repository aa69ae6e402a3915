import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import {
  postgresDialect,
  sqliteDialect,
  type WarehouseDialect,
} from "./dialects.js";
import { toError } from "../errors.js";
import { warehouseLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// Configure pg to parse JSON/JSONB as objects instead of strings
types.setTypeParser(
  types.builtins.JSON,
  (val: string) => JSON.parse(val) as unknown
);
types.setTypeParser(
  types.builtins.JSONB,
  (val: string) => JSON.parse(val) as unknown
);

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_WAREHOUSE_URL =
  process.env.WAREHOUSE_URL ?? "postgresql://localhost:5432/warehouse";

const SQLITE_PREFIX = "sqlite:";

const poolConfig: Omit<pg.PoolConfig, "connectionString"> = {
  max: 20, // Maximum pool connections
  idleTimeoutMillis: 30_000, // Close idle connections after 30s
  connectionTimeoutMillis: 5000, // Connection timeout
};

// ============================================================================
// Connection Handle
// ============================================================================

/**
 * Explicit handle to one warehouse. Created by the entry point and passed
 * down to the warehouse client; there is no module-level instance.
 */
export interface WarehouseConnection {
  db: Kysely<Database>;
  dialect: WarehouseDialect;
  /** Connection URL with any password masked */
  url: string;
  close(): Promise<void>;
}

/**
 * Open a warehouse from a URL.
 *
 * - `postgres://` / `postgresql://` — PostgreSQL through a pg pool
 * - `sqlite:<path>` — local SQLite file, `sqlite::memory:` for in-memory
 */
export function createConnection(
  url: string = DEFAULT_WAREHOUSE_URL
): WarehouseConnection {
  if (url.startsWith(SQLITE_PREFIX)) {
    return createSqliteConnection(url.slice(SQLITE_PREFIX.length));
  }
  return createPostgresConnection(url);
}

function createPostgresConnection(url: string): WarehouseConnection {
  const pool = new Pool({ ...poolConfig, connectionString: url });
  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });

  return {
    db,
    dialect: postgresDialect,
    url: maskUrl(url),
    close: () => closeDatabase(db),
  };
}

function createSqliteConnection(path: string): WarehouseConnection {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Kysely<Database>({
    dialect: new SqliteDialect({ database: new SQLite(path) }),
  });

  return {
    db,
    dialect: sqliteDialect,
    url: `${SQLITE_PREFIX}${path}`,
    close: () => closeDatabase(db),
  };
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the warehouse answers a trivial query
 */
export async function checkConnection(
  connection: WarehouseConnection
): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(connection.db);
    return true;
  } catch (error) {
    warehouseLogger.warn(
      { url: connection.url, error: toError(error).message },
      "Warehouse connection check failed"
    );
    return false;
  }
}

async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    // db.destroy() also closes the pool / sqlite handle
    await db.destroy();
    warehouseLogger.debug("Warehouse connection closed");
  } catch (error) {
    warehouseLogger.error({ error }, "Error closing warehouse connection");
    throw error;
  }
}

/**
 * Mask the password of a connection URL for display
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password !== "") {
      parsed.password = "****";
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
