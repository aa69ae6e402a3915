/**
 * In-memory SQLite warehouse for tests
 */

import { sql } from "kysely";

import { createConnection, type WarehouseConnection } from "../../src/db/connection.js";
import { WarehouseClient } from "../../src/services/warehouse/client.js";

export interface TestWarehouse {
  connection: WarehouseConnection;
  warehouse: WarehouseClient;
}

export function createTestWarehouse(): TestWarehouse {
  const connection = createConnection("sqlite::memory:");
  return { connection, warehouse: new WarehouseClient(connection) };
}

/**
 * Every row of a dataset table, ordered by `orderBy`
 */
export async function selectRows(
  warehouse: WarehouseClient,
  dataset: string,
  table: string,
  orderBy = "id"
): Promise<Record<string, unknown>[]> {
  const result = await sql<Record<string, unknown>>`
    SELECT * FROM ${sql.table(warehouse.tableName(dataset, table))}
    ORDER BY ${sql.ref(orderBy)}
  `.execute(warehouse.db);
  return result.rows;
}

export async function countRows(
  warehouse: WarehouseClient,
  dataset: string,
  table: string
): Promise<number> {
  const result = await sql<{ n: number }>`
    SELECT COUNT(*) AS n FROM ${sql.table(warehouse.tableName(dataset, table))}
  `.execute(warehouse.db);
  return Number(result.rows[0]?.n ?? 0);
}
