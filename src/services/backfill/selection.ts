/**
 * Selection of rows still lacking enrichment. Re-running a selection after
 * an interrupted backfill picks up exactly the rows left to do.
 */

import { sql } from "kysely";

import type { EnrichmentTask } from "./task.js";
import type {
  CellValue,
  EnrichmentJob,
  FetchWindow,
  RawRecord,
} from "../../types/index.js";
import type { WarehouseClient } from "../warehouse/client.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * `days` whole UTC days ending with `endDate` (inclusive), or with the
 * current day when no end date is given.
 *
 * @throws RangeError for a non-positive day count or a malformed date
 */
export function backfillWindow(
  days: number,
  endDate: string | undefined,
  now: Date = new Date()
): FetchWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`days must be a positive integer, got ${String(days)}`);
  }

  let endDay: number;
  if (endDate === undefined) {
    endDay = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  } else {
    endDay = DATE_PATTERN.test(endDate) ? Date.parse(`${endDate}T00:00:00Z`) : NaN;
    if (Number.isNaN(endDay)) {
      throw new RangeError(`Invalid end date "${endDate}", expected YYYY-MM-DD`);
    }
  }

  const until = endDay + DAY_MS;
  return { since: new Date(until - days * DAY_MS), until: new Date(until) };
}

/**
 * One job per row whose marker column is NULL and whose time column falls
 * in `[since, until)`, oldest first.
 */
export async function selectUnenriched<TResult>(
  warehouse: WarehouseClient,
  task: EnrichmentTask<TResult>,
  window: FetchWindow,
  limit?: number
): Promise<EnrichmentJob[]> {
  const { definition, payloadColumn, timeColumn, markerColumn } = task;
  const table = warehouse.tableName(definition.dataset, definition.table);
  const keys = definition.primaryKey;
  const bound = (date: Date) => warehouse.dialect.encode("timestamp", date);

  const result = await sql<Record<string, unknown>>`
    SELECT ${sql.join([...keys, payloadColumn].map((c) => sql.ref(c)))}
    FROM ${sql.table(table)}
    WHERE ${sql.ref(markerColumn)} IS NULL
      AND ${sql.ref(payloadColumn)} IS NOT NULL
      AND ${sql.ref(timeColumn)} >= ${bound(window.since)}
      AND ${sql.ref(timeColumn)} < ${bound(window.until)}
    ORDER BY ${sql.join([timeColumn, ...keys].map((c) => sql.ref(c)))}
    ${limit === undefined ? sql`` : sql`LIMIT ${limit}`}
  `.execute(warehouse.db);

  const jobs: EnrichmentJob[] = [];
  for (const row of result.rows) {
    const payload = row[payloadColumn];
    if (typeof payload !== "string") continue;

    const key: RawRecord = {};
    for (const column of keys) {
      key[column] = toCell(row[column]);
    }
    jobs.push({ key, payload, attempts: 0, status: "pending" });
  }
  return jobs;
}

function toCell(value: unknown): CellValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}
