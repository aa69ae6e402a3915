/**
 * Warehouse Client - staging tables and atomic upsert-merge
 *
 * Every write to a target table goes through the same path:
 * 1. Create a uniquely named staging table with the batch's columns
 * 2. Bulk-load the batch into it
 * 3. Merge staging into target with one INSERT ... SELECT ... ON CONFLICT
 *    statement (update matched primary keys, insert the rest), or one
 *    UPDATE ... FROM for update-only targets
 * 4. Drop the staging table, whatever happened in 2-3
 *
 * Because step 3 is a single statement, a batch is either fully applied
 * or not applied at all, and replaying it converges to the same state.
 */

import { randomUUID } from "node:crypto";

import { sql, type RawBuilder } from "kysely";

import { MergeFailed, StagingUnavailable, toError } from "../../errors.js";
import { warehouseLogger } from "../../logger.js";
import { throwIfAborted } from "../../utils/retry.js";

import type { WarehouseConnection } from "../../db/connection.js";
import type { WarehouseDialect } from "../../db/dialects.js";
import type { Database } from "../../db/types.js";
import type {
  ColumnDefinition,
  MergeTarget,
  RawRecord,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface StagingTable {
  /** Qualified staging table name */
  readonly name: string;
  readonly target: MergeTarget;
  /** Load sequence; the merge keeps the highest one per primary key */
  nextSeq: number;
}

export interface StageAndMergeOptions {
  signal?: AbortSignal;
}

// ============================================================================
// Constants
// ============================================================================

/** Marker embedded in every staging table name */
export const STAGING_MARKER = "__staging_";

const SEQ_COLUMN = "_staged_seq";

// Stay well below SQLite's and PostgreSQL's bind-parameter limits
const MAX_PARAMS_PER_STATEMENT = 10_000;

// ============================================================================
// Warehouse Client
// ============================================================================

export class WarehouseClient {
  readonly db: Kysely<Database>;
  readonly dialect: WarehouseDialect;

  constructor(connection: WarehouseConnection) {
    this.db = connection.db;
    this.dialect = connection.dialect;
  }

  /** Qualified name of a dataset table in this warehouse */
  tableName(dataset: string, table: string): string {
    return this.dialect.qualify(dataset, table);
  }

  // ==========================================================================
  // Target Tables
  // ==========================================================================

  /**
   * Create the target table if it is missing and add any columns the
   * definition gained since it was created.
   */
  async ensureTarget(target: MergeTarget): Promise<void> {
    const name = this.tableName(target.dataset, target.table);

    if (this.dialect.supportsSchemas) {
      await this.db.schema.createSchema(target.dataset).ifNotExists().execute();
    }

    const columnDefs = target.columns.map((column) =>
      this.columnDefinition(column, !this.isNullable(target, column))
    );
    const primaryKey = sql`PRIMARY KEY (${sql.join(
      target.primaryKey.map((key) => sql.ref(key))
    )})`;

    await sql`CREATE TABLE IF NOT EXISTS ${sql.table(name)} (${sql.join([
      ...columnDefs,
      primaryKey,
    ])})`.execute(this.db);

    const existing = await this.existingColumns(target.dataset, target.table);
    for (const column of target.columns) {
      if (existing.has(column.name)) continue;

      // Added columns are always nullable: old rows have no value for them
      await sql`ALTER TABLE ${sql.table(name)} ADD COLUMN ${this.columnDefinition(
        column,
        false
      )}`.execute(this.db);
      warehouseLogger.info(
        { table: name, column: column.name, type: column.type },
        "Added column to target table"
      );
    }

    warehouseLogger.debug({ table: name }, "Target table ready");
  }

  async tableExists(dataset: string, table: string): Promise<boolean> {
    const tables = await this.db.introspection.getTables();
    return tables.some((meta) => this.matchesTable(meta, dataset, table));
  }

  // ==========================================================================
  // Staging Lifecycle
  // ==========================================================================

  /**
   * Allocate a staging table with a unique name for one batch.
   * Fails with StagingUnavailable if the warehouse rejects the DDL.
   */
  async createStaging(target: MergeTarget): Promise<StagingTable> {
    const token = randomUUID().replaceAll("-", "").slice(0, 16);
    const name = this.tableName(
      target.dataset,
      `${target.table}${STAGING_MARKER}${token}`
    );

    // No NOT NULL / key constraints here: the merge enforces the target's
    const columnDefs = target.columns.map((column) =>
      this.columnDefinition(column, false)
    );

    try {
      await sql`CREATE TABLE ${sql.table(name)} (${sql.join([
        ...columnDefs,
        sql`${sql.ref(SEQ_COLUMN)} integer NOT NULL`,
      ])})`.execute(this.db);
    } catch (error) {
      warehouseLogger.error(
        { stagingTable: name, error: toError(error).message },
        "Failed to create staging table"
      );
      throw new StagingUnavailable(name, toError(error));
    }

    warehouseLogger.debug({ stagingTable: name }, "Created staging table");
    return { name, target, nextSeq: 1 };
  }

  /**
   * Bulk-append records to a staging table. Loading the same rows twice
   * only duplicates them in staging; the merge keeps the last one loaded.
   */
  async load(staging: StagingTable, records: RawRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const { columns } = staging.target;
    const columnRefs = [...columns.map((c) => sql.ref(c.name)), sql.ref(SEQ_COLUMN)];
    const rowsPerStatement = Math.max(
      1,
      Math.floor(MAX_PARAMS_PER_STATEMENT / (columns.length + 1))
    );

    try {
      for (let i = 0; i < records.length; i += rowsPerStatement) {
        const chunk = records.slice(i, i + rowsPerStatement);
        const values = chunk.map((record) => this.rowValues(staging, record));

        await sql`INSERT INTO ${sql.table(staging.name)} (${sql.join(
          columnRefs
        )}) VALUES ${sql.join(values)}`.execute(this.db);
      }
    } catch (error) {
      throw new MergeFailed(
        `Load into ${staging.name} failed: ${toError(error).message}`,
        toError(error)
      );
    }

    warehouseLogger.debug(
      { stagingTable: staging.name, rows: records.length },
      "Loaded staging table"
    );
    return records.length;
  }

  /**
   * Reconcile staging into the target in one statement: rows whose primary
   * key exists are updated, the rest inserted (or ignored for an
   * update-only target). Only the staging table's columns are written.
   */
  async merge(staging: StagingTable): Promise<number> {
    const { target } = staging;
    const targetName = this.tableName(target.dataset, target.table);
    const columns = target.columns.map((c) => c.name);
    const updatable = columns.filter((c) => !target.primaryKey.includes(c));

    const matches = (left: string, right: string) =>
      sql.join(
        target.primaryKey.map(
          (key) => sql`${sql.ref(`${left}.${key}`)} = ${sql.ref(`${right}.${key}`)}`
        ),
        sql` AND `
      );
    // Duplicate keys in one staging table: the last row loaded wins
    const latestOnly = sql`${sql.ref(`s.${SEQ_COLUMN}`)} = (
      SELECT MAX(${sql.ref(`d.${SEQ_COLUMN}`)})
      FROM ${sql.table(staging.name)} AS d
      WHERE ${matches("d", "s")}
    )`;

    let statement: RawBuilder<unknown>;
    if (target.updateOnly === true) {
      if (updatable.length === 0) return 0;
      // NOT NULL columns outside the target rule out INSERT ... ON CONFLICT
      statement = sql`
        UPDATE ${sql.table(targetName)} AS t
        SET ${sql.join(updatable.map((c) => sql`${sql.ref(c)} = ${sql.ref(`s.${c}`)}`))}
        FROM ${sql.table(staging.name)} AS s
        WHERE ${matches("t", "s")} AND ${latestOnly}
      `;
    } else {
      const onConflict =
        updatable.length === 0
          ? sql`DO NOTHING`
          : sql`DO UPDATE SET ${sql.join(
              updatable.map((c) => sql`${sql.ref(c)} = excluded.${sql.ref(c)}`)
            )}`;
      statement = sql`
        INSERT INTO ${sql.table(targetName)} (${sql.join(columns.map((c) => sql.ref(c)))})
        SELECT ${sql.join(columns.map((c) => sql.ref(`s.${c}`)))}
        FROM ${sql.table(staging.name)} AS s
        WHERE ${latestOnly}
        ON CONFLICT (${sql.join(target.primaryKey.map((k) => sql.ref(k)))})
        ${onConflict}
      `;
    }

    try {
      const result = await statement.execute(this.db);

      const merged = Number(result.numAffectedRows ?? 0n);
      warehouseLogger.debug(
        { stagingTable: staging.name, target: targetName, merged },
        "Merged staging into target"
      );
      return merged;
    } catch (error) {
      throw new MergeFailed(
        `Merge of ${staging.name} into ${targetName} failed: ${toError(error).message}`,
        toError(error)
      );
    }
  }

  async drop(staging: StagingTable): Promise<void> {
    await sql`DROP TABLE IF EXISTS ${sql.table(staging.name)}`.execute(this.db);
    warehouseLogger.debug({ stagingTable: staging.name }, "Dropped staging table");
  }

  /**
   * createStaging → load → merge, dropping the staging table on every
   * exit path. Returns the number of target rows written.
   *
   * A failed drop neither undoes a committed merge nor masks a merge
   * error: the table is left for `dropStagingTables`.
   */
  async stageAndMerge(
    target: MergeTarget,
    records: RawRecord[],
    options: StageAndMergeOptions = {}
  ): Promise<number> {
    throwIfAborted(options.signal);
    const staging = await this.createStaging(target);

    try {
      await this.load(staging, records);
      throwIfAborted(options.signal);
      return await this.merge(staging);
    } finally {
      await this.drop(staging).catch((error: unknown) => {
        warehouseLogger.error(
          { stagingTable: staging.name, error: toError(error).message },
          "Staging table left behind; remove it with 'warehouse clean-staging'"
        );
      });
    }
  }

  // ==========================================================================
  // Orphaned Staging Tables
  // ==========================================================================

  /**
   * Staging tables left behind by a process that was killed mid-batch.
   */
  async listStagingTables(): Promise<string[]> {
    const tables = await this.db.introspection.getTables();
    return tables
      .filter((meta) => meta.name.includes(STAGING_MARKER))
      .map((meta) =>
        meta.schema !== undefined && this.dialect.supportsSchemas
          ? `${meta.schema}.${meta.name}`
          : meta.name
      )
      .sort();
  }

  async dropStagingTables(): Promise<string[]> {
    const names = await this.listStagingTables();
    for (const name of names) {
      await sql`DROP TABLE IF EXISTS ${sql.table(name)}`.execute(this.db);
      warehouseLogger.info({ stagingTable: name }, "Dropped orphaned staging table");
    }
    return names;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private isNullable(target: MergeTarget, column: ColumnDefinition): boolean {
    return column.nullable && !target.primaryKey.includes(column.name);
  }

  private columnDefinition(
    column: ColumnDefinition,
    notNull: boolean
  ): RawBuilder<unknown> {
    const type = sql.raw(this.dialect.columnType(column.type));
    return notNull
      ? sql`${sql.ref(column.name)} ${type} NOT NULL`
      : sql`${sql.ref(column.name)} ${type}`;
  }

  private rowValues(
    staging: StagingTable,
    record: RawRecord
  ): RawBuilder<unknown> {
    const values = staging.target.columns.map((column) =>
      sql.val(this.dialect.encode(column.type, record[column.name]))
    );
    values.push(sql.val(staging.nextSeq++));
    return sql`(${sql.join(values)})`;
  }

  private matchesTable(
    meta: { name: string; schema?: string },
    dataset: string,
    table: string
  ): boolean {
    if (this.dialect.supportsSchemas) {
      return meta.schema === dataset && meta.name === table;
    }
    return meta.name === this.tableName(dataset, table);
  }

  private async existingColumns(
    dataset: string,
    table: string
  ): Promise<Set<string>> {
    const tables = await this.db.introspection.getTables();
    const meta = tables.find((t) => this.matchesTable(t, dataset, table));
    return new Set(meta?.columns.map((c) => c.name) ?? []);
  }
}
