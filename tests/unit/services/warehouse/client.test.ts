import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { MergeFailed, RunAborted, StagingUnavailable } from "../../../../src/errors.js";
import { syncTarget, tableTarget } from "../../../../src/services/sync/index.js";
import { STAGING_MARKER } from "../../../../src/services/warehouse/client.js";
import { eventsDefinition } from "../../../mocks/sources.js";
import {
  countRows,
  createTestWarehouse,
  selectRows,
  type TestWarehouse,
} from "../../../mocks/warehouse.js";

import type { MergeTarget } from "../../../../src/types/index.js";

const target = tableTarget(eventsDefinition);

const labelTarget: MergeTarget = {
  dataset: "test",
  table: "events",
  columns: [
    { name: "id", type: "integer", nullable: false },
    { name: "label", type: "string", nullable: true },
  ],
  primaryKey: ["id"],
  updateOnly: true,
};

const updatedAt = new Date("2024-06-01T12:00:00.000Z");

describe("services/warehouse/client", () => {
  let ctx: TestWarehouse;

  beforeEach(() => {
    ctx = createTestWarehouse();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await ctx.connection.close();
  });

  // ============================================================================
  // Target Tables
  // ============================================================================

  describe("ensureTarget", () => {
    it("should fold the dataset into the table name on SQLite", () => {
      expect(ctx.warehouse.tableName("test", "events")).toBe("test__events");
    });

    it("should create the target table once", async () => {
      expect(await ctx.warehouse.tableExists("test", "events")).toBe(false);

      await ctx.warehouse.ensureTarget(target);
      await ctx.warehouse.ensureTarget(target);

      expect(await ctx.warehouse.tableExists("test", "events")).toBe(true);
    });

    it("should add columns the target gained", async () => {
      await ctx.warehouse.ensureTarget(syncTarget(eventsDefinition));
      await ctx.warehouse.ensureTarget(target);

      const tables = await ctx.warehouse.db.introspection.getTables();
      const events = tables.find((t) => t.name === "test__events");
      expect(events?.columns.map((c) => c.name)).toEqual([
        "id",
        "name",
        "value",
        "updated_at",
        "label",
      ]);
    });
  });

  // ============================================================================
  // Stage and Merge
  // ============================================================================

  describe("stageAndMerge", () => {
    beforeEach(async () => {
      await ctx.warehouse.ensureTarget(target);
    });

    it("should insert new rows", async () => {
      const merged = await ctx.warehouse.stageAndMerge(target, [
        { id: 1, name: "alpha", value: 1.5, updated_at: updatedAt, label: null },
        { id: 2, name: "beta", value: null, updated_at: null, label: "x" },
      ]);

      expect(merged).toBe(2);
      expect(await selectRows(ctx.warehouse, "test", "events")).toEqual([
        {
          id: 1,
          name: "alpha",
          value: 1.5,
          updated_at: "2024-06-01T12:00:00.000Z",
          label: null,
        },
        { id: 2, name: "beta", value: null, updated_at: null, label: "x" },
      ]);
    });

    it("should update rows whose key already exists", async () => {
      await ctx.warehouse.stageAndMerge(target, [
        { id: 1, name: "alpha" },
        { id: 2, name: "beta" },
      ]);
      const merged = await ctx.warehouse.stageAndMerge(target, [
        { id: 2, name: "beta-2" },
        { id: 3, name: "gamma" },
      ]);

      expect(merged).toBe(2);
      const rows = await selectRows(ctx.warehouse, "test", "events");
      expect(rows.map((row) => [row.id, row.name])).toEqual([
        [1, "alpha"],
        [2, "beta-2"],
        [3, "gamma"],
      ]);
    });

    it("should keep the last record loaded for a duplicated key", async () => {
      const merged = await ctx.warehouse.stageAndMerge(target, [
        { id: 1, name: "first" },
        { id: 1, name: "second" },
        { id: 1, name: "third" },
      ]);

      expect(merged).toBe(1);
      const rows = await selectRows(ctx.warehouse, "test", "events");
      expect(rows.map((row) => row.name)).toEqual(["third"]);
    });

    it("should converge when the same batch is merged twice", async () => {
      const batch = [
        { id: 1, name: "alpha", value: 1 },
        { id: 2, name: "beta", value: 2 },
      ];

      await ctx.warehouse.stageAndMerge(target, batch);
      const once = await selectRows(ctx.warehouse, "test", "events");
      await ctx.warehouse.stageAndMerge(target, batch);

      expect(await selectRows(ctx.warehouse, "test", "events")).toEqual(once);
    });

    it("should only write the columns of the merge target", async () => {
      await ctx.warehouse.stageAndMerge(target, [
        { id: 1, name: "alpha", value: 1 },
      ]);
      await ctx.warehouse.stageAndMerge(labelTarget, [{ id: 1, label: "blue" }]);
      await ctx.warehouse.stageAndMerge(syncTarget(eventsDefinition), [
        { id: 1, name: "alpha-2", value: 2, updated_at: null },
      ]);

      const rows = await selectRows(ctx.warehouse, "test", "events");
      expect(rows).toEqual([
        { id: 1, name: "alpha-2", value: 2, updated_at: null, label: "blue" },
      ]);
    });

    it("should never insert through an update-only target", async () => {
      await ctx.warehouse.stageAndMerge(target, [{ id: 1, name: "alpha" }]);

      const merged = await ctx.warehouse.stageAndMerge(labelTarget, [
        { id: 1, label: "blue" },
        { id: 99, label: "orphan" },
      ]);

      expect(merged).toBe(1);
      expect(await countRows(ctx.warehouse, "test", "events")).toBe(1);
    });

    it("should apply nothing when any row of the batch is rejected", async () => {
      await expect(
        ctx.warehouse.stageAndMerge(target, [
          { id: 1, name: "alpha" },
          { id: 2, name: null },
        ])
      ).rejects.toBeInstanceOf(MergeFailed);

      expect(await countRows(ctx.warehouse, "test", "events")).toBe(0);
      expect(await ctx.warehouse.listStagingTables()).toEqual([]);
    });

    it("should drop the staging table after a successful merge", async () => {
      await ctx.warehouse.stageAndMerge(target, [{ id: 1, name: "alpha" }]);

      expect(await ctx.warehouse.listStagingTables()).toEqual([]);
    });

    it("should report a committed merge even when the staging drop fails", async () => {
      vi.spyOn(ctx.warehouse, "drop").mockRejectedValue(new Error("drop denied"));

      const merged = await ctx.warehouse.stageAndMerge(target, [
        { id: 1, name: "alpha" },
        { id: 2, name: "beta" },
      ]);

      expect(merged).toBe(2);
      const rows = await selectRows(ctx.warehouse, "test", "events");
      expect(rows.map((row) => [row.id, row.name])).toEqual([
        [1, "alpha"],
        [2, "beta"],
      ]);
      expect(await ctx.warehouse.listStagingTables()).toHaveLength(1);
    });

    it("should surface the merge error when the staging drop also fails", async () => {
      vi.spyOn(ctx.warehouse, "drop").mockRejectedValue(new Error("drop denied"));

      await expect(
        ctx.warehouse.stageAndMerge(target, [
          { id: 1, name: "alpha" },
          { id: 2, name: null },
        ])
      ).rejects.toBeInstanceOf(MergeFailed);

      expect(await countRows(ctx.warehouse, "test", "events")).toBe(0);
    });

    it("should not start when the signal is already aborted", async () => {
      await expect(
        ctx.warehouse.stageAndMerge(target, [{ id: 1, name: "alpha" }], {
          signal: AbortSignal.abort(),
        })
      ).rejects.toBeInstanceOf(RunAborted);

      expect(await countRows(ctx.warehouse, "test", "events")).toBe(0);
      expect(await ctx.warehouse.listStagingTables()).toEqual([]);
    });
  });

  // ============================================================================
  // Staging Tables
  // ============================================================================

  describe("staging tables", () => {
    it("should find and drop orphaned staging tables", async () => {
      await ctx.warehouse.ensureTarget(target);
      const first = await ctx.warehouse.createStaging(target);
      const second = await ctx.warehouse.createStaging(target);

      expect(first.name).not.toBe(second.name);
      expect(first.name.startsWith(`test__events${STAGING_MARKER}`)).toBe(true);

      const orphans = await ctx.warehouse.listStagingTables();
      expect(orphans).toEqual([first.name, second.name].sort());

      expect(await ctx.warehouse.dropStagingTables()).toEqual(orphans);
      expect(await ctx.warehouse.listStagingTables()).toEqual([]);
      expect(await ctx.warehouse.tableExists("test", "events")).toBe(true);
    });

    it("should raise StagingUnavailable when the warehouse refuses the table", async () => {
      const closed = createTestWarehouse();
      await closed.warehouse.ensureTarget(target);
      await closed.connection.close();

      await expect(closed.warehouse.createStaging(target)).rejects.toBeInstanceOf(
        StagingUnavailable
      );
    });
  });
});
