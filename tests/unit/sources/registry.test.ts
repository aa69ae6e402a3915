import { describe, it, expect } from "vitest";

import { defineSource } from "../../../src/sources/definition.js";
import {
  HackerNewsCommentsAdapter,
  LinearIssuesAdapter,
  getSource,
  listSources,
} from "../../../src/sources/index.js";

import type { SourceDefinition } from "../../../src/types/index.js";

const base: SourceDefinition = {
  name: "widgets",
  dataset: "shop",
  table: "widgets",
  columns: [
    { name: "sku", type: "string", nullable: false },
    { name: "price", type: "float", nullable: true },
  ],
  primaryKey: ["sku"],
  incrementalLookbackDays: 1,
  fullSync: { lookbackDays: 30 },
};

describe("sources", () => {
  describe("defineSource", () => {
    it("should freeze a valid definition", () => {
      const definition = defineSource(base);

      expect(Object.isFrozen(definition)).toBe(true);
      expect(Object.isFrozen(definition.columns)).toBe(true);
      expect(definition.primaryKey).toEqual(["sku"]);
    });

    it("should reject a primary key outside the columns", () => {
      expect(() => defineSource({ ...base, primaryKey: ["id"] })).toThrow(
        'Source widgets: primary key column "id" is not in its columns'
      );
    });

    it("should reject an empty primary key", () => {
      expect(() => defineSource({ ...base, primaryKey: [] })).toThrow(
        "Source widgets has no primary key"
      );
    });

    it("should reject enrichment columns that shadow source columns", () => {
      expect(() =>
        defineSource({
          ...base,
          enrichmentColumns: [{ name: "price", type: "float", nullable: true }],
        })
      ).toThrow('Source widgets: enrichment column "price" duplicates a source column');
    });
  });

  describe("registry", () => {
    it("should list every registered source", () => {
      expect(listSources().map((entry) => entry.definition.name)).toEqual([
        "linear-issues",
        "hn-comments",
      ]);
    });

    it("should name the available sources for an unknown one", () => {
      expect(() => getSource("jira")).toThrow(
        'Unknown source "jira". Available: linear-issues, hn-comments'
      );
    });

    it("should require a Linear API key", () => {
      expect(() => getSource("linear-issues").createAdapter({})).toThrow(
        "LINEAR_API_KEY environment variable is not set"
      );
    });

    it("should build adapters from the environment", () => {
      expect(
        getSource("linear-issues").createAdapter({ LINEAR_API_KEY: "test-secret" })
      ).toBeInstanceOf(LinearIssuesAdapter);

      const hn = getSource("hn-comments").createAdapter({
        HN_API_URL: "https://hn.example.test/api/v1",
      });
      expect(hn).toBeInstanceOf(HackerNewsCommentsAdapter);
    });
  });
});
