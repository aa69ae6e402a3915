/**
 * Enrichment tasks - what a backfill reads, classifies and writes back
 */

import { hnCommentsDefinition } from "../../sources/hacker-news.js";

import type { Sentiment } from "./classifier.js";
import type {
  ColumnDefinition,
  MergeTarget,
  RawRecord,
  SourceDefinition,
} from "../../types/index.js";

export interface EnrichmentTask<TResult> {
  name: string;
  /** Source whose target table is enriched */
  definition: SourceDefinition;
  /** Column holding the text sent to the classifier */
  payloadColumn: string;
  /** Column the selection window applies to */
  timeColumn: string;
  /** Enrichment column that stays NULL until a row is enriched */
  markerColumn: string;
  /** Columns written back, all among the definition's enrichment columns */
  columns: readonly ColumnDefinition[];
  toRow(result: TResult): RawRecord;
}

/**
 * Write-back target: primary key plus the enrichment columns, so a
 * backfill merge never touches the columns a sync owns. Update-only: a
 * row removed since it was selected is not recreated.
 */
export function writeBackTarget<TResult>(
  task: EnrichmentTask<TResult>
): MergeTarget {
  const { definition } = task;
  const keyColumns = definition.columns.filter((column) =>
    definition.primaryKey.includes(column.name)
  );

  return {
    dataset: definition.dataset,
    table: definition.table,
    columns: [...keyColumns, ...task.columns],
    primaryKey: definition.primaryKey,
    updateOnly: true,
  };
}

export const sentimentTask: EnrichmentTask<Sentiment> = {
  name: "sentiment",
  definition: hnCommentsDefinition,
  payloadColumn: "text",
  timeColumn: "posted_at",
  markerColumn: "sentiment_label",
  columns: hnCommentsDefinition.enrichmentColumns ?? [],
  toRow: (sentiment) => ({
    sentiment_score: sentiment.score,
    sentiment_label: sentiment.label,
    sentiment_category: sentiment.category,
  }),
};
