/**
 * Hacker News comments source - Algolia search API, paged newest-first by time.
 *
 * Comments land with empty sentiment columns; `backfill sentiment`
 * fills them in afterwards.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { defineSource } from "./definition.js";
import { paginate } from "./pagination.js";
import { Nullable, parseItem } from "./validation.js";
import { MalformedRecord } from "../errors.js";
import { SYNC_DEFAULTS } from "../types/index.js";
import { classifyStatus, fetchJson, type JsonResponse } from "../utils/http.js";
import { Fatal, Ok } from "../utils/retry.js";

import type { AdapterOptions, SourceAdapter } from "./types.js";
import type { FetchWindow, RawRecord } from "../types/index.js";
import type { Attempt } from "../utils/retry.js";

export const HN_API_URL = "https://hn.algolia.com/api/v1";
const HITS_PER_PAGE = 100;

// ============================================================================
// Definition
// ============================================================================

export const hnCommentsDefinition = defineSource({
  name: "hn-comments",
  dataset: "hacker_news",
  table: "raw_comments",
  columns: [
    { name: "id", type: "integer", nullable: false },
    { name: "parent_id", type: "integer", nullable: true },
    { name: "story_id", type: "integer", nullable: true },
    { name: "author", type: "string", nullable: true },
    { name: "text", type: "string", nullable: true },
    { name: "posted_at", type: "timestamp", nullable: false },
    { name: "posted_day", type: "date", nullable: true },
  ],
  primaryKey: ["id"],
  enrichmentColumns: [
    { name: "sentiment_score", type: "float", nullable: true },
    { name: "sentiment_label", type: "string", nullable: true },
    { name: "sentiment_category", type: "string", nullable: true },
  ],
  incrementalLookbackDays: 7,
  fullSync: { lookbackDays: 365 },
});

// ============================================================================
// Schemas
// ============================================================================

export const HnCommentSchema = Type.Object({
  objectID: Type.String({ pattern: "^[0-9]+$" }),
  author: Nullable(Type.String()),
  comment_text: Nullable(Type.String()),
  story_id: Nullable(Type.Integer()),
  parent_id: Nullable(Type.Integer()),
  created_at_i: Type.Integer(),
});

export type HnComment = Static<typeof HnCommentSchema>;

const SearchPageSchema = Type.Object({
  hits: Type.Array(Type.Unknown()),
  page: Type.Integer(),
  nbPages: Type.Integer(),
});

export type SearchPage = Static<typeof SearchPageSchema>;

export function classifySearchResponse(
  response: JsonResponse
): Attempt<SearchPage> {
  const status = classifyStatus(response);
  if (status.status !== "ok") {
    return status;
  }
  if (!Value.Check(SearchPageSchema, status.value)) {
    return Fatal("Unexpected Algolia response shape");
  }
  return Ok(status.value);
}

// ============================================================================
// Adapter
// ============================================================================

export interface HackerNewsAdapterOptions extends AdapterOptions {
  apiUrl?: string;
}

/** Search results stop after this many hits, however many match */
const PAGINATION_LIMIT = 1000;

const BoundaryHitSchema = Type.Object({
  objectID: Type.String(),
  created_at_i: Type.Integer(),
});

/**
 * Position in a window walked newest-first. Once a result set hits the
 * pagination limit, the window is narrowed to `created_at_i <= upper`
 * (the oldest second seen so far) and paging restarts at 0; comments at
 * `upper` that were already emitted are dropped from the narrowed pages.
 */
export interface HnCursor {
  page: number;
  upper?: number;
  emittedAtUpper: string[];
  oldest?: number;
  atOldest: string[];
}

const FIRST_CURSOR: HnCursor = { page: 0, emittedAtUpper: [], atOldest: [] };

/** Where to continue after `page`, or `undefined` when the window is done */
export function nextHnCursor(
  page: SearchPage,
  cursor: HnCursor = FIRST_CURSOR
): HnCursor | undefined {
  let { oldest } = cursor;
  let atOldest = [...cursor.atOldest];
  for (const hit of page.hits) {
    if (!Value.Check(BoundaryHitSchema, hit)) continue;
    if (oldest === undefined || hit.created_at_i < oldest) {
      oldest = hit.created_at_i;
      atOldest = [hit.objectID];
    } else if (hit.created_at_i === oldest) {
      atOldest.push(hit.objectID);
    }
  }

  if (page.page + 1 < page.nbPages) {
    return { ...cursor, page: page.page + 1, oldest, atOldest };
  }
  if (page.nbPages * HITS_PER_PAGE < PAGINATION_LIMIT || oldest === undefined) {
    return undefined;
  }
  // A full result set that yielded nothing new would repeat forever
  if (oldest === cursor.upper && atOldest.length === cursor.emittedAtUpper.length) {
    return undefined;
  }
  return {
    page: 0,
    upper: oldest,
    emittedAtUpper: atOldest,
    oldest,
    atOldest,
  };
}

export class HackerNewsCommentsAdapter implements SourceAdapter {
  readonly definition = hnCommentsDefinition;

  constructor(private options: HackerNewsAdapterOptions = {}) {}

  /**
   * Build the search URL for one page of the window, optionally narrowed
   * to comments created at or before `upper` (epoch seconds).
   */
  pageUrl(window: FetchWindow, page: number, upper?: number): string {
    const since = Math.floor(window.since.getTime() / 1000);
    const until = Math.floor(window.until.getTime() / 1000);
    const end =
      upper === undefined
        ? `created_at_i<${String(until)}`
        : `created_at_i<=${String(upper)}`;
    const params = new URLSearchParams({
      tags: "comment",
      numericFilters: `created_at_i>=${String(since)},${end}`,
      hitsPerPage: String(HITS_PER_PAGE),
      page: String(page),
    });
    return `${this.options.apiUrl ?? HN_API_URL}/search_by_date?${params.toString()}`;
  }

  fetch(window: FetchWindow, signal?: AbortSignal): AsyncIterable<unknown> {
    const { retry, requestTimeoutMs } = this.options;

    return paginate<SearchPage, unknown, HnCursor>(
      {
        label: this.definition.name,
        fetchPage: async (cursor = FIRST_CURSOR, pageSignal) => {
          const sent = await fetchJson(
            this.pageUrl(window, cursor.page, cursor.upper),
            {},
            {
              signal: pageSignal,
              timeoutMs: requestTimeoutMs ?? SYNC_DEFAULTS.requestTimeoutMs,
            }
          );
          if (sent.status !== "ok") return sent;

          const result = classifySearchResponse(sent.value);
          if (result.status !== "ok" || cursor.emittedAtUpper.length === 0) {
            return result;
          }
          const emitted = new Set(cursor.emittedAtUpper);
          return Ok({
            ...result.value,
            hits: result.value.hits.filter(
              (hit) =>
                !Value.Check(BoundaryHitSchema, hit) || !emitted.has(hit.objectID)
            ),
          });
        },
        items: (page) => page.hits,
        nextCursor: nextHnCursor,
      },
      { retry, signal }
    );
  }

  /** Deleted and empty comments are skipped */
  transform(item: unknown): RawRecord | null {
    const hit = parseItem(HnCommentSchema, item, "hn comment");

    if (hit.comment_text === null || hit.comment_text.trim() === "") {
      return null;
    }

    const id = Number(hit.objectID);
    if (!Number.isSafeInteger(id)) {
      throw new MalformedRecord(`hn comment: objectID ${hit.objectID} out of range`);
    }

    const postedAt = new Date(hit.created_at_i * 1000);
    return {
      id,
      parent_id: hit.parent_id,
      story_id: hit.story_id,
      author: hit.author,
      text: hit.comment_text,
      posted_at: postedAt,
      posted_day: postedAt.toISOString().slice(0, 10),
    };
  }
}
