import type {
  FetchWindow,
  RawRecord,
  RetryPolicy,
  SourceDefinition,
} from "../types/index.js";

/**
 * One external API, seen as a paged stream of raw items plus a
 * per-item transformation into rows of its definition's columns.
 *
 * Adapters hold configuration only; no state is shared between runs.
 */
export interface SourceAdapter<TItem = unknown> {
  /**
   * Lazily page through every item in the window. Transient failures are
   * retried per page from the last page that succeeded; exhausting the
   * retries throws SourceUnavailable.
   */
  fetch(window: FetchWindow, signal?: AbortSignal): AsyncIterable<TItem>;

  /**
   * Map one raw item to a row, or `null` to skip it deliberately.
   * Throws MalformedRecord when the item does not have the expected shape.
   */
  transform(item: TItem): RawRecord | null;
}

export interface AdapterOptions {
  retry?: RetryPolicy;
  requestTimeoutMs?: number;
}

/**
 * A definition paired with the factory that builds its adapter from the
 * process environment.
 */
export interface SourceEntry {
  definition: SourceDefinition;
  description: string;
  createAdapter(
    env: NodeJS.ProcessEnv,
    options?: AdapterOptions
  ): SourceAdapter;
}
