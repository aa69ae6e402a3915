/**
 * Page-by-page iteration over a source API. A failed page is retried from
 * the last page that succeeded, never from the start of the stream.
 */

import { SourceUnauthorized, SourceUnavailable } from "../errors.js";
import { sourceLogger } from "../logger.js";
import { SYNC_DEFAULTS, type RetryPolicy } from "../types/index.js";
import { UNAUTHORIZED } from "../utils/http.js";
import { retryAttempts, type Attempt } from "../utils/retry.js";

export interface Paginator<TPage, TItem, TCursor> {
  /** Human-readable label for logs and errors */
  label: string;
  fetchPage(
    cursor: TCursor | undefined,
    signal?: AbortSignal
  ): Promise<Attempt<TPage>>;
  items(page: TPage): TItem[];
  /** Cursor of the following page, `undefined` on the last one */
  nextCursor(page: TPage, cursor: TCursor | undefined): TCursor | undefined;
}

export interface PaginateOptions {
  retry?: RetryPolicy;
  signal?: AbortSignal;
}

/**
 * Yield every item of every page. The cursor only advances after a page
 * has been fetched successfully, so a retry re-requests the failed page
 * rather than starting over.
 */
export async function* paginate<TPage, TItem, TCursor>(
  paginator: Paginator<TPage, TItem, TCursor>,
  options: PaginateOptions = {}
): AsyncGenerator<TItem> {
  const { retry = SYNC_DEFAULTS.retry, signal } = options;
  let cursor: TCursor | undefined;
  let pageNumber = 1;

  for (;;) {
    const outcome = await retryAttempts(
      () => paginator.fetchPage(cursor, signal),
      {
        policy: retry,
        signal,
        onRetry: ({ attempt, delayMs, reason }) => {
          sourceLogger.warn(
            { source: paginator.label, page: pageNumber, attempt, delayMs, reason },
            "Page request failed, retrying"
          );
        },
      }
    );

    if (outcome.status === "fatal") {
      if (outcome.code === UNAUTHORIZED) {
        throw new SourceUnauthorized(`${paginator.label}: ${outcome.reason}`);
      }
      throw new SourceUnavailable(
        `${paginator.label} page ${String(pageNumber)}: ${outcome.reason}`,
        outcome.attempts
      );
    }

    if (outcome.status === "exhausted") {
      throw new SourceUnavailable(
        `${paginator.label} page ${String(pageNumber)} failed after ${String(outcome.attempts)} attempts: ${outcome.reason}`,
        outcome.attempts
      );
    }

    const items = paginator.items(outcome.value);
    sourceLogger.debug(
      { source: paginator.label, page: pageNumber, items: items.length },
      "Fetched page"
    );
    yield* items;

    const next = paginator.nextCursor(outcome.value, cursor);
    if (next === undefined) return;
    cursor = next;
    pageNumber++;
  }
}
