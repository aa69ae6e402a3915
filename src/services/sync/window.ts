import type { FetchWindow, SourceDefinition, SyncMode } from "../../types/index.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Resolve the `[since, until)` window of a run, anchored to `now`.
 *
 * - incremental: the last `lookbackDays` days (definition default unless
 *   overridden)
 * - full: from the definition's fixed start date, or its full lookback
 *
 * @throws RangeError if the lookback override is negative or not finite
 */
export function resolveWindow(
  definition: SourceDefinition,
  mode: SyncMode,
  now: Date,
  lookbackDays?: number
): FetchWindow {
  const until = new Date(now.getTime());

  if (mode === "incremental") {
    const days = lookbackDays ?? definition.incrementalLookbackDays;
    if (!Number.isFinite(days) || days < 0) {
      throw new RangeError(`Invalid lookback: ${String(days)} days`);
    }
    return { since: new Date(until.getTime() - days * DAY_MS), until };
  }

  const bound = definition.fullSync;
  const since =
    "since" in bound
      ? new Date(bound.since)
      : new Date(until.getTime() - bound.lookbackDays * DAY_MS);
  return { since, until };
}
