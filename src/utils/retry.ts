/**
 * Retry primitives.
 *
 * Calls that can fail transiently return an {@link Attempt} instead of
 * throwing; {@link retryAttempts} is a plain loop over those values that
 * applies exponential backoff with jitter between tries.
 */

import { RunAborted, toError } from "../errors.js";

import type { RetryPolicy } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type Attempt<T> =
  | { status: "ok"; value: T }
  | {
      status: "retryable";
      reason: string;
      /** Server-requested wait (Retry-After) */
      retryAfterMs?: number;
      /** The remote side is rate limiting us, as opposed to a transient fault */
      throttled?: boolean;
    }
  | { status: "fatal"; reason: string; code?: string };

export type RetryOutcome<T> =
  | { status: "ok"; value: T; attempts: number }
  | { status: "exhausted"; reason: string; attempts: number }
  | { status: "fatal"; reason: string; code?: string; attempts: number };

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  reason: string;
}

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  random?: () => number;
  onRetry?: (info: RetryInfo) => void;
}

// ============================================================================
// Constructors
// ============================================================================

export const Ok = <T>(value: T): Attempt<T> => ({ status: "ok", value });

export const Retryable = (
  reason: string,
  options: { retryAfterMs?: number; throttled?: boolean } = {}
): Attempt<never> => ({ status: "retryable", reason, ...options });

export const Fatal = (reason: string, code?: string): Attempt<never> =>
  code === undefined
    ? { status: "fatal", reason }
    : { status: "fatal", reason, code };

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before the next try after `attempt` failed tries (1-based).
 * Exponential growth capped at `maxBackoffMs`, plus up to
 * `jitterRatio` of the delay as random jitter.
 */
export function computeBackoff(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential =
    policy.initialBackoffMs *
    Math.pow(policy.backoffMultiplier, Math.max(0, attempt - 1));
  const base = Math.min(exponential, policy.maxBackoffMs);
  const jitter = base * policy.jitterRatio * random();
  return Math.round(Math.min(base + jitter, policy.maxBackoffMs));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | undefined {
  if (header === null || header.trim() === "") return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

// ============================================================================
// Cancellation-aware helpers
// ============================================================================

export function abortError(signal: AbortSignal): RunAborted {
  const reason = toError(signal.reason);
  return new RunAborted(
    reason.name === "TimeoutError" ? "Deadline exceeded" : "Run aborted",
    reason
  );
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted === true) {
    throw abortError(signal);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted === true) {
      reject(abortError(signal));
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timer);
      if (signal !== undefined) {
        reject(abortError(signal));
      }
    }

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ============================================================================
// Retry Loop
// ============================================================================

/**
 * Run `attemptFn` until it succeeds, returns a fatal result, or
 * `policy.maxAttempts` tries are used up.
 */
export async function retryAttempts<T>(
  attemptFn: (attempt: number) => Promise<Attempt<T>>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { policy, signal, random, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    const result = await attemptFn(attempt);

    if (result.status === "ok") {
      return { status: "ok", value: result.value, attempts: attempt };
    }

    if (result.status === "fatal") {
      return { ...result, attempts: attempt };
    }

    if (attempt >= policy.maxAttempts) {
      return { status: "exhausted", reason: result.reason, attempts: attempt };
    }

    const delayMs = Math.max(
      result.retryAfterMs ?? 0,
      computeBackoff(attempt, policy, random)
    );
    onRetry?.({ attempt, delayMs, reason: result.reason });
    await sleep(delayMs, signal);
  }
}
