/**
 * JSON over HTTP with a per-request timeout, and the mapping of HTTP
 * statuses onto retryable and fatal attempt outcomes.
 */

import {
  Fatal,
  Ok,
  Retryable,
  abortError,
  parseRetryAfter,
  type Attempt,
} from "./retry.js";
import { toError } from "../errors.js";
import { httpLogger } from "../logger.js";
import { SYNC_DEFAULTS } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface JsonResponse {
  status: number;
  headers: Headers;
  /** Parsed body, or `undefined` when it was not JSON */
  body: unknown;
}

export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Attempt code for credentials the remote side rejected */
export const UNAUTHORIZED = "UNAUTHORIZED";

// ============================================================================
// Requests
// ============================================================================

/**
 * Send one request and parse its JSON body. Network failures and
 * timeouts come back as retryable attempts; the caller's own abort
 * signal is rethrown as RunAborted.
 */
export async function fetchJson(
  url: string,
  init: RequestInit = {},
  options: RequestOptions = {}
): Promise<Attempt<JsonResponse>> {
  const { signal, timeoutMs = SYNC_DEFAULTS.requestTimeoutMs } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${String(timeoutMs)}ms`));
  }, timeoutMs);
  const forwardAbort = (): void => {
    controller.abort(signal?.reason);
  };
  signal?.addEventListener("abort", forwardAbort, { once: true });

  const method = init.method ?? "GET";
  httpLogger.debug({ method, url }, "Sending request");

  try {
    const startTime = performance.now();
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    const duration = Math.round(performance.now() - startTime);

    httpLogger.debug(
      { method, url, status: response.status, duration: `${String(duration)}ms` },
      "Received response"
    );

    return Ok({
      status: response.status,
      headers: response.headers,
      body: parseBody(text),
    });
  } catch (error) {
    if (signal?.aborted === true) {
      throw abortError(signal);
    }
    return Retryable(`Network error: ${toError(error).message}`);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

function parseBody(text: string): unknown {
  if (text === "") return undefined;
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

/**
 * Map an HTTP status to an attempt outcome:
 * 2xx ok, 429 throttled, 408/5xx transient, 401/403 unauthorized,
 * anything else fatal.
 */
export function classifyStatus(response: JsonResponse): Attempt<unknown> {
  const { status } = response;

  if (status >= 200 && status < 300) {
    return Ok(response.body);
  }
  if (status === 429) {
    return Retryable("Rate limited (HTTP 429)", {
      throttled: true,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (status === 408 || status >= 500) {
    return Retryable(`Transient HTTP ${String(status)}`);
  }
  if (status === 401 || status === 403) {
    return Fatal(`Unauthorized (HTTP ${String(status)})`, UNAUTHORIZED);
  }
  return Fatal(`Unexpected HTTP ${String(status)}`, `HTTP_${String(status)}`);
}
