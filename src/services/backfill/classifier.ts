/**
 * Sentiment classifier backed by Cloudflare Workers AI
 * (`@cf/huggingface/distilbert-sst-2-int8`).
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import {
  UNAUTHORIZED,
  classifyStatus,
  fetchJson,
  type JsonResponse,
} from "../../utils/http.js";
import { Fatal, Ok, type Attempt } from "../../utils/retry.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A remote classification service. Outcomes are tagged: `retryable` for
 * throttling and transient faults, `fatal` for permanent rejection.
 */
export interface Classifier<TResult> {
  /** Result for payloads that need no remote call, if any */
  resolveLocally?(payload: string): TResult | undefined;
  classify(payload: string, signal?: AbortSignal): Promise<Attempt<TResult>>;
}

export type SentimentCategory = "positive" | "negative" | "neutral";

export interface Sentiment {
  /** Signed confidence in [-1, 1], rounded to 4 decimals */
  score: number;
  label: string;
  category: SentimentCategory;
}

export const SENTIMENT_MODEL = "@cf/huggingface/distilbert-sst-2-int8";
const CLOUDFLARE_API_URL = "https://api.cloudflare.com/client/v4";

export const MIN_TEXT_LENGTH = 10;
export const MAX_TEXT_LENGTH = 1000;
const CATEGORY_THRESHOLD = 0.25;

/** Attempt code for a payload the service will never accept */
export const INVALID_PAYLOAD = "INVALID_PAYLOAD";

export const NEUTRAL: Readonly<Sentiment> = Object.freeze({
  score: 0,
  label: "NEUTRAL",
  category: "neutral",
});

// ============================================================================
// Text and Score Helpers
// ============================================================================

/** Strip HTML tags and named entities and collapse whitespace */
export function cleanHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, " ")
    .replace(/&[a-z]+;/g, " ")
    .replace(/&#x?[0-9a-f]+;/gi, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function toSentiment(label: string, score: number): Sentiment {
  const signed = label === "POSITIVE" ? score : -score;
  // `|| 0` folds -0 into 0
  const rounded = Math.round(signed * 10_000) / 10_000 || 0;

  let category: SentimentCategory = "neutral";
  if (rounded > CATEGORY_THRESHOLD) category = "positive";
  else if (rounded < -CATEGORY_THRESHOLD) category = "negative";

  return { score: rounded, label, category };
}

// ============================================================================
// Response Classification
// ============================================================================

const SentimentResponseSchema = Type.Object({
  success: Type.Boolean(),
  result: Type.Array(
    Type.Object({ label: Type.String(), score: Type.Number() })
  ),
});

/**
 * 2xx with a result → ok, 429 → throttled, 408/5xx → transient,
 * 401/403 → unauthorized, any other status or an empty result → the
 * payload is rejected for good.
 */
export function classifySentimentResponse(
  response: JsonResponse
): Attempt<Sentiment> {
  const status = classifyStatus(response);
  if (status.status === "fatal" && status.code !== UNAUTHORIZED) {
    return Fatal(status.reason, INVALID_PAYLOAD);
  }
  if (status.status !== "ok") {
    return status;
  }

  const body = status.value;
  if (!Value.Check(SentimentResponseSchema, body) || !body.success) {
    return Fatal("Classifier returned no result", INVALID_PAYLOAD);
  }

  // The model scores both labels; keep the more confident one
  let best: { label: string; score: number } | undefined;
  for (const entry of body.result) {
    if (best === undefined || entry.score > best.score) best = entry;
  }
  if (best === undefined) {
    return Fatal("Classifier returned no result", INVALID_PAYLOAD);
  }
  return Ok(toSentiment(best.label, best.score));
}

// ============================================================================
// Workers AI Classifier
// ============================================================================

export interface WorkersAiOptions {
  accountId: string;
  apiToken: string;
  apiUrl?: string;
  model?: string;
  timeoutMs?: number;
}

export class WorkersAiSentimentClassifier implements Classifier<Sentiment> {
  private readonly url: string;

  constructor(private options: WorkersAiOptions) {
    const base = options.apiUrl ?? CLOUDFLARE_API_URL;
    this.url = `${base}/accounts/${options.accountId}/ai/run/${options.model ?? SENTIMENT_MODEL}`;
  }

  /** Short texts are not worth a call: they resolve to neutral */
  resolveLocally(payload: string): Sentiment | undefined {
    return cleanHtml(payload).length < MIN_TEXT_LENGTH ? { ...NEUTRAL } : undefined;
  }

  async classify(
    payload: string,
    signal?: AbortSignal
  ): Promise<Attempt<Sentiment>> {
    const text = cleanHtml(payload).slice(0, MAX_TEXT_LENGTH);

    const sent = await fetchJson(
      this.url,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ text }),
      },
      { signal, timeoutMs: this.options.timeoutMs }
    );
    if (sent.status !== "ok") return sent;
    return classifySentimentResponse(sent.value);
  }
}
