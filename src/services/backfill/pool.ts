/**
 * Backfill Worker Pool
 *
 * A fixed set of workers drains a bounded job queue. Every remote call
 * first takes a token from one shared limiter, so the pool as a whole
 * never exceeds the configured request rate however many workers run.
 *
 * Per job: pending → in-flight → done | retry-scheduled | failed-permanently.
 * Throttled and transient failures go back to the queue after a backoff;
 * permanent rejections fail the job at once. Rejected credentials abort
 * the whole pool.
 */

import { TokenBucket } from "./rate-limiter.js";
import { EnrichmentJobQueue } from "./queue.js";
import { writeBackTarget, type EnrichmentTask } from "./task.js";
import { RunAborted, toError } from "../../errors.js";
import { backfillLogger } from "../../logger.js";
import { BACKFILL_DEFAULTS, type RetryPolicy } from "../../types/index.js";
import { UNAUTHORIZED } from "../../utils/http.js";
import { Ok, computeBackoff, type Attempt } from "../../utils/retry.js";

import type { Classifier } from "./classifier.js";
import type { EnrichmentJob, MergeTarget } from "../../types/index.js";
import type { WarehouseClient } from "../warehouse/client.js";

// ============================================================================
// Types
// ============================================================================

export interface BackfillOptions {
  workers: number;
  requestsPerSecond: number;
  burst: number;
  queueCapacity: number;
  /** Applies to failures other than throttling */
  retry: RetryPolicy;
  /** Throttled responses tolerated per job before it fails */
  maxThrottles: number;
  /** Classify without writing results back */
  dryRun: boolean;
  /** Cancellation: workers finish their current job and stop */
  signal?: AbortSignal;
  /** Jitter source for backoff */
  random?: () => number;
  onProgress?: (progress: BackfillProgress) => void;
}

export interface BackfillProgress {
  total: number;
  done: number;
  failedPermanently: number;
}

export interface BackfillFailure {
  key: EnrichmentJob["key"];
  reason: string;
  attempts: number;
}

export type BackfillStatus = "completed" | "cancelled" | "aborted";

export interface BackfillSummary {
  status: BackfillStatus;
  total: number;
  done: number;
  failedPermanently: number;
  /** Retries scheduled, all causes */
  retried: number;
  /** Responses that signalled rate limiting */
  throttled: number;
  /** Jobs never finished because the pool stopped early */
  notProcessed: number;
  failures: BackfillFailure[];
  /** Why the pool aborted, when it did */
  abortReason?: string;
  durationMs: number;
}

interface RunContext {
  queue: EnrichmentJobQueue;
  limiter: TokenBucket;
  target: MergeTarget;
  stop: AbortController;
  summary: BackfillSummary;
}

// ============================================================================
// Backfill Worker Pool
// ============================================================================

export class BackfillWorkerPool<TResult> {
  private readonly options: BackfillOptions;

  constructor(
    private warehouse: WarehouseClient,
    private task: EnrichmentTask<TResult>,
    private classifier: Classifier<TResult>,
    options: Partial<BackfillOptions> = {}
  ) {
    this.options = {
      ...options,
      workers: options.workers ?? BACKFILL_DEFAULTS.workers,
      requestsPerSecond:
        options.requestsPerSecond ?? BACKFILL_DEFAULTS.requestsPerSecond,
      burst: options.burst ?? BACKFILL_DEFAULTS.burst,
      queueCapacity: options.queueCapacity ?? BACKFILL_DEFAULTS.queueCapacity,
      retry: options.retry ?? BACKFILL_DEFAULTS.retry,
      maxThrottles: options.maxThrottles ?? BACKFILL_DEFAULTS.maxThrottles,
      dryRun: options.dryRun ?? false,
    };

    if (!Number.isInteger(this.options.workers) || this.options.workers < 1) {
      throw new RangeError(
        `workers must be a positive integer, got ${String(this.options.workers)}`
      );
    }
  }

  /**
   * Process every job and report the outcome. Individual job failures
   * never reject the returned promise.
   */
  async run(
    jobs: Iterable<EnrichmentJob> | AsyncIterable<EnrichmentJob>
  ): Promise<BackfillSummary> {
    const startTime = Date.now();
    const { signal } = this.options;

    const ctx: RunContext = {
      queue: new EnrichmentJobQueue(this.options.queueCapacity),
      limiter: new TokenBucket({
        requestsPerSecond: this.options.requestsPerSecond,
        burst: this.options.burst,
      }),
      target: writeBackTarget(this.task),
      stop: new AbortController(),
      summary: {
        status: "completed",
        total: 0,
        done: 0,
        failedPermanently: 0,
        retried: 0,
        throttled: 0,
        notProcessed: 0,
        failures: [],
        durationMs: 0,
      },
    };

    backfillLogger.info(
      {
        task: this.task.name,
        workers: this.options.workers,
        requestsPerSecond: this.options.requestsPerSecond,
        dryRun: this.options.dryRun,
      },
      "Starting backfill"
    );

    const onCancel = (): void => {
      if (ctx.summary.status === "completed") {
        ctx.summary.status = "cancelled";
      }
      this.halt(ctx, "Backfill cancelled");
    };
    if (signal?.aborted === true) {
      onCancel();
    } else {
      signal?.addEventListener("abort", onCancel, { once: true });
    }

    const producer = this.produce(jobs, ctx);
    const workers = Array.from({ length: this.options.workers }, (_, index) =>
      this.work(index + 1, ctx)
    );

    try {
      const results = await Promise.allSettled([producer, ...workers]);
      const rejected = results.find(
        (result): result is PromiseRejectedResult => result.status === "rejected"
      );
      if (rejected !== undefined) {
        throw toError(rejected.reason);
      }
    } finally {
      signal?.removeEventListener("abort", onCancel);
    }

    const { summary } = ctx;
    summary.durationMs = Date.now() - startTime;
    backfillLogger.info(
      {
        task: this.task.name,
        status: summary.status,
        total: summary.total,
        done: summary.done,
        failedPermanently: summary.failedPermanently,
        retried: summary.retried,
        throttled: summary.throttled,
        notProcessed: summary.notProcessed,
        durationMs: summary.durationMs,
      },
      "Backfill finished"
    );
    return summary;
  }

  // ==========================================================================
  // Producer / Workers
  // ==========================================================================

  private async produce(
    jobs: Iterable<EnrichmentJob> | AsyncIterable<EnrichmentJob>,
    ctx: RunContext
  ): Promise<void> {
    try {
      for await (const job of jobs) {
        ctx.summary.total++;
        const admitted = await ctx.queue.enqueue(job);
        if (!admitted) {
          ctx.summary.notProcessed++;
        }
      }
      ctx.queue.close();
    } catch (error) {
      // Without a producer nothing would ever close the queue
      this.halt(ctx, "Job source failed");
      throw error;
    }
  }

  private async work(workerId: number, ctx: RunContext): Promise<void> {
    for (;;) {
      const job = await ctx.queue.dequeue();
      if (job === undefined) return;

      try {
        await this.process(job, ctx);
      } catch (error) {
        // Unexpected failure in our own code; keep the pool running
        backfillLogger.error(
          { workerId, key: job.key, status: job.status, error: toError(error).message },
          "Worker failed while processing job"
        );
        // A job that already settled or went back to the queue is not failed again
        if (job.status === "in-flight") {
          this.fail(job, toError(error).message, ctx);
        }
      }
    }
  }

  private async process(job: EnrichmentJob, ctx: RunContext): Promise<void> {
    job.status = "in-flight";
    job.attempts++;

    let outcome: Attempt<TResult>;
    const local = this.classifier.resolveLocally?.(job.payload);
    if (local !== undefined) {
      outcome = Ok(local);
    } else {
      try {
        await ctx.limiter.acquire(ctx.stop.signal);
      } catch (error) {
        if (error instanceof RunAborted) {
          // Stopped while waiting for a token: the call never started
          job.status = "pending";
          ctx.summary.notProcessed++;
          ctx.queue.settle();
          return;
        }
        throw error;
      }
      // In-flight calls are not aborted on cancel; they run to completion
      outcome = await this.classifier.classify(job.payload);
    }

    switch (outcome.status) {
      case "ok":
        await this.complete(job, outcome.value, ctx);
        return;
      case "retryable":
        if (outcome.throttled === true) {
          this.throttle(job, outcome.reason, outcome.retryAfterMs, ctx);
        } else {
          this.retry(job, outcome.reason, outcome.retryAfterMs ?? 0, ctx);
        }
        return;
      case "fatal":
        this.fail(job, outcome.reason, ctx);
        if (outcome.code === UNAUTHORIZED) {
          ctx.summary.status = "aborted";
          ctx.summary.abortReason = outcome.reason;
          this.halt(ctx, "Classifier rejected credentials");
        }
        return;
    }
  }

  // ==========================================================================
  // Job Outcomes
  // ==========================================================================

  private async complete(
    job: EnrichmentJob,
    result: TResult,
    ctx: RunContext
  ): Promise<void> {
    if (!this.options.dryRun) {
      try {
        await this.warehouse.stageAndMerge(ctx.target, [
          { ...job.key, ...this.task.toRow(result) },
        ]);
      } catch (error) {
        this.retry(job, `Write-back failed: ${toError(error).message}`, 0, ctx);
        return;
      }
    }

    job.status = "done";
    job.lastError = undefined;
    ctx.summary.done++;
    ctx.queue.settle();
    this.reportProgress(ctx);
  }

  /**
   * Every worker waits out a throttle: the shared limiter pauses for the
   * server's Retry-After, or for the job's backoff when none was given.
   */
  private throttle(
    job: EnrichmentJob,
    reason: string,
    retryAfterMs: number | undefined,
    ctx: RunContext
  ): void {
    const throttles = (job.throttles ?? 0) + 1;
    job.throttles = throttles;
    job.lastError = reason;
    ctx.summary.throttled++;

    if (throttles > this.options.maxThrottles) {
      this.fail(job, `${reason} (throttled ${String(throttles)} times)`, ctx);
      return;
    }

    const delayMs =
      retryAfterMs ??
      computeBackoff(throttles, this.options.retry, this.options.random);
    ctx.limiter.pauseFor(delayMs);
    this.requeue(job, reason, delayMs, ctx);
  }

  private retry(
    job: EnrichmentJob,
    reason: string,
    retryAfterMs: number,
    ctx: RunContext
  ): void {
    job.lastError = reason;

    const policy = this.options.retry;
    const failures = job.attempts - (job.throttles ?? 0);
    if (failures >= policy.maxAttempts) {
      this.fail(job, `${reason} (after ${String(failures)} attempts)`, ctx);
      return;
    }

    const delayMs = Math.max(
      retryAfterMs,
      computeBackoff(failures, policy, this.options.random)
    );
    this.requeue(job, reason, delayMs, ctx);
  }

  private requeue(
    job: EnrichmentJob,
    reason: string,
    delayMs: number,
    ctx: RunContext
  ): void {
    if (!ctx.queue.requeueAfter(job, delayMs)) {
      job.status = "pending";
      ctx.summary.notProcessed++;
      ctx.queue.settle();
      return;
    }

    ctx.summary.retried++;
    backfillLogger.warn(
      { key: job.key, attempt: job.attempts, delayMs, reason },
      "Job scheduled for retry"
    );
  }

  private fail(job: EnrichmentJob, reason: string, ctx: RunContext): void {
    job.status = "failed-permanently";
    job.lastError = reason;
    ctx.summary.failedPermanently++;
    ctx.summary.failures.push({ key: job.key, reason, attempts: job.attempts });
    ctx.queue.settle();

    backfillLogger.error(
      { key: job.key, attempts: job.attempts, reason },
      "Job failed permanently"
    );
    this.reportProgress(ctx);
  }

  /** Stop dequeuing and count every job that never started */
  private halt(ctx: RunContext, reason: string): void {
    if (ctx.stop.signal.aborted) return;
    ctx.stop.abort(new RunAborted(reason));

    const dropped = ctx.queue.cancel();
    for (const job of dropped) {
      job.status = "pending";
    }
    ctx.summary.notProcessed += dropped.length;
    backfillLogger.warn(
      { reason, notStarted: dropped.length },
      "Backfill stopping"
    );
  }

  private reportProgress(ctx: RunContext): void {
    try {
      this.options.onProgress?.({
        total: ctx.summary.total,
        done: ctx.summary.done,
        failedPermanently: ctx.summary.failedPermanently,
      });
    } catch (error) {
      backfillLogger.warn(
        { error: toError(error).message },
        "Progress callback failed"
      );
    }
  }
}
