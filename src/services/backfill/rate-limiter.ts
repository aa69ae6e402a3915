/**
 * Shared token-bucket rate limiter.
 *
 * Tokens refill continuously at `requestsPerSecond` up to `burst`.
 * Waiters are served strictly in arrival order: each acquire is chained
 * behind the previous one, so concurrent callers cannot race for the same
 * token and the bucket never goes below zero.
 */

import { sleep, throwIfAborted } from "../../utils/retry.js";

export interface TokenBucketOptions {
  requestsPerSecond: number;
  /** Bucket capacity; 1 means calls are evenly spaced */
  burst?: number;
  /** Clock, in milliseconds */
  now?: () => number;
}

export class TokenBucket {
  private readonly capacity: number;
  private readonly msPerToken: number;
  private readonly now: () => number;
  private tokens: number;
  private updatedAt: number;
  private pausedUntil = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: TokenBucketOptions) {
    if (!Number.isFinite(options.requestsPerSecond) || options.requestsPerSecond <= 0) {
      throw new RangeError(
        `requestsPerSecond must be positive, got ${String(options.requestsPerSecond)}`
      );
    }

    this.capacity = Math.max(1, Math.floor(options.burst ?? 1));
    this.msPerToken = 1000 / options.requestsPerSecond;
    this.now = options.now ?? Date.now;
    this.tokens = this.capacity;
    this.updatedAt = this.now();
  }

  /**
   * Wait for a token. Rejects with RunAborted if `signal` fires first; the
   * next waiter in line is unaffected.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.take(signal));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Stop handing out tokens for `ms` (e.g. a Retry-After from the remote
   * side). The first token after the pause is available exactly when it
   * ends.
   */
  pauseFor(ms: number): void {
    const now = this.now();
    this.pausedUntil = Math.max(this.pausedUntil, now + ms);
    this.tokens = 0;
    this.updatedAt = Math.max(now, this.pausedUntil - this.msPerToken);
  }

  /** Milliseconds left in the current pause */
  get pausedFor(): number {
    return Math.max(0, this.pausedUntil - this.now());
  }

  private async take(signal?: AbortSignal): Promise<void> {
    for (;;) {
      throwIfAborted(signal);

      const now = this.now();
      this.refill(now);

      const paused = this.pausedUntil - now;
      if (paused > 0) {
        await sleep(paused, signal);
        continue;
      }

      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      await sleep(Math.ceil((1 - this.tokens) * this.msPerToken), signal);
    }
  }

  private refill(now: number): void {
    const elapsed = now - this.updatedAt;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.msPerToken);
    this.updatedAt = now;
  }
}
