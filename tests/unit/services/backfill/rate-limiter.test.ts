import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { RunAborted } from "../../../../src/errors.js";
import { TokenBucket } from "../../../../src/services/backfill/rate-limiter.js";

describe("services/backfill/rate-limiter", () => {
  let start: number;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    start = Date.now();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  /** Acquire `count` tokens at once; resolves to [index, elapsed ms] in grant order */
  async function grants(
    limiter: TokenBucket,
    count: number
  ): Promise<[number, number][]> {
    const granted: [number, number][] = [];
    const pending = Array.from({ length: count }, (_, index) =>
      limiter.acquire().then(() => {
        granted.push([index, Date.now() - start]);
      })
    );
    await vi.runAllTimersAsync();
    await Promise.all(pending);
    return granted;
  }

  it("should space grants evenly at the configured rate", async () => {
    const limiter = new TokenBucket({ requestsPerSecond: 2 });

    expect(await grants(limiter, 4)).toEqual([
      [0, 0],
      [1, 500],
      [2, 1000],
      [3, 1500],
    ]);
  });

  it("should allow a burst up to the bucket capacity", async () => {
    const limiter = new TokenBucket({ requestsPerSecond: 3, burst: 3 });

    expect(await grants(limiter, 4)).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [3, 334],
    ]);
  });

  it("should hand out nothing while paused", async () => {
    const limiter = new TokenBucket({ requestsPerSecond: 10 });
    await limiter.acquire();

    limiter.pauseFor(2000);
    expect(limiter.pausedFor).toBe(2000);

    expect(await grants(limiter, 2)).toEqual([
      [0, 2000],
      [1, 2100],
    ]);
    expect(limiter.pausedFor).toBe(0);
  });

  it("should keep the longer of two overlapping pauses", async () => {
    const limiter = new TokenBucket({ requestsPerSecond: 10 });

    limiter.pauseFor(3000);
    limiter.pauseFor(1000);

    expect(limiter.pausedFor).toBe(3000);
  });

  it("should reject an aborted waiter without blocking the next one", async () => {
    const limiter = new TokenBucket({ requestsPerSecond: 1 });
    const controller = new AbortController();

    await limiter.acquire();
    const aborted = limiter.acquire(controller.signal);
    const next = limiter.acquire().then(() => Date.now() - start);
    controller.abort();

    await expect(aborted).rejects.toBeInstanceOf(RunAborted);
    await vi.runAllTimersAsync();
    expect(await next).toBe(1000);
  });

  it("should reject a non-positive rate", () => {
    expect(() => new TokenBucket({ requestsPerSecond: 0 })).toThrow(RangeError);
  });
});
