/**
 * Bounded in-memory queue of enrichment jobs.
 *
 * Capacity counts admitted jobs that have not settled yet (ready, in a
 * worker's hands, or waiting out a retry delay), so a retry re-enters the
 * queue without taking a new slot and producers block until a job settles.
 */

import type { EnrichmentJob } from "../../types/index.js";

type Consumer = (job: EnrichmentJob | undefined) => void;

export class EnrichmentJobQueue {
  private readonly ready: EnrichmentJob[] = [];
  private readonly delayed = new Map<EnrichmentJob, NodeJS.Timeout>();
  private consumers: Consumer[] = [];
  private producers: Array<() => void> = [];
  private unsettled = 0;
  private closed = false;
  private cancelled = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  /** Admitted jobs that have not settled */
  get size(): number {
    return this.unsettled;
  }

  /** Jobs ready to be dequeued right now */
  get pending(): number {
    return this.ready.length;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Admit a job, waiting for capacity. Resolves `false` when the queue was
   * cancelled before the job got in.
   */
  async enqueue(job: EnrichmentJob): Promise<boolean> {
    if (this.closed) {
      throw new Error("Cannot enqueue into a closed queue");
    }
    while (this.unsettled >= this.capacity && !this.cancelled) {
      await new Promise<void>((resolve) => this.producers.push(resolve));
    }
    if (this.cancelled) {
      return false;
    }

    this.unsettled++;
    job.status = "pending";
    this.push(job);
    return true;
  }

  /**
   * Hand the next ready job to exactly one caller. Resolves `undefined`
   * once the queue is closed and every admitted job has settled, or as
   * soon as it is cancelled.
   */
  dequeue(): Promise<EnrichmentJob | undefined> {
    if (this.cancelled) {
      return Promise.resolve(undefined);
    }
    const job = this.ready.shift();
    if (job !== undefined) {
      return Promise.resolve(job);
    }
    if (this.isDrained()) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => this.consumers.push(resolve));
  }

  /**
   * Put a job back after `delayMs`. Returns `false` when the queue has
   * been cancelled; the caller still owns the job and must settle it.
   */
  requeueAfter(job: EnrichmentJob, delayMs: number): boolean {
    if (this.cancelled) {
      return false;
    }

    job.status = "retry-scheduled";
    const timer = setTimeout(() => {
      this.delayed.delete(job);
      job.status = "pending";
      this.push(job);
    }, delayMs);
    this.delayed.set(job, timer);
    return true;
  }

  /** Release the slot of one job that reached a terminal state */
  settle(): void {
    this.unsettled = Math.max(0, this.unsettled - 1);
    this.producers.shift()?.();
    if (this.isDrained()) {
      this.releaseConsumers();
    }
  }

  /** No more jobs will be enqueued */
  close(): void {
    this.closed = true;
    if (this.isDrained()) {
      this.releaseConsumers();
    }
  }

  /**
   * Stop handing out jobs. Returns the jobs that were admitted but never
   * started (ready or waiting out a retry delay); jobs already held by a
   * worker are settled by that worker.
   */
  cancel(): EnrichmentJob[] {
    this.cancelled = true;

    const dropped = [...this.ready, ...this.delayed.keys()];
    for (const timer of this.delayed.values()) {
      clearTimeout(timer);
    }
    this.ready.length = 0;
    this.delayed.clear();
    this.unsettled = Math.max(0, this.unsettled - dropped.length);

    this.releaseConsumers();
    const producers = this.producers;
    this.producers = [];
    for (const wake of producers) wake();

    return dropped;
  }

  private push(job: EnrichmentJob): void {
    const consumer = this.consumers.shift();
    if (consumer !== undefined) {
      consumer(job);
    } else {
      this.ready.push(job);
    }
  }

  private isDrained(): boolean {
    return this.closed && this.unsettled === 0;
  }

  private releaseConsumers(): void {
    const consumers = this.consumers;
    this.consumers = [];
    for (const consumer of consumers) consumer(undefined);
  }
}
