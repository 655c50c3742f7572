/**
 * BoundedQueue - queue with a fixed number of concurrent workers
 *
 * Items start in enqueue order as slots free up; completion order is not
 * constrained. `drain()` is the join point: it resolves with one settled
 * result per item, in enqueue order.
 */

import type { BoundedQueueOptions, QueueProcessor, QueueStatus } from './types.js';

type Job<T> = {
  item: T;
  index: number;
};

export class BoundedQueue<T, R> {
  private queue: Job<T>[] = [];
  private results: PromiseSettledResult<R>[] = [];
  private inFlight = new Map<number, Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private nextIndex = 0;
  private stopped = false;
  private processedCount = 0;
  private failedCount = 0;
  private readonly processor: QueueProcessor<T, R>;
  private readonly concurrency: number;
  private readonly onError?: (error: unknown, item: T) => void;

  /**
   * @throws RangeError unless concurrency is a positive integer
   */
  constructor(processor: QueueProcessor<T, R>, options: BoundedQueueOptions<T>) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.processor = processor;
    this.concurrency = options.concurrency;
    this.onError = options.onError;
  }

  /**
   * Add an item; it starts right away if a slot is free
   */
  add(item: T): void {
    if (this.stopped) {
      throw new Error('Cannot add items to a stopped queue');
    }

    this.queue.push({ item, index: this.nextIndex++ });
    this.pump();
  }

  addAll(items: Iterable<T>): void {
    for (const item of items) {
      this.add(item);
    }
  }

  /**
   * Wait until every enqueued item has settled
   */
  async drain(): Promise<PromiseSettledResult<R>[]> {
    if (!this.isIdle()) {
      await new Promise<void>((resolve) => {
        this.idleWaiters.push(resolve);
      });
    }
    return this.results.slice();
  }

  /**
   * Refuse new items and wait for the ones already enqueued
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.drain();
  }

  isStopped(): boolean {
    return this.stopped;
  }

  getStatus(): QueueStatus {
    return {
      queued: this.queue.length,
      active: this.inFlight.size,
      processedCount: this.processedCount,
      failedCount: this.failedCount,
    };
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight.size === 0;
  }

  private pump(): void {
    while (this.inFlight.size < this.concurrency) {
      const job = this.queue.shift();
      if (!job) break;
      this.inFlight.set(job.index, this.run(job));
    }
  }

  /**
   * Never rejects: the outcome is recorded in `results`
   */
  private async run(job: Job<T>): Promise<void> {
    try {
      const value = await this.processor(job.item, job.index);
      this.results[job.index] = { status: 'fulfilled', value };
    } catch (error) {
      this.failedCount++;
      this.results[job.index] = { status: 'rejected', reason: error };
      try {
        this.onError?.(error, job.item);
      } catch (hookError) {
        console.error('Queue error hook failed:', hookError);
      }
    } finally {
      this.processedCount++;
      this.inFlight.delete(job.index);
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
