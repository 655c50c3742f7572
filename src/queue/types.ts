/**
 * Work function run for each queued item; `index` is the enqueue position
 */
export type QueueProcessor<T, R> = (item: T, index: number) => Promise<R>;

export type BoundedQueueOptions<T> = {
  /** Maximum number of processors running at once */
  concurrency: number;
  /** Called when a processor rejects; the queue keeps going either way */
  onError?: (error: unknown, item: T) => void;
};

/**
 * Queue status snapshot
 */
export type QueueStatus = {
  /** Items waiting for a free slot */
  queued: number;
  /** Processors currently running */
  active: number;
  /** Items finished (fulfilled or rejected) */
  processedCount: number;
  /** Items whose processor rejected */
  failedCount: number;
};
