/**
 * Worker Pool
 *
 * Limits how many batch groups run at the same time. Tasks beyond the limit
 * wait in a queue and start as soon as a worker becomes free.
 */

type QueuedTask = () => Promise<void>;

export class WorkerPool {
  private readonly maxWorkers: number;
  private activeWorkers = 0;
  private readonly queue: QueuedTask[] = [];

  constructor(maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`Worker pool needs at least one worker, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
  }

  /**
   * Execute a task through the pool, queueing it while the pool is at capacity
   */
  execute<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const wrappedTask: QueuedTask = async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        } finally {
          this.activeWorkers--;
          this.processQueue();
        }
      };

      this.queue.push(wrappedTask);
      this.processQueue();
    });
  }

  /**
   * Start queued tasks up to the worker limit
   */
  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers) {
      const task = this.queue.shift();
      if (!task) break;
      // Incremented before the task starts so bursts of submissions stay under the limit
      this.activeWorkers++;
      void task();
    }
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }
}

/**
 * Map items through an async function with at most `limit` calls in flight
 *
 * Results keep the order of the input.
 */
export function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const pool = new WorkerPool(limit);
  return Promise.all(items.map((item, index) => pool.execute(() => fn(item, index))));
}
