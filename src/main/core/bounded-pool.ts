export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

interface QueuedTask {
  start: () => void;
}

export class PoolSaturatedError extends Error {
  constructor() {
    super("Fallback pool queue is full.");
    this.name = "PoolSaturatedError";
  }
}

export class TaskAbortedError extends Error {
  constructor() {
    super("Task aborted before completion.");
    this.name = "TaskAbortedError";
  }
}

/**
 * FIFO pool that keeps at most `maxConcurrency` tasks in flight.
 * A queued task whose signal aborts is dropped before it starts.
 */
export class BoundedPool {
  private running = 0;
  private readonly queue: QueuedTask[] = [];
  private readonly maxConcurrency: number;

  constructor(
    maxConcurrency: number,
    private readonly queueLimit = 16
  ) {
    this.maxConcurrency = Math.max(1, Math.floor(maxConcurrency));
  }

  run<T>(task: PoolTask<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
      return Promise.reject(new TaskAbortedError());
    }
    if (this.queue.length >= this.queueLimit) {
      return Promise.reject(new PoolSaturatedError());
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(queued);
        if (index >= 0) {
          this.queue.splice(index, 1);
          reject(new TaskAbortedError());
        }
      };

      const queued: QueuedTask = {
        start: () => {
          signal.removeEventListener("abort", onAbort);
          this.running += 1;
          void task(signal)
            .then(resolve, reject)
            .finally(() => {
              this.running -= 1;
              this.drain();
            });
        }
      };

      signal.addEventListener("abort", onAbort, { once: true });
      this.queue.push(queued);
      this.drain();
    });
  }

  private drain(): void {
    while (this.running < this.maxConcurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      next?.start();
    }
  }
}
