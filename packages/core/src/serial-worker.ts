type QueuedTask = () => Promise<void>;

/**
 * FIFO task queue with a single execution slot. Tasks may be submitted at any
 * time without waiting; at most one is running at once and they start in
 * submission order. A failing task rejects only its own promise.
 */
export class SerialWorker {
  private readonly queue: QueuedTask[] = [];
  private idleWaiters: (() => void)[] = [];
  private running = false;

  /** Number of tasks waiting to start. */
  get size(): number {
    return this.queue.length;
  }

  /** Whether a task is currently executing. */
  get pending(): boolean {
    return this.running;
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (error: unknown) {
          reject(error);
        }
      });
      this.next();
    });
  }

  /** Resolves once the queue is empty and nothing is running. */
  onIdle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private next(): void {
    if (this.running) return;

    const task = this.queue.shift();
    if (!task) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
      return;
    }

    this.running = true;
    void task().then(() => {
      this.running = false;
      this.next();
    });
  }
}
