interface PendingTask {
  run: () => Promise<void>;
}

/**
 * Promise queue with bounded concurrency. With a concurrency of 1 tasks run strictly in
 * submission order, which is what the ingestion path and the file writers rely on.
 */
export class TaskQueue {
  private readonly pending: PendingTask[] = [];
  private readonly idleWaiters: Array<() => void> = [];

  private active = 0;

  constructor(private readonly concurrency = 1) {}

  add<T>(task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
      this.process();
    });
  }

  /** Resolves once every queued and running task has settled. */
  onIdle(): Promise<void> {
    if (this.isIdle) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Tasks waiting to start. */
  get size(): number {
    return this.pending.length;
  }

  get isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private process(): void {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) {
        break;
      }
      this.active += 1;
      void next.run().finally(() => {
        this.active -= 1;
        this.process();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle) {
      return;
    }
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    waiters.forEach((resolve) => resolve());
  }
}
