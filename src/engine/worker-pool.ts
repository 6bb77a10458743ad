/**
 * Bounded worker pool keyed by service.
 *
 * At most `concurrency` tasks run at once. A key that already has a task
 * queued or running is refused, so one service never overlaps itself.
 */

export type SubmitResult<T> =
  | { accepted: true; done: Promise<T> }
  | { accepted: false };

interface QueuedTask {
  key: string;
  run: () => Promise<void>;
}

export class WorkerPool {
  private readonly busyKeys = new Set<string>();
  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Keys with a queued or running task. */
  get inFlight(): ReadonlySet<string> {
    return this.busyKeys;
  }

  get running(): number {
    return this.active;
  }

  isBusy(key: string): boolean {
    return this.busyKeys.has(key);
  }

  /** Queue a task unless its key is already in flight. */
  submit<T>(key: string, task: () => Promise<T>): SubmitResult<T> {
    if (this.busyKeys.has(key)) return { accepted: false };
    this.busyKeys.add(key);

    const done = new Promise<T>((resolve, reject) => {
      this.queue.push({
        key,
        run: () => task().then(resolve, reject),
      });
    });
    this.drain();
    return { accepted: true, done };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      this.active++;
      void next.run().finally(() => {
        this.active--;
        this.busyKeys.delete(next.key);
        this.drain();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.active !== 0 || this.queue.length !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
