type Task = () => Promise<void>;

type TaskPoolOptions = {
  concurrency: number;
  queueLimit: number;
  onError: (error: unknown) => void;
};

/**
 * Runs at most `concurrency` tasks at once and queues up to `queueLimit`
 * more. `submit` never waits; it reports whether the task was accepted.
 */
export class TaskPool {
  private active = 0;
  private readonly queue: Task[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly options: TaskPoolOptions) {
    if (options.concurrency < 1) {
      throw new Error('TaskPool concurrency must be at least 1');
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit(task: Task): boolean {
    if (this.active < this.options.concurrency) {
      this.execute(task);
      return true;
    }
    if (this.queue.length < this.options.queueLimit) {
      this.queue.push(task);
      return true;
    }
    return false;
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private execute(task: Task): void {
    this.active += 1;
    void Promise.resolve()
      .then(task)
      .catch((error: unknown) => this.options.onError(error))
      .finally(() => {
        this.active -= 1;
        const next = this.queue.shift();
        if (next) {
          this.execute(next);
          return;
        }
        if (this.active === 0) {
          const waiters = this.idleWaiters;
          this.idleWaiters = [];
          for (const resolve of waiters) {
            resolve();
          }
        }
      });
  }
}
