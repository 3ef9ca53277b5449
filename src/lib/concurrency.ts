import { InventoryError } from './errors';
import { Result, failure, settle } from './result';

export type TaskGroupOptions = {
  /** Max tasks in flight at once. */
  concurrency: number;
  /** Budget for a single task, measured from the moment it starts. */
  timeoutMs: number;
  /** Aborting this fails every task still queued or running. */
  signal?: AbortSignal;
};

export type GroupTask<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Bounded task group: every task gets its own timeout and abort signal, and
 * its outcome comes back as a Result so a sibling failure never rejects the
 * caller's Promise.all.
 */
export class TaskGroup {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly options: TaskGroupOptions) {
    if (options.concurrency < 1) {
      throw new RangeError('TaskGroup concurrency must be at least 1');
    }
  }

  async run<T>(label: string, task: GroupTask<T>): Promise<Result<T>> {
    await this.acquire();
    try {
      if (this.options.signal?.aborted) {
        return failure(this.deadlineError(label));
      }
      return await settle(this.invoke(label, task));
    } finally {
      this.release();
    }
  }

  private invoke<T>(label: string, task: GroupTask<T>): Promise<T> {
    const parent = this.options.signal;
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const abort = (reason: InventoryError) => {
        controller.abort(reason);
        reject(reason);
      };
      const onParentAbort = () => abort(this.deadlineError(label));
      const timer = setTimeout(
        () =>
          abort(
            new InventoryError('TIMEOUT', `${label} timed out after ${this.options.timeoutMs}ms`, {
              task: label,
              timeoutMs: this.options.timeoutMs,
            })
          ),
        this.options.timeoutMs
      );
      parent?.addEventListener('abort', onParentAbort, { once: true });

      // A task that throws before returning its promise still goes through cleanup.
      void Promise.resolve()
        .then(() => task(controller.signal))
        .finally(() => {
          clearTimeout(timer);
          parent?.removeEventListener('abort', onParentAbort);
        })
        .then(resolve, reject);
    });
  }

  private deadlineError(label: string): InventoryError {
    return new InventoryError('DEADLINE_EXCEEDED', `${label} cancelled: deadline exceeded`, { task: label });
  }

  private acquire(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}

/**
 * Abort signal that fires after `ms`. The timer does not keep the process alive.
 */
export function deadlineSignal(ms: number): AbortSignal {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new InventoryError('DEADLINE_EXCEEDED', `deadline of ${ms}ms exceeded`)),
    ms
  );
  timer.unref();
  return controller.signal;
}
