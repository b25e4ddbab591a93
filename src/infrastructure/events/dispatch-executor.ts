import type { BaseLogger } from 'pino';

export const DEFAULT_WORKERS = 10;

export type DispatchTask = () => Promise<void>;

/**
 * Bounded worker pool for handler dispatch.
 *
 * `submit()` only enqueues: tasks start on a later turn of the event loop,
 * at most `capacity` at a time. A task that rejects is logged and its slot
 * is released; nothing is retried and nothing reaches the submitter.
 */
export class DispatchExecutor {
  private readonly queue: DispatchTask[] = [];
  private readonly idleWaiters = new Set<() => void>();
  private running = 0;
  private accepting = true;

  constructor(
    private readonly log: BaseLogger,
    readonly capacity: number = DEFAULT_WORKERS,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Enqueues a task. Returns false (and drops the task) after `shutdown()`. */
  submit(task: DispatchTask): boolean {
    if (!this.accepting) return false;

    this.queue.push(task);
    setImmediate(() => this.pump());
    return true;
  }

  get pending(): number {
    return this.queue.length;
  }

  get active(): number {
    return this.running;
  }

  get idle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  get isShutdown(): boolean {
    return !this.accepting;
  }

  /** Resolves once no task is queued or running. Does not stop intake. */
  whenIdle(): Promise<void> {
    if (this.idle) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.add(resolve);
    });
  }

  /**
   * Stops intake and waits for queued and running tasks to finish.
   * Resolves true if the pool drained, false if `timeoutMs` elapsed first.
   */
  async shutdown(timeoutMs: number): Promise<boolean> {
    this.accepting = false;
    if (this.idle) return true;

    return new Promise<boolean>((resolve) => {
      const onIdle = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters.delete(onIdle);
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.add(onIdle);
    });
  }

  private pump(): void {
    while (this.running < this.capacity) {
      const task = this.queue.shift();
      if (task === undefined) break;
      this.running++;
      void this.runTask(task);
    }
    this.notifyIfIdle();
  }

  private async runTask(task: DispatchTask): Promise<void> {
    try {
      await task();
    } catch (err: unknown) {
      this.log.error({ err }, 'Dispatch task failed');
    } finally {
      this.running--;
      this.pump();
    }
  }

  private notifyIfIdle(): void {
    if (!this.idle || this.idleWaiters.size === 0) return;

    const waiters = [...this.idleWaiters];
    this.idleWaiters.clear();
    for (const waiter of waiters) {
      waiter();
    }
  }
}
