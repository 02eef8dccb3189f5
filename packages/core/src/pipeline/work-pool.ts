import { toError } from '../types/errors.js';

export interface WorkPoolOptions {
  /** Tasks running at once */
  concurrency: number;
  /** Tasks running or waiting; `submit` blocks beyond this */
  maxQueue: number;
}

export type Task = () => Promise<void>;

/**
 * Bounded async work pool.
 *
 * `submit` resolves once the task is accepted, which waits while the pool
 * already holds `maxQueue` tasks: the producer enumerating work is held back
 * instead of the queue growing without limit. `drain` resolves when every
 * accepted task has finished and rejects with the first task failure.
 */
export class WorkPool {
  private readonly concurrency: number;
  private readonly maxQueue: number;
  private readonly queue: Task[] = [];
  private readonly spaceWaiters: Array<() => void> = [];
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;
  private peak = 0;
  private failure: Error | undefined;

  constructor(options: WorkPoolOptions) {
    if (options.concurrency < 1 || options.maxQueue < options.concurrency) {
      throw new Error(
        `Invalid pool bounds: concurrency ${options.concurrency}, maxQueue ${options.maxQueue}`
      );
    }
    this.concurrency = options.concurrency;
    this.maxQueue = options.maxQueue;
  }

  /** Tasks accepted and not yet finished */
  get pending(): number {
    return this.queue.length + this.active;
  }

  /** Highest `pending` seen so far */
  get peakPending(): number {
    return this.peak;
  }

  async submit(task: Task): Promise<void> {
    while (this.pending >= this.maxQueue) {
      await new Promise<void>((resolve) => {
        this.spaceWaiters.push(resolve);
      });
    }
    this.queue.push(task);
    this.peak = Math.max(this.peak, this.pending);
    this.pump();
  }

  async drain(): Promise<void> {
    if (this.pending > 0) {
      await new Promise<void>((resolve) => {
        this.idleWaiters.push(resolve);
      });
    }
    if (this.failure) throw this.failure;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const task = this.queue.shift();
      if (task === undefined) return;
      this.active += 1;
      this.run(task).catch((error: unknown) => {
        this.failure ??= toError(error);
      });
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.failure ??= toError(error);
    } finally {
      this.active -= 1;
      this.spaceWaiters.shift()?.();
      this.pump();
      if (this.pending === 0) {
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      }
    }
  }
}
