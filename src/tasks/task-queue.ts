import type { Logger } from "../logging/logger.js";

export interface QueuedTask {
  /** Identity of the work, e.g. `memory:<sessionId>:<turn>`. */
  readonly key: string;
  readonly run: () => Promise<void>;
  readonly enqueuedAt: number;
}

const DEFAULT_MAX_QUEUE_SIZE = 200;
const DEFAULT_CONCURRENCY = 2;

/**
 * Bounded in-process worker pool for detached work. Each task is attempted
 * at most once; a failure is logged and dropped. When the queue is full the
 * oldest pending task is discarded.
 */
export class TaskQueue {
  private readonly queue: QueuedTask[] = [];
  private active = 0;
  private scheduled = false;
  private readonly maxSize: number;
  private readonly concurrency: number;
  private drainWaiters: Array<() => void> = [];

  constructor(
    private readonly logger: Logger,
    options?: {
      maxSize?: number;
      concurrency?: number;
    },
  ) {
    this.maxSize = options?.maxSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.concurrency = options?.concurrency ?? DEFAULT_CONCURRENCY;
  }

  enqueue(key: string, run: () => Promise<void>): void {
    if (this.queue.length >= this.maxSize) {
      const dropped = this.queue.shift();
      this.logger.warn(
        { queueSize: this.queue.length + 1, dropped: dropped?.key },
        "Task queue full, dropping oldest",
      );
    }

    this.queue.push({ key, run, enqueuedAt: Date.now() });
    this.schedule();
  }

  /** Pending tasks, not counting running ones. */
  get size(): number {
    return this.queue.length;
  }

  get activeCount(): number {
    return this.active;
  }

  /** Resolves once nothing is pending or running. */
  async drain(): Promise<void> {
    if (this.queue.length === 0 && this.active === 0 && !this.scheduled) return;
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;

    queueMicrotask(() => {
      this.scheduled = false;
      this.processNext();
    });
  }

  private processNext(): void {
    while (this.active < this.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.active++;
      this.execute(task);
    }
    this.checkDrain();
  }

  private execute(task: QueuedTask): void {
    const startedAt = Date.now();
    Promise.resolve()
      .then(() => task.run())
      .then(() => {
        this.logger.debug(
          {
            task: task.key,
            waitMs: startedAt - task.enqueuedAt,
            durationMs: Date.now() - startedAt,
          },
          "Background task completed",
        );
      })
      .catch((err: unknown) => {
        this.logger.error({ err, task: task.key }, "Background task failed");
      })
      .finally(() => {
        this.active--;
        this.processNext();
      });
  }

  private checkDrain(): void {
    if (this.queue.length === 0 && this.active === 0 && !this.scheduled) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
