import { StoreCorruptionError, errorMessage } from "../errors";
import type { Logger } from "../observability";
import type { TaskKind } from "../types";

/** Per-kind state machine hooks the queue drives for each task id. */
export interface TaskLifecycle<TTask> {
  readonly kind: TaskKind;
  /** Atomically moves a queued task into its first in-flight state; undefined when it was not queued. */
  claim(id: number): Promise<TTask | undefined>;
  execute(task: TTask): Promise<void>;
  /** Marks a task that never left the in-memory queue as canceled. */
  cancelQueued(id: number): Promise<boolean>;
}

export interface TaskQueueOptions {
  concurrency: number;
  logger: Logger;
  onFatal?: (error: StoreCorruptionError) => void;
}

export interface StopOptions {
  drain: boolean;
}

interface IdleWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
  ignoreFatal: boolean;
}

export class TaskQueue<TTask> {
  private readonly lifecycle: TaskLifecycle<TTask>;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly onFatal?: (error: StoreCorruptionError) => void;
  private readonly pending: number[] = [];
  private readonly known = new Set<number>();
  private readonly idleWaiters: IdleWaiter[] = [];
  private active = 0;
  private running = false;
  private fatal?: StoreCorruptionError;

  constructor(lifecycle: TaskLifecycle<TTask>, options: TaskQueueOptions) {
    this.lifecycle = lifecycle;
    this.concurrency = Math.max(1, options.concurrency);
    this.logger = options.logger;
    this.onFatal = options.onFatal;
  }

  get size(): number {
    return this.pending.length;
  }

  get inFlight(): number {
    return this.active;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.fatal) {
      throw this.fatal;
    }
    this.running = true;
    this.pump();
  }

  /** Returns false when the id is already waiting or in flight. */
  enqueue(id: number): boolean {
    if (this.known.has(id)) {
      return false;
    }
    this.known.add(id);
    this.pending.push(id);
    this.pump();
    return true;
  }

  async cancel(id: number): Promise<boolean> {
    const index = this.pending.indexOf(id);
    if (index < 0) {
      return false;
    }
    this.pending.splice(index, 1);
    this.known.delete(id);
    const canceled = await this.lifecycle.cancelQueued(id);
    this.settleIdle();
    return canceled;
  }

  async stop(options: StopOptions): Promise<void> {
    if (options.drain && this.running) {
      await this.onIdle();
    }
    this.running = false;

    const leftovers = this.pending.splice(0, this.pending.length);
    for (const id of leftovers) {
      this.known.delete(id);
      await this.lifecycle.cancelQueued(id);
    }
    if (leftovers.length > 0) {
      this.logger.info("queue_stopped_with_pending", { kind: this.lifecycle.kind, canceled: leftovers.length });
    }

    await this.waitForIdle(true);
  }

  /**
   * Resolves once nothing is in flight and nothing runnable is waiting. Rejects with the
   * integrity alarm if a worker hit one.
   */
  onIdle(): Promise<void> {
    return this.waitForIdle(false);
  }

  private waitForIdle(ignoreFatal: boolean): Promise<void> {
    if (this.fatal && !ignoreFatal) {
      return Promise.reject(this.fatal);
    }
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.idleWaiters.push({ resolve, reject, ignoreFatal });
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && (this.pending.length === 0 || !this.running);
  }

  private pump(): void {
    while (this.running && this.active < this.concurrency && this.pending.length > 0) {
      const id = this.pending.shift();
      if (id === undefined) {
        break;
      }
      this.active += 1;
      this.runOne(id).then(
        () => this.finish(id),
        (error: unknown) => {
          this.logger.error("queue_worker_crashed", { kind: this.lifecycle.kind, taskId: id, error: errorMessage(error) });
          this.finish(id);
        },
      );
    }
  }

  private async runOne(id: number): Promise<void> {
    try {
      const task = await this.lifecycle.claim(id);
      if (task === undefined) {
        this.logger.debug("queue_task_not_claimable", { kind: this.lifecycle.kind, taskId: id });
        return;
      }
      await this.lifecycle.execute(task);
    } catch (error) {
      if (error instanceof StoreCorruptionError) {
        this.fatal = error;
        this.running = false;
        this.logger.error("data_integrity_alarm", {
          kind: this.lifecycle.kind,
          taskId: id,
          fileHash: error.fileHash,
          error: error.message,
        });
        this.onFatal?.(error);
        return;
      }
      this.logger.error("queue_task_unhandled_error", { kind: this.lifecycle.kind, taskId: id, error: errorMessage(error) });
    }
  }

  private finish(id: number): void {
    this.active -= 1;
    this.known.delete(id);
    this.pump();
    this.settleIdle();
  }

  private settleIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const waiter of waiters) {
      if (this.fatal && !waiter.ignoreFatal) {
        waiter.reject(this.fatal);
      } else {
        waiter.resolve();
      }
    }
  }
}
