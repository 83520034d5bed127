import { sleep } from "../core/fetch";
import type { DownloadTask, ExtractionTask } from "../types";
import type { Sink, SinkStage, SinkTask, TaskEventEnvelope } from "./types";

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
  /** Errors for which another attempt cannot help. */
  isPermanent?: (error: unknown) => boolean;
}

/** Retries of a task reuse its id, so the completion time keeps each outcome distinct. */
export function taskEventKey(stage: SinkStage, task: { id: number; completedAt?: string }): string {
  return `${stage}:${task.id}:${task.completedAt ?? "pending"}`;
}

export function buildEnvelope(stage: SinkStage, task: SinkTask, sentAt: string): TaskEventEnvelope {
  return {
    stage,
    key: taskEventKey(stage, task),
    taskId: task.id,
    status: task.status,
    sentAt,
    payload: task,
  };
}

/** Runs `operation` up to `maxRetries + 1` times with a linearly growing pause. */
export async function withRetries<T>(policy: RetryPolicy, operation: (attempt: number) => Promise<T>): Promise<T> {
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt > policy.maxRetries || policy.isPermanent?.(error)) {
        throw error;
      }
    }
    await sleep(policy.retryDelayMs * attempt);
  }
}

/**
 * Turns task batches into envelopes once; transports only implement `deliver`, which is
 * never called with an empty batch.
 */
export abstract class BaseSink implements Sink {
  private readonly clock: () => Date;

  protected constructor(clock?: () => Date) {
    this.clock = clock ?? (() => new Date());
  }

  async publishDownloadResult(tasks: DownloadTask[]): Promise<void> {
    await this.publish("download", tasks);
  }

  async publishExtractionResult(tasks: ExtractionTask[]): Promise<void> {
    await this.publish("extract", tasks);
  }

  protected abstract deliver(stage: SinkStage, envelopes: TaskEventEnvelope[]): Promise<void>;

  protected requireSetting(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }

  private async publish(stage: SinkStage, tasks: SinkTask[]): Promise<void> {
    if (tasks.length === 0) {
      return;
    }
    const sentAt = this.clock().toISOString();
    await this.deliver(
      stage,
      tasks.map((task) => buildEnvelope(stage, task, sentAt)),
    );
  }
}
