import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { sleep } from "../core/fetch";
import { BaseSink } from "./baseSink";
import type { SinkStage, TaskEventEnvelope } from "./types";

interface FailedEntry {
  Id?: string;
  SenderFault?: boolean;
  Message?: string;
}

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: FailedEntry[] }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  fifo?: boolean;
  groupId?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  clock?: () => Date;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
  MessageAttributes: Record<string, { DataType: "String"; StringValue: string }>;
}

// SendMessageBatch takes at most ten entries.
const BATCH_LIMIT = 10;

/** FIFO deduplication ids allow alphanumerics and a few punctuation marks. */
export function toDeduplicationId(key: string): string {
  return key.replace(/[^A-Za-z0-9_.:-]/g, "_").slice(0, 128);
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: SqsSinkOptions = {}) {
    super(options.clock);
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId ?? "datasheet-review";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  protected async deliver(stage: SinkStage, envelopes: TaskEventEnvelope[]): Promise<void> {
    const queueUrl = this.requireSetting("SQS", this.queueUrl);
    for (let start = 0; start < envelopes.length; start += BATCH_LIMIT) {
      const entries = envelopes
        .slice(start, start + BATCH_LIMIT)
        .map((envelope, index) => this.toEntry(stage, envelope, index));
      await this.sendBatch(queueUrl, entries);
    }
  }

  private toEntry(stage: SinkStage, envelope: TaskEventEnvelope, index: number): BatchEntry {
    const entry: BatchEntry = {
      Id: String(index),
      MessageBody: JSON.stringify(envelope),
      MessageAttributes: {
        stage: { DataType: "String", StringValue: stage },
        status: { DataType: "String", StringValue: envelope.status },
      },
    };
    if (this.fifo) {
      // One group per task keeps outcomes of the same task ordered without serialising the queue.
      entry.MessageGroupId = `${this.groupId}-${stage}-${envelope.taskId}`;
      entry.MessageDeduplicationId = toDeduplicationId(envelope.key);
    }
    return entry;
  }

  /** Resends only the entries SQS reports as failed; sender faults are not retried. */
  private async sendBatch(queueUrl: string, entries: BatchEntry[]): Promise<void> {
    let pending = entries;
    for (let attempt = 1; pending.length > 0; attempt += 1) {
      const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
      const failed = response.Failed ?? [];
      if (failed.length === 0) {
        return;
      }

      const senderFault = failed.find((entry) => entry.SenderFault);
      if (senderFault) {
        throw new Error(`SQS rejected entry ${senderFault.Id ?? "?"}: ${senderFault.Message ?? "sender fault"}`);
      }
      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failed.length} entries still failed)`);
      }

      const failedIds = new Set(failed.map((entry) => entry.Id));
      pending = pending.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
