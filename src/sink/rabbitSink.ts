import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { BaseSink, withRetries } from "./baseSink";
import type { SinkStage, TaskEventEnvelope } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  exchange?: string;
  routingKeyPrefix?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
  clock?: () => Date;
}

/**
 * Publishes to a durable topic exchange on a confirm channel. Routing keys read
 * `<prefix>.<stage>.<status>`, so consumers can bind to e.g. `tasks.extract.failed`.
 */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly routingKeyPrefix: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(options: RabbitSinkOptions = {}) {
    super(options.clock);
    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "datasheet.review";
    this.routingKeyPrefix = options.routingKeyPrefix ?? "tasks";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  routingKey(stage: SinkStage, envelope: TaskEventEnvelope): string {
    return `${this.routingKeyPrefix}.${stage}.${envelope.status}`;
  }

  protected async deliver(stage: SinkStage, envelopes: TaskEventEnvelope[]): Promise<void> {
    const url = this.requireSetting("RabbitMQ", this.connectionUrl);
    await withRetries({ maxRetries: this.maxRetries, retryDelayMs: this.retryDelayMs }, async () => {
      const connection = await this.connectFn(url);
      try {
        const channel = await connection.createConfirmChannel();
        try {
          await channel.assertExchange(this.exchange, "topic", { durable: true });
          for (const envelope of envelopes) {
            channel.publish(this.exchange, this.routingKey(stage, envelope), Buffer.from(JSON.stringify(envelope)), {
              persistent: true,
              contentType: "application/json",
              messageId: envelope.key,
              timestamp: Math.floor(Date.parse(envelope.sentAt) / 1000),
            });
          }
          await channel.waitForConfirms();
        } finally {
          await channel.close();
        }
      } finally {
        await connection.close();
      }
    });
  }
}
