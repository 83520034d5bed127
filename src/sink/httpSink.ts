import { defaultFetch, isRetriableStatus, type FetchLike } from "../core/fetch";
import { BaseSink, withRetries } from "./baseSink";
import type { SinkStage, TaskEventEnvelope } from "./types";

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  clock?: () => Date;
}

class PermanentHttpSinkError extends Error {}

/** POSTs each batch as `{ stage, items }`; the envelope keys double as the idempotency key. */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super(options.clock);
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  protected async deliver(stage: SinkStage, envelopes: TaskEventEnvelope[]): Promise<void> {
    const endpoint = this.requireSetting("HTTP", this.endpoint);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": envelopes.map((envelope) => envelope.key).join(","),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const body = JSON.stringify({ stage, items: envelopes });

    await withRetries(
      {
        maxRetries: this.maxRetries,
        retryDelayMs: this.retryDelayMs,
        isPermanent: (error) => error instanceof PermanentHttpSinkError,
      },
      async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
          const response = await this.fetchFn(endpoint, { method: "POST", headers, body, signal: controller.signal });
          if (response.ok) {
            return;
          }
          const responseText = await response.text();
          if (!isRetriableStatus(response.status)) {
            throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
          }
          throw new Error(`HTTP sink got retriable status ${response.status}: ${responseText}`);
        } finally {
          clearTimeout(timeout);
        }
      },
    );
  }
}
