import type { SendMessageBatchCommand } from "@aws-sdk/client-sqs";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import type { HttpRequestInit, HttpResponseLike } from "../core/fetch";
import type { DownloadTask } from "../types";
import { taskEventKey, withRetries } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink, toDeduplicationId } from "./sqsSink";

const TASK: DownloadTask = {
  id: 4,
  sourceUrl: "https://vendor.test/a.pdf",
  status: "success",
  fileHash: "abc",
  attempts: 1,
  createdAt: "2025-01-01T00:00:00.000Z",
  completedAt: "2025-01-01T00:00:05.000Z",
};

function status(code: number, body = ""): HttpResponseLike {
  return {
    ok: code >= 200 && code < 300,
    status: code,
    url: "https://sink.example.test/events",
    headers: { get: () => null },
    text: async () => body,
    arrayBuffer: async () => new ArrayBuffer(0),
  };
}

describe("taskEventKey", () => {
  it("keys each outcome by stage, id and completion time", () => {
    expect(taskEventKey("download", TASK)).toBe("download:4:2025-01-01T00:00:05.000Z");
    expect(taskEventKey("extract", { id: 9 })).toBe("extract:9:pending");
  });
});

describe("withRetries", () => {
  it("stops early on a permanent error and after the retry budget otherwise", async () => {
    let calls = 0;
    const failing = async (): Promise<never> => {
      calls += 1;
      throw new Error(`attempt ${calls}`);
    };
    await expect(withRetries({ maxRetries: 2, retryDelayMs: 0 }, failing)).rejects.toThrow("attempt 3");

    calls = 0;
    await expect(withRetries({ maxRetries: 2, retryDelayMs: 0, isPermanent: () => true }, failing)).rejects.toThrow(
      "attempt 1",
    );
    expect(await withRetries({ maxRetries: 0, retryDelayMs: 0 }, async (attempt) => attempt)).toBe(1);
  });
});

describe("HttpSink", () => {
  function sinkWith(responses: HttpResponseLike[], token?: string): { sink: HttpSink; calls: HttpRequestInit[] } {
    const calls: HttpRequestInit[] = [];
    const sink = new HttpSink({
      endpoint: "https://sink.example.test/events",
      token,
      retryDelayMs: 0,
      fetchFn: async (_url, init) => {
        calls.push(init);
        const next = responses.shift();
        if (!next) {
          throw new Error("no scripted response left");
        }
        return next;
      },
    });
    return { sink, calls };
  }

  it("retries a retriable status and sends the idempotency key", async () => {
    const { sink, calls } = sinkWith([status(503, "busy"), status(202)], "test-token");
    await sink.publishDownloadResult([TASK]);
    expect(calls).toHaveLength(2);
    expect(calls[1].headers).toMatchObject({
      "Idempotency-Key": "download:4:2025-01-01T00:00:05.000Z",
      Authorization: "Bearer test-token",
    });
    const body: unknown = JSON.parse(calls[1].body ?? "{}");
    expect(body).toMatchObject({
      stage: "download",
      items: [{ key: "download:4:2025-01-01T00:00:05.000Z", taskId: 4, status: "success", payload: { fileHash: "abc" } }],
    });
  });

  it("stops on a permanent error", async () => {
    const { sink, calls } = sinkWith([status(400, "nope")]);
    await expect(sink.publishDownloadResult([TASK])).rejects.toThrow("HTTP sink permanent error 400: nope");
    expect(calls).toHaveLength(1);
  });

  it("does nothing for an empty batch and refuses a missing endpoint", async () => {
    const { sink, calls } = sinkWith([]);
    await sink.publishExtractionResult([]);
    expect(calls).toHaveLength(0);
    await expect(new HttpSink().publishDownloadResult([TASK])).rejects.toThrow("HTTP sink is not configured");
  });
});

describe("LocalJsonlSink", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-sink-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it("appends one envelope line per task tagged with the run id", async () => {
    const manifests = path.join(workDir, "manifests");
    const sink = new LocalJsonlSink(
      { ...DEFAULT_CONFIG, outputDirs: { ...DEFAULT_CONFIG.outputDirs, manifests } },
      "run-1",
      () => new Date("2025-01-01T00:01:00.000Z"),
    );
    await sink.publishDownloadResult([TASK]);
    await sink.publishDownloadResult([{ ...TASK, id: 5 }]);
    await sink.publishExtractionResult([]);

    const lines = fs.readFileSync(sink.manifestPath("download"), "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({
      runId: "run-1",
      stage: "download",
      key: "download:4:2025-01-01T00:00:05.000Z",
      taskId: 4,
      status: "success",
      sentAt: "2025-01-01T00:01:00.000Z",
      payload: TASK,
    });
    expect(JSON.parse(lines[1])).toMatchObject({ runId: "run-1", taskId: 5 });
    expect(fs.existsSync(sink.manifestPath("extract"))).toBe(false);
  });
});

describe("SqsSink", () => {
  type Sent = { QueueUrl?: string; Entries?: Array<{ Id?: string; MessageGroupId?: string; MessageDeduplicationId?: string }> };

  function fakeClient(failures: Array<Array<{ Id?: string; SenderFault?: boolean; Message?: string }>>): {
    client: { send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }> };
    sent: Sent[];
  } {
    const sent: Sent[] = [];
    return {
      sent,
      client: {
        send: async (command) => {
          sent.push(command.input);
          return { Failed: failures.shift() ?? [] };
        },
      },
    };
  }

  it("groups FIFO messages per task and resends only failed entries", async () => {
    const { client, sent } = fakeClient([[{ Id: "1", SenderFault: false }]]);
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/1/events.fifo", client, retryDelayMs: 0 });
    await sink.publishDownloadResult([TASK, { ...TASK, id: 5 }]);

    expect(sent).toHaveLength(2);
    expect(sent[0].Entries?.map((entry) => entry.MessageGroupId)).toEqual([
      "datasheet-review-download-4",
      "datasheet-review-download-5",
    ]);
    expect(sent[0].Entries?.[0].MessageDeduplicationId).toBe("download:4:2025-01-01T00:00:05.000Z");
    expect(sent[1].Entries?.map((entry) => entry.Id)).toEqual(["1"]);
  });

  it("does not retry sender faults", async () => {
    const { client, sent } = fakeClient([[{ Id: "0", SenderFault: true, Message: "too big" }]]);
    const sink = new SqsSink({ queueUrl: "https://sqs.example.test/1/events", client, retryDelayMs: 0 });
    await expect(sink.publishExtractionResult([])).resolves.toBeUndefined();
    await expect(sink.publishDownloadResult([TASK])).rejects.toThrow("SQS rejected entry 0: too big");
    expect(sent).toHaveLength(1);
  });

  it("sanitises deduplication ids", () => {
    expect(toDeduplicationId("extract:7:2025-01-01T00:00:05.000Z+x")).toBe("extract:7:2025-01-01T00:00:05.000Z_x");
  });
});

describe("RabbitSink", () => {
  it("publishes on a confirm channel with status routing keys and closes everything", async () => {
    const published: Array<{ routingKey: string; body: unknown; messageId?: string }> = [];
    const closed: string[] = [];
    const sink = new RabbitSink({
      connectionUrl: "amqp://localhost",
      retryDelayMs: 0,
      connectFn: async () => ({
        createConfirmChannel: async () => ({
          assertExchange: async () => ({}),
          publish: (_exchange, routingKey, content, options) => {
            published.push({ routingKey, body: JSON.parse(content.toString("utf-8")), messageId: options?.messageId });
            return true;
          },
          waitForConfirms: async () => {},
          close: async () => {
            closed.push("channel");
          },
        }),
        close: async () => {
          closed.push("connection");
        },
      }),
    });

    await sink.publishDownloadResult([TASK]);
    expect(published).toEqual([
      {
        routingKey: "tasks.download.success",
        body: expect.objectContaining({ taskId: 4, status: "success" }),
        messageId: "download:4:2025-01-01T00:00:05.000Z",
      },
    ]);
    expect(closed).toEqual(["channel", "connection"]);
  });

  it("retries a failed connection", async () => {
    let attempts = 0;
    const sink = new RabbitSink({
      connectionUrl: "amqp://localhost",
      retryDelayMs: 0,
      maxRetries: 1,
      connectFn: async () => {
        attempts += 1;
        throw new Error("ECONNREFUSED");
      },
    });
    await expect(sink.publishDownloadResult([TASK])).rejects.toThrow("ECONNREFUSED");
    expect(attempts).toBe(2);
  });
});
