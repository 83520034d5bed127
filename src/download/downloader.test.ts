import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import { ContentStore } from "../content";
import type { HttpRequestInit, HttpResponseLike } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import { SqliteStore } from "../store";
import type { DownloadTask } from "../types";
import { DownloadService } from "./downloadService";
import { DownloadWorker } from "./downloader";

const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";
const NOW = new Date("2025-02-03T04:05:06.000Z");
const logger = new Logger({ component: "test", runId: "test", minLevel: "error" });

function response(
  status: number,
  body: string,
  headers: Record<string, string> = {},
  url = "https://vendor.test/files/RS-1205.pdf",
): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    url,
    headers: { get: (name) => headers[name.toLowerCase()] ?? null },
    text: async () => body,
    arrayBuffer: async () => {
      const bytes = Buffer.from(body, "utf-8");
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      return buffer;
    },
  };
}

class RecordingSink implements Sink {
  readonly downloads: DownloadTask[] = [];

  async publishDownloadResult(tasks: DownloadTask[]): Promise<void> {
    this.downloads.push(...tasks);
  }

  async publishExtractionResult(): Promise<void> {}
}

describe("DownloadWorker", () => {
  let workDir: string;
  let config: AppConfig;
  let store: SqliteStore;
  let metrics: MetricsRegistry;
  let content: ContentStore;
  let sink: RecordingSink;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "download-worker-"));
    config = {
      ...DEFAULT_CONFIG,
      outputDirs: { ...DEFAULT_CONFIG.outputDirs, content: path.join(workDir, "store") },
    };
    store = new SqliteStore(":memory:");
    metrics = new MetricsRegistry();
    content = new ContentStore({ store, rootDir: config.outputDirs.content, logger, metrics, clock: () => NOW });
    sink = new RecordingSink();
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function worker(
    responses: Array<HttpResponseLike | Error>,
    onFileStored?: (fileHash: string, task: DownloadTask) => Promise<void>,
  ): { worker: DownloadWorker; calls: string[] } {
    const calls: string[] = [];
    const fetchFn = async (url: string, _init: HttpRequestInit): Promise<HttpResponseLike> => {
      calls.push(url);
      const next = responses.shift();
      if (!next) {
        throw new Error("no scripted response left");
      }
      if (next instanceof Error) {
        throw next;
      }
      return next;
    };
    return {
      calls,
      worker: new DownloadWorker({
        config,
        store,
        content,
        sink,
        logger,
        metrics,
        fetchFn,
        retryBaseDelayMs: 0,
        onFileStored,
        clock: () => NOW,
      }),
    };
  }

  async function run(target: DownloadWorker, url = "https://vendor.test/files/RS-1205.pdf"): Promise<DownloadTask> {
    const created = await store.createDownloadTask(url, "vendor", NOW.toISOString());
    const claimed = await target.claim(created.id);
    if (!claimed) {
      throw new Error("not claimable");
    }
    await target.execute(claimed);
    const finished = await store.getDownloadTask(created.id);
    if (!finished) {
      throw new Error("task disappeared");
    }
    return finished;
  }

  it("retries a retriable status and stores the bytes", async () => {
    const onFileStored = vi.fn(async () => {});
    const { worker: target, calls } = worker(
      [response(503, "busy"), response(200, "hello", { "content-type": "application/pdf" })],
      onFileStored,
    );

    const task = await run(target);
    expect(calls).toHaveLength(2);
    expect(task.status).toBe("success");
    expect(task.fileHash).toBe(HELLO_SHA256);
    expect(task.attempts).toBe(2);
    expect(task.completedAt).toBe(NOW.toISOString());

    const stored = await content.get(HELLO_SHA256);
    expect(stored.bytes.toString("utf-8")).toBe("hello");
    expect(stored.asset.filename).toBe("RS-1205.pdf");
    expect(stored.asset.sourceUrl).toBe("https://vendor.test/files/RS-1205.pdf");

    expect(onFileStored).toHaveBeenCalledTimes(1);
    expect(onFileStored).toHaveBeenCalledWith(HELLO_SHA256, expect.objectContaining({ id: task.id, status: "success" }));
    expect(sink.downloads.map((published) => published.status)).toEqual(["success"]);
    expect(metrics.getCounter("downloads_ok")).toBe(1);
  });

  it("prefers the content-disposition filename", async () => {
    const { worker: target } = worker([
      response(200, "hello", { "content-disposition": 'attachment; filename="Datasheet RS.pdf"' }),
    ]);
    const task = await run(target);
    expect((await content.get(task.fileHash ?? "")).asset.filename).toBe("Datasheet RS.pdf");
  });

  it("fails without retrying on a client error", async () => {
    const { worker: target, calls } = worker([response(404, "missing")]);
    const task = await run(target);
    expect(calls).toHaveLength(1);
    expect(task.status).toBe("failed");
    expect(task.error).toBe("HTTP 404");
    expect(task.attempts).toBe(1);
    expect(metrics.getCounter("downloads_failed")).toBe(1);
  });

  it("fails an empty body", async () => {
    const { worker: target } = worker([response(200, "")]);
    const task = await run(target);
    expect(task.status).toBe("failed");
    expect(task.error).toBe("empty response body");
    expect(task.fileHash).toBeUndefined();
  });

  it("gives up after the attempt budget on network errors", async () => {
    const { worker: target, calls } = worker([
      new Error("socket hang up"),
      new Error("socket hang up"),
      new Error("connection reset"),
    ]);
    const task = await run(target);
    expect(calls).toHaveLength(3);
    expect(task.status).toBe("failed");
    expect(task.error).toBe("connection reset");
    expect(task.attempts).toBe(3);
  });

  it("fails a hanging transfer on its timeout and leaves the task retryable", async () => {
    config = { ...config, downloadTimeoutMs: 20, maxDownloadAttempts: 2 };
    let calls = 0;
    const target = new DownloadWorker({
      config,
      store,
      content,
      sink,
      logger,
      metrics,
      fetchFn: (_url, init) =>
        new Promise<HttpResponseLike>((_resolve, reject) => {
          calls += 1;
          init.signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      retryBaseDelayMs: 0,
      clock: () => NOW,
    });

    const task = await run(target);
    expect(calls).toBe(2);
    expect(task.status).toBe("failed");
    expect(task.error).toBe("timed out after 20ms");
    expect(task.attempts).toBe(2);

    const retried = await store.resetDownloadTask(task.id);
    expect(retried.status).toBe("queued");
  });

  it("keeps the success when the follow-up hook throws", async () => {
    const { worker: target } = worker([response(200, "hello")], async () => {
      throw new Error("queue closed");
    });
    const task = await run(target);
    expect(task.status).toBe("success");
  });

  it("deletes a queued row on cancel", async () => {
    const { worker: target } = worker([]);
    const created = await store.createDownloadTask("https://vendor.test/a.pdf", undefined, NOW.toISOString());
    expect(await target.cancelQueued(created.id)).toBe(true);
    expect(await store.getDownloadTask(created.id)).toBeUndefined();
  });
});

describe("DownloadService", () => {
  let store: SqliteStore;
  let queue: { enqueue: ReturnType<typeof vi.fn>; cancel: ReturnType<typeof vi.fn> };
  let service: DownloadService;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
    queue = { enqueue: vi.fn(() => true), cancel: vi.fn(async () => false) };
    service = new DownloadService({ store, logger, queue, clock: () => NOW });
  });

  afterEach(async () => {
    await store.close();
  });

  it("creates one task per non-blank url in order", async () => {
    const ids = await service.enqueueUrls([" https://vendor.test/a.pdf ", "", "https://vendor.test/b.pdf"], " vendor ");
    expect(ids).toHaveLength(2);
    expect(queue.enqueue.mock.calls).toEqual([[ids[0]], [ids[1]]]);

    const first = await service.get(ids[0]);
    expect(first.sourceUrl).toBe("https://vendor.test/a.pdf");
    expect(first.siteName).toBe("vendor");
    expect(first.status).toBe("queued");
  });

  it("cancels only queued tasks", async () => {
    const [queuedId, runningId] = await service.enqueueUrls(["https://vendor.test/a.pdf", "https://vendor.test/b.pdf"]);
    await store.claimDownloadTask(runningId, NOW.toISOString());

    await service.cancel(queuedId);
    expect(queue.cancel).toHaveBeenCalledWith(queuedId);
    await expect(service.get(queuedId)).rejects.toThrow(/not found/);
    await expect(service.cancel(runningId)).rejects.toThrow("download task 2 is running; only queued tasks can be canceled");
  });

  it("requeues a failed task on retry", async () => {
    const [id] = await service.enqueueUrls(["https://vendor.test/a.pdf"]);
    await store.claimDownloadTask(id, NOW.toISOString());
    await store.completeDownloadTask(id, {
      status: "failed",
      error: "HTTP 500",
      attempts: 3,
      completedAt: NOW.toISOString(),
    });

    const retried = await service.retry(id);
    expect(retried.status).toBe("queued");
    expect(queue.enqueue).toHaveBeenLastCalledWith(id);
  });
});
