import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, type AppConfig } from "../config";
import { ContentStore } from "../content";
import type { FetchLike, HttpResponseLike } from "../core/fetch";
import { ConcurrencyLimiter } from "../core/limiter";
import { ExternalServiceError, StoreCorruptionError } from "../errors";
import { ModelRecordService } from "../governance";
import { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import { SqliteStore } from "../store";
import type { DownloadTask, ExtractionTask, TokenUsage } from "../types";
import {
  OpenAiResponsesClient,
  type DocumentInput,
  type ExtractionServiceClient,
  type ServiceCallResult,
} from "./client";
import { CANCELED_REASON, ExtractionEngine, SKIPPED_EXISTING_REASON, dedupeModelNumbers } from "./engine";

const logger = new Logger({ component: "test", runId: "test", minLevel: "error" });
const NOW = new Date("2025-06-01T12:00:00.000Z");

class RecordingSink implements Sink {
  readonly extractions: ExtractionTask[] = [];

  async publishDownloadResult(_tasks: DownloadTask[]): Promise<void> {}

  async publishExtractionResult(tasks: ExtractionTask[]): Promise<void> {
    this.extractions.push(...tasks);
  }
}

type FieldResponder = (modelNumber: string) => Promise<unknown>;

class FakeClient implements ExtractionServiceClient {
  discovered: string[] = [];
  llmModel = "gpt-5";
  onDiscover?: () => Promise<void>;
  respond: FieldResponder = async () => ({});
  readonly fieldCalls: string[] = [];

  async discoverModels(_document: DocumentInput): Promise<ServiceCallResult<string[]>> {
    await this.onDiscover?.();
    return { value: this.discovered, usage: usage(100, 10), llmModel: this.llmModel };
  }

  async extractFields(_document: DocumentInput, modelNumber: string): Promise<ServiceCallResult<unknown>> {
    this.fieldCalls.push(modelNumber);
    const value = await this.respond(modelNumber);
    return { value, usage: usage(50, 5), llmModel: this.llmModel };
  }
}

function usage(input: number, output: number): TokenUsage {
  return { input, cachedInput: 0, output };
}

function serviceReply(outputText: string, inputTokens: number, outputTokens: number): HttpResponseLike {
  const text = JSON.stringify({
    model: "gpt-5",
    output_text: outputText,
    usage: { input_tokens: inputTokens, output_tokens: outputTokens },
  });
  return {
    ok: true,
    status: 200,
    url: "https://api.example.test/v1/responses",
    headers: { get: () => null },
    text: async () => text,
    arrayBuffer: async () => new ArrayBuffer(0),
  };
}

function replaying(replies: HttpResponseLike[]): FetchLike {
  return async () => {
    const next = replies.shift();
    if (!next) {
      throw new Error("no scripted reply left");
    }
    return next;
  };
}

/** Never answers; only settles once the caller aborts. */
const hangingFetch: FetchLike = (_url, init) =>
  new Promise<HttpResponseLike>((_resolve, reject) => {
    init.signal.addEventListener("abort", () => reject(new Error("aborted")));
  });

const RS1205_PAYLOAD = {
  model_number: "RS-1205",
  output_power: { value: "2W", evidence: "Output power 2W" },
  package: { value: "SIP-7", evidence: "SIP7 package" },
  applications: { values: ["Industrial"], evidence: "Applications: industrial" },
};

describe("dedupeModelNumbers", () => {
  it("trims, drops blanks and keeps first occurrences", () => {
    expect(dedupeModelNumbers([" RS-1205 ", "RS-1205", "", "RS-1209"])).toEqual(["RS-1205", "RS-1209"]);
  });
});

describe("ExtractionEngine", () => {
  let workDir: string;
  let config: AppConfig;
  let store: SqliteStore;
  let metrics: MetricsRegistry;
  let content: ContentStore;
  let models: ModelRecordService;
  let client: FakeClient;
  let sink: RecordingSink;
  let engine: ExtractionEngine;
  let fileHash: string;

  beforeEach(async () => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "extraction-engine-"));
    config = {
      ...DEFAULT_CONFIG,
      outputDirs: {
        content: path.join(workDir, "store"),
        extracted: path.join(workDir, "extractions"),
        manifests: path.join(workDir, "manifests"),
      },
    };
    store = new SqliteStore(":memory:");
    metrics = new MetricsRegistry();
    const clock = (): Date => NOW;
    content = new ContentStore({ store, rootDir: config.outputDirs.content, logger, metrics, clock });
    models = new ModelRecordService({ store, logger, metrics, clock });
    client = new FakeClient();
    client.discovered = [" RS-1205 ", "RS-1205", "RS-1209", ""];
    sink = new RecordingSink();
    engine = new ExtractionEngine({
      config,
      store,
      content,
      models,
      client,
      limiter: new ConcurrencyLimiter(2),
      sink,
      logger,
      metrics,
      textExtractor: async (bytes) => ({ text: bytes.toString("utf-8"), pageCount: 1 }),
      clock,
    });
    ({ fileHash } = await content.put(Buffer.from("RS-1205 RS-1209 datasheet"), { filename: "rs.pdf" }));
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  async function runTask(forceRerun = false): Promise<ExtractionTask> {
    const { task } = await store.createExtractionTask({
      fileHash,
      mode: "sync",
      forceRerun,
      createdAt: NOW.toISOString(),
    });
    const claimed = await engine.claim(task.id);
    if (!claimed) {
      throw new Error(`task ${task.id} was not claimable`);
    }
    await engine.execute(claimed);
    const finished = await store.getExtractionTask(task.id);
    if (!finished) {
      throw new Error(`task ${task.id} disappeared`);
    }
    return finished;
  }

  it("merges valid models and lists schema rejections as partial failures", async () => {
    client.respond = async (modelNumber) =>
      modelNumber === "RS-1205" ? RS1205_PAYLOAD : { output_power: { value: 5 } };

    const task = await runTask();
    expect(client.fieldCalls.sort()).toEqual(["RS-1205", "RS-1209"]);
    expect(task.status).toBe("succeeded");
    expect(task.partialFailures).toHaveLength(1);
    expect(task.partialFailures[0].modelNumber).toBe("RS-1209");
    expect(task.partialFailures[0].reason).toMatch(/^field payload rejected: output_power\.value/);
    expect(task.inputTokens).toBe(200);
    expect(task.outputTokens).toBe(20);
    expect(task.llmModel).toBe("gpt-5");
    expect(task.costUsd).toBe(0.00045);
    expect(task.completedAt).toBe(NOW.toISOString());

    const record = await models.get("RS-1205");
    expect(record.fields.output_power).toBe("2W");
    expect(record.fields.package).toBe("SIP-7");
    expect(record.applications).toEqual(["Industrial"]);
    expect(record.files.map((file) => file.fileHash)).toEqual([fileHash]);
    const evidence = await models.evidence("RS-1205");
    expect(evidence.map((entry) => entry.fieldKey).sort()).toEqual(["applications", "output_power", "package"]);
    await expect(models.get("RS-1209")).rejects.toThrow(/not found/);

    expect(task.outputLocation).toBe(path.join(config.outputDirs.extracted, `${fileHash}.json`));
    const output: unknown = JSON.parse(fs.readFileSync(task.outputLocation ?? "", "utf-8"));
    expect(output).toMatchObject({
      file_hash: fileHash,
      task_id: task.id,
      llm_model: "gpt-5",
      models: [{ model_number: "RS-1205", fields: { output_power: "2W" } }],
      rejected: [{ model_number: "RS-1209" }],
    });

    expect(sink.extractions.map((published) => published.status)).toEqual(["succeeded"]);
    expect(metrics.getCounter("extractions_ok")).toBe(1);
    expect(metrics.getCounter("schema_rejections")).toBe(1);
    expect(metrics.getCounter("models_merged")).toBe(1);
  });

  it("fails the whole task on a transient field-call error and keeps the usage", async () => {
    client.respond = async (modelNumber) => {
      if (modelNumber === "RS-1209") {
        throw new ExternalServiceError("extraction service returned 503: busy", { retriable: true, statusCode: 503 });
      }
      return RS1205_PAYLOAD;
    };

    const task = await runTask();
    expect(task.status).toBe("failed");
    expect(task.error).toBe("field stage failed for RS-1209: extraction service returned 503: busy");
    expect(task.inputTokens).toBe(150);
    expect(task.outputLocation).toBeUndefined();
    expect(await store.getModelRecord("RS-1205")).toBeUndefined();
    expect(metrics.getCounter("extractions_failed")).toBe(1);
  });

  it("skips a file that already has a successful extraction", async () => {
    const { task: earlier } = await store.createExtractionTask({
      fileHash,
      mode: "sync",
      forceRerun: false,
      createdAt: NOW.toISOString(),
    });
    await store.completeExtractionTask(earlier.id, { status: "succeeded", completedAt: NOW.toISOString() });

    const task = await runTask();
    expect(task.status).toBe("canceled");
    expect(task.error).toBe(SKIPPED_EXISTING_REASON);
    expect(task.costUsd).toBeUndefined();
    expect(client.fieldCalls).toEqual([]);
    expect(metrics.getCounter("extractions_skipped")).toBe(1);
  });

  it("stops between stages when cancellation was requested", async () => {
    client.onDiscover = async () => {
      const [running] = await store.listExtractionTasks({ status: "running" });
      await store.requestExtractionCancel(running.id);
    };

    const task = await runTask();
    expect(task.status).toBe("canceled");
    expect(task.error).toBe(CANCELED_REASON);
    expect(task.inputTokens).toBe(100);
    expect(task.costUsd).toBe(0.000225);
    expect(client.fieldCalls).toEqual([]);
  });

  it("records unpriced models without a cost", async () => {
    client.llmModel = "house-model-1";
    client.discovered = [];
    const task = await runTask();
    expect(task.status).toBe("succeeded");
    expect(task.costUsd).toBeUndefined();
    expect(task.costError).toBe('no pricing known for model family of "house-model-1"');
  });

  it("relinks from scratch on a forced rerun", async () => {
    await models.create("OLD-1");
    await store.linkFileModel(fileHash, "OLD-1");
    client.discovered = ["RS-1205"];
    client.respond = async () => RS1205_PAYLOAD;

    const task = await runTask(true);
    expect(task.status).toBe("succeeded");
    expect((await models.get("OLD-1")).files).toEqual([]);
    expect((await models.listForFile(fileHash)).map((record) => record.modelNumber)).toEqual(["RS-1205"]);
  });

  it("demotes a verified record whose values change", async () => {
    await models.create(
      "RS-1205",
      { fields: { output_power: "1W", package: "SIP-7" }, applications: ["Industrial"] },
      { verify: true, reviewer: "alice" },
    );
    client.discovered = ["RS-1205"];
    client.respond = async () => RS1205_PAYLOAD;

    await runTask();
    const record = await models.get("RS-1205");
    expect(record.verifyStatus).toBe("unverified");
    expect(record.reviewer).toBeNull();
    expect(record.reviewedAt).toBeNull();
    expect(metrics.getCounter("models_demoted")).toBe(1);
  });

  it("keeps verification when extraction reproduces the same values", async () => {
    await models.create(
      "RS-1205",
      { fields: { output_power: "2W", package: "SIP-7" }, applications: ["industrial"] },
      { verify: true, reviewer: "alice" },
    );
    client.discovered = ["RS-1205"];
    client.respond = async () => RS1205_PAYLOAD;

    await runTask();
    const record = await models.get("RS-1205");
    expect(record.verifyStatus).toBe("verified");
    expect(record.reviewer).toBe("alice");
  });

  describe("with the HTTP client", () => {
    function useHttpClient(fetchFn: FetchLike, timeoutMs = 5_000): void {
      engine = new ExtractionEngine({
        config,
        store,
        content,
        models,
        client: new OpenAiResponsesClient({
          config: { apiKey: "test-key", baseUrl: "https://api.example.test/v1", model: "gpt-5", timeoutMs },
          logger,
          metrics,
          fetchFn,
          maxRetries: 0,
          retryBaseDelayMs: 0,
        }),
        limiter: new ConcurrencyLimiter(2),
        sink,
        logger,
        metrics,
        textExtractor: async (bytes) => ({ text: bytes.toString("utf-8"), pageCount: 1 }),
        clock: () => NOW,
      });
    }

    it("bills a field call whose output is not JSON", async () => {
      useHttpClient(replaying([serviceReply('{"models":["A-1"]}', 100, 10), serviceReply("sorry, not json", 50, 5)]));

      const task = await runTask();
      expect(task.status).toBe("succeeded");
      expect(task.partialFailures).toEqual([{ modelNumber: "A-1", reason: "field payload is not valid JSON" }]);
      expect(task.promptTokens).toBe(150);
      expect(task.completionTokens).toBe(15);
      expect(task.llmModel).toBe("gpt-5");
      expect(task.costUsd).toBeGreaterThan(0);
    });

    it("bills a discovery reply that is not JSON and fails the task", async () => {
      useHttpClient(replaying([serviceReply("no models here", 100, 10)]));

      const task = await runTask();
      expect(task.status).toBe("failed");
      expect(task.error).toMatch(/^discovery response is not JSON: /);
      expect(task.promptTokens).toBe(100);
      expect(task.completionTokens).toBe(10);
    });

    it("fails a hanging call on its timeout and leaves the task retryable", async () => {
      useHttpClient(hangingFetch, 20);

      const task = await runTask();
      expect(task.status).toBe("failed");
      expect(task.error).toBe("extraction call timed out after 20ms");
      expect(task.promptTokens).toBeUndefined();

      const retried = await store.resetExtractionTask(task.id);
      expect(retried.status).toBe("queued");
      expect(retried.retryCount).toBe(1);
    });
  });

  it("raises the integrity alarm when the bytes are gone", async () => {
    fs.rmSync(content.pathFor(fileHash));
    const { task } = await store.createExtractionTask({
      fileHash,
      mode: "sync",
      forceRerun: false,
      createdAt: NOW.toISOString(),
    });
    const claimed = await engine.claim(task.id);
    if (!claimed) {
      throw new Error("not claimable");
    }
    await expect(engine.execute(claimed)).rejects.toThrow(StoreCorruptionError);
    expect((await store.getExtractionTask(task.id))?.status).toBe("failed");
  });
});
