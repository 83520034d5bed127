import type { AppConfig } from "../config";
import { ContentStore } from "../content";
import { DownloadService, DownloadWorker } from "../download";
import {
  ExtractionEngine,
  ExtractionService,
  OpenAiResponsesClient,
  type ExtractionServiceClient,
  type TextExtractor,
} from "../extract";
import { ModelRecordService } from "../governance";
import type { Logger, MetricsRegistry } from "../observability";
import { TaskQueue } from "../queue";
import { createSink, type Sink } from "../sink";
import { createStore, type PipelineStore, type RecoveredTasks } from "../store";
import type { DownloadTask, ExtractionTask } from "../types";
import type { FetchLike } from "./fetch";
import { ConcurrencyLimiter } from "./limiter";

export interface AppOverrides {
  store?: PipelineStore;
  sink?: Sink;
  client?: ExtractionServiceClient;
  fetchFn?: FetchLike;
  textExtractor?: TextExtractor;
  retryBaseDelayMs?: number;
  clock?: () => Date;
}

export interface App {
  config: AppConfig;
  runId: string;
  logger: Logger;
  metrics: MetricsRegistry;
  store: PipelineStore;
  content: ContentStore;
  models: ModelRecordService;
  downloads: DownloadService;
  extractions: ExtractionService;
  downloadQueue: TaskQueue<DownloadTask>;
  extractionQueue: TaskQueue<ExtractionTask>;
  /** Fails interrupted tasks, re-enters queued ones and starts both worker pools. */
  startWorkers(): Promise<RecoveredTasks>;
  /** Resolves when both queues are empty, including extractions queued by finished downloads. */
  waitUntilIdle(): Promise<void>;
  stopWorkers(drain: boolean): Promise<void>;
  close(): Promise<void>;
}

export function createApp(
  config: AppConfig,
  runId: string,
  logger: Logger,
  metrics: MetricsRegistry,
  overrides: AppOverrides = {},
): App {
  const clock = overrides.clock ?? (() => new Date());
  const store = overrides.store ?? createStore(config);
  const sink = overrides.sink ?? createSink(config, runId);
  const limiter = new ConcurrencyLimiter(config.externalCallConcurrency);

  const content = new ContentStore({
    store,
    rootDir: config.outputDirs.content,
    logger: logger.child("content"),
    metrics,
    clock,
  });
  const models = new ModelRecordService({ store, logger: logger.child("governance"), metrics, clock });

  let client = overrides.client;
  const getClient = (): ExtractionServiceClient => {
    if (!client) {
      client = new OpenAiResponsesClient({
        config: config.openai,
        logger: logger.child("openai"),
        metrics,
        fetchFn: overrides.fetchFn,
      });
    }
    return client;
  };
  const lazyClient: ExtractionServiceClient = {
    discoverModels: (document) => getClient().discoverModels(document),
    extractFields: (document, modelNumber) => getClient().extractFields(document, modelNumber),
  };

  const engine = new ExtractionEngine({
    config,
    store,
    content,
    models,
    client: lazyClient,
    limiter,
    sink,
    logger: logger.child("extract"),
    metrics,
    textExtractor: overrides.textExtractor,
    clock,
  });
  const extractionQueue = new TaskQueue<ExtractionTask>(engine, {
    concurrency: config.extractConcurrency,
    logger: logger.child("extraction-queue"),
  });
  const extractions = new ExtractionService({
    config,
    store,
    logger: logger.child("extract"),
    queue: extractionQueue,
    clock,
  });

  const worker = new DownloadWorker({
    config,
    store,
    content,
    sink,
    logger: logger.child("download"),
    metrics,
    fetchFn: overrides.fetchFn,
    retryBaseDelayMs: overrides.retryBaseDelayMs,
    clock,
    onFileStored: config.autoExtract
      ? async (fileHash) => {
          await extractions.queue([fileHash]);
        }
      : undefined,
  });
  const downloadQueue = new TaskQueue<DownloadTask>(worker, {
    concurrency: config.downloadConcurrency,
    logger: logger.child("download-queue"),
  });
  const downloads = new DownloadService({ store, logger: logger.child("download"), queue: downloadQueue, clock });

  return {
    config,
    runId,
    logger,
    metrics,
    store,
    content,
    models,
    downloads,
    extractions,
    downloadQueue,
    extractionQueue,

    async startWorkers(): Promise<RecoveredTasks> {
      const recovered = await store.recoverInterruptedTasks(clock().toISOString());
      if (recovered.interruptedDownloads.length > 0 || recovered.interruptedExtractions.length > 0) {
        logger.warn("tasks_interrupted_recovered", {
          downloads: recovered.interruptedDownloads,
          extractions: recovered.interruptedExtractions,
        });
      }
      for (const id of recovered.queuedDownloads) {
        downloadQueue.enqueue(id);
      }
      for (const id of recovered.queuedExtractions) {
        extractionQueue.enqueue(id);
      }
      downloadQueue.start();
      extractionQueue.start();
      return recovered;
    },

    async waitUntilIdle(): Promise<void> {
      while (true) {
        await downloadQueue.onIdle();
        await extractionQueue.onIdle();
        if (downloadQueue.size + downloadQueue.inFlight + extractionQueue.size + extractionQueue.inFlight === 0) {
          return;
        }
      }
    },

    async stopWorkers(drain: boolean): Promise<void> {
      await downloadQueue.stop({ drain });
      await extractionQueue.stop({ drain });
    },

    async close(): Promise<void> {
      await store.close();
    },
  };
}
