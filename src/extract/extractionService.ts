import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { InvalidTransitionError, NotFoundError } from "../errors";
import type { Logger } from "../observability";
import type { TaskQueue } from "../queue";
import type { ExtractionTaskFilter, PipelineStore } from "../store";
import type { ExtractionMode, ExtractionTask, FileAsset, ModelRecord } from "../types";
import { CANCELED_REASON } from "./engine";

export interface QueueExtractionOptions {
  forceRerun?: boolean;
  mode?: ExtractionMode;
}

export interface ActiveHash {
  fileHash: string;
  taskId: number;
}

/** Every non-blank input lands in exactly one of the four hash lists. */
export interface QueueExtractionReport {
  totalInput: number;
  queued: number;
  skippedExisting: number;
  notFound: number;
  duplicatesIgnored: number;
  queuedHashes: string[];
  skippedHashes: string[];
  notFoundHashes: string[];
  duplicateHashes: string[];
  activeHashes: ActiveHash[];
  taskIds: number[];
}

export type CancelOutcome = "canceled" | "cancel_requested";

export interface ExtractionSummary {
  file: FileAsset;
  latestTask?: ExtractionTask;
  models: ModelRecord[];
}

export interface ExtractionServiceDeps {
  config: AppConfig;
  store: PipelineStore;
  logger: Logger;
  queue?: Pick<TaskQueue<ExtractionTask>, "enqueue" | "cancel">;
  clock?: () => Date;
}

export class ExtractionService {
  private readonly config: AppConfig;
  private readonly store: PipelineStore;
  private readonly logger: Logger;
  private readonly queueRef?: Pick<TaskQueue<ExtractionTask>, "enqueue" | "cancel">;
  private readonly clock: () => Date;

  constructor(deps: ExtractionServiceDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.logger = deps.logger;
    this.queueRef = deps.queue;
    this.clock = deps.clock ?? (() => new Date());
  }

  async queue(fileHashes: readonly string[], options: QueueExtractionOptions = {}): Promise<QueueExtractionReport> {
    const forceRerun = options.forceRerun ?? false;
    const mode = options.mode ?? this.config.extractionMode;
    const report: QueueExtractionReport = {
      totalInput: 0,
      queued: 0,
      skippedExisting: 0,
      notFound: 0,
      duplicatesIgnored: 0,
      queuedHashes: [],
      skippedHashes: [],
      notFoundHashes: [],
      duplicateHashes: [],
      activeHashes: [],
      taskIds: [],
    };
    const seen = new Set<string>();

    for (const raw of fileHashes) {
      const fileHash = raw.trim().toLowerCase();
      if (!fileHash) {
        continue;
      }
      report.totalInput += 1;

      if (seen.has(fileHash)) {
        report.duplicatesIgnored += 1;
        report.duplicateHashes.push(fileHash);
        continue;
      }
      seen.add(fileHash);

      if (!(await this.store.getFileAsset(fileHash))) {
        report.notFound += 1;
        report.notFoundHashes.push(fileHash);
        continue;
      }

      if (!forceRerun && (await this.store.hasSucceededExtraction(fileHash))) {
        report.skippedExisting += 1;
        report.skippedHashes.push(fileHash);
        continue;
      }

      const { task, created } = await this.store.createExtractionTask({
        fileHash,
        mode,
        forceRerun,
        createdAt: this.clock().toISOString(),
      });
      if (!created) {
        report.skippedExisting += 1;
        report.skippedHashes.push(fileHash);
        report.activeHashes.push({ fileHash, taskId: task.id });
        continue;
      }

      report.queued += 1;
      report.queuedHashes.push(fileHash);
      report.taskIds.push(task.id);
      this.queueRef?.enqueue(task.id);
    }

    this.logger.info("extraction_queue_request", {
      totalInput: report.totalInput,
      queued: report.queued,
      skippedExisting: report.skippedExisting,
      notFound: report.notFound,
      duplicatesIgnored: report.duplicatesIgnored,
      forceRerun,
      mode,
    });
    return report;
  }

  async retry(taskId: number): Promise<ExtractionTask> {
    const task = await this.store.resetExtractionTask(taskId);
    this.queueRef?.enqueue(task.id);
    this.logger.info("extraction_task_retried", { taskId, fileHash: task.fileHash, retryCount: task.retryCount });
    return task;
  }

  async cancel(taskId: number): Promise<CancelOutcome> {
    const task = await this.get(taskId);
    if (task.status === "queued") {
      const removed = this.queueRef ? await this.queueRef.cancel(taskId) : false;
      if (removed || (await this.store.cancelQueuedExtraction(taskId, CANCELED_REASON, this.clock().toISOString()))) {
        this.logger.info("extraction_task_canceled", { taskId });
        return "canceled";
      }
      return this.cancel(taskId);
    }

    if (task.status === "submitted" || task.status === "running") {
      if (await this.store.requestExtractionCancel(taskId)) {
        this.logger.info("extraction_cancel_requested", { taskId });
        return "cancel_requested";
      }
      return this.cancel(taskId);
    }

    throw new InvalidTransitionError(`extraction task ${taskId} is already ${task.status}`);
  }

  async get(taskId: number): Promise<ExtractionTask> {
    const task = await this.store.getExtractionTask(taskId);
    if (!task) {
      throw new NotFoundError("extraction_task", taskId);
    }
    return task;
  }

  async list(filter: ExtractionTaskFilter = {}): Promise<ExtractionTask[]> {
    return this.store.listExtractionTasks(filter);
  }

  async summary(fileHash: string): Promise<ExtractionSummary> {
    const file = await this.store.getFileAsset(fileHash);
    if (!file) {
      throw new NotFoundError("file", fileHash);
    }
    const [latestTask] = await this.store.listExtractionTasks({ fileHash, limit: 1 });
    const models = await this.store.listModelsForFile(fileHash);
    return { file, latestTask, models };
  }

  /** Reads a task's aggregated output document; only files under the extracted directory are served. */
  async readOutput(taskId: number): Promise<unknown> {
    const task = await this.get(taskId);
    if (!task.outputLocation) {
      throw new NotFoundError("extraction_task", `${taskId} (no output)`);
    }
    const root = path.resolve(this.config.outputDirs.extracted);
    const target = path.resolve(task.outputLocation);
    const relative = path.relative(root, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`output location for task ${taskId} is outside the extracted directory`);
    }
    if (!fs.existsSync(target)) {
      throw new NotFoundError("extraction_task", `${taskId} (output file missing)`);
    }
    const parsed: unknown = JSON.parse(await fs.promises.readFile(target, "utf-8"));
    return parsed;
  }
}
