import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import type { ContentStore } from "../content";
import type { ConcurrencyLimiter } from "../core/limiter";
import {
  PricingError,
  SchemaValidationError,
  StoreCorruptionError,
  billedUsageOf,
  errorMessage,
  type BilledCall,
} from "../errors";
import type { ModelRecordService } from "../governance";
import type { Logger, MetricsRegistry } from "../observability";
import type { TaskLifecycle } from "../queue";
import type { Sink } from "../sink";
import type { ExtractionOutcome, PipelineStore } from "../store";
import type { ExtractionTask, PartialFailure, ServiceTier, TokenUsage } from "../types";
import { addUsage, type DocumentInput, type ExtractionServiceClient, type ServiceCallResult } from "./client";
import { computeCostUsd } from "./pricing";
import { projectFieldPayload, type ProjectedModel } from "./projection";
import { extractTextWithPdfParse, type TextExtractor } from "./textExtractor";

export const SKIPPED_EXISTING_REASON = "skipped: successful extraction already exists";
export const CANCELED_REASON = "canceled by request";

export interface ExtractionEngineDeps {
  config: AppConfig;
  store: PipelineStore;
  content: ContentStore;
  models: ModelRecordService;
  client: ExtractionServiceClient;
  limiter: ConcurrencyLimiter;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  textExtractor?: TextExtractor;
  clock?: () => Date;
}

/** Running totals for one task, kept so a failure still records what was spent. */
interface Progress {
  usage: TokenUsage;
  llmModel?: string;
  serviceTier?: ServiceTier;
}

interface FieldStageResult {
  projected: ProjectedModel[];
  rejected: PartialFailure[];
  transient?: { modelNumber: string; error: unknown };
}

export function dedupeModelNumbers(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  }
  return result;
}

export class ExtractionEngine implements TaskLifecycle<ExtractionTask> {
  readonly kind = "extraction" as const;
  private readonly deps: ExtractionEngineDeps;
  private readonly textExtractor: TextExtractor;
  private readonly clock: () => Date;
  private readonly outputDir: string;

  constructor(deps: ExtractionEngineDeps) {
    this.deps = deps;
    this.textExtractor = deps.textExtractor ?? extractTextWithPdfParse;
    this.clock = deps.clock ?? (() => new Date());
    this.outputDir = path.resolve(deps.config.outputDirs.extracted);
  }

  async claim(id: number): Promise<ExtractionTask | undefined> {
    return this.deps.store.claimExtractionTask(id, this.now());
  }

  async cancelQueued(id: number): Promise<boolean> {
    return this.deps.store.cancelQueuedExtraction(id, CANCELED_REASON, this.now());
  }

  async execute(task: ExtractionTask): Promise<void> {
    const { logger, metrics } = this.deps;
    const stopTimer = metrics.startTimer("extraction_ms");
    const progress: Progress = { usage: { input: 0, cachedInput: 0, output: 0 } };
    logger.info("extraction_task_start", { taskId: task.id, fileHash: task.fileHash, forceRerun: task.forceRerun });

    let finished: ExtractionTask | undefined;
    try {
      finished = await this.run(task, progress);
    } catch (error) {
      finished = await this.finish(task, progress, { status: "failed", error: errorMessage(error) });
      if (error instanceof StoreCorruptionError) {
        throw error;
      }
    } finally {
      const durationMs = stopTimer();
      if (finished) {
        this.countOutcome(finished, durationMs);
        await this.publish(finished);
      }
    }
  }

  private async run(task: ExtractionTask, progress: Progress): Promise<ExtractionTask | undefined> {
    const { store, content, client, limiter, logger } = this.deps;

    const running = await store.markExtractionRunning(task.id, this.now());
    if (!running) {
      logger.warn("extraction_task_not_runnable", { taskId: task.id });
      return undefined;
    }

    if (!task.forceRerun && (await store.hasSucceededExtraction(task.fileHash))) {
      return this.finish(task, progress, { status: "canceled", error: SKIPPED_EXISTING_REASON });
    }

    const stored = await content.get(task.fileHash);
    const { text } = await this.textExtractor(stored.bytes);
    const document: DocumentInput = { fileHash: task.fileHash, filename: stored.asset.filename, text };

    let discovery: ServiceCallResult<string[]>;
    try {
      discovery = await limiter.run(() => client.discoverModels(document));
    } catch (error) {
      this.trackFailed(progress, error);
      throw error;
    }
    this.track(progress, discovery);
    const modelNumbers = dedupeModelNumbers(discovery.value);
    logger.info("extraction_discovery_done", { taskId: task.id, modelCount: modelNumbers.length });

    if (await this.cancelRequested(task.id)) {
      return this.finish(task, progress, { status: "canceled", error: CANCELED_REASON });
    }

    const fieldStage = await this.runFieldStage(task, document, modelNumbers, progress);
    if (fieldStage.transient) {
      const { modelNumber, error } = fieldStage.transient;
      return this.finish(task, progress, {
        status: "failed",
        error: `field stage failed for ${modelNumber}: ${errorMessage(error)}`,
        partialFailures: fieldStage.rejected,
      });
    }

    if (await this.cancelRequested(task.id)) {
      return this.finish(task, progress, { status: "canceled", error: CANCELED_REASON });
    }

    if (task.forceRerun) {
      const unlinked = await store.unlinkAllModelsForFile(task.fileHash);
      logger.info("extraction_links_cleared", { taskId: task.id, fileHash: task.fileHash, unlinked });
    }

    for (const model of fieldStage.projected) {
      await this.deps.models.mergeExtracted(model, task.fileHash, task.id);
    }

    const outputLocation = this.writeOutput(task, progress, fieldStage);
    return this.finish(task, progress, {
      status: "succeeded",
      outputLocation,
      partialFailures: fieldStage.rejected,
    });
  }

  private async runFieldStage(
    task: ExtractionTask,
    document: DocumentInput,
    modelNumbers: string[],
    progress: Progress,
  ): Promise<FieldStageResult> {
    const { client, limiter, logger, metrics } = this.deps;
    const settled = await Promise.allSettled(
      modelNumbers.map((modelNumber) => limiter.run(() => client.extractFields(document, modelNumber))),
    );

    const result: FieldStageResult = { projected: [], rejected: [] };
    settled.forEach((outcome, index) => {
      const modelNumber = modelNumbers[index];
      if (outcome.status === "rejected") {
        this.trackFailed(progress, outcome.reason);
        if (outcome.reason instanceof SchemaValidationError) {
          result.rejected.push({ modelNumber, reason: outcome.reason.message });
        } else if (!result.transient) {
          result.transient = { modelNumber, error: outcome.reason };
        }
        return;
      }

      this.track(progress, outcome.value);
      try {
        const projected = projectFieldPayload(modelNumber, outcome.value.value);
        if (projected.droppedKeys.length > 0) {
          logger.warn("extraction_unknown_keys_dropped", {
            taskId: task.id,
            modelNumber,
            droppedKeys: projected.droppedKeys,
          });
        }
        if (projected.reportedModelNumber) {
          logger.warn("extraction_model_number_mismatch", {
            taskId: task.id,
            modelNumber,
            reported: projected.reportedModelNumber,
          });
        }
        result.projected.push(projected);
      } catch (error) {
        if (!(error instanceof SchemaValidationError)) {
          throw error;
        }
        result.rejected.push({ modelNumber, reason: error.message });
      }
    });

    if (result.rejected.length > 0) {
      metrics.incrementCounter("schema_rejections", result.rejected.length);
      logger.warn("extraction_schema_rejections", { taskId: task.id, rejected: result.rejected });
    }
    return result;
  }

  private track(progress: Progress, call: BilledCall): void {
    progress.usage = addUsage(progress.usage, call.usage);
    progress.llmModel = call.llmModel || progress.llmModel;
    progress.serviceTier = call.serviceTier ?? progress.serviceTier;
  }

  /** A call that answered with unusable output was still billed. */
  private trackFailed(progress: Progress, error: unknown): void {
    const billed = billedUsageOf(error);
    if (billed) {
      this.track(progress, billed);
    }
  }

  private async cancelRequested(taskId: number): Promise<boolean> {
    const current = await this.deps.store.getExtractionTask(taskId);
    return current?.cancelRequested === true;
  }

  private writeOutput(task: ExtractionTask, progress: Progress, fieldStage: FieldStageResult): string {
    const outputPath = path.join(this.outputDir, `${task.fileHash}.json`);
    const document = {
      file_hash: task.fileHash,
      task_id: task.id,
      generated_at: this.now(),
      llm_model: progress.llmModel ?? null,
      service_tier: progress.serviceTier ?? null,
      usage: progress.usage,
      models: fieldStage.projected.map((model) => ({
        model_number: model.modelNumber,
        reported_model_number: model.reportedModelNumber ?? null,
        fields: model.fields,
        applications: model.applications,
        evidence: model.evidence,
        dropped_keys: model.droppedKeys,
      })),
      rejected: fieldStage.rejected.map((failure) => ({ model_number: failure.modelNumber, reason: failure.reason })),
    };

    fs.mkdirSync(this.outputDir, { recursive: true });
    const tempPath = `${outputPath}.${crypto.randomUUID()}.part`;
    fs.writeFileSync(tempPath, JSON.stringify(document, null, 2), "utf-8");
    fs.renameSync(tempPath, outputPath);
    return outputPath;
  }

  private async finish(
    task: ExtractionTask,
    progress: Progress,
    outcome: Pick<ExtractionOutcome, "status" | "error" | "outputLocation" | "partialFailures">,
  ): Promise<ExtractionTask> {
    const spent = progress.usage.input + progress.usage.output > 0;
    const llmModel = progress.llmModel ?? this.deps.config.openai.model;
    const serviceTier = progress.serviceTier ?? this.deps.config.openai.serviceTier;

    let costUsd: number | undefined;
    let costError: string | undefined;
    if (spent) {
      try {
        costUsd = computeCostUsd(llmModel, progress.usage, task.mode, serviceTier);
      } catch (error) {
        if (!(error instanceof PricingError)) {
          throw error;
        }
        costError = error.message;
        this.deps.logger.warn("extraction_cost_unpriced", { taskId: task.id, llmModel });
      }
    }

    return this.deps.store.completeExtractionTask(task.id, {
      ...outcome,
      completedAt: this.now(),
      llmModel: spent ? llmModel : undefined,
      serviceTier: spent ? serviceTier : undefined,
      usage: spent ? progress.usage : undefined,
      costUsd,
      costError,
    });
  }

  private countOutcome(task: ExtractionTask, durationMs: number): void {
    const { logger, metrics } = this.deps;
    const fields = { taskId: task.id, fileHash: task.fileHash, durationMs, costUsd: task.costUsd };
    if (task.status === "succeeded") {
      metrics.incrementCounter("extractions_ok");
      logger.info("extraction_task_ok", { ...fields, partialFailures: task.partialFailures.length });
    } else if (task.status === "canceled") {
      if (task.error === SKIPPED_EXISTING_REASON) {
        metrics.incrementCounter("extractions_skipped");
      }
      logger.info("extraction_task_canceled", { ...fields, reason: task.error });
    } else {
      metrics.incrementCounter("extractions_failed");
      logger.error("extraction_task_failed", { ...fields, error: task.error });
    }
  }

  private async publish(task: ExtractionTask): Promise<void> {
    try {
      await this.deps.sink.publishExtractionResult([task]);
    } catch (error) {
      this.deps.logger.warn("sink_publish_failed", { stage: "extract", taskId: task.id, error: errorMessage(error) });
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
