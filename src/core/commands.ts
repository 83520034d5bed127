import { once } from "node:events";
import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import type { AppConfig } from "../config";
import { UsageError } from "../errors";
import { exportAll, exportByList, writeExport, type ExportFormat } from "../export";
import type { ModelPatch, VerifyIntent } from "../governance";
import type { Logger, MetricsRegistry } from "../observability";
import type {
  DownloadStatus,
  ExtractionMode,
  ExtractionStatus,
  SpecFields,
  TaskKind,
  VerifyStatus,
} from "../types";
import { isSpecFieldKey } from "../types";
import type { App } from "./app";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  app: App;
  logger: Logger;
  metrics: MetricsRegistry;
  out: Writable;
}

export interface TaskListOptions {
  kind?: TaskKind;
  status?: string;
}

export interface UpdateOptions {
  sets: readonly string[];
  apps?: string;
  verify?: boolean;
  reviewer?: string;
  notes?: string;
}

export interface ExportOptions {
  status?: VerifyStatus;
  format: ExportFormat;
  listPath?: string;
  preserveOrder: boolean;
  outPath?: string;
}

const DOWNLOAD_STATUSES: readonly DownloadStatus[] = ["queued", "running", "success", "failed"];
const EXTRACTION_STATUSES: readonly ExtractionStatus[] = [
  "queued",
  "submitted",
  "running",
  "succeeded",
  "failed",
  "canceled",
];

function print(ctx: CommandContext, value: unknown): void {
  ctx.out.write(`${JSON.stringify(value, null, 2)}\n`);
}

function pickStatus<T extends string>(value: string | undefined, allowed: readonly T[], kind: string): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new UsageError(`unknown ${kind} status "${value}" (expected one of: ${allowed.join(", ")})`);
  }
  return match;
}

/** Turns repeated `key=value` pairs into a field patch. An empty value clears the field. */
export function parseFieldAssignments(assignments: readonly string[]): Partial<SpecFields> {
  const fields: Partial<SpecFields> = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new UsageError(`--set expects key=value, got "${assignment}"`);
    }
    const key = assignment.slice(0, separator).trim();
    if (!isSpecFieldKey(key)) {
      throw new UsageError(`unknown field "${key}"`);
    }
    const value = assignment.slice(separator + 1);
    fields[key] = value.trim() ? value : null;
  }
  return fields;
}

export function parseApplicationList(raw: string): string[] {
  return raw
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function readModelList(listPath: string): string[] {
  return fs
    .readFileSync(path.resolve(listPath), "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function runIngest(ctx: CommandContext, files: readonly string[]): Promise<void> {
  const results: Array<{ file: string; fileHash: string; created: boolean }> = [];
  for (const file of files) {
    const bytes = await fs.promises.readFile(path.resolve(file));
    const stored = await ctx.app.content.put(bytes, { filename: path.basename(file) });
    ctx.logger.info("file_ingested", { file, fileHash: stored.fileHash, created: stored.created });
    results.push({ file, fileHash: stored.fileHash, created: stored.created });
  }

  if (ctx.config.autoExtract && results.length > 0) {
    const report = await ctx.app.extractions.queue(results.map((result) => result.fileHash));
    print(ctx, { files: results, extraction: report });
    return;
  }
  print(ctx, { files: results });
}

export async function runFetch(ctx: CommandContext, urls: readonly string[], siteName?: string): Promise<void> {
  const taskIds = await ctx.app.downloads.enqueueUrls(urls, siteName);
  ctx.logger.info("fetch_enqueued", { count: taskIds.length, siteName });
  print(ctx, { taskIds });
}

export async function runExtractQueue(
  ctx: CommandContext,
  fileHashes: readonly string[],
  forceRerun: boolean,
  mode?: ExtractionMode,
): Promise<void> {
  const report = await ctx.app.extractions.queue(fileHashes, { forceRerun, mode });
  print(ctx, report);
}

/** Recovers interrupted work, runs both queues until nothing is left, then stops. */
export async function runWork(ctx: CommandContext): Promise<void> {
  const { app, logger } = ctx;
  const onSignal = (): void => {
    logger.warn("work_interrupted", { drain: false });
    app.stopWorkers(false).catch((error: unknown) => {
      logger.error("work_stop_failed", { error: error instanceof Error ? error.message : String(error) });
    });
  };
  process.once("SIGINT", onSignal);

  try {
    const recovered = await app.startWorkers();
    logger.info("work_start", {
      queuedDownloads: recovered.queuedDownloads.length,
      queuedExtractions: recovered.queuedExtractions.length,
    });
    try {
      await app.waitUntilIdle();
    } catch (error) {
      await app.stopWorkers(false);
      throw error;
    }
    await app.stopWorkers(true);
    const stats = await app.store.getStats();
    logger.info("work_complete", { ...stats });
    print(ctx, { recovered, stats });
  } finally {
    process.removeListener("SIGINT", onSignal);
  }
}

export async function runTasks(ctx: CommandContext, options: TaskListOptions): Promise<void> {
  const { app } = ctx;
  const result: { downloads?: unknown[]; extractions?: unknown[] } = {};
  if (options.kind !== "extraction") {
    const status = pickStatus(options.status, DOWNLOAD_STATUSES, "download");
    result.downloads = await app.downloads.list({ status });
  }
  if (options.kind !== "download") {
    const status = pickStatus(options.status, EXTRACTION_STATUSES, "extraction");
    result.extractions = await app.extractions.list({ status });
  }
  print(ctx, result);
}

export async function runRetry(ctx: CommandContext, kind: TaskKind, taskId: number): Promise<void> {
  const task = kind === "download" ? await ctx.app.downloads.retry(taskId) : await ctx.app.extractions.retry(taskId);
  ctx.logger.info("task_retry_queued", { kind, taskId });
  print(ctx, task);
}

export async function runCancel(ctx: CommandContext, kind: TaskKind, taskId: number): Promise<void> {
  if (kind === "download") {
    await ctx.app.downloads.cancel(taskId);
    print(ctx, { taskId, outcome: "canceled" });
    return;
  }
  const outcome = await ctx.app.extractions.cancel(taskId);
  print(ctx, { taskId, outcome });
}

export async function runModels(
  ctx: CommandContext,
  query: { status?: VerifyStatus; q?: string; page?: number; pageSize?: number },
): Promise<void> {
  print(ctx, await ctx.app.models.list(query));
}

export async function runShow(ctx: CommandContext, modelNumber: string): Promise<void> {
  const record = await ctx.app.models.get(modelNumber);
  const evidence = await ctx.app.models.evidence(record.modelNumber);
  print(ctx, { record, evidence });
}

export async function runUpdate(ctx: CommandContext, modelNumber: string, options: UpdateOptions): Promise<void> {
  const patch: ModelPatch = {};
  if (options.sets.length > 0) {
    patch.fields = parseFieldAssignments(options.sets);
  }
  if (options.apps !== undefined) {
    patch.applications = parseApplicationList(options.apps);
  }
  if (options.notes !== undefined) {
    patch.notes = options.notes;
  }
  const intent: VerifyIntent = { verify: options.verify, reviewer: options.reviewer };

  const result = await ctx.app.models.update(modelNumber, patch, intent);
  print(ctx, {
    record: result.record,
    transition: result.decision.transition,
    changedKeys: result.decision.changedKeys,
  });
}

export async function runDeleteModel(ctx: CommandContext, modelNumber: string): Promise<void> {
  await ctx.app.models.remove(modelNumber);
  print(ctx, { modelNumber, deleted: true });
}

export async function runExport(ctx: CommandContext, options: ExportOptions): Promise<void> {
  const { app, logger } = ctx;
  const rows = options.listPath
    ? exportByList(app.store, readModelList(options.listPath), {
        status: options.status,
        preserveOrder: options.preserveOrder,
      })
    : exportAll(app.store, { status: options.status });

  if (!options.outPath) {
    const count = await writeExport(options.format, rows, ctx.out);
    logger.info("export_complete", { format: options.format, rows: count });
    return;
  }

  const outPath = path.resolve(options.outPath);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  try {
    const count = await writeExport(options.format, rows, stream);
    stream.end();
    await once(stream, "finish");
    logger.info("export_complete", { format: options.format, rows: count, outPath });
  } catch (error) {
    stream.destroy();
    throw error;
  }
}

/** Returns the number of committed files whose bytes are missing. */
export async function runVerifyStore(ctx: CommandContext): Promise<number> {
  const report = await ctx.app.content.verifyIntegrity();
  if (report.missing.length > 0) {
    ctx.logger.error("data_integrity_alarm", { missing: report.missing });
  }
  print(ctx, report);
  return report.missing.length;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  const stats = await ctx.app.store.getStats();
  ctx.logger.info("status", { ...stats });
  print(ctx, stats);
}
