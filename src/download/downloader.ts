import type { AppConfig } from "../config";
import type { ContentStore } from "../content";
import { guessFilename } from "../content";
import { backoffDelayMs, defaultFetch, getFetchDispatcher, isRetriableStatus, sleep, type FetchLike } from "../core/fetch";
import { StoreCorruptionError, errorMessage } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { TaskLifecycle } from "../queue";
import type { Sink } from "../sink";
import type { DownloadOutcome, PipelineStore } from "../store";
import type { DownloadTask } from "../types";

export interface DownloadWorkerDeps {
  config: AppConfig;
  store: PipelineStore;
  content: ContentStore;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  retryBaseDelayMs?: number;
  /** Called after bytes are committed, e.g. to queue an extraction for the new hash. */
  onFileStored?: (fileHash: string, task: DownloadTask) => Promise<void>;
  clock?: () => Date;
}

type AttemptResult =
  | { kind: "ok"; bytes: Buffer; filename: string; resolvedUrl: string }
  | { kind: "http_error"; statusCode: number }
  | { kind: "empty" };

class DownloadAttemptError extends Error {}

export class DownloadWorker implements TaskLifecycle<DownloadTask> {
  readonly kind = "download" as const;
  private readonly deps: DownloadWorkerDeps;
  private readonly fetchFn: FetchLike;
  private readonly retryBaseDelayMs: number;
  private readonly clock: () => Date;

  constructor(deps: DownloadWorkerDeps) {
    this.deps = deps;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.retryBaseDelayMs = deps.retryBaseDelayMs ?? 1000;
    this.clock = deps.clock ?? (() => new Date());
  }

  async claim(id: number): Promise<DownloadTask | undefined> {
    return this.deps.store.claimDownloadTask(id, this.now());
  }

  async cancelQueued(id: number): Promise<boolean> {
    return this.deps.store.deleteQueuedDownloadTask(id);
  }

  async execute(task: DownloadTask): Promise<void> {
    const { config, logger, metrics } = this.deps;
    const maxAttempts = Math.max(1, config.maxDownloadAttempts);
    let outcome: DownloadOutcome | undefined;
    let attempt = 1;

    for (; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = metrics.startTimer("download_ms");
      logger.info("download_task_attempt_start", { taskId: task.id, url: task.sourceUrl, attempt });

      try {
        const result = await this.downloadAttempt(task.sourceUrl);
        const durationMs = stopTimer();

        if (result.kind === "empty") {
          outcome = this.failed("empty response body", attempt);
          logger.warn("download_task_empty_body", { taskId: task.id, url: task.sourceUrl, attempt, durationMs });
          break;
        }

        if (result.kind === "http_error") {
          const retriable = isRetriableStatus(result.statusCode);
          if (!retriable || attempt >= maxAttempts) {
            outcome = this.failed(`HTTP ${result.statusCode}`, attempt);
            logger.warn("download_task_failed_http", {
              taskId: task.id,
              url: task.sourceUrl,
              attempt,
              durationMs,
              statusCode: result.statusCode,
            });
            break;
          }

          logger.warn("download_task_retry_http", {
            taskId: task.id,
            url: task.sourceUrl,
            attempt,
            durationMs,
            statusCode: result.statusCode,
          });
          await sleep(backoffDelayMs(attempt, this.retryBaseDelayMs));
          continue;
        }

        const stored = await this.deps.content.put(result.bytes, {
          filename: result.filename,
          sourceUrl: result.resolvedUrl,
        });
        outcome = { status: "success", fileHash: stored.fileHash, attempts: attempt, completedAt: this.now() };
        logger.info("download_task_ok", {
          taskId: task.id,
          url: task.sourceUrl,
          attempt,
          durationMs,
          fileHash: stored.fileHash,
          created: stored.created,
        });
        break;
      } catch (error) {
        const durationMs = stopTimer();
        if (error instanceof StoreCorruptionError) {
          await this.complete(task, this.failed(error.message, attempt));
          throw error;
        }
        const message = errorMessage(error);
        logger.warn("download_task_error", { taskId: task.id, url: task.sourceUrl, attempt, durationMs, error: message });
        if (!(error instanceof DownloadAttemptError) || attempt >= maxAttempts) {
          outcome = this.failed(message, attempt);
          break;
        }
        await sleep(backoffDelayMs(attempt, this.retryBaseDelayMs));
      }
    }

    const finished = await this.complete(task, outcome ?? this.failed("unknown download failure", maxAttempts));
    if (finished.status === "success" && finished.fileHash && this.deps.onFileStored) {
      try {
        await this.deps.onFileStored(finished.fileHash, finished);
      } catch (error) {
        logger.error("download_follow_up_failed", { taskId: task.id, fileHash: finished.fileHash, error: errorMessage(error) });
      }
    }
  }

  private async complete(task: DownloadTask, outcome: DownloadOutcome): Promise<DownloadTask> {
    const { store, sink, logger, metrics } = this.deps;
    const finished = await store.completeDownloadTask(task.id, outcome);
    metrics.incrementCounter(finished.status === "success" ? "downloads_ok" : "downloads_failed");
    try {
      await sink.publishDownloadResult([finished]);
    } catch (error) {
      logger.warn("sink_publish_failed", { stage: "download", taskId: task.id, error: errorMessage(error) });
    }
    return finished;
  }

  private failed(error: string, attempts: number): DownloadOutcome {
    return { status: "failed", error, attempts, completedAt: this.now() };
  }

  /** One GET; the timeout covers both headers and body. Network failures surface as DownloadAttemptError. */
  private async downloadAttempt(url: string): Promise<AttemptResult> {
    const { config } = this.deps;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.downloadTimeoutMs);
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": config.userAgent,
          accept: "application/pdf,*/*",
        },
        dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        return { kind: "http_error", statusCode: response.status };
      }
      if (response.headers.get("content-length") === "0") {
        return { kind: "empty" };
      }

      const bytes = Buffer.from(await response.arrayBuffer());
      if (bytes.byteLength === 0) {
        return { kind: "empty" };
      }

      const resolvedUrl = response.url || url;
      return {
        kind: "ok",
        bytes,
        resolvedUrl,
        filename: guessFilename(
          resolvedUrl,
          response.headers.get("content-disposition"),
          response.headers.get("content-type"),
        ),
      };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${config.downloadTimeoutMs}ms` : errorMessage(error);
      throw new DownloadAttemptError(reason);
    } finally {
      clearTimeout(timeout);
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
