import { InvalidTransitionError, NotFoundError } from "../errors";
import type { Logger } from "../observability";
import type { TaskQueue } from "../queue";
import type { DownloadTaskFilter, PipelineStore } from "../store";
import type { DownloadTask } from "../types";

export interface DownloadServiceDeps {
  store: PipelineStore;
  logger: Logger;
  queue?: Pick<TaskQueue<DownloadTask>, "enqueue" | "cancel">;
  clock?: () => Date;
}

export class DownloadService {
  private readonly store: PipelineStore;
  private readonly logger: Logger;
  private readonly queue?: Pick<TaskQueue<DownloadTask>, "enqueue" | "cancel">;
  private readonly clock: () => Date;

  constructor(deps: DownloadServiceDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.queue = deps.queue;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** One queued task per non-blank URL, in input order. */
  async enqueueUrls(urls: readonly string[], siteName?: string): Promise<number[]> {
    const ids: number[] = [];
    for (const raw of urls) {
      const url = raw.trim();
      if (!url) {
        continue;
      }
      const task = await this.store.createDownloadTask(url, siteName?.trim() || undefined, this.clock().toISOString());
      ids.push(task.id);
      this.queue?.enqueue(task.id);
    }
    this.logger.info("download_tasks_enqueued", { count: ids.length, siteName });
    return ids;
  }

  async retry(taskId: number): Promise<DownloadTask> {
    const task = await this.store.resetDownloadTask(taskId);
    this.queue?.enqueue(task.id);
    this.logger.info("download_task_retried", { taskId, url: task.sourceUrl });
    return task;
  }

  /** Only queued tasks can be canceled; the row is removed. */
  async cancel(taskId: number): Promise<void> {
    const task = await this.get(taskId);
    if (task.status !== "queued") {
      throw new InvalidTransitionError(`download task ${taskId} is ${task.status}; only queued tasks can be canceled`);
    }
    const removed = this.queue ? await this.queue.cancel(taskId) : false;
    if (!removed && !(await this.store.deleteQueuedDownloadTask(taskId))) {
      throw new InvalidTransitionError(`download task ${taskId} was claimed before it could be canceled`);
    }
    this.logger.info("download_task_canceled", { taskId });
  }

  async get(taskId: number): Promise<DownloadTask> {
    const task = await this.store.getDownloadTask(taskId);
    if (!task) {
      throw new NotFoundError("download_task", taskId);
    }
    return task;
  }

  async list(filter: DownloadTaskFilter = {}): Promise<DownloadTask[]> {
    return this.store.listDownloadTasks(filter);
  }
}
