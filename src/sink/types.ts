import type { DownloadTask, ExtractionTask } from "../types";

export type SinkStage = "download" | "extract";

export type SinkTask = DownloadTask | ExtractionTask;

/** Receives every terminal task transition. Failures here never change task state. */
export interface Sink {
  publishDownloadResult(tasks: DownloadTask[]): Promise<void>;
  publishExtractionResult(tasks: ExtractionTask[]): Promise<void>;
}

/** What every transport ships for one task outcome. */
export interface TaskEventEnvelope {
  stage: SinkStage;
  key: string;
  taskId: number;
  status: SinkTask["status"];
  sentAt: string;
  payload: SinkTask;
}
