export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  taskId?: number;
  fileHash?: string;
  modelNumber?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "files_ingested"
  | "files_deduplicated"
  | "downloads_ok"
  | "downloads_failed"
  | "extractions_ok"
  | "extractions_failed"
  | "extractions_skipped"
  | "models_merged"
  | "models_demoted"
  | "schema_rejections";

export type MetricTimerName = "download_ms" | "extraction_ms" | "external_call_ms";
