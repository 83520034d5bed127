import type {
  DownloadStatus,
  DownloadTask,
  EvidenceKey,
  ExtractionMode,
  ExtractionStatus,
  ExtractionTask,
  FieldEvidence,
  FileAsset,
  ModelRecord,
  PartialFailure,
  ServiceTier,
  SpecFields,
  TokenUsage,
  VerifyStatus,
} from "../types";

export interface StoreStats {
  files: number;
  models: number;
  verifiedModels: number;
  downloads: Record<DownloadStatus, number>;
  extractions: Record<ExtractionStatus, number>;
}

export type NewFileAsset = FileAsset;

export interface DownloadTaskFilter {
  status?: DownloadStatus;
  limit?: number;
}

export interface ExtractionTaskFilter {
  status?: ExtractionStatus;
  mode?: ExtractionMode;
  fileHash?: string;
  limit?: number;
}

export type DownloadOutcome =
  | { status: "success"; fileHash: string; attempts: number; completedAt: string }
  | { status: "failed"; error: string; attempts: number; completedAt: string };

export interface ExtractionOutcome {
  status: "succeeded" | "failed" | "canceled";
  completedAt: string;
  llmModel?: string;
  serviceTier?: ServiceTier;
  usage?: TokenUsage;
  costUsd?: number;
  costError?: string;
  outputLocation?: string;
  error?: string;
  partialFailures?: PartialFailure[];
}

export interface NewExtractionTask {
  fileHash: string;
  mode: ExtractionMode;
  forceRerun: boolean;
  createdAt: string;
}

export interface CreateExtractionResult {
  task: ExtractionTask;
  created: boolean;
}

/** Complete next state of a model record, produced inside the write transaction. */
export interface ModelWrite {
  fields: SpecFields;
  applications: string[];
  notes: string | null;
  verifyStatus: VerifyStatus;
  reviewer: string | null;
  reviewedAt: string | null;
}

export type ModelWriteDecider = (current: ModelRecord | undefined) => ModelWrite;

export interface ModelListFilter {
  q?: string;
  status?: VerifyStatus;
  hasFiles?: boolean;
  page: number;
  pageSize: number;
}

export interface ModelPage {
  items: ModelRecord[];
  total: number;
  page: number;
  pageSize: number;
}

export interface RecoveredTasks {
  interruptedDownloads: number[];
  interruptedExtractions: number[];
  queuedDownloads: number[];
  queuedExtractions: number[];
}

export interface PipelineStore {
  insertFileAssetIfAbsent(asset: NewFileAsset): Promise<{ asset: FileAsset; created: boolean }>;
  getFileAsset(fileHash: string): Promise<FileAsset | undefined>;
  listFileAssets(limit: number, offset?: number): Promise<FileAsset[]>;
  deleteFileAsset(fileHash: string): Promise<boolean>;

  createDownloadTask(sourceUrl: string, siteName: string | undefined, createdAt: string): Promise<DownloadTask>;
  getDownloadTask(id: number): Promise<DownloadTask | undefined>;
  claimDownloadTask(id: number, startedAt: string): Promise<DownloadTask | undefined>;
  completeDownloadTask(id: number, outcome: DownloadOutcome): Promise<DownloadTask>;
  resetDownloadTask(id: number): Promise<DownloadTask>;
  deleteQueuedDownloadTask(id: number): Promise<boolean>;
  listDownloadTasks(filter?: DownloadTaskFilter): Promise<DownloadTask[]>;

  createExtractionTask(task: NewExtractionTask): Promise<CreateExtractionResult>;
  getExtractionTask(id: number): Promise<ExtractionTask | undefined>;
  findActiveExtraction(fileHash: string): Promise<ExtractionTask | undefined>;
  hasSucceededExtraction(fileHash: string): Promise<boolean>;
  claimExtractionTask(id: number, submittedAt: string): Promise<ExtractionTask | undefined>;
  markExtractionRunning(id: number, startedAt: string): Promise<ExtractionTask | undefined>;
  completeExtractionTask(id: number, outcome: ExtractionOutcome): Promise<ExtractionTask>;
  cancelQueuedExtraction(id: number, reason: string, completedAt: string): Promise<boolean>;
  requestExtractionCancel(id: number): Promise<boolean>;
  resetExtractionTask(id: number): Promise<ExtractionTask>;
  listExtractionTasks(filter?: ExtractionTaskFilter): Promise<ExtractionTask[]>;

  getModelRecord(modelNumber: string): Promise<ModelRecord | undefined>;
  writeModelRecord(modelNumber: string, decide: ModelWriteDecider, now: string): Promise<ModelRecord>;
  deleteModelRecord(modelNumber: string): Promise<boolean>;
  listModelRecords(filter: ModelListFilter): Promise<ModelPage>;
  listModelsForFile(fileHash: string): Promise<ModelRecord[]>;
  linkFileModel(fileHash: string, modelNumber: string): Promise<void>;
  unlinkFileModel(fileHash: string, modelNumber: string): Promise<boolean>;
  unlinkAllModelsForFile(fileHash: string): Promise<number>;
  replaceEvidence(
    modelNumber: string,
    fileHash: string,
    taskId: number | undefined,
    evidence: Partial<Record<EvidenceKey, string>>,
    recordedAt: string,
  ): Promise<void>;
  listEvidence(modelNumber: string): Promise<FieldEvidence[]>;

  pageModelRecords(afterModelNumber: string | undefined, limit: number, status?: VerifyStatus): Promise<ModelRecord[]>;
  getModelRecordsByNumbers(modelNumbers: readonly string[], status?: VerifyStatus): Promise<ModelRecord[]>;

  recoverInterruptedTasks(now: string): Promise<RecoveredTasks>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
