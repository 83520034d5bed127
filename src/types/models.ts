export const SPEC_FIELD_KEYS = [
  "input_voltage_range",
  "output_voltage",
  "output_power",
  "package",
  "isolation",
  "insulation",
  "dimension",
] as const;

export type SpecFieldKey = (typeof SPEC_FIELD_KEYS)[number];

export type SpecFields = Record<SpecFieldKey, string | null>;

/** Keys under which per-field extraction evidence is stored. */
export type EvidenceKey = SpecFieldKey | "applications";

export type VerifyStatus = "unverified" | "verified";

export type DownloadStatus = "queued" | "running" | "success" | "failed";

export type ExtractionStatus = "queued" | "submitted" | "running" | "succeeded" | "failed" | "canceled";

export const ACTIVE_EXTRACTION_STATUSES: readonly ExtractionStatus[] = ["queued", "submitted", "running"];

export type ExtractionMode = "sync" | "batch" | "background";

export type ServiceTier = "auto" | "default" | "flex" | "priority" | "scale";

export type TaskKind = "download" | "extraction";

export interface FileAsset {
  fileHash: string;
  filename: string;
  sizeBytes: number;
  sourceUrl?: string;
  localPath: string;
  createdAt: string;
}

export interface FileLink {
  fileHash: string;
  filename: string;
  createdAt: string;
}

export interface DownloadTask {
  id: number;
  sourceUrl: string;
  siteName?: string;
  status: DownloadStatus;
  fileHash?: string;
  error?: string;
  attempts: number;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface PartialFailure {
  modelNumber: string;
  reason: string;
}

export interface TokenUsage {
  input: number;
  cachedInput: number;
  output: number;
}

export interface ExtractionTask {
  id: number;
  fileHash: string;
  status: ExtractionStatus;
  mode: ExtractionMode;
  forceRerun: boolean;
  llmModel?: string;
  serviceTier?: ServiceTier;
  promptTokens?: number;
  completionTokens?: number;
  inputTokens?: number;
  cachedInputTokens?: number;
  outputTokens?: number;
  costUsd?: number;
  costError?: string;
  outputLocation?: string;
  error?: string;
  partialFailures: PartialFailure[];
  cancelRequested: boolean;
  retryCount: number;
  createdAt: string;
  submittedAt?: string;
  startedAt?: string;
  completedAt?: string;
}

export interface ModelRecord {
  modelNumber: string;
  fields: SpecFields;
  applications: string[];
  verifyStatus: VerifyStatus;
  reviewer: string | null;
  reviewedAt: string | null;
  notes: string | null;
  files: FileLink[];
  createdAt: string;
  updatedAt: string;
}

export interface FieldEvidence {
  modelNumber: string;
  fileHash: string;
  fieldKey: EvidenceKey;
  evidence: string;
  taskId?: number;
  recordedAt: string;
}

export function emptySpecFields(): SpecFields {
  return {
    input_voltage_range: null,
    output_voltage: null,
    output_power: null,
    package: null,
    isolation: null,
    insulation: null,
    dimension: null,
  };
}

export function isSpecFieldKey(value: string): value is SpecFieldKey {
  return (SPEC_FIELD_KEYS as readonly string[]).includes(value);
}
