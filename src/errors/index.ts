import type { ServiceTier, TokenUsage } from "../types";

export type NotFoundEntity = "file" | "model" | "download_task" | "extraction_task" | "file_model_link";

export class NotFoundError extends Error {
  readonly entity: NotFoundEntity;
  readonly key: string;

  constructor(entity: NotFoundEntity, key: string | number) {
    super(`${entity.replace(/_/g, " ")} not found: ${key}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.key = String(key);
  }
}

export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTransitionError";
  }
}

/**
 * A committed file asset whose bytes are gone. Unlike every other failure this one is
 * allowed to escape a worker loop.
 */
export class StoreCorruptionError extends Error {
  readonly fileHash: string;
  readonly localPath: string;

  constructor(fileHash: string, localPath: string) {
    super(`data integrity alarm: bytes missing for committed file ${fileHash} (${localPath})`);
    this.name = "StoreCorruptionError";
    this.fileHash = fileHash;
    this.localPath = localPath;
  }
}

/** What a completed service call was billed for, even when its output was unusable. */
export interface BilledCall {
  usage: TokenUsage;
  llmModel: string;
  serviceTier?: ServiceTier;
}

export class ExternalServiceError extends Error {
  readonly retriable: boolean;
  readonly statusCode?: number;
  readonly billed?: BilledCall;

  constructor(message: string, options: { retriable: boolean; statusCode?: number; billed?: BilledCall }) {
    super(message);
    this.name = "ExternalServiceError";
    this.retriable = options.retriable;
    this.statusCode = options.statusCode;
    this.billed = options.billed;
  }
}

export class SchemaValidationError extends Error {
  readonly modelNumber: string;
  readonly billed?: BilledCall;

  constructor(modelNumber: string, message: string, billed?: BilledCall) {
    super(message);
    this.name = "SchemaValidationError";
    this.modelNumber = modelNumber;
    this.billed = billed;
  }
}

export function billedUsageOf(error: unknown): BilledCall | undefined {
  if (error instanceof ExternalServiceError || error instanceof SchemaValidationError) {
    return error.billed;
  }
  return undefined;
}

export class PricingError extends Error {
  readonly llmModel: string;

  constructor(llmModel: string) {
    super(`no pricing known for model family of "${llmModel}"`);
    this.name = "PricingError";
    this.llmModel = llmModel;
  }
}

/** Bad command-line input; the CLI prints it with the help text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
