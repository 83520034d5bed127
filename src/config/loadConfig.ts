import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ExtractionMode, ServiceTier } from "../types";
import type { AppConfig, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "datasheet-review/0.1",
  ignoreHttpsErrors: false,
  downloadTimeoutMs: 120_000,
  downloadConcurrency: 3,
  extractConcurrency: 1,
  externalCallConcurrency: 4,
  maxDownloadAttempts: 3,
  autoExtract: false,
  extractionMode: "sync",
  openai: {
    apiKey: undefined,
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-5",
    serviceTier: undefined,
    timeoutMs: 900_000,
  },
  sink: {
    type: "local_jsonl",
  },
  outputDirs: {
    content: "workspace/store",
    extracted: "workspace/extractions",
    manifests: "workspace/manifests",
  },
  storePath: "workspace/review.sqlite",
};

const SERVICE_TIERS: readonly ServiceTier[] = ["auto", "default", "flex", "priority", "scale"];
const EXTRACTION_MODES: readonly ExtractionMode[] = ["sync", "batch", "background"];
const SINK_TYPES: readonly SinkType[] = ["local_jsonl", "http", "sqs", "rabbit", "none"];

const configFileSchema = z
  .object({
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    downloadTimeoutMs: z.number().int().positive(),
    downloadConcurrency: z.number().int().positive(),
    extractConcurrency: z.number().int().positive(),
    externalCallConcurrency: z.number().int().positive(),
    maxDownloadAttempts: z.number().int().positive(),
    autoExtract: z.boolean(),
    extractionMode: z.enum(["sync", "batch", "background"]),
    openai: z
      .object({
        apiKey: z.string(),
        baseUrl: z.string(),
        model: z.string(),
        serviceTier: z.enum(["auto", "default", "flex", "priority", "scale"]),
        timeoutMs: z.number().int().positive(),
      })
      .partial(),
    sink: z
      .object({
        type: z.enum(["local_jsonl", "http", "sqs", "rabbit", "none"]),
        httpEndpoint: z.string(),
        httpToken: z.string(),
        sqsQueueUrl: z.string(),
        rabbitUrl: z.string(),
      })
      .partial(),
    outputDirs: z.object({ content: z.string(), extracted: z.string(), manifests: z.string() }).partial(),
    storePath: z.string(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  if (raw === null) {
    return {};
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data satisfies ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T;
function toEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T | undefined): T | undefined;
function toEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T | undefined): T | undefined {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    openai: {
      ...DEFAULT_CONFIG.openai,
      ...(fileConfig.openai ?? {}),
    },
    sink: {
      ...DEFAULT_CONFIG.sink,
      ...(fileConfig.sink ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    extractConcurrency: toInt(env.EXTRACT_CONCURRENCY, merged.extractConcurrency),
    externalCallConcurrency: toInt(env.EXTERNAL_CALL_CONCURRENCY, merged.externalCallConcurrency),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    autoExtract: toBool(env.AUTO_EXTRACT, merged.autoExtract),
    extractionMode: toEnum(env.EXTRACTION_MODE, EXTRACTION_MODES, merged.extractionMode),
    openai: {
      apiKey: env.OPENAI_API_KEY ?? merged.openai.apiKey,
      baseUrl: env.OPENAI_BASE_URL ?? merged.openai.baseUrl,
      model: env.OPENAI_MODEL ?? merged.openai.model,
      serviceTier: toEnum(env.OPENAI_SERVICE_TIER, SERVICE_TIERS, merged.openai.serviceTier),
      timeoutMs: toInt(env.EXTRACTION_TIMEOUT_MS, merged.openai.timeoutMs),
    },
    sink: {
      type: toEnum(env.SINK_TYPE?.toLowerCase(), SINK_TYPES, merged.sink.type),
      httpEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.sink.httpEndpoint,
      httpToken: env.HTTP_SINK_TOKEN ?? merged.sink.httpToken,
      sqsQueueUrl: env.SQS_QUEUE_URL ?? merged.sink.sqsQueueUrl,
      rabbitUrl: env.RABBIT_URL ?? merged.sink.rabbitUrl,
    },
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      content: env.CONTENT_DIR ?? merged.outputDirs.content,
      extracted: env.EXTRACTED_DIR ?? merged.outputDirs.extracted,
      manifests: env.MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

export { DEFAULT_CONFIG };
