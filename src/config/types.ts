import type { ExtractionMode, ServiceTier } from "../types";

export type SinkType = "local_jsonl" | "http" | "sqs" | "rabbit" | "none";

export interface OutputDirs {
  content: string;
  extracted: string;
  manifests: string;
}

export interface OpenAiConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  serviceTier?: ServiceTier;
  timeoutMs: number;
}

export interface SinkConfig {
  type: SinkType;
  httpEndpoint?: string;
  httpToken?: string;
  sqsQueueUrl?: string;
  rabbitUrl?: string;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  downloadTimeoutMs: number;
  downloadConcurrency: number;
  extractConcurrency: number;
  externalCallConcurrency: number;
  maxDownloadAttempts: number;
  autoExtract: boolean;
  extractionMode: ExtractionMode;
  openai: OpenAiConfig;
  sink: SinkConfig;
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "openai" | "sink">> & {
  outputDirs?: Partial<OutputDirs>;
  openai?: Partial<OpenAiConfig>;
  sink?: Partial<SinkConfig>;
};
