import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { OpenAiConfig } from "../config";
import { backoffDelayMs, defaultFetch, isRetriableStatus, sleep, type FetchLike } from "../core/fetch";
import { ExternalServiceError, SchemaValidationError, errorMessage, type BilledCall } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { TokenUsage } from "../types";
import { DiscoveryPayloadSchema } from "./fieldSchema";

export interface DocumentInput {
  fileHash: string;
  filename: string;
  text: string;
}

export interface ServiceCallResult<T> extends BilledCall {
  value: T;
}

/** The two calls of the extraction protocol. */
export interface ExtractionServiceClient {
  discoverModels(document: DocumentInput): Promise<ServiceCallResult<string[]>>;
  /** Resolves with the raw, unvalidated payload for one model number. */
  extractFields(document: DocumentInput, modelNumber: string): Promise<ServiceCallResult<unknown>>;
}

export const RESOURCES_DIR = path.resolve(__dirname, "../../resources");

interface StageResources {
  instructions: string;
  format: unknown;
}

function loadStage(promptFile: string, schemaFile: string, resourcesDir: string): StageResources {
  return {
    instructions: fs.readFileSync(path.join(resourcesDir, "prompts", promptFile), "utf8"),
    format: JSON.parse(fs.readFileSync(path.join(resourcesDir, "schemas", schemaFile), "utf8")),
  };
}

const count = z.number().int().nonnegative().optional();

const UsageSchema = z.object({
  input_tokens: count,
  prompt_tokens: count,
  output_tokens: count,
  completion_tokens: count,
  cache_read_input_tokens: count,
  cache_write_input_tokens: count,
  cached_input_tokens: count,
  cached_tokens: count,
  input_tokens_details: z.object({ cached_tokens: count }).nullish(),
});

const ResponseEnvelopeSchema = z.object({
  model: z.string().nullish(),
  service_tier: z.enum(["auto", "default", "flex", "priority", "scale"]).nullish().catch(undefined),
  usage: UsageSchema.nullish(),
  output_text: z.string().nullish(),
  output: z
    .array(
      z.object({
        type: z.string(),
        content: z.array(z.object({ type: z.string(), text: z.string().nullish() })).nullish(),
      }),
    )
    .nullish(),
});

type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

/**
 * Input and output counts under either naming. Cached input is cache reads plus writes
 * when reported, else the aggregate cached count.
 */
export function normalizeUsage(usage: z.infer<typeof UsageSchema> | null | undefined): TokenUsage {
  if (!usage) {
    return { input: 0, cachedInput: 0, output: 0 };
  }
  const split = (usage.cache_read_input_tokens ?? 0) + (usage.cache_write_input_tokens ?? 0);
  const aggregate = usage.cached_input_tokens ?? usage.cached_tokens ?? usage.input_tokens_details?.cached_tokens ?? 0;
  return {
    input: usage.input_tokens ?? usage.prompt_tokens ?? 0,
    cachedInput: split > 0 ? split : aggregate,
    output: usage.output_tokens ?? usage.completion_tokens ?? 0,
  };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    input: a.input + b.input,
    cachedInput: a.cachedInput + b.cachedInput,
    output: a.output + b.output,
  };
}

function outputText(envelope: ResponseEnvelope): string {
  if (envelope.output_text) {
    return envelope.output_text;
  }
  const parts: string[] = [];
  for (const item of envelope.output ?? []) {
    for (const content of item.content ?? []) {
      if (content.type === "output_text" && content.text) {
        parts.push(content.text);
      }
    }
  }
  return parts.join("");
}

export interface OpenAiResponsesClientOptions {
  config: OpenAiConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  resourcesDir?: string;
}

interface RawCall extends BilledCall {
  text: string;
}

function billedPart(call: RawCall): BilledCall {
  return { usage: call.usage, llmModel: call.llmModel, serviceTier: call.serviceTier };
}

export class OpenAiResponsesClient implements ExtractionServiceClient {
  private readonly config: OpenAiConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchLike;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly discovery: StageResources;
  private readonly fieldStage: StageResources;

  constructor(options: OpenAiResponsesClientOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    const resourcesDir = options.resourcesDir ?? RESOURCES_DIR;
    this.discovery = loadStage("discover-models.md", "discovery.json", resourcesDir);
    this.fieldStage = loadStage("extract-fields.md", "field-stage.json", resourcesDir);
  }

  async discoverModels(document: DocumentInput): Promise<ServiceCallResult<string[]>> {
    const call = await this.call(this.discovery, document, JSON.stringify({ request_type: "model_discovery" }));
    let parsed: unknown;
    try {
      parsed = call.text.trim() ? JSON.parse(call.text) : { models: [] };
    } catch (error) {
      throw new ExternalServiceError(`discovery response is not JSON: ${errorMessage(error)}`, {
        retriable: false,
        billed: billedPart(call),
      });
    }
    const result = DiscoveryPayloadSchema.safeParse(parsed);
    if (!result.success) {
      throw new ExternalServiceError("discovery response does not match its schema", {
        retriable: false,
        billed: billedPart(call),
      });
    }
    return { value: result.data.models, ...billedPart(call) };
  }

  async extractFields(document: DocumentInput, modelNumber: string): Promise<ServiceCallResult<unknown>> {
    const request = JSON.stringify({ request_type: "datasheet_field_extraction", model_number: modelNumber });
    const call = await this.call(this.fieldStage, document, request);
    let value: unknown;
    try {
      value = JSON.parse(call.text);
    } catch {
      throw new SchemaValidationError(modelNumber, "field payload is not valid JSON", billedPart(call));
    }
    return { value, ...billedPart(call) };
  }

  private async call(stage: StageResources, document: DocumentInput, request: string): Promise<RawCall> {
    const apiKey = this.config.apiKey;
    if (!apiKey) {
      throw new ExternalServiceError("OPENAI_API_KEY is not set", { retriable: false });
    }

    const body = JSON.stringify({
      model: this.config.model,
      instructions: stage.instructions,
      input: [
        {
          role: "user",
          content: [
            { type: "input_text", text: `Datasheet "${document.filename}" (sha256 ${document.fileHash}):\n\n${document.text}` },
            { type: "input_text", text: request },
          ],
        },
      ],
      text: { format: stage.format },
      ...(this.config.serviceTier ? { service_tier: this.config.serviceTier } : {}),
    });

    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await this.send(apiKey, body);
      } catch (error) {
        const retriable = error instanceof ExternalServiceError && error.retriable;
        if (!retriable || attempt > this.maxRetries) {
          throw error;
        }
        const delayMs = backoffDelayMs(attempt, this.retryBaseDelayMs);
        this.logger.warn("extraction_call_retry", { attempt, delayMs, error: errorMessage(error) });
        await sleep(delayMs);
      }
    }
  }

  private async send(apiKey: string, body: string): Promise<RawCall> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);
    const stopTimer = this.metrics.startTimer("external_call_ms");
    try {
      const response = await this.fetchFn(`${this.config.baseUrl.replace(/\/+$/, "")}/responses`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = (await response.text()).slice(0, 500);
        throw new ExternalServiceError(`extraction service returned ${response.status}: ${detail}`, {
          retriable: isRetriableStatus(response.status),
          statusCode: response.status,
        });
      }

      const envelope = ResponseEnvelopeSchema.safeParse(JSON.parse(await response.text()));
      if (!envelope.success) {
        throw new ExternalServiceError("extraction service response envelope is malformed", { retriable: false });
      }
      return {
        text: outputText(envelope.data),
        usage: normalizeUsage(envelope.data.usage),
        llmModel: envelope.data.model ?? this.config.model,
        serviceTier: envelope.data.service_tier ?? this.config.serviceTier,
      };
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ExternalServiceError(`extraction call timed out after ${this.config.timeoutMs}ms`, { retriable: true });
      }
      throw new ExternalServiceError(`extraction call failed: ${errorMessage(error)}`, { retriable: true });
    } finally {
      clearTimeout(timeout);
      stopTimer();
    }
  }
}
