import { PricingError } from "../errors";
import type { ExtractionMode, ServiceTier, TokenUsage } from "../types";

/** USD per one million tokens. */
export interface ModelPrice {
  id: string;
  since: string;
  input: number;
  cachedInput: number;
  output: number;
}

export const PRICE_TABLE: readonly ModelPrice[] = [
  { id: "gpt-5", since: "2025-08-07", input: 1.25, cachedInput: 0.125, output: 10 },
  { id: "gpt-5-mini", since: "2025-08-07", input: 0.25, cachedInput: 0.025, output: 2 },
  { id: "gpt-5-nano", since: "2025-08-07", input: 0.05, cachedInput: 0.005, output: 0.4 },
  { id: "gpt-4.1", since: "2025-04-14", input: 2, cachedInput: 0.5, output: 8 },
  { id: "gpt-4.1-mini", since: "2025-04-14", input: 0.4, cachedInput: 0.1, output: 1.6 },
  { id: "gpt-4o", since: "2024-08-06", input: 2.5, cachedInput: 1.25, output: 10 },
  { id: "gpt-4o-mini", since: "2024-07-18", input: 0.15, cachedInput: 0.075, output: 0.6 },
];

const DATED_SUFFIX = /-\d{4}-\d{2}-\d{2}$/;

function latest(entries: readonly ModelPrice[]): ModelPrice | undefined {
  return [...entries].sort((a, b) => b.since.localeCompare(a.since))[0];
}

function exact(id: string, table: readonly ModelPrice[]): ModelPrice | undefined {
  return latest(table.filter((entry) => entry.id === id));
}

/** Exact id, then the id without a `-YYYY-MM-DD` suffix, then the longest known family prefix. */
export function resolvePrice(llmModel: string, table: readonly ModelPrice[] = PRICE_TABLE): ModelPrice {
  const id = llmModel.trim().toLowerCase();

  const direct = exact(id, table);
  if (direct) {
    return direct;
  }

  const undated = id.replace(DATED_SUFFIX, "");
  const dated = undated !== id ? exact(undated, table) : undefined;
  if (dated) {
    return dated;
  }

  const families = table.filter((entry) => undated.startsWith(`${entry.id}-`));
  const longest = Math.max(0, ...families.map((entry) => entry.id.length));
  const family = latest(families.filter((entry) => entry.id.length === longest));
  if (family) {
    return family;
  }

  throw new PricingError(llmModel);
}

export function costMultiplier(mode: ExtractionMode, serviceTier?: ServiceTier): number {
  if (serviceTier === "flex" || mode === "batch") {
    return 0.5;
  }
  if (serviceTier === "priority" || serviceTier === "scale") {
    return 2;
  }
  return 1;
}

/** Cached input tokens are a subset of input tokens and are billed at the cached rate only. */
export function computeCostUsd(
  llmModel: string,
  usage: TokenUsage,
  mode: ExtractionMode,
  serviceTier?: ServiceTier,
  table: readonly ModelPrice[] = PRICE_TABLE,
): number {
  const price = resolvePrice(llmModel, table);
  const cached = Math.min(usage.cachedInput, usage.input);
  const uncached = usage.input - cached;
  const raw = (uncached * price.input + cached * price.cachedInput + usage.output * price.output) / 1_000_000;
  return Math.round(raw * costMultiplier(mode, serviceTier) * 1_000_000) / 1_000_000;
}
