import { SchemaValidationError } from "../errors";
import { normalizeScalar, type ExtractedModel } from "../governance";
import type { EvidenceKey, SpecFields } from "../types";
import { FieldPayloadSchema, unknownFieldPaths, type FieldPayload } from "./fieldSchema";

export interface ProjectedModel extends ExtractedModel {
  /** Model number the payload itself claimed, when it differs from the requested one. */
  reportedModelNumber?: string;
  droppedKeys: string[];
}

const VALUE_WITH_UNIT = /^±?([\d.]+)\s*([a-zA-Zμ%]+)/;

/** `lower~upper unit` when both ends carry the same unit, else `lower~upper`; null unless both ends exist. */
export function joinRange(lower: string | null, upper: string | null): string | null {
  if (!lower || !upper) {
    return null;
  }
  const lowerMatch = VALUE_WITH_UNIT.exec(lower);
  const upperMatch = VALUE_WITH_UNIT.exec(upper);
  if (lowerMatch && upperMatch && lowerMatch[2] === upperMatch[2]) {
    return `${lowerMatch[1]}~${upperMatch[1]} ${lowerMatch[2]}`;
  }
  return `${lower}~${upper}`;
}

export function formatOutputVoltage(value: string | null, dualOutput: boolean): string | null {
  if (!value) {
    return null;
  }
  return dualOutput && !value.startsWith("±") ? `±${value}` : value;
}

export function formatDimension(length: string | null, width: string | null, height: string | null): string | null {
  return length && width && height ? `${length} x ${width} x ${height}` : null;
}

function collectEvidence(payload: FieldPayload): Partial<Record<EvidenceKey, string>> {
  const evidence: Partial<Record<EvidenceKey, string>> = {};
  const sources: Array<[EvidenceKey, string | null | undefined]> = [
    ["input_voltage_range", payload.input_voltage_range?.evidence],
    ["output_voltage", payload.output_voltage?.evidence],
    ["output_power", payload.output_power?.evidence],
    ["package", payload.package?.evidence],
    ["isolation", payload.isolation?.evidence],
    ["insulation", payload.insulation?.evidence],
    ["dimension", payload.dimension?.evidence],
    ["applications", payload.applications?.evidence],
  ];
  for (const [key, value] of sources) {
    const normalized = normalizeScalar(value);
    if (normalized) {
      evidence[key] = normalized;
    }
  }
  return evidence;
}

/**
 * Maps one untrusted field-stage payload onto the record shape. Unknown keys are dropped,
 * missing keys become null, and a wrongly typed payload is rejected for this model only.
 */
export function projectFieldPayload(requestedModelNumber: string, raw: unknown): ProjectedModel {
  const parsed = FieldPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaValidationError(requestedModelNumber, `field payload rejected: ${detail}`);
  }

  const payload = parsed.data;
  const range = payload.input_voltage_range;
  const voltage = payload.output_voltage;
  const dimension = payload.dimension;

  const fields: SpecFields = {
    input_voltage_range: joinRange(normalizeScalar(range?.lower), normalizeScalar(range?.upper)),
    output_voltage: formatOutputVoltage(normalizeScalar(voltage?.value), voltage?.dual_output === true),
    output_power: normalizeScalar(payload.output_power?.value),
    package: normalizeScalar(payload.package?.value),
    isolation: normalizeScalar(payload.isolation?.value),
    insulation: normalizeScalar(payload.insulation?.value),
    dimension: formatDimension(
      normalizeScalar(dimension?.length),
      normalizeScalar(dimension?.width),
      normalizeScalar(dimension?.height),
    ),
  };

  const applications = (payload.applications?.values ?? [])
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  const reported = normalizeScalar(payload.model_number);
  return {
    modelNumber: requestedModelNumber,
    reportedModelNumber: reported && reported !== requestedModelNumber ? reported : undefined,
    fields,
    applications,
    evidence: collectEvidence(payload),
    droppedKeys: unknownFieldPaths(raw),
  };
}
