import { z } from "zod";

const text = z.string().nullish();

const valueField = z.object({
  value: text,
  evidence: text,
});

export const FieldPayloadSchema = z.object({
  model_number: text,
  input_voltage_range: z
    .object({
      lower: text,
      upper: text,
      evidence: text,
    })
    .nullish(),
  output_voltage: z
    .object({
      value: text,
      dual_output: z.boolean().nullish(),
      evidence: text,
    })
    .nullish(),
  output_power: valueField.nullish(),
  package: valueField.nullish(),
  isolation: valueField.nullish(),
  insulation: valueField.nullish(),
  dimension: z
    .object({
      length: text,
      width: text,
      height: text,
      evidence: text,
    })
    .nullish(),
  applications: z
    .object({
      values: z.array(z.string()).nullish(),
      evidence: text,
    })
    .nullish(),
});

export type FieldPayload = z.infer<typeof FieldPayloadSchema>;

export const DiscoveryPayloadSchema = z.object({
  models: z.array(z.string()),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Lists dotted paths present in `raw` that the field schema does not declare. These are
 * stripped by parsing; the list only feeds logging and the output file.
 */
export function unknownFieldPaths(raw: unknown): string[] {
  if (!isPlainObject(raw)) {
    return [];
  }
  const shape: Record<string, z.ZodTypeAny> = FieldPayloadSchema.shape;
  const unknown: string[] = [];
  for (const [key, value] of Object.entries(raw)) {
    const member = Object.hasOwn(shape, key) ? shape[key] : undefined;
    if (!member) {
      unknown.push(key);
      continue;
    }
    const inner = unwrapObject(member);
    if (inner && isPlainObject(value)) {
      const innerShape: Record<string, z.ZodTypeAny> = inner.shape;
      for (const innerKey of Object.keys(value)) {
        if (!Object.hasOwn(innerShape, innerKey)) {
          unknown.push(`${key}.${innerKey}`);
        }
      }
    }
  }
  return unknown;
}

function unwrapObject(schema: z.ZodTypeAny): z.AnyZodObject | undefined {
  let current: z.ZodTypeAny = schema;
  while (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
    current = current.unwrap();
  }
  return current instanceof z.ZodObject ? current : undefined;
}
