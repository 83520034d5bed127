import { once } from "node:events";
import type { Writable } from "node:stream";
import type { ExportRow } from "./exporter";

export type ExportFormat = "csv" | "json";

export const CSV_COLUMNS = [
  "model_number",
  "input_voltage_range",
  "output_voltage",
  "output_power",
  "package",
  "isolation",
  "insulation",
  "dimension",
  "applications",
  "verify_status",
  "reviewer",
  "reviewed_at",
  "files",
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

const BOM = "\ufeff";

export function escapeCsvValue(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvCells(row: ExportRow): Record<CsvColumn, string> {
  return {
    model_number: row.model_number,
    input_voltage_range: row.input_voltage_range ?? "",
    output_voltage: row.output_voltage ?? "",
    output_power: row.output_power ?? "",
    package: row.package ?? "",
    isolation: row.isolation ?? "",
    insulation: row.insulation ?? "",
    dimension: row.dimension ?? "",
    applications: row.applications.join("; "),
    verify_status: row.verify_status,
    reviewer: row.reviewer ?? "",
    reviewed_at: row.reviewed_at ?? "",
    files: row.files.map((file) => file.filename).join("; "),
  };
}

export function formatCsvLine(row: ExportRow): string {
  const cells = toCsvCells(row);
  return CSV_COLUMNS.map((column) => escapeCsvValue(cells[column])).join(",") + "\r\n";
}

async function write(out: Writable, chunk: string): Promise<void> {
  if (!out.write(chunk, "utf-8")) {
    await once(out, "drain");
  }
}

/** Streams rows as CSV, one write per record. Returns the number of records written. */
export async function writeCsv(rows: AsyncIterable<ExportRow>, out: Writable): Promise<number> {
  await write(out, BOM + CSV_COLUMNS.join(",") + "\r\n");
  let count = 0;
  for await (const row of rows) {
    await write(out, formatCsvLine(row));
    count += 1;
  }
  return count;
}

/** Streams rows as a JSON array without holding the whole result. */
export async function writeJson(rows: AsyncIterable<ExportRow>, out: Writable): Promise<number> {
  await write(out, "[");
  let count = 0;
  for await (const row of rows) {
    await write(out, `${count === 0 ? "\n" : ",\n"}${JSON.stringify(row)}`);
    count += 1;
  }
  await write(out, count === 0 ? "]\n" : "\n]\n");
  return count;
}

export async function writeExport(format: ExportFormat, rows: AsyncIterable<ExportRow>, out: Writable): Promise<number> {
  return format === "csv" ? writeCsv(rows, out) : writeJson(rows, out);
}
