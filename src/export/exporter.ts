import type { PipelineStore } from "../store";
import type { ModelRecord, SpecFields, VerifyStatus } from "../types";

export const LOOKUP_CHUNK_SIZE = 900;
const DEFAULT_PAGE_SIZE = 500;

export interface ExportFile {
  file_hash: string;
  filename: string;
}

export interface ExportRow extends SpecFields {
  model_number: string;
  applications: string[];
  verify_status: VerifyStatus;
  reviewer: string | null;
  reviewed_at: string | null;
  files: ExportFile[];
}

export interface ExportAllOptions {
  status?: VerifyStatus;
  pageSize?: number;
}

export interface ExportByListOptions {
  status?: VerifyStatus;
  preserveOrder?: boolean;
  chunkSize?: number;
}

/** ISO 8601 in UTC with a `Z` suffix and no fractional seconds. */
export function toIsoSeconds(value: string | null): string | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return value;
  }
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function toExportRow(record: ModelRecord): ExportRow {
  const files = [...record.files].sort(
    (a, b) => b.createdAt.localeCompare(a.createdAt) || a.fileHash.localeCompare(b.fileHash),
  );
  return {
    model_number: record.modelNumber,
    ...record.fields,
    applications: [...record.applications],
    verify_status: record.verifyStatus,
    reviewer: record.reviewer,
    reviewed_at: toIsoSeconds(record.reviewedAt),
    files: files.map((file) => ({ file_hash: file.fileHash, filename: file.filename })),
  };
}

/** Whole corpus in ascending model number order, read page by page on the primary key. */
export async function* exportAll(store: PipelineStore, options: ExportAllOptions = {}): AsyncGenerator<ExportRow> {
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  let after: string | undefined;
  while (true) {
    const page = await store.pageModelRecords(after, pageSize, options.status);
    for (const record of page) {
      yield toExportRow(record);
    }
    if (page.length < pageSize) {
      return;
    }
    after = page[page.length - 1].modelNumber;
  }
}

/** Byte order of the UTF-8 encodings, which is how SQLite's BINARY collation sorts. */
export function compareBinary(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
}

function cleanNumbers(values: readonly string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

/**
 * Records for a caller-supplied list. With `preserveOrder` the output follows the input,
 * repeats included; otherwise each number appears once in ascending order. Unknown numbers
 * and numbers failing the status filter are left out.
 */
export async function* exportByList(
  store: PipelineStore,
  modelNumbers: readonly string[],
  options: ExportByListOptions = {},
): AsyncGenerator<ExportRow> {
  const chunkSize = options.chunkSize ?? LOOKUP_CHUNK_SIZE;
  const numbers = cleanNumbers(modelNumbers);

  if (options.preserveOrder) {
    for (let start = 0; start < numbers.length; start += chunkSize) {
      const slice = numbers.slice(start, start + chunkSize);
      const found = await store.getModelRecordsByNumbers([...new Set(slice)], options.status);
      const byNumber = new Map(found.map((record) => [record.modelNumber, record]));
      for (const modelNumber of slice) {
        const record = byNumber.get(modelNumber);
        if (record) {
          yield toExportRow(record);
        }
      }
    }
    return;
  }

  const unique = [...new Set(numbers)].sort(compareBinary);
  for (let start = 0; start < unique.length; start += chunkSize) {
    const found = await store.getModelRecordsByNumbers(unique.slice(start, start + chunkSize), options.status);
    for (const record of found) {
      yield toExportRow(record);
    }
  }
}
