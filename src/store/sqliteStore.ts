import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { InvalidTransitionError, NotFoundError } from "../errors";
import {
  ACTIVE_EXTRACTION_STATUSES,
  SPEC_FIELD_KEYS,
  type DownloadStatus,
  type DownloadTask,
  type EvidenceKey,
  type ExtractionMode,
  type ExtractionStatus,
  type ExtractionTask,
  type FieldEvidence,
  type FileAsset,
  type FileLink,
  type ModelRecord,
  type PartialFailure,
  type ServiceTier,
  type SpecFields,
  type VerifyStatus,
} from "../types";
import type {
  CreateExtractionResult,
  DownloadOutcome,
  DownloadTaskFilter,
  ExtractionOutcome,
  ExtractionTaskFilter,
  ModelListFilter,
  ModelPage,
  ModelWriteDecider,
  NewExtractionTask,
  NewFileAsset,
  PipelineStore,
  RecoveredTasks,
  StoreStats,
} from "./types";

type FileAssetRow = {
  fileHash: string;
  filename: string;
  sizeBytes: number;
  sourceUrl: string | null;
  localPath: string;
  createdAt: string;
};

type DownloadTaskRow = {
  id: number;
  sourceUrl: string;
  siteName: string | null;
  status: DownloadStatus;
  fileHash: string | null;
  error: string | null;
  attempts: number;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
};

type ExtractionTaskRow = {
  id: number;
  fileHash: string;
  status: ExtractionStatus;
  mode: ExtractionMode;
  forceRerun: number;
  llmModel: string | null;
  serviceTier: ServiceTier | null;
  promptTokens: number | null;
  completionTokens: number | null;
  inputTokens: number | null;
  cachedInputTokens: number | null;
  outputTokens: number | null;
  costUsd: number | null;
  costError: string | null;
  outputLocation: string | null;
  error: string | null;
  partialFailures: string | null;
  cancelRequested: number;
  retryCount: number;
  createdAt: string;
  submittedAt: string | null;
  startedAt: string | null;
  completedAt: string | null;
};

type ModelRow = {
  modelNumber: string;
  input_voltage_range: string | null;
  output_voltage: string | null;
  output_power: string | null;
  package: string | null;
  isolation: string | null;
  insulation: string | null;
  dimension: string | null;
  verifyStatus: VerifyStatus;
  reviewer: string | null;
  reviewedAt: string | null;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
};

type ApplicationRow = { modelNumber: string; tag: string };

type LinkRow = { modelNumber: string; fileHash: string; filename: string; createdAt: string };

type EvidenceRow = {
  modelNumber: string;
  fileHash: string;
  fieldKey: EvidenceKey;
  evidence: string;
  taskId: number | null;
  recordedAt: string;
};

const ACTIVE_STATUS_SQL = `(${ACTIVE_EXTRACTION_STATUSES.map((status) => `'${status}'`).join(", ")})`;

const MODEL_COLUMNS = `
  modelNumber, input_voltage_range, output_voltage, output_power, package,
  isolation, insulation, dimension, verifyStatus, reviewer, reviewedAt, notes,
  createdAt, updatedAt
`;

const EXTRACTION_COLUMNS = `
  id, fileHash, status, mode, forceRerun, llmModel, serviceTier, promptTokens,
  completionTokens, inputTokens, cachedInputTokens, outputTokens, costUsd, costError,
  outputLocation, error, partialFailures, cancelRequested, retryCount, createdAt,
  submittedAt, startedAt, completedAt
`;

function toFileAsset(row: FileAssetRow): FileAsset {
  return {
    fileHash: row.fileHash,
    filename: row.filename,
    sizeBytes: row.sizeBytes,
    sourceUrl: row.sourceUrl ?? undefined,
    localPath: row.localPath,
    createdAt: row.createdAt,
  };
}

function toDownloadTask(row: DownloadTaskRow): DownloadTask {
  return {
    id: row.id,
    sourceUrl: row.sourceUrl,
    siteName: row.siteName ?? undefined,
    status: row.status,
    fileHash: row.fileHash ?? undefined,
    error: row.error ?? undefined,
    attempts: row.attempts,
    createdAt: row.createdAt,
    startedAt: row.startedAt ?? undefined,
    completedAt: row.completedAt ?? undefined,
  };
}

function parsePartialFailures(raw: string | null): PartialFailure[] {
  if (!raw) {
    return [];
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    return [];
  }
  const entries: unknown[] = parsed;
  const failures: PartialFailure[] = [];
  for (const entry of entries) {
    if (typeof entry === "object" && entry !== null && "modelNumber" in entry && "reason" in entry) {
      failures.push({ modelNumber: String(entry.modelNumber), reason: String(entry.reason) });
    }
  }
  return failures;
}

function toExtractionTask(row: ExtractionTaskRow): ExtractionTask {
  return {
    id: row.id,
    fileHash: row.fileHash,
    status: row.status,
    mode: row.mode,
    forceRerun: row.forceRerun === 1,
    llmModel: row.llmModel ?? undefined,
    serviceTier: row.serviceTier ?? undefined,
    promptTokens: row.promptTokens ?? undefined,
    completionTokens: row.completionTokens ?? undefined,
    inputTokens: row.inputTokens ?? undefined,
    cachedInputTokens: row.cachedInputTokens ?? undefined,
    outputTokens: row.outputTokens ?? undefined,
    costUsd: row.costUsd ?? undefined,
    costError: row.costError ?? undefined,
    outputLocation: row.outputLocation ?? undefined,
    error: row.error ?? undefined,
    partialFailures: parsePartialFailures(row.partialFailures),
    cancelRequested: row.cancelRequested === 1,
    retryCount: row.retryCount,
    createdAt: row.createdAt,
    submittedAt: row.submittedAt ?? undefined,
    startedAt: row.startedAt ?? undefined,
    completedAt: row.completedAt ?? undefined,
  };
}

function fieldsFromRow(row: ModelRow): SpecFields {
  return {
    input_voltage_range: row.input_voltage_range,
    output_voltage: row.output_voltage,
    output_power: row.output_power,
    package: row.package,
    isolation: row.isolation,
    insulation: row.insulation,
    dimension: row.dimension,
  };
}

function placeholders(count: number): string {
  return new Array(count).fill("?").join(", ");
}

export class SqliteStore implements PipelineStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");
    this.initializeSchema();
  }

  async insertFileAssetIfAbsent(asset: NewFileAsset): Promise<{ asset: FileAsset; created: boolean }> {
    const result = this.db
      .prepare(
        `
        INSERT INTO file_asset (fileHash, filename, sizeBytes, sourceUrl, localPath, createdAt)
        VALUES (@fileHash, @filename, @sizeBytes, @sourceUrl, @localPath, @createdAt)
        ON CONFLICT(fileHash) DO NOTHING
      `,
      )
      .run({
        fileHash: asset.fileHash,
        filename: asset.filename,
        sizeBytes: asset.sizeBytes,
        sourceUrl: asset.sourceUrl ?? null,
        localPath: asset.localPath,
        createdAt: asset.createdAt,
      });

    const stored = await this.getFileAsset(asset.fileHash);
    if (!stored) {
      throw new NotFoundError("file", asset.fileHash);
    }
    return { asset: stored, created: result.changes > 0 };
  }

  async getFileAsset(fileHash: string): Promise<FileAsset | undefined> {
    const row = this.db.prepare("SELECT * FROM file_asset WHERE fileHash = ?").get(fileHash) as FileAssetRow | undefined;
    return row ? toFileAsset(row) : undefined;
  }

  async listFileAssets(limit: number, offset = 0): Promise<FileAsset[]> {
    const rows = this.db
      .prepare("SELECT * FROM file_asset ORDER BY createdAt DESC, fileHash ASC LIMIT ? OFFSET ?")
      .all(limit, offset) as FileAssetRow[];
    return rows.map(toFileAsset);
  }

  async deleteFileAsset(fileHash: string): Promise<boolean> {
    return this.db.prepare("DELETE FROM file_asset WHERE fileHash = ?").run(fileHash).changes > 0;
  }

  async createDownloadTask(sourceUrl: string, siteName: string | undefined, createdAt: string): Promise<DownloadTask> {
    const result = this.db
      .prepare(
        `
        INSERT INTO download_task (sourceUrl, siteName, status, attempts, createdAt)
        VALUES (?, ?, 'queued', 0, ?)
      `,
      )
      .run(sourceUrl, siteName ?? null, createdAt);
    return this.requireDownloadTask(Number(result.lastInsertRowid));
  }

  async getDownloadTask(id: number): Promise<DownloadTask | undefined> {
    const row = this.db.prepare("SELECT * FROM download_task WHERE id = ?").get(id) as DownloadTaskRow | undefined;
    return row ? toDownloadTask(row) : undefined;
  }

  async claimDownloadTask(id: number, startedAt: string): Promise<DownloadTask | undefined> {
    const result = this.db
      .prepare("UPDATE download_task SET status = 'running', startedAt = ? WHERE id = ? AND status = 'queued'")
      .run(startedAt, id);
    return result.changes > 0 ? this.requireDownloadTask(id) : undefined;
  }

  async completeDownloadTask(id: number, outcome: DownloadOutcome): Promise<DownloadTask> {
    this.db
      .prepare(
        `
        UPDATE download_task
        SET
          status = @status,
          fileHash = @fileHash,
          error = @error,
          attempts = attempts + @attempts,
          completedAt = @completedAt
        WHERE id = @id AND status = 'running'
      `,
      )
      .run({
        id,
        status: outcome.status,
        fileHash: outcome.status === "success" ? outcome.fileHash : null,
        error: outcome.status === "failed" ? outcome.error : null,
        attempts: outcome.attempts,
        completedAt: outcome.completedAt,
      });
    return this.requireDownloadTask(id);
  }

  async resetDownloadTask(id: number): Promise<DownloadTask> {
    const current = this.requireDownloadTask(id);
    if (current.status !== "failed") {
      throw new InvalidTransitionError(`download task ${id} is ${current.status}; only failed tasks can be retried`);
    }
    this.db
      .prepare(
        `
        UPDATE download_task
        SET status = 'queued', error = NULL, fileHash = NULL, startedAt = NULL, completedAt = NULL
        WHERE id = ? AND status = 'failed'
      `,
      )
      .run(id);
    return this.requireDownloadTask(id);
  }

  async deleteQueuedDownloadTask(id: number): Promise<boolean> {
    return this.db.prepare("DELETE FROM download_task WHERE id = ? AND status = 'queued'").run(id).changes > 0;
  }

  async listDownloadTasks(filter: DownloadTaskFilter = {}): Promise<DownloadTask[]> {
    const rows = this.db
      .prepare(
        `
        SELECT * FROM download_task
        WHERE (@status IS NULL OR status = @status)
        ORDER BY id DESC
        LIMIT @limit
      `,
      )
      .all({ status: filter.status ?? null, limit: filter.limit ?? 100 }) as DownloadTaskRow[];
    return rows.map(toDownloadTask);
  }

  async createExtractionTask(task: NewExtractionTask): Promise<CreateExtractionResult> {
    const create = this.db.transaction((input: NewExtractionTask): CreateExtractionResult => {
      // A forced rerun is an explicit request for another run alongside the active one.
      const active = input.forceRerun ? undefined : this.activeExtractionRow(input.fileHash);
      if (active) {
        return { task: toExtractionTask(active), created: false };
      }
      const result = this.db
        .prepare(
          `
          INSERT INTO extraction_task (fileHash, status, mode, forceRerun, partialFailures, createdAt)
          VALUES (?, 'queued', ?, ?, '[]', ?)
        `,
        )
        .run(input.fileHash, input.mode, input.forceRerun ? 1 : 0, input.createdAt);
      return { task: this.requireExtractionTask(Number(result.lastInsertRowid)), created: true };
    });
    return create(task);
  }

  async getExtractionTask(id: number): Promise<ExtractionTask | undefined> {
    const row = this.db.prepare(`SELECT ${EXTRACTION_COLUMNS} FROM extraction_task WHERE id = ?`).get(id) as
      | ExtractionTaskRow
      | undefined;
    return row ? toExtractionTask(row) : undefined;
  }

  async findActiveExtraction(fileHash: string): Promise<ExtractionTask | undefined> {
    const row = this.activeExtractionRow(fileHash);
    return row ? toExtractionTask(row) : undefined;
  }

  async hasSucceededExtraction(fileHash: string): Promise<boolean> {
    const row = this.db
      .prepare("SELECT 1 AS found FROM extraction_task WHERE fileHash = ? AND status = 'succeeded' LIMIT 1")
      .get(fileHash) as { found: number } | undefined;
    return row !== undefined;
  }

  async claimExtractionTask(id: number, submittedAt: string): Promise<ExtractionTask | undefined> {
    const result = this.db
      .prepare("UPDATE extraction_task SET status = 'submitted', submittedAt = ? WHERE id = ? AND status = 'queued'")
      .run(submittedAt, id);
    return result.changes > 0 ? this.requireExtractionTask(id) : undefined;
  }

  async markExtractionRunning(id: number, startedAt: string): Promise<ExtractionTask | undefined> {
    const result = this.db
      .prepare("UPDATE extraction_task SET status = 'running', startedAt = ? WHERE id = ? AND status = 'submitted'")
      .run(startedAt, id);
    return result.changes > 0 ? this.requireExtractionTask(id) : undefined;
  }

  async completeExtractionTask(id: number, outcome: ExtractionOutcome): Promise<ExtractionTask> {
    const usage = outcome.usage;
    this.db
      .prepare(
        `
        UPDATE extraction_task
        SET
          status = @status,
          llmModel = COALESCE(@llmModel, llmModel),
          serviceTier = COALESCE(@serviceTier, serviceTier),
          promptTokens = @promptTokens,
          completionTokens = @completionTokens,
          inputTokens = @inputTokens,
          cachedInputTokens = @cachedInputTokens,
          outputTokens = @outputTokens,
          costUsd = @costUsd,
          costError = @costError,
          outputLocation = @outputLocation,
          error = @error,
          partialFailures = @partialFailures,
          completedAt = @completedAt
        WHERE id = @id AND status IN ${ACTIVE_STATUS_SQL}
      `,
      )
      .run({
        id,
        status: outcome.status,
        llmModel: outcome.llmModel ?? null,
        serviceTier: outcome.serviceTier ?? null,
        promptTokens: usage ? usage.input : null,
        completionTokens: usage ? usage.output : null,
        inputTokens: usage ? usage.input : null,
        cachedInputTokens: usage ? usage.cachedInput : null,
        outputTokens: usage ? usage.output : null,
        costUsd: outcome.costUsd ?? null,
        costError: outcome.costError ?? null,
        outputLocation: outcome.outputLocation ?? null,
        error: outcome.error ?? null,
        partialFailures: JSON.stringify(outcome.partialFailures ?? []),
        completedAt: outcome.completedAt,
      });
    return this.requireExtractionTask(id);
  }

  async cancelQueuedExtraction(id: number, reason: string, completedAt: string): Promise<boolean> {
    const result = this.db
      .prepare(
        "UPDATE extraction_task SET status = 'canceled', error = ?, completedAt = ? WHERE id = ? AND status = 'queued'",
      )
      .run(reason, completedAt, id);
    return result.changes > 0;
  }

  async requestExtractionCancel(id: number): Promise<boolean> {
    const result = this.db
      .prepare(
        "UPDATE extraction_task SET cancelRequested = 1 WHERE id = ? AND status IN ('submitted', 'running')",
      )
      .run(id);
    return result.changes > 0;
  }

  async resetExtractionTask(id: number): Promise<ExtractionTask> {
    const reset = this.db.transaction((taskId: number): ExtractionTask => {
      const current = this.requireExtractionTask(taskId);
      if (current.status !== "failed") {
        throw new InvalidTransitionError(
          `extraction task ${taskId} is ${current.status}; only failed tasks can be retried`,
        );
      }
      const active = this.activeExtractionRow(current.fileHash);
      if (active) {
        throw new InvalidTransitionError(
          `extraction task ${active.id} is already active for file ${current.fileHash}`,
        );
      }
      this.db
        .prepare(
          `
          UPDATE extraction_task
          SET
            status = 'queued',
            promptTokens = NULL,
            completionTokens = NULL,
            inputTokens = NULL,
            cachedInputTokens = NULL,
            outputTokens = NULL,
            costUsd = NULL,
            costError = NULL,
            outputLocation = NULL,
            error = NULL,
            partialFailures = '[]',
            cancelRequested = 0,
            retryCount = retryCount + 1,
            submittedAt = NULL,
            startedAt = NULL,
            completedAt = NULL
          WHERE id = ? AND status = 'failed'
        `,
        )
        .run(taskId);
      return this.requireExtractionTask(taskId);
    });
    return reset(id);
  }

  async listExtractionTasks(filter: ExtractionTaskFilter = {}): Promise<ExtractionTask[]> {
    const rows = this.db
      .prepare(
        `
        SELECT ${EXTRACTION_COLUMNS} FROM extraction_task
        WHERE
          (@status IS NULL OR status = @status)
          AND (@mode IS NULL OR mode = @mode)
          AND (@fileHash IS NULL OR fileHash = @fileHash)
        ORDER BY id DESC
        LIMIT @limit
      `,
      )
      .all({
        status: filter.status ?? null,
        mode: filter.mode ?? null,
        fileHash: filter.fileHash ?? null,
        limit: filter.limit ?? 100,
      }) as ExtractionTaskRow[];
    return rows.map(toExtractionTask);
  }

  async getModelRecord(modelNumber: string): Promise<ModelRecord | undefined> {
    return this.readModel(modelNumber);
  }

  async writeModelRecord(modelNumber: string, decide: ModelWriteDecider, now: string): Promise<ModelRecord> {
    const write = this.db.transaction((): ModelRecord => {
      const current = this.readModel(modelNumber);
      const next = decide(current);
      const params = {
        modelNumber,
        ...next.fields,
        verifyStatus: next.verifyStatus,
        reviewer: next.reviewer,
        reviewedAt: next.reviewedAt,
        notes: next.notes,
        now,
      };

      if (current) {
        this.db
          .prepare(
            `
            UPDATE model_record
            SET
              input_voltage_range = @input_voltage_range,
              output_voltage = @output_voltage,
              output_power = @output_power,
              package = @package,
              isolation = @isolation,
              insulation = @insulation,
              dimension = @dimension,
              verifyStatus = @verifyStatus,
              reviewer = @reviewer,
              reviewedAt = @reviewedAt,
              notes = @notes,
              updatedAt = @now
            WHERE modelNumber = @modelNumber
          `,
          )
          .run(params);
      } else {
        this.db
          .prepare(
            `
            INSERT INTO model_record (${MODEL_COLUMNS})
            VALUES (
              @modelNumber, @input_voltage_range, @output_voltage, @output_power, @package,
              @isolation, @insulation, @dimension, @verifyStatus, @reviewer, @reviewedAt, @notes,
              @now, @now
            )
          `,
          )
          .run(params);
      }

      this.db.prepare("DELETE FROM model_application WHERE modelNumber = ?").run(modelNumber);
      const insertTag = this.db.prepare(
        "INSERT OR IGNORE INTO model_application (modelNumber, tag, tagCanon) VALUES (?, ?, ?)",
      );
      for (const tag of next.applications) {
        insertTag.run(modelNumber, tag, tag.trim().toLowerCase());
      }

      const stored = this.readModel(modelNumber);
      if (!stored) {
        throw new NotFoundError("model", modelNumber);
      }
      return stored;
    });
    return write();
  }

  async deleteModelRecord(modelNumber: string): Promise<boolean> {
    return this.db.prepare("DELETE FROM model_record WHERE modelNumber = ?").run(modelNumber).changes > 0;
  }

  async listModelRecords(filter: ModelListFilter): Promise<ModelPage> {
    const where = `
      (@q IS NULL OR m.modelNumber LIKE @q)
      AND (@status IS NULL OR m.verifyStatus = @status)
      AND (
        @hasFiles IS NULL
        OR (@hasFiles = 1 AND EXISTS (SELECT 1 FROM file_model_link l WHERE l.modelNumber = m.modelNumber))
        OR (@hasFiles = 0 AND NOT EXISTS (SELECT 1 FROM file_model_link l WHERE l.modelNumber = m.modelNumber))
      )
    `;
    const params = {
      q: filter.q ? `%${filter.q}%` : null,
      status: filter.status ?? null,
      hasFiles: filter.hasFiles === undefined ? null : filter.hasFiles ? 1 : 0,
    };
    const total = (
      this.db.prepare(`SELECT COUNT(*) AS count FROM model_record m WHERE ${where}`).get(params) as { count: number }
    ).count;
    const rows = this.db
      .prepare(
        `
        SELECT ${MODEL_COLUMNS} FROM model_record m
        WHERE ${where}
        ORDER BY m.modelNumber ASC
        LIMIT @limit OFFSET @offset
      `,
      )
      .all({
        ...params,
        limit: filter.pageSize,
        offset: (filter.page - 1) * filter.pageSize,
      }) as ModelRow[];

    return { items: this.hydrate(rows), total, page: filter.page, pageSize: filter.pageSize };
  }

  async listModelsForFile(fileHash: string): Promise<ModelRecord[]> {
    const rows = this.db
      .prepare(
        `
        SELECT ${MODEL_COLUMNS} FROM model_record
        WHERE modelNumber IN (SELECT modelNumber FROM file_model_link WHERE fileHash = ?)
        ORDER BY modelNumber ASC
      `,
      )
      .all(fileHash) as ModelRow[];
    return this.hydrate(rows);
  }

  async linkFileModel(fileHash: string, modelNumber: string): Promise<void> {
    this.db
      .prepare("INSERT OR IGNORE INTO file_model_link (fileHash, modelNumber) VALUES (?, ?)")
      .run(fileHash, modelNumber);
  }

  async unlinkFileModel(fileHash: string, modelNumber: string): Promise<boolean> {
    return (
      this.db.prepare("DELETE FROM file_model_link WHERE fileHash = ? AND modelNumber = ?").run(fileHash, modelNumber)
        .changes > 0
    );
  }

  async unlinkAllModelsForFile(fileHash: string): Promise<number> {
    return this.db.prepare("DELETE FROM file_model_link WHERE fileHash = ?").run(fileHash).changes;
  }

  async replaceEvidence(
    modelNumber: string,
    fileHash: string,
    taskId: number | undefined,
    evidence: Partial<Record<EvidenceKey, string>>,
    recordedAt: string,
  ): Promise<void> {
    const replace = this.db.transaction(() => {
      this.db.prepare("DELETE FROM field_evidence WHERE modelNumber = ? AND fileHash = ?").run(modelNumber, fileHash);
      const insert = this.db.prepare(`
        INSERT INTO field_evidence (modelNumber, fileHash, fieldKey, evidence, taskId, recordedAt)
        VALUES (?, ?, ?, ?, ?, ?)
      `);
      for (const [fieldKey, text] of Object.entries(evidence)) {
        if (text) {
          insert.run(modelNumber, fileHash, fieldKey, text, taskId ?? null, recordedAt);
        }
      }
    });
    replace();
  }

  async listEvidence(modelNumber: string): Promise<FieldEvidence[]> {
    const rows = this.db
      .prepare(
        `
        SELECT modelNumber, fileHash, fieldKey, evidence, taskId, recordedAt
        FROM field_evidence
        WHERE modelNumber = ?
        ORDER BY recordedAt DESC, fieldKey ASC
      `,
      )
      .all(modelNumber) as EvidenceRow[];
    return rows.map((row) => ({
      modelNumber: row.modelNumber,
      fileHash: row.fileHash,
      fieldKey: row.fieldKey,
      evidence: row.evidence,
      taskId: row.taskId ?? undefined,
      recordedAt: row.recordedAt,
    }));
  }

  async pageModelRecords(afterModelNumber: string | undefined, limit: number, status?: VerifyStatus): Promise<ModelRecord[]> {
    const rows = this.db
      .prepare(
        `
        SELECT ${MODEL_COLUMNS} FROM model_record
        WHERE (@after IS NULL OR modelNumber > @after)
          AND (@status IS NULL OR verifyStatus = @status)
        ORDER BY modelNumber ASC
        LIMIT @limit
      `,
      )
      .all({ after: afterModelNumber ?? null, status: status ?? null, limit }) as ModelRow[];
    return this.hydrate(rows);
  }

  async getModelRecordsByNumbers(modelNumbers: readonly string[], status?: VerifyStatus): Promise<ModelRecord[]> {
    if (modelNumbers.length === 0) {
      return [];
    }
    const statusClause = status ? "AND verifyStatus = ?" : "";
    const args: string[] = status ? [...modelNumbers, status] : [...modelNumbers];
    const rows = this.db
      .prepare(
        `
        SELECT ${MODEL_COLUMNS} FROM model_record
        WHERE modelNumber IN (${placeholders(modelNumbers.length)}) ${statusClause}
        ORDER BY modelNumber ASC
      `,
      )
      .all(...args) as ModelRow[];
    return this.hydrate(rows);
  }

  async recoverInterruptedTasks(now: string): Promise<RecoveredTasks> {
    const recover = this.db.transaction((): RecoveredTasks => {
      const ids = (sql: string): number[] =>
        (this.db.prepare(sql).all() as Array<{ id: number }>).map((row) => row.id);

      const interruptedDownloads = ids("SELECT id FROM download_task WHERE status = 'running' ORDER BY id");
      const interruptedExtractions = ids(
        "SELECT id FROM extraction_task WHERE status IN ('submitted', 'running') ORDER BY id",
      );

      this.db
        .prepare(
          "UPDATE download_task SET status = 'failed', error = 'interrupted: process exited before completion', completedAt = ? WHERE status = 'running'",
        )
        .run(now);
      this.db
        .prepare(
          `
          UPDATE extraction_task
          SET status = 'failed', error = 'interrupted: process exited before completion', completedAt = ?
          WHERE status IN ('submitted', 'running')
        `,
        )
        .run(now);

      return {
        interruptedDownloads,
        interruptedExtractions,
        queuedDownloads: ids("SELECT id FROM download_task WHERE status = 'queued' ORDER BY id"),
        queuedExtractions: ids("SELECT id FROM extraction_task WHERE status = 'queued' ORDER BY id"),
      };
    });
    return recover();
  }

  async getStats(): Promise<StoreStats> {
    const downloads: Record<DownloadStatus, number> = { queued: 0, running: 0, success: 0, failed: 0 };
    const downloadRows = this.db
      .prepare("SELECT status, COUNT(*) AS count FROM download_task GROUP BY status")
      .all() as Array<{ status: DownloadStatus; count: number }>;
    for (const row of downloadRows) {
      downloads[row.status] = row.count;
    }

    const extractions: Record<ExtractionStatus, number> = {
      queued: 0,
      submitted: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      canceled: 0,
    };
    const extractionRows = this.db
      .prepare("SELECT status, COUNT(*) AS count FROM extraction_task GROUP BY status")
      .all() as Array<{ status: ExtractionStatus; count: number }>;
    for (const row of extractionRows) {
      extractions[row.status] = row.count;
    }

    return {
      files: this.countWhere("file_asset", "1 = 1"),
      models: this.countWhere("model_record", "1 = 1"),
      verifiedModels: this.countWhere("model_record", "verifyStatus = 'verified'"),
      downloads,
      extractions,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private requireDownloadTask(id: number): DownloadTask {
    const row = this.db.prepare("SELECT * FROM download_task WHERE id = ?").get(id) as DownloadTaskRow | undefined;
    if (!row) {
      throw new NotFoundError("download_task", id);
    }
    return toDownloadTask(row);
  }

  private requireExtractionTask(id: number): ExtractionTask {
    const row = this.db.prepare(`SELECT ${EXTRACTION_COLUMNS} FROM extraction_task WHERE id = ?`).get(id) as
      | ExtractionTaskRow
      | undefined;
    if (!row) {
      throw new NotFoundError("extraction_task", id);
    }
    return toExtractionTask(row);
  }

  private activeExtractionRow(fileHash: string): ExtractionTaskRow | undefined {
    return this.db
      .prepare(
        `
        SELECT ${EXTRACTION_COLUMNS} FROM extraction_task
        WHERE fileHash = ? AND status IN ${ACTIVE_STATUS_SQL}
        ORDER BY id DESC
        LIMIT 1
      `,
      )
      .get(fileHash) as ExtractionTaskRow | undefined;
  }

  private readModel(modelNumber: string): ModelRecord | undefined {
    const row = this.db.prepare(`SELECT ${MODEL_COLUMNS} FROM model_record WHERE modelNumber = ?`).get(modelNumber) as
      | ModelRow
      | undefined;
    return row ? this.hydrate([row])[0] : undefined;
  }

  /** Attaches applications and linked files to a batch of model rows, preserving row order. */
  private hydrate(rows: ModelRow[]): ModelRecord[] {
    if (rows.length === 0) {
      return [];
    }
    const numbers = rows.map((row) => row.modelNumber);
    const inList = placeholders(numbers.length);

    const applications = new Map<string, string[]>();
    const appRows = this.db
      .prepare(`SELECT modelNumber, tag FROM model_application WHERE modelNumber IN (${inList}) ORDER BY id ASC`)
      .all(...numbers) as ApplicationRow[];
    for (const row of appRows) {
      const tags = applications.get(row.modelNumber) ?? [];
      tags.push(row.tag);
      applications.set(row.modelNumber, tags);
    }

    const files = new Map<string, FileLink[]>();
    const linkRows = this.db
      .prepare(
        `
        SELECT l.modelNumber, f.fileHash, f.filename, f.createdAt
        FROM file_model_link l
        JOIN file_asset f ON f.fileHash = l.fileHash
        WHERE l.modelNumber IN (${inList})
        ORDER BY f.createdAt DESC, f.fileHash ASC
      `,
      )
      .all(...numbers) as LinkRow[];
    for (const row of linkRows) {
      const links = files.get(row.modelNumber) ?? [];
      links.push({ fileHash: row.fileHash, filename: row.filename, createdAt: row.createdAt });
      files.set(row.modelNumber, links);
    }

    return rows.map((row) => ({
      modelNumber: row.modelNumber,
      fields: fieldsFromRow(row),
      applications: applications.get(row.modelNumber) ?? [],
      verifyStatus: row.verifyStatus,
      reviewer: row.reviewer,
      reviewedAt: row.reviewedAt,
      notes: row.notes,
      files: files.get(row.modelNumber) ?? [],
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    }));
  }

  private countWhere(tableName: string, whereClause: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${tableName} WHERE ${whereClause}`).get() as {
      count: number;
    };
    return row.count;
  }

  private initializeSchema(): void {
    const fieldColumns = SPEC_FIELD_KEYS.map((key) => `${key} TEXT NULL`).join(",\n        ");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS file_asset (
        fileHash TEXT PRIMARY KEY,
        filename TEXT NOT NULL,
        sizeBytes INTEGER NOT NULL,
        sourceUrl TEXT NULL,
        localPath TEXT NOT NULL,
        createdAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS download_task (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sourceUrl TEXT NOT NULL,
        siteName TEXT NULL,
        status TEXT NOT NULL CHECK (status IN ('queued', 'running', 'success', 'failed')),
        fileHash TEXT NULL REFERENCES file_asset(fileHash) ON DELETE SET NULL,
        error TEXT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        createdAt TEXT NOT NULL,
        startedAt TEXT NULL,
        completedAt TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS extraction_task (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        fileHash TEXT NOT NULL REFERENCES file_asset(fileHash) ON DELETE CASCADE,
        status TEXT NOT NULL
          CHECK (status IN ('queued', 'submitted', 'running', 'succeeded', 'failed', 'canceled')),
        mode TEXT NOT NULL CHECK (mode IN ('sync', 'batch', 'background')),
        forceRerun INTEGER NOT NULL DEFAULT 0,
        llmModel TEXT NULL,
        serviceTier TEXT NULL,
        promptTokens INTEGER NULL,
        completionTokens INTEGER NULL,
        inputTokens INTEGER NULL,
        cachedInputTokens INTEGER NULL,
        outputTokens INTEGER NULL,
        costUsd REAL NULL,
        outputLocation TEXT NULL,
        error TEXT NULL,
        cancelRequested INTEGER NOT NULL DEFAULT 0,
        retryCount INTEGER NOT NULL DEFAULT 0,
        createdAt TEXT NOT NULL,
        submittedAt TEXT NULL,
        startedAt TEXT NULL,
        completedAt TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS model_record (
        modelNumber TEXT PRIMARY KEY,
        ${fieldColumns},
        verifyStatus TEXT NOT NULL DEFAULT 'unverified' CHECK (verifyStatus IN ('unverified', 'verified')),
        reviewer TEXT NULL,
        reviewedAt TEXT NULL,
        notes TEXT NULL,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        CHECK (verifyStatus = 'unverified' OR reviewedAt IS NOT NULL)
      );

      CREATE TABLE IF NOT EXISTS model_application (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        modelNumber TEXT NOT NULL REFERENCES model_record(modelNumber) ON DELETE CASCADE,
        tag TEXT NOT NULL,
        tagCanon TEXT NOT NULL,
        UNIQUE (modelNumber, tagCanon)
      );

      CREATE TABLE IF NOT EXISTS file_model_link (
        fileHash TEXT NOT NULL REFERENCES file_asset(fileHash) ON DELETE CASCADE,
        modelNumber TEXT NOT NULL REFERENCES model_record(modelNumber) ON DELETE CASCADE,
        PRIMARY KEY (fileHash, modelNumber)
      );

      CREATE TABLE IF NOT EXISTS field_evidence (
        modelNumber TEXT NOT NULL REFERENCES model_record(modelNumber) ON DELETE CASCADE,
        fileHash TEXT NOT NULL REFERENCES file_asset(fileHash) ON DELETE CASCADE,
        fieldKey TEXT NOT NULL,
        evidence TEXT NOT NULL,
        taskId INTEGER NULL,
        recordedAt TEXT NOT NULL,
        PRIMARY KEY (modelNumber, fileHash, fieldKey)
      );

      CREATE INDEX IF NOT EXISTS idx_download_task_status ON download_task(status);
      CREATE INDEX IF NOT EXISTS idx_extraction_task_status ON extraction_task(status);
      CREATE INDEX IF NOT EXISTS idx_extraction_task_file ON extraction_task(fileHash);
      CREATE INDEX IF NOT EXISTS idx_model_record_status ON model_record(verifyStatus);
      CREATE INDEX IF NOT EXISTS idx_file_model_link_model ON file_model_link(modelNumber);
    `);

    this.ensureColumn("extraction_task", "costError", "TEXT NULL");
    this.ensureColumn("extraction_task", "partialFailures", "TEXT NOT NULL DEFAULT '[]'");
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
