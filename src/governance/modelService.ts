import { InvalidTransitionError, NotFoundError } from "../errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { ModelListFilter, ModelPage, ModelWrite, PipelineStore } from "../store";
import {
  SPEC_FIELD_KEYS,
  emptySpecFields,
  type EvidenceKey,
  type FieldEvidence,
  type ModelRecord,
  type SpecFields,
  type VerifyStatus,
} from "../types";
import {
  decideVerification,
  normalizeApplications,
  normalizeScalar,
  type VerificationDecision,
  type VerifyIntent,
} from "./verification";

export interface ModelRecordServiceDeps {
  store: PipelineStore;
  logger: Logger;
  metrics: MetricsRegistry;
  clock?: () => Date;
}

export interface ModelPatch {
  fields?: Partial<SpecFields>;
  applications?: readonly string[];
  notes?: string | null;
}

export interface ModelListQuery {
  q?: string;
  status?: VerifyStatus;
  hasFiles?: boolean;
  page?: number;
  pageSize?: number;
}

/** One model as produced by the field stage, already projected onto the record shape. */
export interface ExtractedModel {
  modelNumber: string;
  fields: SpecFields;
  applications: string[];
  evidence: Partial<Record<EvidenceKey, string>>;
}

export interface WriteResult {
  record: ModelRecord;
  decision: VerificationDecision;
  created: boolean;
}

function normalizeModelNumber(modelNumber: string): string {
  const trimmed = modelNumber.trim();
  if (!trimmed) {
    throw new Error("model number must not be blank");
  }
  return trimmed;
}

function normalizeFields(patch: Partial<SpecFields>): Partial<SpecFields> {
  const result: Partial<SpecFields> = {};
  for (const key of SPEC_FIELD_KEYS) {
    if (key in patch) {
      result[key] = normalizeScalar(patch[key]);
    }
  }
  return result;
}

export class ModelRecordService {
  private readonly store: PipelineStore;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly clock: () => Date;

  constructor(deps: ModelRecordServiceDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.clock = deps.clock ?? (() => new Date());
  }

  async get(modelNumber: string): Promise<ModelRecord> {
    const record = await this.store.getModelRecord(modelNumber.trim());
    if (!record) {
      throw new NotFoundError("model", modelNumber);
    }
    return record;
  }

  async list(query: ModelListQuery = {}): Promise<ModelPage> {
    const filter: ModelListFilter = {
      q: query.q?.trim() || undefined,
      status: query.status,
      hasFiles: query.hasFiles,
      page: Math.max(1, query.page ?? 1),
      pageSize: Math.min(Math.max(1, query.pageSize ?? 50), 500),
    };
    return this.store.listModelRecords(filter);
  }

  /** Reviewer-side creation of a record that no extraction produced. */
  async create(modelNumber: string, patch: ModelPatch = {}, intent: VerifyIntent = {}): Promise<WriteResult> {
    const key = normalizeModelNumber(modelNumber);
    const now = this.clock();
    let decision: VerificationDecision | undefined;

    const record = await this.store.writeModelRecord(
      key,
      (current) => {
        if (current) {
          throw new InvalidTransitionError(`model ${key} already exists`);
        }
        const fields = { ...emptySpecFields(), ...normalizeFields(patch.fields ?? {}) };
        const applications = normalizeApplications(patch.applications ?? []);
        decision = decideVerification(undefined, { fields, applications }, intent, now);
        return this.toWrite(fields, applications, normalizeScalar(patch.notes), decision);
      },
      now.toISOString(),
    );

    this.logger.info("model_created", { modelNumber: key, verifyStatus: record.verifyStatus });
    return { record, decision: this.requireDecision(decision), created: true };
  }

  /**
   * Applies a partial reviewer edit. Scalar keys absent from the patch keep their value;
   * a supplied applications list replaces the stored set.
   */
  async update(modelNumber: string, patch: ModelPatch, intent: VerifyIntent = {}): Promise<WriteResult> {
    const key = normalizeModelNumber(modelNumber);
    const now = this.clock();
    let decision: VerificationDecision | undefined;

    const record = await this.store.writeModelRecord(
      key,
      (current) => {
        if (!current) {
          throw new NotFoundError("model", key);
        }
        const fieldPatch = normalizeFields(patch.fields ?? {});
        const applications =
          patch.applications !== undefined ? normalizeApplications(patch.applications) : current.applications;
        decision = decideVerification(current, { fields: fieldPatch, applications: patch.applications }, intent, now);
        const notes = patch.notes !== undefined ? normalizeScalar(patch.notes) : current.notes;
        return this.toWrite({ ...current.fields, ...fieldPatch }, applications, notes, decision);
      },
      now.toISOString(),
    );

    const applied = this.requireDecision(decision);
    this.recordTransition(key, applied, "review");
    return { record, decision: applied, created: false };
  }

  /** Writes one extracted model through the same governance path as a reviewer edit. */
  async mergeExtracted(model: ExtractedModel, fileHash: string, taskId: number): Promise<WriteResult> {
    const key = normalizeModelNumber(model.modelNumber);
    const now = this.clock();
    let decision: VerificationDecision | undefined;
    let created = false;

    const fields = { ...emptySpecFields(), ...normalizeFields(model.fields) };
    const applications = normalizeApplications(model.applications);

    const record = await this.store.writeModelRecord(
      key,
      (current) => {
        created = current === undefined;
        decision = decideVerification(current, { fields, applications }, {}, now);
        return this.toWrite(fields, applications, current?.notes ?? null, decision);
      },
      now.toISOString(),
    );

    await this.store.linkFileModel(fileHash, key);
    await this.store.replaceEvidence(key, fileHash, taskId, model.evidence, now.toISOString());

    const applied = this.requireDecision(decision);
    this.metrics.incrementCounter("models_merged");
    this.recordTransition(key, applied, "extraction", { fileHash, taskId });
    const linked = (await this.store.getModelRecord(key)) ?? record;
    return { record: linked, decision: applied, created };
  }

  async remove(modelNumber: string): Promise<void> {
    const deleted = await this.store.deleteModelRecord(modelNumber.trim());
    if (!deleted) {
      throw new NotFoundError("model", modelNumber);
    }
    this.logger.info("model_deleted", { modelNumber });
  }

  async linkFile(fileHash: string, modelNumber: string): Promise<ModelRecord> {
    const record = await this.get(modelNumber);
    if (!(await this.store.getFileAsset(fileHash))) {
      throw new NotFoundError("file", fileHash);
    }
    await this.store.linkFileModel(fileHash, record.modelNumber);
    return this.get(record.modelNumber);
  }

  async unlinkFile(fileHash: string, modelNumber: string): Promise<void> {
    const removed = await this.store.unlinkFileModel(fileHash, modelNumber.trim());
    if (!removed) {
      throw new NotFoundError("file_model_link", `${fileHash}/${modelNumber}`);
    }
  }

  async listForFile(fileHash: string): Promise<ModelRecord[]> {
    if (!(await this.store.getFileAsset(fileHash))) {
      throw new NotFoundError("file", fileHash);
    }
    return this.store.listModelsForFile(fileHash);
  }

  async evidence(modelNumber: string): Promise<FieldEvidence[]> {
    const record = await this.get(modelNumber);
    return this.store.listEvidence(record.modelNumber);
  }

  private toWrite(
    fields: SpecFields,
    applications: string[],
    notes: string | null,
    decision: VerificationDecision,
  ): ModelWrite {
    return {
      fields,
      applications,
      notes,
      verifyStatus: decision.verifyStatus,
      reviewer: decision.reviewer,
      reviewedAt: decision.reviewedAt,
    };
  }

  private requireDecision(decision: VerificationDecision | undefined): VerificationDecision {
    if (!decision) {
      throw new Error("model write completed without a verification decision");
    }
    return decision;
  }

  private recordTransition(
    modelNumber: string,
    decision: VerificationDecision,
    source: "review" | "extraction",
    extra: { fileHash?: string; taskId?: number } = {},
  ): void {
    if (decision.transition === "demoted") {
      this.metrics.incrementCounter("models_demoted");
      this.logger.warn("model_demoted", { modelNumber, source, changedKeys: decision.changedKeys, ...extra });
      return;
    }
    this.logger.info("model_written", {
      modelNumber,
      source,
      transition: decision.transition,
      changedKeys: decision.changedKeys,
      ...extra,
    });
  }
}
