import { SPEC_FIELD_KEYS, type EvidenceKey, type SpecFields, type VerifyStatus } from "../types";

export type ChangedKey = EvidenceKey;

export interface VerificationState {
  fields: SpecFields;
  applications: readonly string[];
  verifyStatus: VerifyStatus;
  reviewer: string | null;
  reviewedAt: string | null;
}

export interface IncomingValues {
  fields?: Partial<SpecFields>;
  applications?: readonly string[];
}

/**
 * `verify: true` certifies (or re-certifies) the record, `verify: false` withdraws
 * certification, and an absent value leaves the decision to the change detector.
 */
export interface VerifyIntent {
  verify?: boolean;
  reviewer?: string | null;
}

export type VerificationTransition = "verified" | "reverified" | "unverified" | "demoted" | "unchanged";

export interface VerificationDecision {
  verifyStatus: VerifyStatus;
  reviewer: string | null;
  reviewedAt: string | null;
  changedKeys: ChangedKey[];
  transition: VerificationTransition;
}

export function normalizeScalar(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Trims, drops blanks and removes case-insensitive duplicates, keeping the first spelling. */
export function normalizeApplications(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    const canon = trimmed.toLowerCase();
    if (!trimmed || seen.has(canon)) {
      continue;
    }
    seen.add(canon);
    result.push(trimmed);
  }
  return result;
}

export function canonicalApplications(values: readonly string[]): string[] {
  return [...new Set(values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0))].sort();
}

export function applicationsEqual(left: readonly string[], right: readonly string[]): boolean {
  const a = canonicalApplications(left);
  const b = canonicalApplications(right);
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

/** Keys whose incoming value differs from the stored one. Keys absent from `incoming` are untouched. */
export function diffRecord(
  current: Pick<VerificationState, "fields" | "applications"> | undefined,
  incoming: IncomingValues,
): ChangedKey[] {
  const changed: ChangedKey[] = [];
  const fields = incoming.fields ?? {};
  for (const key of SPEC_FIELD_KEYS) {
    if (!(key in fields)) {
      continue;
    }
    const before = current ? current.fields[key] : null;
    if (normalizeScalar(fields[key]) !== before) {
      changed.push(key);
    }
  }
  if (incoming.applications !== undefined && !applicationsEqual(current?.applications ?? [], incoming.applications)) {
    changed.push("applications");
  }
  return changed;
}

export function decideVerification(
  current: VerificationState | undefined,
  incoming: IncomingValues,
  intent: VerifyIntent,
  now: Date,
): VerificationDecision {
  const changedKeys = diffRecord(current, incoming);

  if (intent.verify === true) {
    return {
      verifyStatus: "verified",
      reviewer: normalizeScalar(intent.reviewer) ?? current?.reviewer ?? null,
      reviewedAt: now.toISOString(),
      changedKeys,
      transition: current?.verifyStatus === "verified" ? "reverified" : "verified",
    };
  }

  if (intent.verify === false) {
    return { verifyStatus: "unverified", reviewer: null, reviewedAt: null, changedKeys, transition: "unverified" };
  }

  if (current?.verifyStatus === "verified" && changedKeys.length > 0) {
    return { verifyStatus: "unverified", reviewer: null, reviewedAt: null, changedKeys, transition: "demoted" };
  }

  return {
    verifyStatus: current?.verifyStatus ?? "unverified",
    reviewer: current?.reviewer ?? null,
    reviewedAt: current?.reviewedAt ?? null,
    changedKeys,
    transition: "unchanged",
  };
}
