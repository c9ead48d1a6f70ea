import { createHash } from "node:crypto";
import type { ReadonlyCandidateProfile } from "../profiles/candidate-profile";
import { isPlausibleEmail, isPlausiblePhone } from "../profiles/parsers/contact.parser";
import { splitTechStack } from "../profiles/parsers/tech-stack.parser";
import type { CandidateField, CandidateProfileRecord } from "../shared/types/profile.types";

export const PII_FIELDS: readonly CandidateField[] = ["email", "phone", "full_name"];
export const PRIVACY_NOTICE = "PII fields have been hashed for GDPR compliance";

export type AnonymizedProfileRecord = Record<CandidateField, string | null>;

export interface CandidateExport {
  export_date: string;
  candidate: AnonymizedProfileRecord;
  tech_stack_items: string[];
  completion_percentage: number;
  field_warnings: string[];
  privacy_notice: string;
}

export function hashPii(value: string): string {
  return `${createHash("sha256").update(value, "utf8").digest("hex").slice(0, 12)}...`;
}

export function anonymizeProfile(record: CandidateProfileRecord): AnonymizedProfileRecord {
  const anonymized: AnonymizedProfileRecord = { ...record };
  for (const field of PII_FIELDS) {
    const value = anonymized[field];
    if (value) {
      anonymized[field] = hashPii(value);
    }
  }
  return anonymized;
}

export function buildCandidateExport(profile: ReadonlyCandidateProfile, now: Date = new Date()): CandidateExport {
  const record = profile.toRecord();
  const warnings: string[] = [];
  if (record.email && !isPlausibleEmail(record.email)) {
    warnings.push("email_format_unrecognized");
  }
  if (record.phone && !isPlausiblePhone(record.phone)) {
    warnings.push("phone_format_unrecognized");
  }

  return {
    export_date: now.toISOString(),
    candidate: anonymizeProfile(record),
    tech_stack_items: record.tech_stack ? splitTechStack(record.tech_stack) : [],
    completion_percentage: profile.completionPercentage(),
    field_warnings: warnings,
    privacy_notice: PRIVACY_NOTICE,
  };
}

export function buildExportFileName(now: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `candidate_${date}_${time}.json`;
}
