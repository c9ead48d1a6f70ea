import { CANDIDATE_FIELD_SCHEMA } from "../config/screening.config";
import {
  CANDIDATE_FIELDS,
  CandidateField,
  CandidateFieldSchema,
  CandidateProfileRecord,
} from "../shared/types/profile.types";

export interface ReadonlyCandidateProfile {
  get(field: CandidateField): string | null;
  missingFields(): CandidateField[];
  filledFields(): Partial<Record<CandidateField, string>>;
  completionPercentage(): number;
  isComplete(): boolean;
  summary(): string;
  toRecord(): CandidateProfileRecord;
}

/**
 * Candidate record accumulated during information gathering.
 *
 * Values are first-write-wins: once a field holds a value, later extractions
 * for that field are ignored.
 */
export class CandidateProfile implements ReadonlyCandidateProfile {
  private readonly values = new Map<CandidateField, string>();

  constructor(private readonly schema: CandidateFieldSchema = CANDIDATE_FIELD_SCHEMA) {}

  get(field: CandidateField): string | null {
    return this.values.get(field) ?? null;
  }

  /** Returns true when the value was stored, false when the field was already set or the value is blank. */
  setIfUnset(field: CandidateField, value: string): boolean {
    if (this.values.has(field)) {
      return false;
    }
    const trimmed = value.trim();
    if (!trimmed) {
      return false;
    }
    this.values.set(field, trimmed);
    return true;
  }

  missingFields(): CandidateField[] {
    return CANDIDATE_FIELDS.filter((field) => !this.values.has(field));
  }

  filledFields(): Partial<Record<CandidateField, string>> {
    const filled: Partial<Record<CandidateField, string>> = {};
    for (const field of CANDIDATE_FIELDS) {
      const value = this.values.get(field);
      if (value !== undefined) {
        filled[field] = value;
      }
    }
    return filled;
  }

  completionPercentage(): number {
    return Math.round((100 * this.values.size) / CANDIDATE_FIELDS.length);
  }

  isComplete(): boolean {
    return this.missingFields().length === 0;
  }

  summary(): string {
    return CANDIDATE_FIELDS.map((field) => {
      const value = this.values.get(field);
      return `- ${this.schema[field].label}: ${value ?? "pending"}`;
    }).join("\n");
  }

  toRecord(): CandidateProfileRecord {
    return {
      full_name: this.get("full_name"),
      email: this.get("email"),
      phone: this.get("phone"),
      years_of_experience: this.get("years_of_experience"),
      desired_positions: this.get("desired_positions"),
      current_location: this.get("current_location"),
      tech_stack: this.get("tech_stack"),
    };
  }
}
