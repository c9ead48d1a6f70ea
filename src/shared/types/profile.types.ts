export type CandidateField =
  | "full_name"
  | "email"
  | "phone"
  | "years_of_experience"
  | "desired_positions"
  | "current_location"
  | "tech_stack";

export const CANDIDATE_FIELDS: readonly CandidateField[] = [
  "full_name",
  "email",
  "phone",
  "years_of_experience",
  "desired_positions",
  "current_location",
  "tech_stack",
];

export type CandidateProfileRecord = Record<CandidateField, string | null>;

export interface CandidateFieldDefinition {
  readonly label: string;
}

export type CandidateFieldSchema = Record<CandidateField, CandidateFieldDefinition>;

export function isCandidateField(value: string): value is CandidateField {
  return (CANDIDATE_FIELDS as readonly string[]).includes(value);
}
