import {
  CANDIDATE_FIELDS,
  CandidateFieldSchema,
  CandidateProfileRecord,
} from "../../../shared/types/profile.types";

const NOT_COLLECTED = "not yet collected";

export function buildInfoGatheringV1Prompt(
  record: CandidateProfileRecord,
  schema: CandidateFieldSchema,
): string {
  const fieldStatus = CANDIDATE_FIELDS.map((field) => `- ${schema[field].label}: ${record[field] ?? NOT_COLLECTED}`);
  const extractionKeys = CANDIDATE_FIELDS.map((field) => `    "${field}": "<value or null>"`).join(",\n");

  return [
    "Based on the conversation so far, work out what the candidate has provided and what is still missing.",
    "",
    "## Required fields",
    ...fieldStatus,
    "",
    "## Instructions",
    "1. Extract any information the candidate gave in their latest message.",
    "2. Acknowledge it naturally.",
    "3. Ask for the NEXT missing item only.",
    "4. When every field is collected, summarise the information and say you will move on to technical questions.",
    "",
    "## Response format",
    "Answer conversationally. Do not show JSON or structured data in the part meant for the candidate.",
    "",
    "## Data extraction (internal)",
    "After your conversational answer, on a new line, output exactly this JSON block:",
    "```json",
    "{",
    "  \"extracted\": {",
    extractionKeys,
    "  },",
    "  \"all_collected\": <true or false>",
    "}",
    "```",
  ].join("\n");
}
