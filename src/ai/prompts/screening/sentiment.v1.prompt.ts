import { SENTIMENT_LABELS } from "../../../config/screening.config";

export function buildSentimentV1Prompt(message: string): string {
  return [
    "Classify the emotional tone of this candidate message from a recruitment screening.",
    "",
    `Message: "${message}"`,
    "",
    `Use exactly ONE label: ${SENTIMENT_LABELS.join(", ")}.`,
    "",
    "Return STRICT JSON only, on a single line, no markdown:",
    "{\"sentiment\": \"<label>\", \"confidence\": <0.0-1.0>}",
  ].join("\n");
}
