import type { ConversationPhase } from "../../../shared/types/conversation.types";

export function buildFallbackV1Prompt(input: { message: string; phase: ConversationPhase }): string {
  return [
    "The candidate said something that looks off-topic or unclear for a recruitment screening.",
    "",
    `Candidate message: "${input.message}"`,
    `Current conversation state: ${input.phase}`,
    "",
    "## Instructions",
    "1. Acknowledge the message politely.",
    "2. Steer them back to the screening.",
    "3. Remind them what you were discussing or what you need next.",
    "4. Keep it brief and friendly.",
  ].join("\n");
}
