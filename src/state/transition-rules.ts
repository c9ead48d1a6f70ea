import type { ConversationPhase } from "../shared/types/conversation.types";

const transitionRules: Record<ConversationPhase, ConversationPhase[]> = {
  greeting: ["gathering_info", "ended"],
  gathering_info: ["tech_questions", "closing", "ended"],
  tech_questions: ["answering_questions", "closing", "ended"],
  answering_questions: ["closing", "ended"],
  closing: ["ended"],
  ended: [],
};

export const ACTIVE_PHASES: readonly ConversationPhase[] = [
  "gathering_info",
  "tech_questions",
  "answering_questions",
  "closing",
];

export function isAllowedTransition(from: ConversationPhase, to: ConversationPhase): boolean {
  return transitionRules[from].includes(to);
}

export function isActivePhase(phase: ConversationPhase): boolean {
  return ACTIVE_PHASES.includes(phase);
}
