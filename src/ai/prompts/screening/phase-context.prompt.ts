import type { ReadonlyCandidateProfile } from "../../../profiles/candidate-profile";
import type { ConversationPhase } from "../../../shared/types/conversation.types";

export function describePhase(phase: ConversationPhase, profile: ReadonlyCandidateProfile): string {
  switch (phase) {
    case "greeting":
      return "You are greeting the candidate for the first time. Welcome them and ask for their full name.";
    case "gathering_info": {
      const missing = profile.missingFields();
      const collected = JSON.stringify(profile.filledFields());
      return [
        "You are collecting candidate information.",
        `Missing fields: ${missing.length > 0 ? missing.join(", ") : "none"}.`,
        `Collected: ${collected}`,
      ].join(" ");
    }
    case "tech_questions":
      return "All candidate information is collected. You are presenting technical screening questions based on the tech stack.";
    case "answering_questions":
      return "The candidate is answering the technical questions. Acknowledge each answer, ask a short follow-up when an answer is thin, never reveal model answers, and guide them through the remaining questions.";
    case "closing":
      return "The screening is complete. Thank the candidate and explain the next steps.";
    case "ended":
      return "The conversation has ended.";
  }
}
