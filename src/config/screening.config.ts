import type { SentimentLabel, SentimentTag } from "../shared/types/conversation.types";
import type { CandidateFieldSchema } from "../shared/types/profile.types";

export const DEFAULT_EXIT_KEYWORDS: ReadonlySet<string> = new Set([
  "bye",
  "goodbye",
  "exit",
  "quit",
  "end",
  "stop",
  "thanks bye",
  "thank you bye",
  "see you",
  "later",
  "done",
  "finish",
  "end conversation",
  "close",
  "no more",
  "that's all",
  "i'm done",
  "im done",
]);

export const CANDIDATE_FIELD_SCHEMA: CandidateFieldSchema = {
  full_name: { label: "Full Name" },
  email: { label: "Email Address" },
  phone: { label: "Phone Number" },
  years_of_experience: { label: "Years of Experience" },
  desired_positions: { label: "Desired Position(s)" },
  current_location: { label: "Current Location" },
  tech_stack: { label: "Tech Stack" },
};

export const SENTIMENT_LABELS: readonly SentimentLabel[] = [
  "positive",
  "neutral",
  "negative",
  "excited",
  "nervous",
  "confident",
];

export const NEUTRAL_SENTIMENT: SentimentTag = { sentiment: "neutral", confidence: 0.5 };

export const MAX_INPUT_LENGTH = 2000;

export const CHAT_DEFAULTS = {
  temperature: 0.7,
  maxTokens: 1024,
} as const;

export const TECH_QUESTIONS_GENERATION = {
  temperature: 0.6,
  maxTokens: 2048,
} as const;

export const SENTIMENT_ANALYSIS = {
  temperature: 0.3,
  maxTokens: 100,
} as const;

export const FALLBACK_CONTEXT_ENTRIES = 3;

export const TECH_QUESTION_DEFAULTS = {
  name: "Candidate",
  experience: "Unknown",
  positions: "Software Engineer",
  techStack: "General Programming",
} as const;

export interface ScreeningBranding {
  companyName: string;
  assistantName: string;
}

export const DEFAULT_BRANDING: ScreeningBranding = {
  companyName: "Northwind Talent",
  assistantName: "Scout",
};
