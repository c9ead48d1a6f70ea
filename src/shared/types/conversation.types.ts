export type ConversationPhase =
  | "greeting"
  | "gathering_info"
  | "tech_questions"
  | "answering_questions"
  | "closing"
  | "ended";

export type ChatRole = "user" | "assistant";

export interface TranscriptEntry {
  readonly role: ChatRole;
  readonly content: string;
}

export type SentimentLabel = "positive" | "neutral" | "negative" | "excited" | "nervous" | "confident";

export interface SentimentTag {
  readonly sentiment: SentimentLabel;
  readonly confidence: number;
}

export interface TechQuestionGroup {
  readonly technology: string;
  readonly questions: string[];
}

export interface TechnicalAnswer {
  readonly groupIndex: number;
  readonly questionIndex: number;
  readonly answer: string;
}

export interface ProcessMessageResult {
  reply: string;
  sentiment: SentimentTag | null;
}

export type TurnHandler = "exit" | "info_gathering" | "tech_interaction" | "closing" | "fallback";
