import {
  CHAT_DEFAULTS,
  NEUTRAL_SENTIMENT,
  SENTIMENT_ANALYSIS,
  SENTIMENT_LABELS,
  TECH_QUESTIONS_GENERATION,
} from "../config/screening.config";
import type { Logger } from "../config/logger";
import type { SentimentLabel, SentimentTag, TranscriptEntry } from "../shared/types/conversation.types";
import { isRecord } from "../shared/utils/text.util";
import type { ChatCompletionTransport, ChatMessage } from "./llm.client";
import { callChatSafe } from "./llm.safe";
import { buildSentimentV1Prompt } from "./prompts/screening/sentiment.v1.prompt";
import { buildTechQuestionsV1Prompt, TechQuestionsPromptInput } from "./prompts/screening/tech-questions.v1.prompt";

export const MODEL_UNAVAILABLE_REPLY =
  "I apologize, but I'm experiencing a brief technical issue. Could you please repeat your last message? I want to make sure I capture everything correctly.";

export interface CompleteOptions {
  promptName?: string;
}

/** Model boundary consumed by the conversation engine. None of these methods reject. */
export interface ModelClient {
  complete(
    messages: ReadonlyArray<TranscriptEntry>,
    systemPrompt: string,
    temperature?: number,
    maxTokens?: number,
    options?: CompleteOptions,
  ): Promise<string>;
  analyzeSentiment(message: string): Promise<SentimentTag>;
  generateTechnicalQuestions(input: TechQuestionsPromptInput): Promise<string>;
}

export interface ScreeningModelClientOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export class ScreeningModelClient implements ModelClient {
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly transport: ChatCompletionTransport,
    private readonly logger: Logger,
    private readonly options: ScreeningModelClientOptions = {},
  ) {
    this.temperature = options.temperature ?? CHAT_DEFAULTS.temperature;
    this.maxTokens = options.maxTokens ?? CHAT_DEFAULTS.maxTokens;
  }

  async complete(
    messages: ReadonlyArray<TranscriptEntry>,
    systemPrompt: string,
    temperature: number = this.temperature,
    maxTokens: number = this.maxTokens,
    options?: CompleteOptions,
  ): Promise<string> {
    const promptName = options?.promptName ?? "chat";
    const chatMessages: ChatMessage[] = [];
    if (systemPrompt.trim()) {
      chatMessages.push({ role: "system", content: systemPrompt });
    }
    for (const message of messages) {
      chatMessages.push({ role: message.role, content: message.content });
    }

    try {
      const result = await callChatSafe({
        transport: this.transport,
        logger: this.logger,
        timeoutMs: this.options.timeoutMs,
        request: { messages: chatMessages, temperature, maxTokens, promptName },
      });
      if (result.ok) {
        return result.text;
      }
      this.logger.warn("model.complete.fallback", { promptName, errorCode: result.error_code });
    } catch (error) {
      this.logger.error("model.complete.unexpected_error", {
        promptName,
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
    return MODEL_UNAVAILABLE_REPLY;
  }

  async analyzeSentiment(message: string): Promise<SentimentTag> {
    try {
      const result = await callChatSafe({
        transport: this.transport,
        logger: this.logger,
        timeoutMs: this.options.timeoutMs,
        request: {
          messages: [{ role: "user", content: buildSentimentV1Prompt(message) }],
          temperature: SENTIMENT_ANALYSIS.temperature,
          maxTokens: SENTIMENT_ANALYSIS.maxTokens,
          promptName: "sentiment_v1",
        },
      });
      if (!result.ok) {
        this.logger.warn("model.sentiment.fallback", { errorCode: result.error_code });
        return NEUTRAL_SENTIMENT;
      }
      const parsed = parseSentimentReply(result.text);
      if (!parsed) {
        this.logger.warn("model.sentiment.fallback", { errorCode: "json_parse_failed" });
        return NEUTRAL_SENTIMENT;
      }
      return parsed;
    } catch (error) {
      this.logger.warn("model.sentiment.fallback", {
        errorCode: "unexpected_error",
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return NEUTRAL_SENTIMENT;
    }
  }

  async generateTechnicalQuestions(input: TechQuestionsPromptInput): Promise<string> {
    return this.complete(
      [{ role: "user", content: buildTechQuestionsV1Prompt(input) }],
      "",
      TECH_QUESTIONS_GENERATION.temperature,
      TECH_QUESTIONS_GENERATION.maxTokens,
      { promptName: "tech_questions_v1" },
    );
  }
}

export function parseSentimentReply(raw: string): SentimentTag | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim());
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }
  const label = typeof parsed.sentiment === "string" ? parsed.sentiment.trim().toLowerCase() : "";
  if (!isSentimentLabel(label)) {
    return null;
  }
  return { sentiment: label, confidence: normalizeConfidence(parsed.confidence) };
}

function isSentimentLabel(value: string): value is SentimentLabel {
  return (SENTIMENT_LABELS as readonly string[]).includes(value);
}

function normalizeConfidence(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return NEUTRAL_SENTIMENT.confidence;
  }
  if (value < 0) {
    return 0;
  }
  if (value > 1) {
    return 1;
  }
  return value;
}
