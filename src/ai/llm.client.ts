import fetch from "node-fetch";
import type { Logger } from "../config/logger";
import { ScreeningError, errorMessage } from "../shared/errors";
import { isRecord } from "../shared/utils/text.util";

export type ChatMessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatMessageRole;
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  promptName?: string;
}

/** Anything that can turn a chat request into assistant text. Implementations throw on failure. */
export interface ChatCompletionTransport {
  createChatCompletion(request: ChatCompletionRequest): Promise<string>;
  getModelName?(): string;
}

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: ChatMessage[];
  max_tokens?: number;
  max_completion_tokens?: number;
}

export interface LlmClientConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export class LlmClient implements ChatCompletionTransport {
  private readonly apiKey: string;

  constructor(
    private readonly config: LlmClientConfig,
    private readonly logger: Logger,
  ) {
    const apiKey = config.apiKey.trim();
    if (!apiKey) {
      throw new ScreeningError(
        "missing_configuration",
        "LLM API key is empty. Set OPENAI_API_KEY before starting the screening service.",
      );
    }
    this.apiKey = apiKey;
  }

  getModelName(): string {
    return this.config.model;
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<string> {
    const startedAt = Date.now();
    const promptName = request.promptName ?? "chat";
    const requestBody = this.buildRequestBody(request);
    try {
      const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`LLM API error: HTTP ${response.status} - ${body}`);
      }

      const body: unknown = await response.json();
      const content = readMessageContent(body);
      if (!content || !content.trim()) {
        throw new Error("LLM response does not contain message content");
      }

      const trimmed = content.trim();
      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: request.maxTokens,
        tokenEstimate: estimateTokenCount(request.messages, trimmed),
      });
      return trimmed;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.config.model,
        latencyMs: Date.now() - startedAt,
        maxTokens: request.maxTokens,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  buildRequestBody(request: ChatCompletionRequest): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.config.model,
      temperature: request.temperature,
      messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
    };
    if (usesMaxCompletionTokens(this.config.model)) {
      body.max_completion_tokens = request.maxTokens;
    } else {
      body.max_tokens = request.maxTokens;
    }
    return body;
  }
}

function readMessageContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return null;
  }
  const choice: unknown = body.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return null;
  }
  return typeof choice.message.content === "string" ? choice.message.content : null;
}

function estimateTokenCount(messages: ChatMessage[], output: string): number {
  const totalChars = messages.reduce((sum, message) => sum + message.content.length, 0) + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
