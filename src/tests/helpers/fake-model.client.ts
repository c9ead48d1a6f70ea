import type { CompleteOptions, ModelClient } from "../../ai/model.client";
import type { TechQuestionsPromptInput } from "../../ai/prompts/screening/tech-questions.v1.prompt";
import type { SentimentTag, TranscriptEntry } from "../../shared/types/conversation.types";

export interface RecordedCompletion {
  messages: TranscriptEntry[];
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
  promptName?: string;
}

/** ModelClient double: replies are queued per prompt name and every call is recorded. */
export class FakeModelClient implements ModelClient {
  readonly completions: RecordedCompletion[] = [];
  readonly sentimentInputs: string[] = [];
  readonly techQuestionInputs: TechQuestionsPromptInput[] = [];
  sentiment: SentimentTag = { sentiment: "positive", confidence: 0.9 };
  techQuestions = "";
  private readonly replies = new Map<string, string[]>();

  queue(promptName: string, ...replies: string[]): this {
    const existing = this.replies.get(promptName) ?? [];
    this.replies.set(promptName, [...existing, ...replies]);
    return this;
  }

  async complete(
    messages: ReadonlyArray<TranscriptEntry>,
    systemPrompt: string,
    temperature?: number,
    maxTokens?: number,
    options?: CompleteOptions,
  ): Promise<string> {
    const promptName = options?.promptName;
    this.completions.push({ messages: [...messages], systemPrompt, temperature, maxTokens, promptName });
    const queued = this.replies.get(promptName ?? "");
    return queued?.shift() ?? `default ${promptName ?? "chat"} reply`;
  }

  async analyzeSentiment(message: string): Promise<SentimentTag> {
    this.sentimentInputs.push(message);
    return this.sentiment;
  }

  async generateTechnicalQuestions(input: TechQuestionsPromptInput): Promise<string> {
    this.techQuestionInputs.push(input);
    return this.techQuestions;
  }

  promptNames(): Array<string | undefined> {
    return this.completions.map((completion) => completion.promptName);
  }
}
