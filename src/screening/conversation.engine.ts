import type { ModelClient } from "../ai/model.client";
import { buildClosingV1Prompt } from "../ai/prompts/screening/closing.v1.prompt";
import { buildExitV1Prompt } from "../ai/prompts/screening/exit.v1.prompt";
import { buildFallbackV1Prompt } from "../ai/prompts/screening/fallback.v1.prompt";
import { buildGreetingV1Prompt } from "../ai/prompts/screening/greeting.v1.prompt";
import { buildInfoGatheringV1Prompt } from "../ai/prompts/screening/info-gathering.v1.prompt";
import { describePhase } from "../ai/prompts/screening/phase-context.prompt";
import { buildScreeningSystemPrompt } from "../ai/system/screening.system";
import { logContext, Logger } from "../config/logger";
import {
  CANDIDATE_FIELD_SCHEMA,
  DEFAULT_BRANDING,
  DEFAULT_EXIT_KEYWORDS,
  FALLBACK_CONTEXT_ENTRIES,
  ScreeningBranding,
  TECH_QUESTION_DEFAULTS,
} from "../config/screening.config";
import { CandidateProfile, ReadonlyCandidateProfile } from "../profiles/candidate-profile";
import { isPlausibleEmail, isPlausiblePhone } from "../profiles/parsers/contact.parser";
import { ScreeningError } from "../shared/errors";
import type {
  ConversationPhase,
  ProcessMessageResult,
  SentimentTag,
  TechQuestionGroup,
  TranscriptEntry,
  TurnHandler,
} from "../shared/types/conversation.types";
import { CandidateField, CandidateFieldSchema, isCandidateField } from "../shared/types/profile.types";
import {
  detectExitIntent,
  extractStructuredBlock,
  isRecord,
  sanitizeInput,
  stripStructuredBlock,
} from "../shared/utils/text.util";
import { assertTransition } from "../state/phase-machine";
import { isActivePhase } from "../state/transition-rules";
import { parseTechnicalQuestions } from "./parsers/tech-questions.parser";

export interface ConversationEngineOptions {
  sessionId?: string;
  exitKeywords?: ReadonlySet<string>;
  fieldSchema?: CandidateFieldSchema;
  branding?: ScreeningBranding;
}

interface HandlerOutcome {
  reply: string;
  handler: TurnHandler;
}

/**
 * Finite state machine for one screening conversation.
 *
 * greeting -> gathering_info -> tech_questions -> answering_questions -> closing -> ended,
 * with exit intent jumping from any phase straight to ended.
 *
 * Turns must be processed one at a time: the engine does not guard against
 * overlapping processMessage calls on the same instance.
 */
export class ConversationEngine {
  private phase: ConversationPhase = "greeting";
  private readonly profile: CandidateProfile;
  private readonly transcript: TranscriptEntry[] = [];
  private readonly exitKeywords: ReadonlySet<string>;
  private readonly fieldSchema: CandidateFieldSchema;
  private readonly branding: ScreeningBranding;
  private techQuestionsGenerated = false;
  private rawTechQuestions = "";
  private techQuestionGroups: TechQuestionGroup[] = [];
  private currentMood: SentimentTag | null = null;

  constructor(
    private readonly modelClient: ModelClient,
    private readonly logger: Logger,
    private readonly options: ConversationEngineOptions = {},
  ) {
    this.exitKeywords = options.exitKeywords ?? DEFAULT_EXIT_KEYWORDS;
    this.fieldSchema = options.fieldSchema ?? CANDIDATE_FIELD_SCHEMA;
    this.branding = options.branding ?? DEFAULT_BRANDING;
    this.profile = new CandidateProfile(this.fieldSchema);
  }

  /** Opens the conversation. Callers send it once per engine; a second call appends another greeting. */
  async generateGreeting(): Promise<string> {
    const reply = await this.modelClient.complete(
      [{ role: "user", content: buildGreetingV1Prompt(this.branding) }],
      this.buildSystemPrompt(),
      undefined,
      undefined,
      { promptName: "greeting_v1" },
    );
    this.transitionTo("gathering_info");
    this.transcript.push({ role: "assistant", content: reply });
    return reply;
  }

  /**
   * Runs one candidate turn. Callers must not send messages once the
   * conversation has ended; the engine answers them with the fallback redirect.
   */
  async processMessage(userText: string): Promise<ProcessMessageResult> {
    const startedAt = Date.now();
    const phaseBefore = this.phase;
    const message = sanitizeInput(userText);
    this.transcript.push({ role: "user", content: message });

    if (detectExitIntent(message, this.exitKeywords)) {
      const reply = await this.handleExit();
      this.logTurn(phaseBefore, "exit", startedAt, this.currentMood);
      return { reply, sentiment: this.currentMood };
    }

    const sentiment = await this.modelClient.analyzeSentiment(message);
    this.currentMood = sentiment;

    const outcome = await this.dispatch(message);
    this.transcript.push({ role: "assistant", content: outcome.reply });
    this.logTurn(phaseBefore, outcome.handler, startedAt, sentiment);
    return { reply: outcome.reply, sentiment };
  }

  /** Ends an active conversation with the closing farewell. */
  async close(): Promise<string> {
    if (this.phase === "ended") {
      throw new ScreeningError("conversation_ended", "Conversation has already ended.");
    }
    if (!isActivePhase(this.phase)) {
      throw new ScreeningError("invalid_request", "Conversation has not started yet.");
    }
    this.transitionTo("closing");
    const reply = await this.handleClosing();
    this.transcript.push({ role: "assistant", content: reply });
    return reply;
  }

  /** Moves to closing so that the next candidate message receives the farewell. */
  beginClosing(): void {
    if (this.phase === "ended") {
      throw new ScreeningError("conversation_ended", "Conversation has already ended.");
    }
    if (!isActivePhase(this.phase)) {
      throw new ScreeningError("invalid_request", "Conversation has not started yet.");
    }
    this.transitionTo("closing");
  }

  getSessionId(): string | undefined {
    return this.options.sessionId;
  }

  getPhase(): ConversationPhase {
    return this.phase;
  }

  getProfile(): ReadonlyCandidateProfile {
    return this.profile;
  }

  isEnded(): boolean {
    return this.phase === "ended";
  }

  hasGeneratedTechQuestions(): boolean {
    return this.techQuestionsGenerated;
  }

  getGeneratedTechQuestionsRaw(): string {
    return this.rawTechQuestions;
  }

  getTechQuestionGroups(): TechQuestionGroup[] {
    return this.techQuestionGroups.map((group) => ({
      technology: group.technology,
      questions: [...group.questions],
    }));
  }

  getTranscript(): ReadonlyArray<TranscriptEntry> {
    return [...this.transcript];
  }

  getCurrentMood(): SentimentTag | null {
    return this.currentMood;
  }

  private async dispatch(message: string): Promise<HandlerOutcome> {
    const phase = this.phase;
    switch (phase) {
      case "gathering_info":
        return { reply: await this.handleInfoGathering(), handler: "info_gathering" };
      case "tech_questions":
      case "answering_questions":
        return { reply: await this.handleTechInteraction(), handler: "tech_interaction" };
      case "closing":
        return { reply: await this.handleClosing(), handler: "closing" };
      case "greeting":
      case "ended":
        return { reply: await this.handleFallback(message), handler: "fallback" };
      default:
        return assertNever(phase);
    }
  }

  private async handleInfoGathering(): Promise<string> {
    const systemPrompt = [
      this.buildSystemPrompt(),
      buildInfoGatheringV1Prompt(this.profile.toRecord(), this.fieldSchema),
    ].join("\n\n");
    const response = await this.modelClient.complete(
      [...this.transcript],
      systemPrompt,
      undefined,
      undefined,
      { promptName: "info_gathering_v1" },
    );

    const block = extractStructuredBlock(response);
    let allCollected = false;
    if (block && isRecord(block.extracted)) {
      const updated = this.applyExtraction(block.extracted);
      allCollected = isTruthyFlag(block.all_collected);
      this.logger.debug("screening.extraction.applied", {
        sessionId: this.options.sessionId,
        updatedFields: updated,
        allCollected,
      });
    } else {
      this.logger.debug("screening.extraction.miss", { sessionId: this.options.sessionId });
    }

    if (allCollected || this.profile.isComplete()) {
      this.transitionTo("tech_questions");
    }

    let reply = stripStructuredBlock(response);
    if (this.phase === "tech_questions" && !this.techQuestionsGenerated) {
      const questions = await this.generateTechQuestions();
      reply = reply ? `${reply}\n\n${questions}` : questions;
      this.transitionTo("answering_questions");
    }
    return reply;
  }

  private applyExtraction(extracted: Record<string, unknown>): CandidateField[] {
    const updated: CandidateField[] = [];
    for (const [key, rawValue] of Object.entries(extracted)) {
      if (!isCandidateField(key)) {
        continue;
      }
      const value = normalizeExtractedValue(rawValue);
      if (value === null) {
        continue;
      }
      if (!this.profile.setIfUnset(key, value)) {
        continue;
      }
      updated.push(key);
      if ((key === "email" && !isPlausibleEmail(value)) || (key === "phone" && !isPlausiblePhone(value))) {
        this.logger.warn("profile.field.implausible", { sessionId: this.options.sessionId, field: key });
      }
    }
    return updated;
  }

  private async generateTechQuestions(): Promise<string> {
    const raw = await this.modelClient.generateTechnicalQuestions({
      name: this.profile.get("full_name") ?? TECH_QUESTION_DEFAULTS.name,
      experience: this.profile.get("years_of_experience") ?? TECH_QUESTION_DEFAULTS.experience,
      positions: this.profile.get("desired_positions") ?? TECH_QUESTION_DEFAULTS.positions,
      techStack: this.profile.get("tech_stack") ?? TECH_QUESTION_DEFAULTS.techStack,
    });
    this.rawTechQuestions = raw;
    this.techQuestionGroups = parseTechnicalQuestions(raw);
    this.techQuestionsGenerated = true;
    this.logger.info("screening.tech_questions.generated", {
      sessionId: this.options.sessionId,
      groups: this.techQuestionGroups.length,
      questions: this.techQuestionGroups.reduce((sum, group) => sum + group.questions.length, 0),
    });
    return raw;
  }

  private async handleTechInteraction(): Promise<string> {
    return this.modelClient.complete([...this.transcript], this.buildSystemPrompt(), undefined, undefined, {
      promptName: "tech_interaction",
    });
  }

  private async handleClosing(): Promise<string> {
    const prompt = buildClosingV1Prompt({
      name: this.profile.get("full_name") ?? "there",
      positions: this.profile.get("desired_positions") ?? "the position",
      branding: this.branding,
    });
    const reply = await this.modelClient.complete(
      [{ role: "user", content: prompt }],
      this.buildSystemPrompt(),
      undefined,
      undefined,
      { promptName: "closing_v1" },
    );
    this.transitionTo("ended");
    return reply;
  }

  private async handleExit(): Promise<string> {
    const infoStatus = this.profile.isComplete()
      ? "Complete"
      : `Partial (${this.profile.completionPercentage()}% complete)`;
    const prompt = buildExitV1Prompt({
      name: this.profile.get("full_name") ?? "there",
      infoStatus,
    });
    const reply = await this.modelClient.complete(
      [{ role: "user", content: prompt }],
      this.buildSystemPrompt(),
      undefined,
      undefined,
      { promptName: "exit_v1" },
    );
    this.transitionTo("ended");
    return reply;
  }

  private async handleFallback(message: string): Promise<string> {
    const systemPrompt = [this.buildSystemPrompt(), buildFallbackV1Prompt({ message, phase: this.phase })].join(
      "\n\n",
    );
    return this.modelClient.complete(
      this.transcript.slice(-FALLBACK_CONTEXT_ENTRIES),
      systemPrompt,
      undefined,
      undefined,
      { promptName: "fallback_v1" },
    );
  }

  private buildSystemPrompt(): string {
    return buildScreeningSystemPrompt({
      branding: this.branding,
      phaseContext: describePhase(this.phase, this.profile),
      candidateContext: this.profile.summary(),
    });
  }

  private transitionTo(next: ConversationPhase): void {
    if (this.phase === next) {
      return;
    }
    assertTransition(this.phase, next);
    this.phase = next;
  }

  private logTurn(
    phaseBefore: ConversationPhase,
    handler: TurnHandler,
    startedAt: number,
    sentiment: SentimentTag | null,
  ): void {
    logContext(this.logger, "info", "screening.turn.completed", {
      session_id: this.options.sessionId,
      phase: phaseBefore,
      next_phase: this.phase,
      handler,
      latency_ms: Date.now() - startedAt,
      sentiment: sentiment?.sentiment,
    });
  }
}

function normalizeExtractedValue(value: unknown): string | null {
  if (Array.isArray(value)) {
    const items = value.map(normalizeScalar).filter((item): item is string => item !== null);
    return items.length > 0 ? items.join(", ") : null;
  }
  return normalizeScalar(value);
}

function normalizeScalar(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase() === "null") {
    return null;
  }
  return trimmed;
}

function isTruthyFlag(value: unknown): boolean {
  return value === true || (typeof value === "string" && value.trim().toLowerCase() === "true");
}

function assertNever(value: never): never {
  throw new Error(`Unhandled conversation phase: ${String(value)}`);
}
