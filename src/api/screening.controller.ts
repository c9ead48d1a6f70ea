import { Request, Response, Router } from "express";
import type { Logger } from "../config/logger";
import { buildCandidateExport, buildExportFileName } from "../privacy/candidate-export.service";
import { formatTechnicalAnswers } from "../screening/answers.formatter";
import { ScreeningError, ScreeningErrorCode, errorMessage, isScreeningError } from "../shared/errors";
import type { TechnicalAnswer } from "../shared/types/conversation.types";
import type { SessionRateLimiter } from "../shared/utils/rate-limit";
import { isRecord } from "../shared/utils/text.util";
import type { ScreeningSession, SessionService } from "../state/session.service";

interface ScreeningControllerDeps {
  sessionService: SessionService;
  rateLimiter: SessionRateLimiter;
  logger: Logger;
}

const STATUS_BY_ERROR_CODE: Record<ScreeningErrorCode, number> = {
  missing_configuration: 500,
  session_not_found: 404,
  session_busy: 409,
  conversation_ended: 409,
  export_unavailable: 409,
  invalid_request: 400,
  rate_limited: 429,
};

type RouteHandler = (request: Request<{ id?: string }>, response: Response) => Promise<void>;

export function toSessionView(session: ScreeningSession) {
  const engine = session.engine;
  const profile = engine.getProfile();
  return {
    id: session.id,
    createdAt: session.createdAt,
    phase: engine.getPhase(),
    ended: engine.isEnded(),
    profile: profile.toRecord(),
    missingFields: profile.missingFields(),
    completionPercentage: profile.completionPercentage(),
    mood: engine.getCurrentMood(),
    techQuestionsGenerated: engine.hasGeneratedTechQuestions(),
    transcript: engine.getTranscript(),
  };
}

export function buildScreeningController(deps: ScreeningControllerDeps): Router {
  const router = Router();
  const { sessionService, rateLimiter, logger } = deps;

  const route =
    (name: string, handler: RouteHandler) =>
    async (request: Request<{ id?: string }>, response: Response): Promise<void> => {
      try {
        await handler(request, response);
      } catch (error) {
        sendError(response, error, logger, name, request.params.id);
      }
    };

  router.post(
    "/",
    route("create", async (_request, response) => {
      const session = sessionService.create();
      const greeting = await sessionService.runExclusive(session.id, (current) => current.engine.generateGreeting());
      logger.info("screening.session.created", { sessionId: session.id });
      response.status(201).json({ session: toSessionView(session), greeting });
    }),
  );

  router.get(
    "/:id",
    route("view", async (request, response) => {
      const session = sessionService.getRequired(requireSessionId(request));
      response.status(200).json({ session: toSessionView(session) });
    }),
  );

  router.post(
    "/:id/messages",
    route("message", async (request, response) => {
      const sessionId = requireSessionId(request);
      const text = readMessageText(request.body);
      const session = sessionService.getRequired(sessionId);
      if (session.engine.isEnded()) {
        throw new ScreeningError("conversation_ended", "This screening session has ended. Reset it to start again.");
      }
      const rate = rateLimiter.checkAndConsume(sessionId);
      if (!rate.allowed) {
        response.setHeader("retry-after", String(rate.retryAfterSeconds));
        throw new ScreeningError("rate_limited", "Too many messages. Please wait a moment.", {
          retryAfterSeconds: rate.retryAfterSeconds,
        });
      }
      const result = await sessionService.runExclusive(sessionId, (current) => current.engine.processMessage(text));
      response.status(200).json({
        reply: result.reply,
        sentiment: result.sentiment,
        session: toSessionView(session),
      });
    }),
  );

  router.get(
    "/:id/questions",
    route("questions", async (request, response) => {
      const session = sessionService.getRequired(requireSessionId(request));
      response.status(200).json({
        raw: session.engine.getGeneratedTechQuestionsRaw(),
        groups: session.engine.getTechQuestionGroups(),
      });
    }),
  );

  router.post(
    "/:id/answers",
    route("answers", async (request, response) => {
      const sessionId = requireSessionId(request);
      const answers = readTechnicalAnswers(request.body);
      const session = sessionService.getRequired(sessionId);
      const engine = session.engine;
      if (engine.isEnded()) {
        throw new ScreeningError("conversation_ended", "This screening session has ended. Reset it to start again.");
      }
      const groups = engine.getTechQuestionGroups();
      if (!engine.hasGeneratedTechQuestions() || groups.length === 0) {
        throw new ScreeningError("invalid_request", "Technical questions have not been generated for this session.");
      }
      const formatted = formatTechnicalAnswers(groups, answers);
      if (formatted.answeredCount === 0) {
        throw new ScreeningError("invalid_request", "Please answer at least one question before submitting.");
      }
      const result = await sessionService.runExclusive(sessionId, (current) =>
        current.engine.processMessage(formatted.text),
      );
      response.status(200).json({
        reply: result.reply,
        sentiment: result.sentiment,
        answeredCount: formatted.answeredCount,
        session: toSessionView(session),
      });
    }),
  );

  router.post(
    "/:id/close",
    route("close", async (request, response) => {
      const sessionId = requireSessionId(request);
      const reply = await sessionService.runExclusive(sessionId, (current) => current.engine.close());
      response.status(200).json({ reply, session: toSessionView(sessionService.getRequired(sessionId)) });
    }),
  );

  router.post(
    "/:id/reset",
    route("reset", async (request, response) => {
      const sessionId = requireSessionId(request);
      const greeting = await sessionService.runExclusive(sessionId, () => {
        const session = sessionService.reset(sessionId);
        return session.engine.generateGreeting();
      });
      rateLimiter.forget(sessionId);
      logger.info("screening.session.reset", { sessionId });
      response.status(200).json({ session: toSessionView(sessionService.getRequired(sessionId)), greeting });
    }),
  );

  router.get(
    "/:id/export",
    route("export", async (request, response) => {
      const session = sessionService.getRequired(requireSessionId(request));
      const profile = session.engine.getProfile();
      if (!profile.isComplete()) {
        throw new ScreeningError("export_unavailable", "Candidate profile is not complete yet.", {
          missingFields: profile.missingFields(),
        });
      }
      const now = new Date();
      response.setHeader("content-disposition", `attachment; filename="${buildExportFileName(now)}"`);
      response.status(200).json(buildCandidateExport(profile, now));
    }),
  );

  router.delete(
    "/:id",
    route("delete", async (request, response) => {
      const sessionId = requireSessionId(request);
      if (!sessionService.delete(sessionId)) {
        throw new ScreeningError("session_not_found", `Screening session not found: ${sessionId}`);
      }
      rateLimiter.forget(sessionId);
      response.status(204).end();
    }),
  );

  return router;
}

function requireSessionId(request: Request<{ id?: string }>): string {
  const sessionId = request.params.id?.trim();
  if (!sessionId) {
    throw new ScreeningError("invalid_request", "Session id is required.");
  }
  return sessionId;
}

function readMessageText(body: unknown): string {
  if (!isRecord(body) || typeof body.text !== "string" || !body.text.trim()) {
    throw new ScreeningError("invalid_request", "Body must be a JSON object with a non-empty \"text\" string.");
  }
  return body.text;
}

function readTechnicalAnswers(body: unknown): TechnicalAnswer[] {
  if (!isRecord(body) || !Array.isArray(body.answers)) {
    throw new ScreeningError("invalid_request", "Body must be a JSON object with an \"answers\" array.");
  }
  return body.answers.map((item: unknown, index: number): TechnicalAnswer => {
    if (
      !isRecord(item) ||
      !isIndex(item.groupIndex) ||
      !isIndex(item.questionIndex) ||
      typeof item.answer !== "string"
    ) {
      throw new ScreeningError(
        "invalid_request",
        `Answer #${index + 1} must have "groupIndex" (non-negative integer), "questionIndex" (non-negative integer) and "answer" (string).`,
      );
    }
    return { groupIndex: item.groupIndex, questionIndex: item.questionIndex, answer: item.answer };
  });
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function sendError(
  response: Response,
  error: unknown,
  logger: Logger,
  routeName: string,
  sessionId: string | undefined,
): void {
  if (isScreeningError(error)) {
    logger.warn("screening.request.rejected", {
      route: routeName,
      sessionId,
      errorCode: error.code,
    });
    response.status(STATUS_BY_ERROR_CODE[error.code]).json({
      ok: false,
      error: error.code,
      message: error.message,
      ...(error.details ?? {}),
    });
    return;
  }

  logger.error("screening.request.failed", {
    route: routeName,
    sessionId,
    error: errorMessage(error),
  });
  response.status(500).json({ ok: false, error: "internal_error", message: "Something went wrong." });
}
