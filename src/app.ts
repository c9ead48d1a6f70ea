import express, { Express, Request, Response } from "express";
import { buildScreeningController } from "./api/screening.controller";
import { ChatCompletionTransport, LlmClient } from "./ai/llm.client";
import { ModelClient, ScreeningModelClient } from "./ai/model.client";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { DEFAULT_EXIT_KEYWORDS } from "./config/screening.config";
import { ConversationEngine } from "./screening/conversation.engine";
import { SessionRateLimiter } from "./shared/utils/rate-limit";
import { SessionService } from "./state/session.service";

export interface AppContext {
  app: Express;
  logger: Logger;
  sessionService: SessionService;
}

export interface AppOverrides {
  logger?: Logger;
  transport?: ChatCompletionTransport;
  modelClient?: ModelClient;
  rateLimiter?: SessionRateLimiter;
  idFactory?: () => string;
}

export function createApp(env: EnvConfig, overrides: AppOverrides = {}): AppContext {
  const logger = overrides.logger ?? createLogger({ minLevel: env.logLevel });
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  const modelClient =
    overrides.modelClient ??
    new ScreeningModelClient(
      overrides.transport ??
        new LlmClient(
          { apiKey: env.openaiApiKey, baseUrl: env.openaiBaseUrl, model: env.openaiChatModel },
          logger,
        ),
      logger,
      {
        temperature: env.llmTemperature,
        maxTokens: env.llmMaxTokens,
        timeoutMs: env.llmTimeoutMs,
      },
    );
  const exitKeywords = env.exitKeywords ? new Set(env.exitKeywords) : DEFAULT_EXIT_KEYWORDS;
  const branding = { companyName: env.companyName, assistantName: env.assistantName };
  const sessionService = new SessionService(
    (sessionId) => new ConversationEngine(modelClient, logger, { sessionId, exitKeywords, branding }),
    overrides.idFactory,
  );
  const screeningController = buildScreeningController({
    sessionService,
    rateLimiter: overrides.rateLimiter ?? new SessionRateLimiter(),
    logger,
  });

  app.get("/health", (_request: Request, response: Response) => {
    response.status(200).json({ ok: true });
  });

  app.use("/api/screenings", screeningController);

  return { app, logger, sessionService };
}
