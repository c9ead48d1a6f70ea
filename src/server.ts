import { createApp } from "./app";
import { loadEnv } from "./config/env";

function bootstrap(): void {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, path: "/api/screenings" });
    logger.info(`LLM chat model: ${env.openaiChatModel}`);
    logger.info("DEBUG_MODE", { enabled: env.debugMode });
    logger.info("Screening branding", { company: env.companyName, assistant: env.assistantName });
  });
}

bootstrap();
