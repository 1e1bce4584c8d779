// Import env config first (loads .env and validates immediately)
import { env, isGeminiConfigured } from "./config/env";
import { logger } from "./config/logger";
import { createApp } from "./app";
import { createGenerationOrchestrator } from "./services/generation";

function start(): void {
  if (!isGeminiConfigured()) {
    logger.warn("server", "GEMINI_API_KEY not set. Every provider tier will be unavailable.");
  }

  const orchestrator = createGenerationOrchestrator(env);
  for (const entry of orchestrator.describePlan()) {
    logger.info("server", `Provider tier ${entry.tier}`, {
      model: entry.model,
      available: entry.available,
    });
  }

  const app = createApp({ orchestrator });

  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      model: env.GEMINI_MODEL,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (err) {
  logger.error("server", "Failed to start", {
    error: err instanceof Error ? err.message : String(err),
  });
  process.exit(1);
}
