/**
 * Document Q&A Server
 * Loads configuration, prepares the index and serves the HTTP API
 */

import { config } from "dotenv";
import { buildServer } from "./src/app.js";
import { loadConfig } from "./src/config.js";
import { ConfigurationError } from "./src/errors.js";
import { logger } from "./src/logger.js";
import { createServices } from "./src/services/index.js";

// Environment-specific file first; dotenv never overrides a key already set
const nodeEnv = process.env.NODE_ENV || "development";
config({ path: `.env.${nodeEnv}` });
config();

const PURGE_INTERVAL_MS = 60000;

const start = async () => {
  const appConfig = loadConfig();
  logger.configure({
    level: appConfig.LOG_LEVEL,
    environment: appConfig.NODE_ENV,
  });

  logger.info("Environment configuration loaded", {
    nodeEnv: appConfig.NODE_ENV,
    llmProvider: appConfig.LLM_PROVIDER,
    embeddingProvider: appConfig.EMBEDDING_PROVIDER,
    rateLimitStore: appConfig.RATE_LIMIT_STORE,
  });

  const services = await createServices(appConfig);
  const index = await services.indexManager.loadOrBuild();
  logger.info("Vector index ready", { chunks: index.size, model: index.model });

  const server = buildServer({
    config: appConfig,
    orchestrator: services.orchestrator,
    sessions: services.sessions,
    generator: services.generator,
    indexManager: services.indexManager,
  });

  // Expired rate-limit windows and idle sessions
  const purgeTimer = setInterval(() => {
    services.sessions.purgeExpired();
    services.rateLimiter.purgeExpired().catch((error: unknown) => {
      logger.warn("Rate limit purge failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }, PURGE_INTERVAL_MS);
  purgeTimer.unref();

  // Graceful shutdown
  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, initiating graceful shutdown`);

    try {
      clearInterval(purgeTimer);
      await server.close();
      await services.rateLimiter.close();
      logger.info("Server closed successfully");
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await server.listen({ port: appConfig.PORT, host: appConfig.HOST });

  logger.info("Document Q&A server started", {
    url: `http://${appConfig.HOST}:${appConfig.PORT}`,
    environment: appConfig.NODE_ENV,
    llmModel: services.generator.model,
    embeddingModel: services.encoder.model,
    rateLimit: appConfig.RATE_LIMIT_PER_MINUTE,
  });
};

process.on("unhandledRejection", (reason) => {
  logger.fatal("Unhandled Rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  process.exit(1);
});

start().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal("Invalid configuration", { problems: [...error.problems] });
  } else {
    logger.fatal("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  process.exit(1);
});
