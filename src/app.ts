/**
 * HTTP surface
 * Fastify routes over the query pipeline; process wiring lives in server.ts
 */

import { timingSafeEqual } from "node:crypto";
import {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
  fastify,
} from "fastify";
import { logger } from "./logger.js";
import {
  SecurityMiddleware,
  extractClientIP,
} from "./security/security-middleware.js";
import type { AnswerGenerator } from "./services/answer-generator.js";
import type { IndexManager } from "./services/index-manager.js";
import type { QueryOrchestrator } from "./services/query-orchestrator.js";
import type { SessionService } from "./services/session-service.js";
import type { AppConfig } from "./types/env.js";
import type { QueryOutcome } from "./types/rag.js";

export const APP_VERSION = "1.0.0";

export interface AppDependencies {
  readonly config: Pick<AppConfig, "NODE_ENV" | "LOG_LEVEL" | "ADMIN_TOKEN">;
  readonly orchestrator: Pick<QueryOrchestrator, "process">;
  readonly sessions: Pick<SessionService, "touch" | "describe" | "getStats">;
  readonly generator: Pick<AnswerGenerator, "getStats" | "healthCheck">;
  readonly indexManager: Pick<IndexManager, "status" | "reindex">;
  readonly security?: SecurityMiddleware;
  readonly clock?: () => number;
}

interface QueryBody {
  question: string;
}

const querySchema = {
  body: {
    type: "object",
    required: ["question"],
    properties: {
      question: { type: "string" },
    },
    additionalProperties: false,
  },
} as const;

const STATUS_CODES: Record<QueryOutcome["status"], number> = {
  answered: 200,
  no_results: 200,
  rejected: 400,
  rate_limited: 429,
  failed: 503,
};

export function buildServer(deps: AppDependencies): FastifyInstance {
  const { config, orchestrator, sessions, generator, indexManager } = deps;
  const security = deps.security ?? new SecurityMiddleware();
  const clock = deps.clock ?? Date.now;

  const server = fastify({
    logger: fastifyLoggerOptions(config),
    trustProxy: true,
    keepAliveTimeout: 30000,
    requestTimeout: 60000,
    bodyLimit: 1048576, // 1MB limit
  });

  // Security check and headers for every route
  server.addHook("onRequest", async (request, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    reply.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    security.applyHeaders(reply);

    if (!security.checkSecurity(request, reply)) {
      return reply;
    }
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({
        error: "Bad Request",
        message: error.message,
      });
    }

    logger.error("Request failed", {
      method: request.method,
      url: request.url,
      error: error.message,
    });
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.code(statusCode).send({ error: error.name, message: error.message });
    }
    return reply.code(statusCode).send({
      error: "Internal Server Error",
      message: "An unexpected error occurred",
    });
  });

  server.options("/api/query", async (_request, reply) => {
    return reply.code(204).send();
  });

  server.post<{ Body: QueryBody }>(
    "/api/query",
    { schema: querySchema },
    async (request, reply) => {
      const clientId = extractClientIP(request);
      sessions.touch(clientId);

      const outcome = await orchestrator.process({
        rawText: request.body.question,
        clientId,
        timestamp: clock(),
      });

      logger.request(request.method, request.url, {
        clientId,
        status: outcome.status,
      });

      if (outcome.status === "rate_limited") {
        const retryAfterSeconds = Math.max(
          1,
          Math.ceil((outcome.resetAt - clock()) / 1000)
        );
        reply.header("Retry-After", String(retryAfterSeconds));
      }

      if ("remaining" in outcome) {
        reply.header("X-RateLimit-Remaining", String(outcome.remaining));
      }

      return reply.code(STATUS_CODES[outcome.status]).send(outcome);
    }
  );

  server.get("/api/session", async (request) => {
    return sessions.describe(extractClientIP(request));
  });

  server.get("/api/stats", async () => ({
    generator: generator.getStats(),
    index: indexManager.status(),
    sessions: sessions.getStats(),
  }));

  server.get<{ Querystring: { deep?: string } }>(
    "/health",
    async (request, reply) => {
      const deep = request.query.deep === "true";
      // The deep probe spends a real completion; admin only
      if (
        deep &&
        !(config.ADMIN_TOKEN &&
          isAuthorized(request.headers.authorization, config.ADMIN_TOKEN))
      ) {
        logger.security("UNAUTHORIZED_DEEP_HEALTH", "WARNING", {
          clientId: extractClientIP(request),
        });
        return reply.code(401).send({
          error: "Unauthorized",
          message: "A valid admin token is required",
        });
      }

      const index = indexManager.status();
      const probe = deep ? await generator.healthCheck() : undefined;
      const healthy = index.loaded && (probe?.healthy ?? true);

      return reply.code(healthy ? 200 : 503).send({
        status: healthy ? "healthy" : "degraded",
        timestamp: new Date(clock()).toISOString(),
        environment: config.NODE_ENV,
        version: APP_VERSION,
        index,
        ...(probe ? { generator: probe } : {}),
      });
    }
  );

  server.post("/api/reindex", async (request, reply) => {
    if (!config.ADMIN_TOKEN) {
      return reply.code(404).send({ error: "Not Found" });
    }

    if (!isAuthorized(request.headers.authorization, config.ADMIN_TOKEN)) {
      logger.security("UNAUTHORIZED_REINDEX", "WARNING", {
        clientId: extractClientIP(request),
      });
      return reply.code(401).send({
        error: "Unauthorized",
        message: "A valid admin token is required",
      });
    }

    const index = await indexManager.reindex();
    return reply.code(200).send({
      status: "reindexed",
      chunks: index.size,
      model: index.model,
      builtAt: index.builtAt,
    });
  });

  return server;
}

function isAuthorized(header: string | undefined, token: string): boolean {
  const match = header ? /^Bearer\s+(.+)$/i.exec(header) : null;
  if (!match) return false;

  const provided = Buffer.from(match[1].trim());
  const expected = Buffer.from(token);
  return provided.length === expected.length && timingSafeEqual(provided, expected);
}

function fastifyLoggerOptions(
  config: AppDependencies["config"]
): FastifyServerOptions["logger"] {
  switch (config.NODE_ENV) {
    case "test":
      return false;
    case "production":
      return {
        level: config.LOG_LEVEL,
        redact: ["req.headers.authorization"],
      };
    default:
      return {
        level: config.LOG_LEVEL,
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      };
  }
}
