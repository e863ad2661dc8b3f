/**
 * Service Factory
 * Wires every pipeline component from validated configuration
 */

import { logger } from "../logger.js";
import { InputGuard } from "../security/input-guard.js";
import { PostgresRateLimitStore } from "../security/postgres-rate-limit-store.js";
import {
  InMemoryRateLimitStore,
  RateLimiter,
  type RateLimitStore,
} from "../security/rate-limiter.js";
import { Redactor } from "../security/redactor.js";
import type { AppConfig } from "../types/env.js";
import { AnswerGenerator } from "./answer-generator.js";
import { DirectoryDocumentSource } from "./document-source.js";
import {
  type EmbeddingEncoder,
  HashingEmbeddingService,
  RemoteEmbeddingService,
} from "./embedding-service.js";
import { IndexManager } from "./index-manager.js";
import {
  type LlmClient,
  MockLlmClient,
  OpenAICompatibleClient,
} from "./llm-client.js";
import { QueryOrchestrator } from "./query-orchestrator.js";
import { SessionService } from "./session-service.js";

export interface Services {
  readonly rateLimiter: RateLimiter;
  readonly encoder: EmbeddingEncoder;
  readonly indexManager: IndexManager;
  readonly generator: AnswerGenerator;
  readonly orchestrator: QueryOrchestrator;
  readonly sessions: SessionService;
}

/**
 * Create all services. The index is not loaded here; call
 * `indexManager.loadOrBuild()` before serving queries.
 */
export async function createServices(config: AppConfig): Promise<Services> {
  const store = await createRateLimitStore(config);
  const rateLimiter = new RateLimiter(store, {
    limit: config.RATE_LIMIT_PER_MINUTE,
    windowMs: config.RATE_LIMIT_WINDOW_SECONDS * 1000,
  });

  const encoder = createEncoder(config);
  const indexManager = createIndexManager(config, encoder);

  const generator = new AnswerGenerator(createLlmClient(config), {
    temperature: config.LLM_TEMPERATURE,
    topP: config.LLM_TOP_P,
    maxOutputTokens: config.MAX_OUTPUT_TOKENS,
  });

  const orchestrator = new QueryOrchestrator({
    rateLimiter,
    inputGuard: new InputGuard({ maxLength: config.MAX_QUERY_LENGTH }),
    encoder,
    indexManager,
    generator,
    redactor: new Redactor(),
    topK: config.TOP_K_RESULTS,
  });

  const sessions = new SessionService(rateLimiter, {
    timeoutSeconds: config.SESSION_TIMEOUT_SECONDS,
  });

  logger.info("Services initialized", {
    rateLimitStore: config.RATE_LIMIT_STORE,
    embeddingProvider: config.EMBEDDING_PROVIDER,
    llmProvider: config.LLM_PROVIDER,
    topK: config.TOP_K_RESULTS,
  });

  return { rateLimiter, encoder, indexManager, generator, orchestrator, sessions };
}

export function createEncoder(config: AppConfig): EmbeddingEncoder {
  if (config.EMBEDDING_PROVIDER === "local") {
    return new HashingEmbeddingService(config.EMBEDDING_DIMENSIONS);
  }

  return new RemoteEmbeddingService({
    apiKey: config.EMBEDDING_API_KEY,
    baseUrl: config.EMBEDDING_BASE_URL,
    model: config.EMBEDDING_MODEL,
    timeoutMs: config.LLM_TIMEOUT_SECONDS * 1000,
  });
}

export function createIndexManager(
  config: AppConfig,
  encoder: EmbeddingEncoder
): IndexManager {
  return new IndexManager({
    encoder,
    source: new DirectoryDocumentSource({
      rootDir: config.DOCUMENTS_PATH,
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
    }),
    indexPath: config.INDEX_PATH,
  });
}

function createLlmClient(config: AppConfig): LlmClient {
  if (config.LLM_PROVIDER === "mock") {
    return new MockLlmClient();
  }

  return new OpenAICompatibleClient({
    baseUrl: config.LLM_BASE_URL,
    apiKey: config.LLM_API_KEY,
    model: config.LLM_MODEL,
    timeoutMs: config.LLM_TIMEOUT_SECONDS * 1000,
  });
}

async function createRateLimitStore(config: AppConfig): Promise<RateLimitStore> {
  if (config.RATE_LIMIT_STORE === "postgres" && config.DATABASE_URL) {
    const store = new PostgresRateLimitStore({
      connectionString: config.DATABASE_URL,
      debug: config.NODE_ENV === "development",
    });
    await store.initialize();
    return store;
  }

  return new InMemoryRateLimitStore();
}
