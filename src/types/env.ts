/**
 * Type-safe application configuration.
 * Immutable once loaded; see `loadConfig` for defaults and validation.
 */

export type NodeEnv = "development" | "production" | "test";
export type LogLevel = "debug" | "info" | "warn" | "error";
export type LlmProvider = "openai" | "mock";
export type EmbeddingProvider = "remote" | "local";
export type RateLimitStoreKind = "memory" | "postgres";

export interface AppConfig {
  // Server Configuration
  readonly PORT: number;
  readonly HOST: string;
  readonly NODE_ENV: NodeEnv;
  readonly LOG_LEVEL: LogLevel;

  // Security Configuration
  readonly MAX_QUERY_LENGTH: number;
  readonly RATE_LIMIT_PER_MINUTE: number;
  readonly RATE_LIMIT_WINDOW_SECONDS: number;
  readonly RATE_LIMIT_STORE: RateLimitStoreKind;
  readonly DATABASE_URL?: string;
  readonly SESSION_TIMEOUT_SECONDS: number;
  readonly ADMIN_TOKEN?: string;

  // Retrieval Configuration
  readonly TOP_K_RESULTS: number;
  readonly DOCUMENTS_PATH: string;
  readonly INDEX_PATH: string;
  readonly CHUNK_SIZE: number;
  readonly CHUNK_OVERLAP: number;

  // Embedding Configuration
  readonly EMBEDDING_PROVIDER: EmbeddingProvider;
  readonly EMBEDDING_BASE_URL: string;
  readonly EMBEDDING_MODEL: string;
  readonly EMBEDDING_API_KEY: string;
  readonly EMBEDDING_DIMENSIONS: number;

  // LLM Configuration
  readonly LLM_PROVIDER: LlmProvider;
  readonly LLM_BASE_URL: string;
  readonly LLM_MODEL: string;
  readonly LLM_API_KEY: string;
  readonly LLM_TEMPERATURE: number;
  readonly LLM_TOP_P: number;
  readonly MAX_OUTPUT_TOKENS: number;
  readonly LLM_TIMEOUT_SECONDS: number;
}
