/**
 * Configuration Management
 * Environment-aware configuration with validation
 */

import path from "node:path";
import { ConfigurationError } from "./errors.js";
import type {
  AppConfig,
  EmbeddingProvider,
  LlmProvider,
  LogLevel,
  NodeEnv,
  RateLimitStoreKind,
} from "./types/env.js";

type Env = Readonly<Record<string, string | undefined>>;

const NODE_ENVS: readonly NodeEnv[] = ["development", "production", "test"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LLM_PROVIDERS: readonly LlmProvider[] = ["openai", "mock"];
const EMBEDDING_PROVIDERS: readonly EmbeddingProvider[] = ["remote", "local"];
const RATE_LIMIT_STORES: readonly RateLimitStoreKind[] = ["memory", "postgres"];

/**
 * Load and validate application configuration
 */
export const loadConfig = (env: Env = process.env): AppConfig => {
  const errors: string[] = [];

  const int = (key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      errors.push(`Invalid ${key}: "${raw}". Must be an integer.`);
      return fallback;
    }
    return value;
  };

  const float = (key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      errors.push(`Invalid ${key}: "${raw}". Must be a number.`);
      return fallback;
    }
    return value;
  };

  const oneOf = <T extends string>(
    key: string,
    allowed: readonly T[],
    fallback: T
  ): T => {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    const match = allowed.find((candidate) => candidate === raw);
    if (!match) {
      errors.push(`Invalid ${key}: "${raw}". Must be one of ${allowed.join(", ")}.`);
      return fallback;
    }
    return match;
  };

  const optional = (key: string): string | undefined => {
    const raw = env[key]?.trim();
    return raw ? raw : undefined;
  };

  const llmApiKey = optional("LLM_API_KEY") ?? "";

  const config: AppConfig = {
    // Server Configuration
    PORT: int("PORT", 3000),
    HOST: optional("HOST") ?? "0.0.0.0",
    NODE_ENV: oneOf("NODE_ENV", NODE_ENVS, "development"),
    LOG_LEVEL: oneOf("LOG_LEVEL", LOG_LEVELS, "info"),

    // Security Configuration
    MAX_QUERY_LENGTH: int("MAX_QUERY_LENGTH", 1000),
    RATE_LIMIT_PER_MINUTE: int("RATE_LIMIT_PER_MINUTE", 30),
    RATE_LIMIT_WINDOW_SECONDS: int("RATE_LIMIT_WINDOW_SECONDS", 60),
    RATE_LIMIT_STORE: oneOf("RATE_LIMIT_STORE", RATE_LIMIT_STORES, "memory"),
    DATABASE_URL: optional("DATABASE_URL"),
    SESSION_TIMEOUT_SECONDS: int("SESSION_TIMEOUT_SECONDS", 3600),
    ADMIN_TOKEN: optional("ADMIN_TOKEN"),

    // Retrieval Configuration
    TOP_K_RESULTS: int("TOP_K_RESULTS", 5),
    DOCUMENTS_PATH: path.resolve(optional("DOCUMENTS_PATH") ?? "documents"),
    INDEX_PATH: path.resolve(
      optional("INDEX_PATH") ?? path.join("storage", "index.json")
    ),
    CHUNK_SIZE: int("CHUNK_SIZE", 2000),
    CHUNK_OVERLAP: int("CHUNK_OVERLAP", 200),

    // Embedding Configuration
    EMBEDDING_PROVIDER: oneOf("EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS, "remote"),
    EMBEDDING_BASE_URL:
      optional("EMBEDDING_BASE_URL") ??
      optional("LLM_BASE_URL") ??
      "https://api.openai.com/v1",
    EMBEDDING_MODEL: optional("EMBEDDING_MODEL") ?? "text-embedding-3-small",
    EMBEDDING_API_KEY: optional("EMBEDDING_API_KEY") ?? llmApiKey,
    EMBEDDING_DIMENSIONS: int("EMBEDDING_DIMENSIONS", 512),

    // LLM Configuration
    LLM_PROVIDER: oneOf("LLM_PROVIDER", LLM_PROVIDERS, "openai"),
    LLM_BASE_URL: optional("LLM_BASE_URL") ?? "https://api.openai.com/v1",
    LLM_MODEL: optional("LLM_MODEL") ?? "gpt-4o-mini",
    LLM_API_KEY: llmApiKey,
    LLM_TEMPERATURE: float("LLM_TEMPERATURE", 0.05),
    LLM_TOP_P: float("LLM_TOP_P", 0.9),
    MAX_OUTPUT_TOKENS: int("MAX_OUTPUT_TOKENS", 1024),
    LLM_TIMEOUT_SECONDS: int("LLM_TIMEOUT_SECONDS", 30),
  };

  validateConfig(config, errors);

  return config;
};

/**
 * Validate configuration values; collects every problem before failing
 */
const validateConfig = (config: AppConfig, errors: string[]): void => {
  if (config.PORT < 1 || config.PORT > 65535) {
    errors.push(`Invalid PORT: ${config.PORT}. Must be between 1 and 65535.`);
  }

  const positive: readonly [string, number][] = [
    ["MAX_QUERY_LENGTH", config.MAX_QUERY_LENGTH],
    ["RATE_LIMIT_PER_MINUTE", config.RATE_LIMIT_PER_MINUTE],
    ["RATE_LIMIT_WINDOW_SECONDS", config.RATE_LIMIT_WINDOW_SECONDS],
    ["SESSION_TIMEOUT_SECONDS", config.SESSION_TIMEOUT_SECONDS],
    ["TOP_K_RESULTS", config.TOP_K_RESULTS],
    ["CHUNK_SIZE", config.CHUNK_SIZE],
    ["EMBEDDING_DIMENSIONS", config.EMBEDDING_DIMENSIONS],
    ["MAX_OUTPUT_TOKENS", config.MAX_OUTPUT_TOKENS],
  ];

  for (const [field, value] of positive) {
    if (value < 1) {
      errors.push(`Invalid ${field}: ${value}. Must be at least 1.`);
    }
  }

  if (config.CHUNK_OVERLAP < 0 || config.CHUNK_OVERLAP >= config.CHUNK_SIZE) {
    errors.push(
      `Invalid CHUNK_OVERLAP: ${config.CHUNK_OVERLAP}. Must be between 0 and CHUNK_SIZE - 1.`
    );
  }

  if (config.LLM_TEMPERATURE < 0 || config.LLM_TEMPERATURE > 2) {
    errors.push(
      `Invalid LLM_TEMPERATURE: ${config.LLM_TEMPERATURE}. Must be between 0 and 2.`
    );
  }

  if (config.LLM_TOP_P <= 0 || config.LLM_TOP_P > 1) {
    errors.push(`Invalid LLM_TOP_P: ${config.LLM_TOP_P}. Must be in (0, 1].`);
  }

  if (config.LLM_TIMEOUT_SECONDS < 1 || config.LLM_TIMEOUT_SECONDS > 300) {
    errors.push(
      `Invalid LLM_TIMEOUT_SECONDS: ${config.LLM_TIMEOUT_SECONDS}. Must be between 1 and 300 seconds.`
    );
  }

  // Credentials required by the selected providers
  if (config.LLM_PROVIDER === "openai" && !config.LLM_API_KEY) {
    errors.push("LLM_API_KEY is required when LLM_PROVIDER is openai");
  }

  if (config.EMBEDDING_PROVIDER === "remote" && !config.EMBEDDING_API_KEY) {
    errors.push(
      "EMBEDDING_API_KEY (or LLM_API_KEY) is required when EMBEDDING_PROVIDER is remote"
    );
  }

  if (config.RATE_LIMIT_STORE === "postgres" && !config.DATABASE_URL) {
    errors.push("DATABASE_URL is required when RATE_LIMIT_STORE is postgres");
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
};

/**
 * Mask a secret for display, keeping a short prefix
 */
export const maskSecret = (value: string | undefined): string => {
  if (!value) return "(not set)";
  if (value.length <= 4) return "****";
  return `${value.slice(0, 4)}****`;
};
