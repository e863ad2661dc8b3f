import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, maskSecret } from "./config.js";
import { ConfigurationError } from "./errors.js";

const OFFLINE = { LLM_PROVIDER: "mock", EMBEDDING_PROVIDER: "local" };

function problemsOf(env: Record<string, string>): readonly string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.problems;
    throw error;
  }
  return [];
}

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig(OFFLINE);

    expect(config).toMatchObject({
      PORT: 3000,
      HOST: "0.0.0.0",
      NODE_ENV: "development",
      LOG_LEVEL: "info",
      MAX_QUERY_LENGTH: 1000,
      RATE_LIMIT_PER_MINUTE: 30,
      RATE_LIMIT_WINDOW_SECONDS: 60,
      RATE_LIMIT_STORE: "memory",
      TOP_K_RESULTS: 5,
      CHUNK_SIZE: 2000,
      CHUNK_OVERLAP: 200,
      LLM_TEMPERATURE: 0.05,
      LLM_TOP_P: 0.9,
      MAX_OUTPUT_TOKENS: 1024,
      LLM_TIMEOUT_SECONDS: 30,
      EMBEDDING_DIMENSIONS: 512,
      SESSION_TIMEOUT_SECONDS: 3600,
      DOCUMENTS_PATH: path.resolve("documents"),
      INDEX_PATH: path.resolve("storage", "index.json"),
    });
    expect(config.ADMIN_TOKEN).toBeUndefined();
  });

  it("should read overrides and normalize enum casing", () => {
    const config = loadConfig({
      ...OFFLINE,
      PORT: "8080",
      LOG_LEVEL: "DEBUG",
      TOP_K_RESULTS: "3",
      LLM_TEMPERATURE: "0.7",
    });

    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.TOP_K_RESULTS).toBe(3);
    expect(config.LLM_TEMPERATURE).toBe(0.7);
  });

  it("should fall back to the LLM key and endpoint for embeddings", () => {
    const config = loadConfig({
      LLM_API_KEY: "test-secret",
      LLM_BASE_URL: "https://llm.test/v1",
    });

    expect(config.EMBEDDING_API_KEY).toBe("test-secret");
    expect(config.EMBEDDING_BASE_URL).toBe("https://llm.test/v1");
  });

  it("should collect every problem into one error", () => {
    expect(problemsOf({})).toEqual([
      "LLM_API_KEY is required when LLM_PROVIDER is openai",
      "EMBEDDING_API_KEY (or LLM_API_KEY) is required when EMBEDDING_PROVIDER is remote",
    ]);
  });

  it("should reject malformed and out-of-range values", () => {
    expect(
      problemsOf({
        ...OFFLINE,
        PORT: "abc",
        LOG_LEVEL: "verbose",
        CHUNK_OVERLAP: "2000",
        LLM_TOP_P: "0",
      })
    ).toEqual([
      'Invalid PORT: "abc". Must be an integer.',
      'Invalid LOG_LEVEL: "verbose". Must be one of debug, info, warn, error.',
      "Invalid CHUNK_OVERLAP: 2000. Must be between 0 and CHUNK_SIZE - 1.",
      "Invalid LLM_TOP_P: 0. Must be in (0, 1].",
    ]);
  });

  it("should require a database for the postgres store", () => {
    expect(problemsOf({ ...OFFLINE, RATE_LIMIT_STORE: "postgres" })).toEqual([
      "DATABASE_URL is required when RATE_LIMIT_STORE is postgres",
    ]);
  });

  it("should throw a ConfigurationError listing the problems", () => {
    expect(() => loadConfig({ ...OFFLINE, MAX_QUERY_LENGTH: "0" })).toThrow(
      "Configuration validation failed:\nInvalid MAX_QUERY_LENGTH: 0. Must be at least 1."
    );
  });
});

describe("maskSecret", () => {
  it("should keep only a short prefix", () => {
    expect(maskSecret(undefined)).toBe("(not set)");
    expect(maskSecret("abc")).toBe("****");
    expect(maskSecret("test-secret")).toBe("test****");
  });
});
