#!/usr/bin/env tsx
/**
 * Print which settings are present (secrets masked) and whether they validate
 */

import { config } from "dotenv";
import { loadConfig, maskSecret } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";

const nodeEnv = process.env.NODE_ENV || "development";
config({ path: `.env.${nodeEnv}` });
config();

const SECRET_KEYS = new Set(["LLM_API_KEY", "EMBEDDING_API_KEY", "ADMIN_TOKEN", "DATABASE_URL"]);

const KEYS = [
  "NODE_ENV",
  "PORT",
  "HOST",
  "LOG_LEVEL",
  "LLM_PROVIDER",
  "LLM_BASE_URL",
  "LLM_MODEL",
  "LLM_API_KEY",
  "EMBEDDING_PROVIDER",
  "EMBEDDING_BASE_URL",
  "EMBEDDING_MODEL",
  "EMBEDDING_API_KEY",
  "RATE_LIMIT_STORE",
  "DATABASE_URL",
  "DOCUMENTS_PATH",
  "INDEX_PATH",
  "ADMIN_TOKEN",
] as const;

console.log("🔍 Configuration diagnosis\n");

for (const key of KEYS) {
  const value = process.env[key];
  const display = SECRET_KEYS.has(key)
    ? maskSecret(value)
    : (value ?? "(not set, default applies)");
  console.log(`${value ? "✅" : "⚪"} ${key.padEnd(20)} ${display}`);
}

console.log("");

try {
  const appConfig = loadConfig();
  console.log("✅ Configuration is valid");
  console.log(`   LLM: ${appConfig.LLM_PROVIDER} (${appConfig.LLM_MODEL})`);
  console.log(
    `   Embeddings: ${appConfig.EMBEDDING_PROVIDER} (${
      appConfig.EMBEDDING_PROVIDER === "local"
        ? `${appConfig.EMBEDDING_DIMENSIONS} dimensions`
        : appConfig.EMBEDDING_MODEL
    })`
  );
  console.log(`   Rate limit: ${appConfig.RATE_LIMIT_PER_MINUTE} per ${appConfig.RATE_LIMIT_WINDOW_SECONDS}s (${appConfig.RATE_LIMIT_STORE})`);
} catch (error) {
  if (error instanceof ConfigurationError) {
    console.log("❌ Configuration is invalid:");
    for (const problem of error.problems) {
      console.log(`   - ${problem}`);
    }
    process.exit(1);
  }
  throw error;
}
