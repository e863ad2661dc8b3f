#!/usr/bin/env tsx
/**
 * Build the vector index from DOCUMENTS_PATH and persist it to INDEX_PATH
 */

import { config } from "dotenv";
import { loadConfig } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { logger } from "../src/logger.js";
import { createEncoder, createIndexManager } from "../src/services/index.js";

const nodeEnv = process.env.NODE_ENV || "development";
config({ path: `.env.${nodeEnv}` });
config();

async function main(): Promise<void> {
  const appConfig = loadConfig();
  logger.configure({ level: appConfig.LOG_LEVEL, environment: appConfig.NODE_ENV });

  const encoder = createEncoder(appConfig);
  const indexManager = createIndexManager(appConfig, encoder);

  console.log(`📚 Indexing documents from ${appConfig.DOCUMENTS_PATH}`);
  console.log(`🧮 Embedding model: ${encoder.model}`);

  const index = await indexManager.reindex();

  console.log(`✅ Indexed ${index.size} chunks`);
  console.log(`💾 Saved to ${appConfig.INDEX_PATH}`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error(
      `❌ Index build failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  process.exit(1);
});
