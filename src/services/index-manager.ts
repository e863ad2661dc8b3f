/**
 * Owns the live vector index. Queries take a snapshot reference; a reindex
 * builds a complete replacement and swaps the reference when it is ready.
 */

import fs from "node:fs/promises";
import { IndexUnavailableError } from "../errors.js";
import { logger } from "../logger.js";
import type { DocumentSource } from "./document-source.js";
import type { EmbeddingEncoder } from "./embedding-service.js";
import { FlatVectorIndex } from "./vector-index.js";

export interface IndexManagerOptions {
  readonly encoder: EmbeddingEncoder;
  readonly source: DocumentSource;
  readonly indexPath: string;
}

export interface IndexStatus {
  readonly loaded: boolean;
  readonly chunks: number;
  readonly model: string | null;
  readonly builtAt: string | null;
  readonly reindexing: boolean;
}

export class IndexManager {
  private index: FlatVectorIndex | null = null;
  private rebuild: Promise<FlatVectorIndex> | null = null;

  constructor(private readonly options: IndexManagerOptions) {}

  /**
   * Current index snapshot
   */
  current(): FlatVectorIndex {
    if (!this.index) {
      throw new IndexUnavailableError();
    }
    return this.index;
  }

  /**
   * Startup path: load the persisted artifact, or build one when missing
   */
  async loadOrBuild(): Promise<FlatVectorIndex> {
    const { indexPath, encoder } = this.options;

    if (await fileExists(indexPath)) {
      const loaded = await FlatVectorIndex.load(indexPath);

      if (loaded.model === encoder.model) {
        this.index = loaded;
        return loaded;
      }

      logger.warn("Persisted index was built with a different model, rebuilding", {
        persistedModel: loaded.model,
        encoderModel: encoder.model,
      });
    }

    return this.reindex();
  }

  /**
   * Build a fresh index from the document source and swap it in.
   * Concurrent callers share the same build.
   */
  reindex(): Promise<FlatVectorIndex> {
    if (this.rebuild) {
      return this.rebuild;
    }

    this.rebuild = this.performReindex().finally(() => {
      this.rebuild = null;
    });

    return this.rebuild;
  }

  status(): IndexStatus {
    return {
      loaded: this.index !== null,
      chunks: this.index?.size ?? 0,
      model: this.index?.model ?? null,
      builtAt: this.index?.builtAt ?? null,
      reindexing: this.rebuild !== null,
    };
  }

  private async performReindex(): Promise<FlatVectorIndex> {
    const reindexStart = Date.now();
    logger.info("Reindex started", { source: this.options.source.description });

    const inputs = await this.options.source.load();
    const built = await FlatVectorIndex.build(inputs, this.options.encoder);
    await built.save(this.options.indexPath);

    this.index = built;

    logger.info("Reindex completed", {
      chunks: built.size,
      path: this.options.indexPath,
      totalTime: Date.now() - reindexStart,
    });

    return built;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
