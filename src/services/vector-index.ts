/**
 * Flat inner-product vector index
 *
 * Holds one L2-normalized vector per document chunk, in chunk order, and answers
 * exact top-k queries by inner product (equivalent to cosine similarity on
 * normalized vectors). Instances are immutable; a rebuild produces a new index.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger.js";
import type {
  ChunkInput,
  DocumentChunk,
  EmbeddingVector,
  RetrievalHit,
  RetrievalResult,
} from "../types/rag.js";
import { innerProduct } from "../utils/vector-math.js";
import type { EmbeddingEncoder } from "./embedding-service.js";

const INDEX_FORMAT_VERSION = 1;

interface PersistedIndex {
  readonly formatVersion: number;
  readonly model: string;
  readonly dimension: number;
  readonly builtAt: string;
  readonly chunks: readonly DocumentChunk[];
  readonly vectors: readonly EmbeddingVector[];
}

export class FlatVectorIndex {
  private constructor(
    private readonly chunkList: readonly DocumentChunk[],
    private readonly vectors: readonly EmbeddingVector[],
    readonly model: string,
    readonly dimension: number,
    readonly builtAt: string
  ) {}

  /**
   * Embed every chunk and build an index in the same order
   */
  static async build(
    inputs: readonly ChunkInput[],
    encoder: EmbeddingEncoder
  ): Promise<FlatVectorIndex> {
    const buildStart = Date.now();
    const chunks: DocumentChunk[] = inputs.map((input, chunkIndex) => ({
      text: input.text,
      sourceFile: input.sourceFile,
      chunkIndex,
    }));

    const vectors =
      chunks.length > 0
        ? await encoder.encodeBatch(chunks.map((chunk) => chunk.text))
        : [];

    if (vectors.length !== chunks.length) {
      throw new Error(
        `Encoder returned ${vectors.length} vectors for ${chunks.length} chunks`
      );
    }

    const dimension = vectors[0]?.length ?? 0;
    if (vectors.some((vector) => vector.length !== dimension)) {
      throw new Error("Encoder returned vectors of differing dimensions");
    }

    logger.info("Vector index built", {
      chunks: chunks.length,
      dimension,
      model: encoder.model,
      buildTime: Date.now() - buildStart,
    });

    return new FlatVectorIndex(
      chunks,
      vectors,
      encoder.model,
      dimension,
      new Date().toISOString()
    );
  }

  /**
   * Load an index artifact written by `save`
   */
  static async load(filePath: string): Promise<FlatVectorIndex> {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(raw);

    if (!isPersistedIndex(parsed)) {
      throw new Error(`Unrecognized vector index format at ${filePath}`);
    }

    if (parsed.formatVersion !== INDEX_FORMAT_VERSION) {
      throw new Error(
        `Unsupported vector index version ${parsed.formatVersion} at ${filePath}`
      );
    }

    if (parsed.chunks.length !== parsed.vectors.length) {
      throw new Error(
        `Vector index at ${filePath} has ${parsed.chunks.length} chunks but ${parsed.vectors.length} vectors`
      );
    }

    logger.info("Vector index loaded", {
      path: filePath,
      chunks: parsed.chunks.length,
      dimension: parsed.dimension,
      model: parsed.model,
    });

    return new FlatVectorIndex(
      parsed.chunks,
      parsed.vectors,
      parsed.model,
      parsed.dimension,
      parsed.builtAt
    );
  }

  /**
   * Persist the index; written to a temp file first, then renamed into place
   */
  async save(filePath: string): Promise<void> {
    const store: PersistedIndex = {
      formatVersion: INDEX_FORMAT_VERSION,
      model: this.model,
      dimension: this.dimension,
      builtAt: this.builtAt,
      chunks: this.chunkList,
      vectors: this.vectors,
    };

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(store), "utf8");
    await fs.rename(tempPath, filePath);
  }

  get size(): number {
    return this.chunkList.length;
  }

  get chunks(): readonly DocumentChunk[] {
    return this.chunkList;
  }

  chunkAt(chunkIndex: number): DocumentChunk {
    const chunk = this.chunkList[chunkIndex];
    if (!chunk) {
      throw new RangeError(`Chunk index ${chunkIndex} out of range`);
    }
    return chunk;
  }

  /**
   * Top-k chunks by descending inner product; ties keep chunk order
   */
  search(queryVector: EmbeddingVector, k: number): RetrievalResult {
    if (this.chunkList.length === 0 || k <= 0) {
      return [];
    }

    if (queryVector.length !== this.dimension) {
      throw new Error(
        `Query vector has dimension ${queryVector.length}, index expects ${this.dimension}`
      );
    }

    const hits: RetrievalHit[] = this.vectors.map((vector, chunkIndex) => ({
      chunkIndex,
      score: innerProduct(queryVector, vector),
    }));

    return hits
      .sort((a, b) => b.score - a.score || a.chunkIndex - b.chunkIndex)
      .slice(0, Math.min(k, hits.length));
  }
}

function isPersistedIndex(value: unknown): value is PersistedIndex {
  return (
    typeof value === "object" &&
    value !== null &&
    "formatVersion" in value &&
    typeof value.formatVersion === "number" &&
    "model" in value &&
    typeof value.model === "string" &&
    "dimension" in value &&
    typeof value.dimension === "number" &&
    "builtAt" in value &&
    typeof value.builtAt === "string" &&
    "chunks" in value &&
    Array.isArray(value.chunks) &&
    "vectors" in value &&
    Array.isArray(value.vectors)
  );
}
