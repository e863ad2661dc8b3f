/**
 * Embedding Services
 * Remote OpenAI-compatible embeddings and a local hashing encoder, both L2-normalized
 */

import {
  ProviderError,
  isTransientStatus,
  readProviderJson,
  toProviderError,
} from "../errors.js";
import { logger } from "../logger.js";
import type { EmbeddingVector } from "../types/rag.js";
import { normalizeL2 } from "../utils/vector-math.js";

export interface EmbeddingEncoder {
  readonly model: string;
  encode(text: string): Promise<EmbeddingVector>;
  encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]>;
}

export interface RemoteEmbeddingConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly batchSize?: number;
}

interface EmbeddingResponse {
  readonly data?: readonly {
    readonly index?: number;
    readonly embedding: readonly number[];
  }[];
}

export class RemoteEmbeddingService implements EmbeddingEncoder {
  readonly model: string;
  private readonly apiUrl: string;
  private readonly batchSize: number;

  constructor(private readonly config: RemoteEmbeddingConfig) {
    if (!config.apiKey) {
      throw new Error("Embedding API key is required");
    }

    this.model = config.model;
    this.apiUrl = `${config.baseUrl.replace(/\/+$/, "")}/embeddings`;
    this.batchSize = config.batchSize ?? 64;

    logger.info("Embedding service initialized", {
      provider: "remote",
      model: this.model,
      timeout: config.timeoutMs,
    });
  }

  /**
   * Generate embedding for query text
   */
  async encode(text: string): Promise<EmbeddingVector> {
    if (!text?.trim()) {
      throw new Error("Text cannot be empty for embedding generation");
    }

    const embeddingStart = Date.now();
    const [embedding] = await this.request([text.trim()]);

    logger.debug("Embedding generation completed", {
      vectorDimensions: embedding.length,
      totalTime: Date.now() - embeddingStart,
    });

    return embedding;
  }

  /**
   * Generate embeddings in provider-sized batches, preserving input order
   */
  async encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    const vectors: EmbeddingVector[] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.request(batch)));
      logger.debug("Embedding batch completed", {
        completed: vectors.length,
        total: texts.length,
      });
    }

    return vectors;
  }

  private async request(inputs: readonly string[]): Promise<number[][]> {
    const payload = {
      model: this.model,
      input: inputs,
      encoding_format: "float",
    };

    let response: Response;
    try {
      response = await fetch(this.apiUrl, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw toProviderError(error, "Embedding generation");
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      throw new ProviderError(
        `Embedding API error ${response.status}: ${errorText}`,
        { status: response.status, transient: isTransientStatus(response.status) }
      );
    }

    const result = await readProviderJson<EmbeddingResponse>(
      response,
      "Embedding generation"
    );
    const data = result?.data ?? [];

    if (data.length !== inputs.length) {
      throw new ProviderError(
        `Embedding API returned ${data.length} vectors for ${inputs.length} inputs`,
        { transient: false, invalidResponse: true }
      );
    }

    return [...data]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map((item) => normalizeL2(item.embedding));
  }
}

/**
 * Deterministic bag-of-words encoder using feature hashing.
 * Needs no network; useful for development and offline indexing.
 */
export class HashingEmbeddingService implements EmbeddingEncoder {
  readonly model: string;

  constructor(private readonly dimensions = 512) {
    this.model = `local-hashing-${dimensions}`;
  }

  async encode(text: string): Promise<EmbeddingVector> {
    const counts = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      counts[fnv1a(token) % this.dimensions] += 1;
    }

    return normalizeL2(counts);
  }

  async encodeBatch(texts: readonly string[]): Promise<EmbeddingVector[]> {
    return Promise.all(texts.map((text) => this.encode(text)));
  }
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
