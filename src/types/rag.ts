/**
 * RAG Type Definitions for project document question answering
 *
 * Core Types:
 * - Document chunks and their embeddings
 * - Retrieval hits ordered by similarity
 * - Per-chunk generation results and the assembled query outcome
 */

export type EmbeddingVector = readonly number[];

export interface DocumentChunk {
  readonly text: string;
  readonly sourceFile: string;
  /** Position of the chunk in the list the index was built from. */
  readonly chunkIndex: number;
}

export interface ChunkInput {
  readonly text: string;
  readonly sourceFile: string;
}

export interface RetrievalHit {
  readonly chunkIndex: number;
  readonly score: number;
}

export type RetrievalResult = readonly RetrievalHit[];

export interface QueryRequest {
  readonly rawText: string;
  readonly clientId: string;
  readonly timestamp: number;
}

export type GenerationErrorCategory =
  | "provider_unavailable"
  | "provider_rejected"
  | "invalid_response";

export interface GenerationError {
  readonly category: GenerationErrorCategory;
  readonly message: string;
}

export interface GenerationResult {
  readonly sourceFile: string;
  readonly chunkIndex: number;
  readonly score: number;
  readonly answer: string | null;
  readonly responseTimeMs: number;
  readonly success: boolean;
  readonly error?: GenerationError;
}

export type RejectionReason =
  | "empty"
  | "too_long"
  | "malicious_pattern"
  | "policy_violation";

export type FailureCategory = "embedding_unavailable" | "index_unavailable";

export type QueryOutcome =
  | {
      readonly status: "rate_limited";
      readonly remaining: 0;
      readonly resetAt: number;
      readonly message: string;
    }
  | {
      readonly status: "rejected";
      readonly reason: RejectionReason;
      readonly message: string;
    }
  | {
      readonly status: "no_results";
      readonly remaining: number;
      readonly message: string;
      readonly processingTimeMs: number;
    }
  | {
      readonly status: "answered";
      readonly remaining: number;
      readonly answers: readonly GenerationResult[];
      readonly sourceFiles: readonly string[];
      readonly projectCodes: readonly string[];
      readonly processingTimeMs: number;
    }
  | {
      readonly status: "failed";
      readonly category: FailureCategory;
      readonly message: string;
    };

export type QueryStatus = QueryOutcome["status"];
