/**
 * Query Orchestrator
 *
 * Pipeline: rate limit → validate → embed → retrieve → generate per chunk → redact → assemble
 *
 * - Rate-limit denials and validation rejections end the request before any
 *   embedding or model call is made
 * - Each retrieved chunk gets its own generation call; the calls run
 *   concurrently and a failure on one chunk never fails the others
 * - Every answer is redacted before it leaves the pipeline
 */

import { createHash } from "node:crypto";
import { IndexUnavailableError } from "../errors.js";
import { logger } from "../logger.js";
import type { InputGuard } from "../security/input-guard.js";
import type { RateLimiter } from "../security/rate-limiter.js";
import type { Redactor } from "../security/redactor.js";
import type {
  GenerationResult,
  QueryOutcome,
  QueryRequest,
  RetrievalResult,
} from "../types/rag.js";
import { extractProjectCodes } from "../utils/project-codes.js";
import type { AnswerGenerator } from "./answer-generator.js";
import type { EmbeddingEncoder } from "./embedding-service.js";
import type { IndexManager } from "./index-manager.js";
import type { FlatVectorIndex } from "./vector-index.js";

export interface QueryOrchestratorDeps {
  readonly rateLimiter: RateLimiter;
  readonly inputGuard: InputGuard;
  readonly encoder: EmbeddingEncoder;
  readonly indexManager: Pick<IndexManager, "current">;
  readonly generator: AnswerGenerator;
  readonly redactor: Redactor;
  readonly topK: number;
  readonly clock?: () => number;
}

export const NO_RESULTS_MESSAGE =
  "No relevant documents were found for this question.";
export const RATE_LIMITED_MESSAGE =
  "Rate limit exceeded. Please wait before making another request.";

export class QueryOrchestrator {
  private readonly clock: () => number;

  constructor(private readonly deps: QueryOrchestratorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async process(request: QueryRequest): Promise<QueryOutcome> {
    const startTime = this.clock();
    const { rateLimiter, inputGuard, redactor } = this.deps;

    const admission = await rateLimiter.admit(request.clientId);
    if (!admission.allowed) {
      return {
        status: "rate_limited",
        remaining: 0,
        resetAt: admission.resetAt,
        message: RATE_LIMITED_MESSAGE,
      };
    }

    const validation = inputGuard.validate(request.rawText);
    if (!validation.ok) {
      return {
        status: "rejected",
        reason: validation.reason,
        message: validation.message,
      };
    }
    const question = validation.value;

    // Snapshot the index so a concurrent reindex cannot change it mid-query
    let index: FlatVectorIndex;
    try {
      index = this.deps.indexManager.current();
    } catch (error) {
      if (error instanceof IndexUnavailableError) {
        logger.error("Query received without a loaded index", {
          clientId: request.clientId,
        });
        return {
          status: "failed",
          category: "index_unavailable",
          message: "The document index is not available yet.",
        };
      }
      throw error;
    }

    let hits: RetrievalResult;
    try {
      const queryVector = await this.deps.encoder.encode(question);
      hits = index.search(queryVector, this.deps.topK);
    } catch (error) {
      logger.error("Retrieval failed", {
        clientId: request.clientId,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        status: "failed",
        category: "embedding_unavailable",
        message: "Search is temporarily unavailable. Please try again later.",
      };
    }

    logger.info("Retrieval completed", {
      hits: hits.length,
      topScore: hits[0]?.score ?? null,
      retrievalTime: this.clock() - startTime,
    });

    if (hits.length === 0) {
      return {
        status: "no_results",
        remaining: admission.remaining,
        message: NO_RESULTS_MESSAGE,
        processingTimeMs: this.clock() - startTime,
      };
    }

    const answers = await Promise.all(
      hits.map(async ({ chunkIndex, score }): Promise<GenerationResult> => {
        const chunk = index.chunkAt(chunkIndex);
        const outcome = await this.deps.generator.generate(question, chunk.text);

        if (!outcome.success) {
          logger.warn("Answer generation failed for chunk", {
            sourceFile: chunk.sourceFile,
            chunkIndex,
            category: outcome.error?.category,
          });
        }

        return {
          sourceFile: chunk.sourceFile,
          chunkIndex,
          score,
          answer:
            outcome.responseText === null
              ? null
              : redactor.redact(outcome.responseText),
          responseTimeMs: outcome.responseTimeMs,
          success: outcome.success,
          error: outcome.error,
        };
      })
    );

    const sourceFiles = [...new Set(answers.map((answer) => answer.sourceFile))];
    this.logInteraction(question, answers);

    const processingTimeMs = this.clock() - startTime;
    logger.info("Query completed", {
      answers: answers.length,
      failures: answers.filter((answer) => !answer.success).length,
      processingTimeMs,
    });

    return {
      status: "answered",
      remaining: admission.remaining,
      answers,
      sourceFiles,
      projectCodes: extractProjectCodes(sourceFiles),
      processingTimeMs,
    };
  }

  /**
   * Audit entry: the question is hashed, the preview is already redacted
   */
  private logInteraction(
    question: string,
    answers: readonly GenerationResult[]
  ): void {
    const queryHash = createHash("sha256")
      .update(question)
      .digest("hex")
      .slice(0, 16);
    const firstAnswer = answers.find((answer) => answer.answer !== null);
    const preview = firstAnswer?.answer?.slice(0, 100) ?? "";

    logger.info("User interaction logged", {
      type: "audit",
      queryHash,
      responsePreview: preview,
    });
  }
}
