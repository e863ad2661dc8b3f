/**
 * Answer Generator
 * Context-grounded completions with bounded exponential-backoff retries,
 * running performance aggregates and a lightweight health probe
 */

import { ProviderError, toProviderError } from "../errors.js";
import { logger } from "../logger.js";
import type { GenerationError } from "../types/rag.js";
import type { CompletionResponse, LlmClient } from "./llm-client.js";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 4000,
  maxDelayMs: 10000,
};

export interface AnswerGeneratorOptions {
  readonly temperature: number;
  readonly topP: number;
  readonly maxOutputTokens: number;
  readonly retry?: Partial<RetryPolicy>;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly clock?: () => number;
}

export interface GenerationOutcome {
  readonly success: boolean;
  readonly responseText: string | null;
  readonly responseTimeMs: number;
  readonly attempts: number;
  readonly error?: GenerationError;
}

export interface HealthStatus {
  readonly healthy: boolean;
  readonly latencyMs: number;
  readonly model: string;
  readonly checkedAt: string;
  readonly error?: string;
}

export interface PerformanceStats {
  readonly totalRequests: number;
  readonly averageResponseTimeMs: number;
  readonly errorRate: number;
  readonly successRate: number;
}

type AttemptResult =
  | { readonly kind: "success"; readonly response: CompletionResponse }
  | { readonly kind: "retryable"; readonly error: ProviderError }
  | { readonly kind: "fatal"; readonly error: ProviderError };

const HEALTH_PROBE_PROMPT = "Hello, please respond with 'Service is healthy'";

const SAFE_MESSAGES: Record<GenerationError["category"], string> = {
  provider_unavailable:
    "The answer service is temporarily unavailable. Please try again later.",
  provider_rejected: "The answer service could not process this request.",
  invalid_response: "The answer service returned an unexpected response.",
};

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(Math.max(exponential, policy.baseDelayMs), policy.maxDelayMs);
}

/**
 * Prompt sent to the model for one question and one chunk of context
 */
export function buildPrompt(question: string, context?: string): string {
  if (!context?.trim()) {
    return question;
  }
  return `Context: ${context}\n\nQuestion: ${question}\n\nPlease provide a helpful and accurate answer based on the context provided.`;
}

export class AnswerGenerator {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  private totalRequests = 0;
  private totalResponseTimeMs = 0;
  private errorCount = 0;

  constructor(
    private readonly client: LlmClient,
    private readonly options: AnswerGeneratorOptions
  ) {
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep =
      options.sleep ??
      ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.clock = options.clock ?? Date.now;

    logger.info("Answer generator initialized", {
      model: client.model,
      temperature: options.temperature,
      topP: options.topP,
      maxOutputTokens: options.maxOutputTokens,
      maxAttempts: this.retryPolicy.maxAttempts,
    });
  }

  get model(): string {
    return this.client.model;
  }

  /**
   * Generate an answer to `prompt` grounded in `context`. Never throws;
   * failures come back as `success: false` with a safe error descriptor.
   */
  async generate(prompt: string, context?: string): Promise<GenerationOutcome> {
    const startTime = this.clock();
    const fullPrompt = buildPrompt(prompt, context);

    let attempts = 0;
    let result: AttemptResult | null = null;

    for (attempts = 1; attempts <= this.retryPolicy.maxAttempts; attempts++) {
      result = await this.attempt(fullPrompt);

      if (result.kind !== "retryable") break;
      if (attempts === this.retryPolicy.maxAttempts) break;

      const delay = backoffDelay(attempts, this.retryPolicy);
      logger.warn("Transient LLM error, backing off", {
        attempt: attempts,
        delayMs: delay,
        status: result.error.status ?? null,
        error: result.error.message,
      });
      await this.sleep(delay);
    }

    const responseTimeMs = this.clock() - startTime;
    const attemptsMade = Math.min(attempts, this.retryPolicy.maxAttempts);

    if (result?.kind === "success") {
      this.recordCompletion(responseTimeMs, true);
      logger.apiCall("llm_generate", prompt, responseTimeMs, true);
      return {
        success: true,
        responseText: result.response.text,
        responseTimeMs,
        attempts: attemptsMade,
      };
    }

    this.recordCompletion(responseTimeMs, false);
    logger.apiCall("llm_generate", prompt, responseTimeMs, false);

    const error = result?.error;
    logger.error("Answer generation failed", {
      attempts: attemptsMade,
      gaveUp: result?.kind === "retryable",
      status: error?.status ?? null,
      error: error?.message ?? "no attempt made",
    });

    const category = categorize(result);
    return {
      success: false,
      responseText: null,
      responseTimeMs,
      attempts: attemptsMade,
      error: { category, message: SAFE_MESSAGES[category] },
    };
  }

  /**
   * Single probe call without retries; not counted in the aggregates
   */
  async healthCheck(): Promise<HealthStatus> {
    const startTime = this.clock();
    const result = await this.attempt(HEALTH_PROBE_PROMPT);
    const latencyMs = this.clock() - startTime;
    const checkedAt = new Date().toISOString();

    if (result.kind === "success") {
      return { healthy: true, latencyMs, model: this.client.model, checkedAt };
    }

    logger.warn("LLM health check failed", { error: result.error.message });
    return {
      healthy: false,
      latencyMs,
      model: this.client.model,
      checkedAt,
      error: SAFE_MESSAGES[categorize(result)],
    };
  }

  getStats(): PerformanceStats {
    if (this.totalRequests === 0) {
      return {
        totalRequests: 0,
        averageResponseTimeMs: 0,
        errorRate: 0,
        successRate: 0,
      };
    }

    const successCount = this.totalRequests - this.errorCount;
    return {
      totalRequests: this.totalRequests,
      averageResponseTimeMs: round2(this.totalResponseTimeMs / this.totalRequests),
      errorRate: round2((this.errorCount / this.totalRequests) * 100),
      successRate: round2((successCount / this.totalRequests) * 100),
    };
  }

  private async attempt(fullPrompt: string): Promise<AttemptResult> {
    try {
      const response = await this.client.complete({
        prompt: fullPrompt,
        temperature: this.options.temperature,
        topP: this.options.topP,
        maxTokens: this.options.maxOutputTokens,
      });
      return { kind: "success", response };
    } catch (error) {
      const providerError = toProviderError(error, "LLM call");
      return providerError.transient
        ? { kind: "retryable", error: providerError }
        : { kind: "fatal", error: providerError };
    }
  }

  // All three counters move together in one synchronous step
  private recordCompletion(responseTimeMs: number, success: boolean): void {
    this.totalRequests += 1;
    this.totalResponseTimeMs += responseTimeMs;
    if (!success) {
      this.errorCount += 1;
    }
  }
}

function categorize(result: AttemptResult | null): GenerationError["category"] {
  if (!result || result.kind === "retryable") return "provider_unavailable";
  if (result.kind === "fatal" && result.error.invalidResponse) {
    return "invalid_response";
  }
  return "provider_rejected";
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
