/**
 * LLM provider clients
 * One completion per call; retry policy lives in the AnswerGenerator
 */

import {
  ProviderError,
  isTransientStatus,
  readProviderJson,
  toProviderError,
} from "../errors.js";

export interface CompletionRequest {
  readonly prompt: string;
  readonly temperature: number;
  readonly topP: number;
  readonly maxTokens: number;
}

export interface CompletionResponse {
  readonly text: string;
  readonly outputTokens?: number;
}

export interface LlmClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface OpenAICompatibleClientConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
}

interface ChatCompletionResponse {
  readonly choices?: readonly {
    readonly message?: { readonly content?: string | null };
  }[];
  readonly usage?: { readonly completion_tokens?: number };
}

/**
 * Chat completions over any OpenAI-compatible HTTP endpoint
 */
export class OpenAICompatibleClient implements LlmClient {
  readonly model: string;
  private readonly endpoint: string;

  constructor(private readonly config: OpenAICompatibleClientConfig) {
    this.model = config.model;
    this.endpoint = `${config.baseUrl.replace(/\/+$/, "")}/chat/completions`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const payload = {
      model: this.model,
      messages: [{ role: "user", content: request.prompt }],
      temperature: request.temperature,
      top_p: request.topP,
      max_tokens: request.maxTokens,
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw toProviderError(error, "Chat completion");
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      throw new ProviderError(`LLM API error ${response.status}: ${errorText}`, {
        status: response.status,
        transient: isTransientStatus(response.status),
      });
    }

    const body = await readProviderJson<ChatCompletionResponse>(
      response,
      "Chat completion"
    );
    const text = body?.choices?.[0]?.message?.content;

    if (typeof text !== "string" || !text.trim()) {
      throw new ProviderError("Invalid response format from LLM API", {
        transient: false,
        invalidResponse: true,
      });
    }

    return { text, outputTokens: body?.usage?.completion_tokens };
  }

  private buildHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.config.apiKey}`,
      "Content-Type": "application/json",
      "User-Agent": "doc-qa-rag/1.0.0",
    };
  }
}

/**
 * Offline stand-in that echoes the question; no network access
 */
export class MockLlmClient implements LlmClient {
  readonly model = "mock-llm";

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const question = extractQuestion(request.prompt);
    const text = `Mock response to: ${question.slice(0, 50)}... This is a demonstration response.`;
    return { text, outputTokens: text.split(/\s+/).length };
  }
}

function extractQuestion(prompt: string): string {
  const match = /Question: ([\s\S]*?)\n\n/.exec(prompt);
  return match ? match[1] : prompt;
}
