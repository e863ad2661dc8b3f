import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../errors.js";
import { logger } from "../logger.js";
import {
  AnswerGenerator,
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  buildPrompt,
} from "./answer-generator.js";
import type {
  CompletionRequest,
  CompletionResponse,
  LlmClient,
} from "./llm-client.js";
import { MockLlmClient } from "./llm-client.js";

type Step = string | Error;

/**
 * Replays a scripted sequence of replies; each call advances the clock
 */
class ScriptedClient implements LlmClient {
  readonly model = "scripted-llm";
  readonly prompts: string[] = [];

  constructor(
    private readonly steps: Step[],
    private readonly onCall: () => void = () => {}
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.prompts.push(request.prompt);
    this.onCall();
    const step = this.steps[Math.min(this.prompts.length, this.steps.length) - 1];
    if (step instanceof Error) throw step;
    return { text: step };
  }
}

const unavailable = () =>
  new ProviderError("LLM API error 503: overloaded", { status: 503, transient: true });
const badRequest = () =>
  new ProviderError("LLM API error 400: bad request", { status: 400, transient: false });

function createGenerator(client: LlmClient, clock: () => number = () => 0) {
  const delays: number[] = [];
  const generator = new AnswerGenerator(client, {
    temperature: 0.05,
    topP: 0.9,
    maxOutputTokens: 256,
    sleep: async (ms) => {
      delays.push(ms);
    },
    clock,
  });
  return { generator, delays };
}

describe("backoffDelay", () => {
  it("should grow exponentially from the base and cap at the maximum", () => {
    expect(backoffDelay(1, DEFAULT_RETRY_POLICY)).toBe(4000);
    expect(backoffDelay(2, DEFAULT_RETRY_POLICY)).toBe(8000);
    expect(backoffDelay(3, DEFAULT_RETRY_POLICY)).toBe(10000);
  });
});

describe("buildPrompt", () => {
  it("should wrap the question in its context", () => {
    expect(buildPrompt("What is the budget?", "The budget is 4.2M.")).toBe(
      "Context: The budget is 4.2M.\n\nQuestion: What is the budget?\n\nPlease provide a helpful and accurate answer based on the context provided."
    );
  });

  it("should send the bare question without context", () => {
    expect(buildPrompt("What is the budget?")).toBe("What is the budget?");
    expect(buildPrompt("What is the budget?", "  ")).toBe("What is the budget?");
  });
});

describe("AnswerGenerator", () => {
  beforeEach(() => {
    vi.spyOn(logger, "info").mockImplementation(() => {});
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
  });

  it("should return the completion on first success", async () => {
    const client = new ScriptedClient(["The budget is 4.2M."]);
    const { generator, delays } = createGenerator(client);

    const outcome = await generator.generate("What is the budget?", "ctx");

    expect(outcome).toEqual({
      success: true,
      responseText: "The budget is 4.2M.",
      responseTimeMs: 0,
      attempts: 1,
    });
    expect(delays).toEqual([]);
    expect(client.prompts).toEqual([buildPrompt("What is the budget?", "ctx")]);
  });

  it("should retry transient failures with backoff", async () => {
    const client = new ScriptedClient([unavailable(), unavailable(), "Recovered"]);
    const { generator, delays } = createGenerator(client);

    const outcome = await generator.generate("question", "context");

    expect(outcome.success).toBe(true);
    expect(outcome.responseText).toBe("Recovered");
    expect(outcome.attempts).toBe(3);
    expect(delays).toEqual([4000, 8000]);
  });

  it("should give up after the last attempt with a safe error", async () => {
    const client = new ScriptedClient([unavailable()]);
    const { generator, delays } = createGenerator(client);

    const outcome = await generator.generate("question", "context");

    expect(outcome).toEqual({
      success: false,
      responseText: null,
      responseTimeMs: 0,
      attempts: 3,
      error: {
        category: "provider_unavailable",
        message:
          "The answer service is temporarily unavailable. Please try again later.",
      },
    });
    expect(client.prompts).toHaveLength(3);
    expect(delays).toEqual([4000, 8000]);
  });

  it("should not retry a rejected request", async () => {
    const client = new ScriptedClient([badRequest(), "never reached"]);
    const { generator, delays } = createGenerator(client);

    const outcome = await generator.generate("question", "context");

    expect(outcome.error).toEqual({
      category: "provider_rejected",
      message: "The answer service could not process this request.",
    });
    expect(client.prompts).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it("should classify a malformed response without retrying", async () => {
    const client = new ScriptedClient([
      new ProviderError("Invalid response format from LLM API", {
        transient: false,
        invalidResponse: true,
      }),
    ]);
    const { generator } = createGenerator(client);

    const outcome = await generator.generate("question", "context");

    expect(outcome.error?.category).toBe("invalid_response");
    expect(client.prompts).toHaveLength(1);
  });

  it("should retry raw network failures", async () => {
    const client = new ScriptedClient([new TypeError("fetch failed"), "ok"]);
    const { generator, delays } = createGenerator(client);

    const outcome = await generator.generate("question", "context");

    expect(outcome.success).toBe(true);
    expect(delays).toEqual([4000]);
  });

  it("should keep running performance aggregates", async () => {
    let now = 0;
    const client = new ScriptedClient(["ok", badRequest()], () => {
      now += 100;
    });
    const { generator } = createGenerator(client, () => now);

    expect(generator.getStats()).toEqual({
      totalRequests: 0,
      averageResponseTimeMs: 0,
      errorRate: 0,
      successRate: 0,
    });

    await generator.generate("first", "context");
    await generator.generate("second", "context");
    await generator.generate("third", "context");

    expect(generator.getStats()).toEqual({
      totalRequests: 3,
      averageResponseTimeMs: 100,
      errorRate: 66.67,
      successRate: 33.33,
    });
  });

  it("should report healthy from a single probe without counting it", async () => {
    const client = new ScriptedClient(["Service is healthy"]);
    const { generator } = createGenerator(client);

    const health = await generator.healthCheck();

    expect(health).toMatchObject({ healthy: true, latencyMs: 0, model: "scripted-llm" });
    expect(client.prompts).toEqual([
      "Hello, please respond with 'Service is healthy'",
    ]);
    expect(generator.getStats().totalRequests).toBe(0);
  });

  it("should report unhealthy without retrying the probe", async () => {
    const client = new ScriptedClient([unavailable()]);
    const { generator, delays } = createGenerator(client);

    const health = await generator.healthCheck();

    expect(health.healthy).toBe(false);
    expect(health.error).toBe(
      "The answer service is temporarily unavailable. Please try again later."
    );
    expect(client.prompts).toHaveLength(1);
    expect(delays).toEqual([]);
  });
});

describe("MockLlmClient", () => {
  it("should echo the question from a context prompt", async () => {
    const client = new MockLlmClient();

    const response = await client.complete({
      prompt: buildPrompt("When does the deck replacement start?", "ctx"),
      temperature: 0,
      topP: 1,
      maxTokens: 64,
    });

    expect(response.text).toBe(
      "Mock response to: When does the deck replacement start?... This is a demonstration response."
    );
  });
});
