import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../logger.js";
import { AnswerGenerator } from "./answer-generator.js";
import { OpenAICompatibleClient } from "./llm-client.js";

const REQUEST = {
  prompt: "Question: What is the budget?\n\nAnswer:",
  temperature: 0.05,
  topP: 0.9,
  maxTokens: 256,
};

function createClient() {
  return new OpenAICompatibleClient({
    baseUrl: "https://llm.test/v1/",
    apiKey: "test-secret",
    model: "test-chat",
    timeoutMs: 1000,
  });
}

describe("OpenAICompatibleClient", () => {
  beforeEach(() => {
    for (const level of ["info", "warn", "error", "debug"] as const) {
      vi.spyOn(logger, level).mockImplementation(() => {});
    }
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post a chat completion and return the first choice", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(
          JSON.stringify({
            choices: [{ message: { content: "The budget is 4.2M." } }],
            usage: { completion_tokens: 6 },
          }),
          { status: 200, headers: { "Content-Type": "application/json" } }
        )
    );
    vi.stubGlobal("fetch", fetchMock);

    const response = await createClient().complete(REQUEST);

    expect(response).toEqual({ text: "The budget is 4.2M.", outputTokens: 6 });
    expect(fetchMock).toHaveBeenCalledWith(
      "https://llm.test/v1/chat/completions",
      expect.objectContaining({
        method: "POST",
        body: JSON.stringify({
          model: "test-chat",
          messages: [{ role: "user", content: REQUEST.prompt }],
          temperature: 0.05,
          top_p: 0.9,
          max_tokens: 256,
        }),
      })
    );
  });

  it("should reject a successful response whose body is not JSON", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html>upstream error</html>", { status: 200 }))
    );

    await expect(createClient().complete(REQUEST)).rejects.toMatchObject({
      name: "ProviderError",
      message: "Chat completion returned a body that is not JSON",
      status: 200,
      transient: false,
      invalidResponse: true,
    });
  });

  it("should reject a JSON body without message content", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("null", { status: 200 }))
    );

    await expect(createClient().complete(REQUEST)).rejects.toMatchObject({
      message: "Invalid response format from LLM API",
      invalidResponse: true,
    });
  });

  it("should surface a non-JSON body as an invalid response without retrying", async () => {
    const fetchMock = vi.fn(
      async () => new Response("not json", { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);
    const generator = new AnswerGenerator(createClient(), {
      temperature: 0.05,
      topP: 0.9,
      maxOutputTokens: 256,
      sleep: async () => {},
      clock: () => 0,
    });

    const outcome = await generator.generate("What is the budget?", "ctx");

    expect(outcome).toEqual({
      success: false,
      responseText: null,
      responseTimeMs: 0,
      attempts: 1,
      error: {
        category: "invalid_response",
        message: "The answer service returned an unexpected response.",
      },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
