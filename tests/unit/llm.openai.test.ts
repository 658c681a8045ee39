import { describe, it, expect, beforeEach, vi } from "vitest";

const createMock = vi.hoisted(() => vi.fn());

vi.mock("openai", () => {
  class APIError extends Error {
    readonly code: string | undefined;
    readonly type: string | undefined;

    constructor(
      readonly status: number | undefined,
      error: { code?: string; type?: string } | undefined,
      message: string | undefined,
      readonly headers: Record<string, string> | undefined
    ) {
      super(message);
      this.code = error?.code;
      this.type = error?.type;
    }
  }

  class OpenAI {
    static APIError = APIError;
    chat = { completions: { create: createMock } };
  }

  return { default: OpenAI, APIError };
});

import OpenAI from "openai";
import { OpenAIGenerationClient } from "../../src/adapters/llm/openai.js";
import { UpstreamHTTPError, UpstreamTimeoutError } from "../../src/adapters/llm/errors.js";

describe("OpenAIGenerationClient", () => {
  const client = new OpenAIGenerationClient({ apiKey: "test-secret", model: "gpt-4o-mini", maxTokens: 1000 });

  beforeEach(() => {
    createMock.mockReset();
  });

  it("returns the completion text and usage", async () => {
    createMock.mockResolvedValue({
      choices: [{ message: { content: '{"name":"alu"}' } }],
      usage: { prompt_tokens: 120, completion_tokens: 40 },
    });

    const result = await client.generate("design an alu", { requestId: "req-1" });

    expect(result).toEqual({ text: '{"name":"alu"}', usage: { input_tokens: 120, output_tokens: 40 } });
    expect(createMock).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        messages: [{ role: "user", content: "design an alu" }],
        temperature: 0,
        max_tokens: 1000,
      },
      expect.objectContaining({ headers: { "Idempotency-Key": expect.any(String) } })
    );
  });

  it("returns empty text when the completion has no content", async () => {
    createMock.mockResolvedValue({ choices: [] });

    const result = await client.generate("design an alu");

    expect(result).toEqual({ text: "", usage: { input_tokens: 0, output_tokens: 0 } });
  });

  it("maps API errors to UpstreamHTTPError", async () => {
    createMock.mockRejectedValue(
      new OpenAI.APIError(
        429,
        { code: "rate_limit_exceeded", type: "requests" },
        "Rate limit reached",
        { "x-request-id": "req_abc" }
      )
    );

    const attempt = client.generate("design an alu");

    await expect(attempt).rejects.toBeInstanceOf(UpstreamHTTPError);
    await expect(attempt).rejects.toMatchObject({
      provider: "openai",
      status: 429,
      code: "rate_limit_exceeded",
      requestId: "req_abc",
    });
  });

  it("raises UpstreamTimeoutError when the call outlives its timeout", async () => {
    createMock.mockImplementation(
      (_body: unknown, options: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          options.signal.addEventListener("abort", () => reject(new Error("Request was aborted.")));
        })
    );

    await expect(client.generate("design an alu", { timeoutMs: 10 })).rejects.toBeInstanceOf(UpstreamTimeoutError);
  });

  it("rethrows other errors unchanged", async () => {
    const failure = new TypeError("fetch failed");
    createMock.mockRejectedValue(failure);

    await expect(client.generate("design an alu")).rejects.toBe(failure);
  });
});
