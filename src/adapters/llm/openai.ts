import { randomUUID } from "node:crypto";
import OpenAI from "openai";
import { config } from "../../config/index.js";
import { GENERATION_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";
import type { CallOpts, GenerationClient, GenerationResult } from "./types.js";
import { UpstreamTimeoutError, UpstreamHTTPError } from "./errors.js";

export interface OpenAIClientOptions {
  apiKey?: string;
  /** OpenAI-compatible gateway endpoint */
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
}

/**
 * OpenAI generation client (chat completions, plain text output).
 */
export class OpenAIGenerationClient implements GenerationClient {
  readonly name = "openai" as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(options: OpenAIClientOptions = {}) {
    const apiKey = options.apiKey ?? config.llm.openaiApiKey;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY environment variable is required but not set");
    }
    // Default to GPT-4o-mini for cost efficiency
    this.model = options.model ?? config.llm.model ?? "gpt-4o-mini";
    this.maxTokens = options.maxTokens ?? config.llm.maxTokens;
    this.client = new OpenAI({ apiKey, baseURL: options.baseUrl ?? config.llm.openaiBaseUrl });
  }

  async generate(prompt: string, opts: CallOpts = {}): Promise<GenerationResult> {
    const timeoutMs = opts.timeoutMs ?? GENERATION_TIMEOUT_MS;
    const idempotencyKey = randomUUID();
    const startTime = Date.now();

    log.info(
      { prompt_chars: prompt.length, model: this.model, provider: this.name, request_id: opts.requestId, idempotency_key: idempotencyKey },
      "calling OpenAI for spec generation"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0,
          max_tokens: this.maxTokens,
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      return {
        text: response.choices[0]?.message?.content ?? "",
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "OpenAI generation call timed out");
        throw new UpstreamTimeoutError("OpenAI generation timed out", this.name, elapsedMs, error);
      }

      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["x-request-id"] ?? undefined;
        log.error(
          { status: error.status, request_id: requestId, elapsed_ms: elapsedMs },
          "OpenAI API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `OpenAI generation failed: ${error.message}`,
          this.name,
          error.status,
          error.code ?? error.type ?? undefined,
          requestId,
          elapsedMs,
          error
        );
      }

      log.error({ error }, "OpenAI generation call failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
