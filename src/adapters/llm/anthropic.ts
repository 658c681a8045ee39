import { randomUUID } from "node:crypto";
import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config/index.js";
import { GENERATION_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";
import type { CallOpts, GenerationClient, GenerationResult } from "./types.js";
import { UpstreamTimeoutError, UpstreamHTTPError } from "./errors.js";

export interface AnthropicClientOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
}

/**
 * Anthropic generation client (messages API). Text blocks of the response
 * are concatenated in order.
 */
export class AnthropicGenerationClient implements GenerationClient {
  readonly name = "anthropic" as const;
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? config.llm.anthropicApiKey;
    if (!apiKey) {
      throw new Error("ANTHROPIC_API_KEY environment variable is required but not set");
    }
    this.model = options.model ?? config.llm.model ?? "claude-3-5-sonnet-20241022";
    this.maxTokens = options.maxTokens ?? config.llm.maxTokens;
    this.client = new Anthropic({ apiKey });
  }

  async generate(prompt: string, opts: CallOpts = {}): Promise<GenerationResult> {
    const timeoutMs = opts.timeoutMs ?? GENERATION_TIMEOUT_MS;
    const idempotencyKey = randomUUID();
    const startTime = Date.now();

    log.info(
      { prompt_chars: prompt.length, model: this.model, provider: this.name, request_id: opts.requestId, idempotency_key: idempotencyKey },
      "calling Anthropic for spec generation"
    );

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: 0,
          messages: [{ role: "user", content: prompt }],
        },
        {
          signal: abortController.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      const text = response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("");

      return {
        text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "Anthropic generation call timed out");
        throw new UpstreamTimeoutError("Anthropic generation timed out", this.name, elapsedMs, error);
      }

      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        const requestId = error.headers?.["request-id"] ?? undefined;
        log.error(
          { status: error.status, request_id: requestId, elapsed_ms: elapsedMs },
          "Anthropic API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `Anthropic generation failed: ${error.message}`,
          this.name,
          error.status,
          undefined,
          requestId,
          elapsedMs,
          error
        );
      }

      log.error({ error }, "Anthropic generation call failed");
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
