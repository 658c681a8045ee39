/**
 * Provider-agnostic generation client interface.
 *
 * The spec agent only needs "prompt in, text out". Every provider adapter
 * (OpenAI, Anthropic, fixtures) implements this so the pipeline can be wired
 * with any of them, or with a fake in tests.
 */

/**
 * Usage metrics returned by generation calls for cost tracking and telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

export interface GenerationResult {
  text: string;
  usage: UsageMetrics;
}

export interface CallOpts {
  requestId?: string;
  timeoutMs?: number;
}

export interface GenerationClient {
  readonly name: string;
  readonly model: string;
  generate(prompt: string, opts?: CallOpts): Promise<GenerationResult>;
}
