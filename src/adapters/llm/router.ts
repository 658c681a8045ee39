/**
 * Provider router for generation clients.
 *
 * Selects the client (OpenAI, Anthropic, Fixtures) from an explicit provider
 * argument, falling back to LLM_PROVIDER and then to OpenAI.
 */

import { log } from "../../utils/telemetry.js";
import { config, type LLMProviderName } from "../../config/index.js";
import type { CallOpts, GenerationClient, GenerationResult } from "./types.js";
import { AnthropicGenerationClient } from "./anthropic.js";
import { OpenAIGenerationClient } from "./openai.js";

/**
 * Canned single-module design in the delimited output format.
 */
export const FIXTURE_OUTPUT = [
  JSON.stringify(
    {
      name: "fixture_counter",
      description: "4-bit synchronous counter with active-high reset",
      ports: [
        { name: "clk", direction: "input", width: 1 },
        { name: "rst", direction: "input", width: 1 },
        { name: "count", direction: "output", width: 4 },
      ],
      functionality: "Increments count on every rising clock edge; rst clears it.",
    },
    null,
    2
  ),
  "---BEGIN fixture_counter.v---",
  "module fixture_counter(",
  "  input clk,",
  "  input rst,",
  "  output reg [3:0] count",
  ");",
  "  always @(posedge clk) begin",
  "    if (rst) count <= 4'd0;",
  "    else count <= count + 4'd1;",
  "  end",
  "endmodule",
  "---END fixture_counter.v---",
].join("\n");

/**
 * Fixtures client for running without API keys.
 * Returns the same design for every prompt.
 */
export class FixturesGenerationClient implements GenerationClient {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async generate(_prompt: string, _opts?: CallOpts): Promise<GenerationResult> {
    return {
      text: FIXTURE_OUTPUT,
      usage: { input_tokens: 0, output_tokens: 0 },
    };
  }
}

/**
 * Build the generation client for a provider.
 *
 * Missing API keys fail here, at wiring time, rather than on the first request.
 */
export function getGenerationClient(provider?: LLMProviderName): GenerationClient {
  const selected = provider ?? config.llm.provider;

  log.info({ provider: selected, model: config.llm.model ?? "default" }, "Selected generation provider");

  switch (selected) {
    case "anthropic":
      return new AnthropicGenerationClient();
    case "openai":
      return new OpenAIGenerationClient();
    case "fixtures":
      return new FixturesGenerationClient();
  }
}
