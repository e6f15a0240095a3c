// =============================================================================
// @reinforce-lab/shared — LLM provider selection
// =============================================================================
// The digest only needs "prompt in, text out". Claude and Gemini both sit
// behind LlmClient; LLM_PROVIDER picks one at startup and the matching API
// key must be configured.
// =============================================================================

import type { DigestConfig } from "../config.js";
import type { LlmProvider } from "../types.js";
import type { RetryOptions } from "./retry.js";
import { createAnthropicClient, createClaudeLlm } from "./anthropic.js";
import { createGeminiClient, createGeminiLlm } from "./gemini.js";

export interface LlmClient {
  provider: LlmProvider;
  model: string;
  generate(prompt: string): Promise<string>;
}

export class LlmConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LlmConfigurationError";
  }
}

type LlmConfig = Pick<
  DigestConfig,
  | "LLM_PROVIDER"
  | "ANTHROPIC_API_KEY"
  | "ANTHROPIC_MODEL"
  | "GEMINI_API_KEY"
  | "GEMINI_MODEL"
>;

export function createLlmClient(
  config: LlmConfig,
  options?: { retry?: RetryOptions },
): LlmClient {
  if (config.LLM_PROVIDER === "gemini") {
    if (!config.GEMINI_API_KEY) {
      throw new LlmConfigurationError("GEMINI_API_KEY not found");
    }
    return createGeminiLlm(createGeminiClient(config.GEMINI_API_KEY), {
      model: config.GEMINI_MODEL,
      retry: options?.retry,
    });
  }

  if (!config.ANTHROPIC_API_KEY) {
    throw new LlmConfigurationError("ANTHROPIC_API_KEY not found");
  }
  return createClaudeLlm(createAnthropicClient(config.ANTHROPIC_API_KEY), {
    model: config.ANTHROPIC_MODEL,
    retry: options?.retry,
  });
}
