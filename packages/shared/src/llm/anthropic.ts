import Anthropic from "@anthropic-ai/sdk";
import { withRetry, type RetryOptions } from "./retry.js";
import type { LlmClient } from "./provider.js";

export const DEFAULT_CLAUDE_MODEL = "claude-opus-4-5";
const MAX_TOKENS = 1000;

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey });
}

/**
 * Single-turn Claude completion at temperature 0. Text blocks of the reply
 * are concatenated; a reply without text yields an empty string.
 */
export function createClaudeLlm(
  client: Anthropic,
  options?: { model?: string; retry?: RetryOptions },
): LlmClient {
  const model = options?.model ?? DEFAULT_CLAUDE_MODEL;

  return {
    provider: "claude",
    model,
    async generate(prompt: string): Promise<string> {
      const message = await withRetry(
        () =>
          client.messages.create({
            model,
            max_tokens: MAX_TOKENS,
            temperature: 0,
            messages: [{ role: "user", content: prompt }],
          }),
        options?.retry,
      );

      return message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    },
  };
}
