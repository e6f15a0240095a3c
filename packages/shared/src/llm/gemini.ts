import { GoogleGenAI } from "@google/genai";
import { withRetry, type RetryOptions } from "./retry.js";
import type { LlmClient } from "./provider.js";

export const DEFAULT_GEMINI_MODEL = "gemini-3-pro-preview";

export function createGeminiClient(apiKey: string): GoogleGenAI {
  return new GoogleGenAI({ apiKey });
}

export function createGeminiLlm(
  ai: GoogleGenAI,
  options?: { model?: string; retry?: RetryOptions },
): LlmClient {
  const model = options?.model ?? DEFAULT_GEMINI_MODEL;

  return {
    provider: "gemini",
    model,
    async generate(prompt: string): Promise<string> {
      const response = await withRetry(
        () => ai.models.generateContent({ model, contents: prompt }),
        options?.retry,
      );
      return response.text ?? "";
    },
  };
}
