export {
  type LlmClient,
  LlmConfigurationError,
  createLlmClient,
} from "./provider.js";
export {
  DEFAULT_CLAUDE_MODEL,
  createAnthropicClient,
  createClaudeLlm,
} from "./anthropic.js";
export {
  DEFAULT_GEMINI_MODEL,
  createGeminiClient,
  createGeminiLlm,
} from "./gemini.js";
export { type RetryOptions, isRetryableError, withRetry } from "./retry.js";
