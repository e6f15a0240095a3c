// =============================================================================
// @reinforce-lab/shared — Environment variable config with validation
// =============================================================================
// Two loaders: one for the simulation server and one for the insight digest.
// Required variables throw on missing. Optional variables fall back to
// documented defaults. SIM_VOCABULARY is parsed as a comma-separated list.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared fields
// ---------------------------------------------------------------------------

const logLevelSchema = z
  .enum(["debug", "info", "warn", "error", "fatal"])
  .default("info");

/**
 * Comma-separated token list, e.g. "A,B,C,D". Tokens are trimmed and must
 * be non-empty and distinct.
 */
const vocabularySchema = z.string().transform((val, ctx) => {
  const tokens = val.split(",").map((t) => t.trim());
  if (tokens.some((t) => t.length === 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "SIM_VOCABULARY must not contain empty tokens",
    });
    return z.NEVER;
  }
  if (new Set(tokens).size !== tokens.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "SIM_VOCABULARY tokens must be distinct",
    });
    return z.NEVER;
  }
  return tokens;
});

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

const serverConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    LOG_LEVEL: logLevelSchema,
    CORS_ORIGINS: z.string().default("*"),
    RATE_LIMIT_PER_MIN: z.coerce.number().int().min(1).default(100),

    SIM_VOCABULARY: vocabularySchema.default("A,B,C,D"),
    SIM_TARGET_TOKEN: z.string().min(1).default("C"),
    SIM_MAX_EPISODES: z.coerce.number().int().min(0).default(100_000),
    SIM_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),
  })
  .superRefine((config, ctx) => {
    // The vocabulary transform reports its own issues; skip the cross-check
    if (!Array.isArray(config.SIM_VOCABULARY)) return;
    if (!config.SIM_VOCABULARY.includes(config.SIM_TARGET_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SIM_TARGET_TOKEN"],
        message: `SIM_TARGET_TOKEN "${config.SIM_TARGET_TOKEN}" is not in SIM_VOCABULARY`,
      });
    }
  });

export type ServerConfig = z.infer<typeof serverConfigSchema>;

/**
 * Load and validate simulation server configuration.
 *
 * Throws a ZodError with detailed messages if any value fails validation.
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  return serverConfigSchema.parse(env);
}

// ---------------------------------------------------------------------------
// Insight digest
// ---------------------------------------------------------------------------

const digestConfigSchema = z
  .object({
    // Required
    READWISE_TOKEN: z.string().min(1, "READWISE_TOKEN is required"),

    // Provider selection
    LLM_PROVIDER: z
      .string()
      .default("claude")
      .transform((v) => v.toLowerCase())
      .pipe(z.enum(["claude", "gemini"])),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
    ANTHROPIC_MODEL: z.string().default("claude-opus-4-5"),
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().default("gemini-3-pro-preview"),

    // Vault layout
    OBSIDIAN_VAULT_PATH: z.string().default("."),
    ACTIVE_PROBLEMS_FILE: z.string().default("ActiveProblems.md"),
    DAILY_NOTE_FOLDER: z.string().default("Daily Notes"),

    // Run behavior
    DIGEST_LOOKBACK_HOURS: z.coerce.number().positive().default(24),
    DIGEST_DOC_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
    DIGEST_MIN_CONTENT_CHARS: z.coerce.number().int().min(0).default(500),
    DIGEST_MAX_CONTENT_CHARS: z.coerce.number().int().min(1).default(15_000),
    DIGEST_CRON: z.string().min(1).optional(),
    LOG_LEVEL: logLevelSchema,
  })
  .superRefine((config, ctx) => {
    if (config.LLM_PROVIDER === "claude" && !config.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ANTHROPIC_API_KEY"],
        message: "ANTHROPIC_API_KEY is required when LLM_PROVIDER=claude",
      });
    }
    if (config.LLM_PROVIDER === "gemini" && !config.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GEMINI_API_KEY"],
        message: "GEMINI_API_KEY is required when LLM_PROVIDER=gemini",
      });
    }
  });

export type DigestConfig = z.infer<typeof digestConfigSchema>;

/**
 * Load and validate insight digest configuration. The API key for the
 * selected provider must be present; the other one is ignored.
 */
export function loadDigestConfig(
  env: Record<string, string | undefined> = process.env,
): DigestConfig {
  return digestConfigSchema.parse(env);
}
