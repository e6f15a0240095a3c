// =============================================================================
// @reinforce-lab/shared — Zod schemas for inputs crossing a process boundary
// =============================================================================
// Simulation requests (HTTP + MCP), Readwise Reader list responses, and the
// JSON object the LLM returns for an insight hit. Downstream code can trust
// anything that has passed through these.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Simulation request
// ---------------------------------------------------------------------------

const tokenSchema = z.string().min(1).max(64);

/**
 * Builds the request schema for a simulation run. The episode ceiling comes
 * from configuration (SIM_MAX_EPISODES).
 */
export function createSimulateRequestSchema(maxEpisodes: number) {
  return z.object({
    reward_weight: z.number().finite(),
    learning_rate: z.number().finite(),
    episodes: z.number().int().min(0).max(maxEpisodes),
    seed: z
      .number()
      .int()
      .optional()
      .describe("Seed for a reproducible run (omit for Math.random)"),
    vocabulary: z
      .array(tokenSchema)
      .min(1)
      .max(64)
      .optional()
      .describe("Action labels (defaults to the server vocabulary)"),
    target_token: tokenSchema
      .optional()
      .describe("Token that earns reward 1.0 (defaults to the server target)"),
  });
}
export type SimulateRequest = z.infer<
  ReturnType<typeof createSimulateRequestSchema>
>;

export interface SimulateResponse {
  episode_rewards: number[];
  token_distributions: Array<{ token: string; probability: number }>;
}

// ---------------------------------------------------------------------------
// Readwise Reader
// ---------------------------------------------------------------------------

export const ReadwiseDocumentSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  source_url: z.string().nullish(),
  summary: z.string().nullish(),
  html_content: z.string().nullish(),
  updated_at: z.string().nullish(),
});
export type ReadwiseDocument = z.infer<typeof ReadwiseDocumentSchema>;

export const ReadwiseListResponseSchema = z.object({
  count: z.number().int().optional(),
  nextPageCursor: z.string().nullish(),
  results: z.array(ReadwiseDocumentSchema),
});
export type ReadwiseListResponse = z.infer<typeof ReadwiseListResponseSchema>;

// ---------------------------------------------------------------------------
// Insight hit (LLM output)
// ---------------------------------------------------------------------------

export const InsightTypeSchema = z.enum([
  "Mechanism",
  "Contradiction",
  "Solution",
]);
export type InsightType = z.infer<typeof InsightTypeSchema>;

export const InsightSchema = z.object({
  project_name: z.string().min(1),
  insight_type: InsightTypeSchema,
  summary: z.string().min(1),
  actionable_advice: z.string().min(1),
  source_name: z.string().min(1),
});
export type Insight = z.infer<typeof InsightSchema>;

/** An insight with the link back to the article it came from */
export type InsightHit = Insight & { source_url: string };
