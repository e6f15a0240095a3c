// =============================================================================
// @reinforce-lab/shared — Domain types
// =============================================================================
// Simulation records and results, plus the LLM provider name.
// Request/response shapes validated at the edge live in schemas.ts.
// =============================================================================

// ---------------------------------------------------------------------------
// Policy-gradient simulation
// ---------------------------------------------------------------------------

/** One entry of a categorical distribution, labelled by its vocabulary token */
export interface TokenProbability {
  token: string;
  probability: number;
}

/** Outcome of a single sample-then-update cycle */
export interface EpisodeRecord {
  /** Zero-based episode number */
  episode: number;
  /** Sampled action index into the vocabulary */
  action: number;
  /** Vocabulary label of the sampled action */
  token: string;
  reward: number;
}

export interface SimulationResult {
  /** Per-episode rewards in episode order */
  rewards: number[];
  episodes: EpisodeRecord[];
  /** Final parameter vector θ */
  logits: number[];
  /** softmax(θ) in vocabulary order */
  distribution: TokenProbability[];
}

// ---------------------------------------------------------------------------
// Insight digest
// ---------------------------------------------------------------------------

/** Which LLM backend the digest talks to */
export type LlmProvider = "claude" | "gemini";
