// =============================================================================
// @reinforce-lab/server — Simulation request runner
// =============================================================================
// Turns a validated request body into a simulate() call and the wire-format
// response. Shared by the REST route and the MCP tool so both resolve the
// vocabulary, reward target, seed and deadline the same way.
// =============================================================================

import {
  type ServerConfig,
  type SimulateRequest,
  type SimulateResponse,
  SimulationValidationError,
  createSeededRandom,
  simulate,
  targetReward,
} from "@reinforce-lab/shared";

export type SimulationConfig = Pick<
  ServerConfig,
  "SIM_VOCABULARY" | "SIM_TARGET_TOKEN" | "SIM_TIMEOUT_MS"
>;

export interface RunSimulationOptions {
  /** Defaults to Date.now; used for the per-request deadline */
  clock?: () => number;
  signal?: AbortSignal;
}

/**
 * Resolves the vocabulary and rewarded token for a request. A request that
 * brings its own vocabulary without a target falls back to the configured
 * target, which must then be part of that vocabulary.
 */
export function resolveTarget(
  request: Pick<SimulateRequest, "vocabulary" | "target_token">,
  config: SimulationConfig,
): { vocabulary: string[]; targetIndex: number } {
  const vocabulary = request.vocabulary ?? config.SIM_VOCABULARY;
  const targetToken = request.target_token ?? config.SIM_TARGET_TOKEN;
  const targetIndex = vocabulary.indexOf(targetToken);

  if (targetIndex === -1) {
    throw new SimulationValidationError(
      `target_token "${targetToken}" is not in the vocabulary`,
    );
  }

  return { vocabulary: [...vocabulary], targetIndex };
}

/**
 * Runs one isolated simulation. Every call builds its own simulator; nothing
 * survives past the return.
 */
export function runSimulation(
  request: SimulateRequest,
  config: SimulationConfig,
  options: RunSimulationOptions = {},
): SimulateResponse {
  const clock = options.clock ?? Date.now;
  const { vocabulary, targetIndex } = resolveTarget(request, config);

  const result = simulate({
    vocabulary,
    rewardWeight: request.reward_weight,
    learningRate: request.learning_rate,
    episodeCount: request.episodes,
    reward: targetReward(targetIndex),
    random:
      request.seed !== undefined ? createSeededRandom(request.seed) : undefined,
    deadline: clock() + config.SIM_TIMEOUT_MS,
    clock,
    signal: options.signal,
  });

  return {
    episode_rewards: result.rewards,
    token_distributions: result.distribution.map(({ token, probability }) => ({
      token,
      probability,
    })),
  };
}
