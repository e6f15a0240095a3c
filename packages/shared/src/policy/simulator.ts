// =============================================================================
// @reinforce-lab/shared — REINFORCE policy-gradient simulator
// =============================================================================
// A categorical policy over a fixed token vocabulary. Each episode samples an
// action from softmax(θ), scores it with a caller-supplied reward function,
// and moves θ along (one_hot(action) - probs) scaled by
// learningRate * rewardWeight * reward.
//
// θ belongs to one simulator instance; there is no module-level state, so
// concurrent requests each construct their own simulator.
// =============================================================================

import type {
  EpisodeRecord,
  SimulationResult,
  TokenProbability,
} from "../types.js";
import {
  type RandomSource,
  oneHot,
  sampleCategorical,
  softmax,
} from "./math.js";
import type { RewardFunction } from "./reward.js";
import {
  SimulationCancelledError,
  SimulationValidationError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SimulatorOptions {
  vocabulary: readonly string[];
  rewardWeight: number;
  learningRate: number;
  reward: RewardFunction;
  /** Defaults to Math.random */
  random?: RandomSource;
}

export interface SimulateOptions extends SimulatorOptions {
  episodeCount: number;
  /** Checked before every episode */
  signal?: AbortSignal;
  /** Epoch milliseconds after which the run is abandoned */
  deadline?: number;
  /** Clock used against `deadline`. Defaults to Date.now */
  clock?: () => number;
  /** Observes each episode along with θ after its update */
  onEpisode?: (episode: EpisodeRecord, logits: readonly number[]) => void;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateVocabulary(vocabulary: readonly string[]): void {
  if (vocabulary.length === 0) {
    throw new SimulationValidationError("vocabulary must not be empty");
  }
  const seen = new Set<string>();
  for (const token of vocabulary) {
    if (seen.has(token)) {
      throw new SimulationValidationError(
        `vocabulary contains duplicate token "${token}"`,
      );
    }
    seen.add(token);
  }
}

function validateRate(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new SimulationValidationError(`${name} must be a finite number`);
  }
}

function validateEpisodeCount(episodeCount: number): void {
  if (!Number.isInteger(episodeCount) || episodeCount < 0) {
    throw new SimulationValidationError(
      "episodeCount must be a non-negative integer",
    );
  }
}

// ---------------------------------------------------------------------------
// Simulator
// ---------------------------------------------------------------------------

export class PolicyGradientSimulator {
  readonly vocabulary: readonly string[];
  private readonly theta: number[];
  private readonly stepSize: number;
  private readonly reward: RewardFunction;
  private readonly random: RandomSource;
  private episodeCount = 0;

  constructor(options: SimulatorOptions) {
    validateVocabulary(options.vocabulary);
    validateRate("rewardWeight", options.rewardWeight);
    validateRate("learningRate", options.learningRate);

    this.vocabulary = [...options.vocabulary];
    this.theta = new Array<number>(options.vocabulary.length).fill(0);
    this.stepSize = options.learningRate * options.rewardWeight;
    if (!Number.isFinite(this.stepSize)) {
      throw new SimulationValidationError(
        "learningRate * rewardWeight must be a finite number",
      );
    }
    this.reward = options.reward;
    this.random = options.random ?? Math.random;
  }

  /** Number of episodes run so far */
  get completedEpisodes(): number {
    return this.episodeCount;
  }

  /** Copy of the current parameter vector θ */
  get logits(): number[] {
    return [...this.theta];
  }

  probabilities(): number[] {
    return softmax(this.theta);
  }

  distribution(): TokenProbability[] {
    const probs = this.probabilities();
    return this.vocabulary.map((token, i) => ({
      token,
      probability: probs[i] ?? 0,
    }));
  }

  /** Runs one episode: sample, score, update θ. */
  step(): EpisodeRecord {
    const probs = this.probabilities();
    const action = sampleCategorical(probs, this.random);
    const reward = this.reward(action);
    if (!Number.isFinite(reward)) {
      throw new SimulationValidationError(
        `reward for action ${action} must be a finite number, got ${reward}`,
      );
    }

    const scale = this.stepSize * reward;
    if (!Number.isFinite(scale)) {
      throw new SimulationValidationError(
        `update for action ${action} overflows: step size ${this.stepSize} times reward ${reward}`,
      );
    }

    // θ is only written once every component of the update is finite
    const grad = oneHot(action, probs.length).map(
      (h, i) => h - (probs[i] ?? 0),
    );
    const next = this.theta.map((t, i) => t + scale * (grad[i] ?? 0));
    if (!next.every(Number.isFinite)) {
      throw new SimulationValidationError(
        `parameters overflow after episode ${this.episodeCount}`,
      );
    }
    next.forEach((t, i) => {
      this.theta[i] = t;
    });

    const record: EpisodeRecord = {
      episode: this.episodeCount,
      action,
      token: this.vocabulary[action] ?? String(action),
      reward,
    };
    this.episodeCount++;
    return record;
  }
}

// ---------------------------------------------------------------------------
// simulate
// ---------------------------------------------------------------------------

/**
 * Runs `episodeCount` episodes on a fresh simulator and reports the rewards
 * and the final distribution. Throws before the first episode on invalid
 * input, and mid-run on cancellation; no partial result is returned.
 */
export function simulate(options: SimulateOptions): SimulationResult {
  validateEpisodeCount(options.episodeCount);
  const simulator = new PolicyGradientSimulator(options);
  const clock = options.clock ?? Date.now;

  const episodes: EpisodeRecord[] = [];
  for (let i = 0; i < options.episodeCount; i++) {
    if (options.signal?.aborted) {
      throw new SimulationCancelledError("request aborted", i);
    }
    if (options.deadline !== undefined && clock() >= options.deadline) {
      throw new SimulationCancelledError("deadline exceeded", i);
    }

    const record = simulator.step();
    episodes.push(record);
    options.onEpisode?.(record, simulator.logits);
  }

  return {
    rewards: episodes.map((e) => e.reward),
    episodes,
    logits: simulator.logits,
    distribution: simulator.distribution(),
  };
}
