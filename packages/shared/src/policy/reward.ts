/** Maps a sampled action index to a scalar reward. */
export type RewardFunction = (action: number) => number;

/**
 * Single-target bandit reward: 1.0 for the privileged action, 0.0 otherwise.
 */
export function targetReward(targetIndex: number): RewardFunction {
  return (action) => (action === targetIndex ? 1.0 : 0.0);
}

/** Never rewards anything; the policy stays where it started. */
export const zeroReward: RewardFunction = () => 0;
