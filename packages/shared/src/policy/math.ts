// =============================================================================
// @reinforce-lab/shared — Categorical distribution helpers
// =============================================================================
// Softmax over logits, inverse-CDF sampling, and a seedable random source.
// =============================================================================

/** Returns a value in [0, 1). `Math.random` satisfies this contract. */
export type RandomSource = () => number;

const LEHMER_MODULUS = 2147483647;
const LEHMER_MULTIPLIER = 48271;

/**
 * Numerically stable softmax: the maximum logit is subtracted before
 * exponentiating so large logits cannot overflow to Infinity.
 *
 * Entries are positive only while exp(l - max) is representable: a logit
 * about 745 or more below the maximum underflows to exactly 0.
 */
export function softmax(logits: readonly number[]): number[] {
  if (logits.length === 0) return [];

  const maxLogit = Math.max(...logits);
  const expLogits = logits.map((l) => Math.exp(l - maxLogit));
  const sum = expLogits.reduce((a, b) => a + b, 0);
  return expLogits.map((e) => e / sum);
}

/**
 * Draws one index from a categorical distribution by walking the CDF.
 *
 * Floating-point slack (a draw at or above the accumulated total) falls on
 * the last entry with non-zero probability.
 */
export function sampleCategorical(
  probs: readonly number[],
  random: RandomSource,
): number {
  if (probs.length === 0) {
    throw new RangeError("Cannot sample from an empty distribution");
  }

  const draw = random();
  let cumulative = 0;
  let lastPositive = 0;

  for (let i = 0; i < probs.length; i++) {
    const p = probs[i] ?? 0;
    if (p <= 0) continue;
    lastPositive = i;
    cumulative += p;
    if (draw < cumulative) return i;
  }

  return lastPositive;
}

/**
 * Park–Miller (Lehmer) generator. The same seed always yields the same
 * sequence; values lie strictly between 0 and 1.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.floor(Math.abs(seed)) % LEHMER_MODULUS;
  if (state === 0) {
    state = 1;
  }

  return () => {
    state = (state * LEHMER_MULTIPLIER) % LEHMER_MODULUS;
    return state / LEHMER_MODULUS;
  };
}

export function oneHot(index: number, length: number): number[] {
  return Array.from({ length }, (_, i) => (i === index ? 1 : 0));
}
