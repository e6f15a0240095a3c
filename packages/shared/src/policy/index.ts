export {
  type RandomSource,
  softmax,
  sampleCategorical,
  createSeededRandom,
  oneHot,
} from "./math.js";
export { type RewardFunction, targetReward, zeroReward } from "./reward.js";
export {
  SimulationValidationError,
  SimulationCancelledError,
} from "./errors.js";
export {
  type SimulatorOptions,
  type SimulateOptions,
  PolicyGradientSimulator,
  simulate,
} from "./simulator.js";
