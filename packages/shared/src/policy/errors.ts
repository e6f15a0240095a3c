export class SimulationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulationValidationError";
  }
}

export class SimulationCancelledError extends Error {
  readonly completedEpisodes: number;

  constructor(reason: string, completedEpisodes: number) {
    super(`Simulation cancelled after ${completedEpisodes} episodes: ${reason}`);
    this.name = "SimulationCancelledError";
    this.completedEpisodes = completedEpisodes;
  }
}
