import type { SimulationStatistics } from "../stats/SimulationStatistics";
import { BimodalPredictor } from "./BimodalPredictor";
import { BackwardTakenPredictor, NotTakenPredictor, type BranchPredictor, type Prediction, type PredictorId } from "./BranchPredictor";
import { GsharePredictor } from "./GsharePredictor";
import { resolvePredictorConfig, type PredictorConfig } from "./PredictorConfig";

export interface BranchObservation {
  id: PredictorId;
  prediction: Prediction;
  correct: boolean;
}

/**
 * Runs every predictor on each conditional branch: all of them predict first,
 * then all of them learn the actual outcome.
 */
export class BranchPredictorBank {
  private readonly predictors: readonly BranchPredictor[];
  private readonly statistics: SimulationStatistics | null;
  private readonly config: PredictorConfig;

  constructor(statistics: SimulationStatistics | null = null, overrides: Partial<PredictorConfig> = {}) {
    this.config = resolvePredictorConfig(overrides);
    this.statistics = statistics;
    this.predictors = [
      new NotTakenPredictor(),
      new BackwardTakenPredictor(),
      new BimodalPredictor(this.config.bimodalIndexBits, this.config.initialCounter),
      new GsharePredictor(this.config.gshareIndexBits, this.config.gshareHistoryBits, this.config.initialCounter),
    ];
  }

  observe(pc: number, target: number, taken: boolean): BranchObservation[] {
    const observations = this.predictors.map((predictor) => {
      const prediction = predictor.predict(pc, target);
      return { predictor, prediction };
    });

    return observations.map(({ predictor, prediction }) => {
      predictor.update(pc, target, taken, prediction);
      this.statistics?.recordPrediction(predictor.id, prediction, taken);
      return { id: predictor.id, prediction, correct: prediction.taken === taken };
    });
  }

  getPredictor(id: PredictorId): BranchPredictor {
    const predictor = this.predictors.find((candidate) => candidate.id === id);
    if (!predictor) {
      throw new RangeError(`Unknown predictor: ${id}`);
    }
    return predictor;
  }

  getConfig(): Readonly<PredictorConfig> {
    return this.config;
  }

  reset(): void {
    this.predictors.forEach((predictor) => predictor.reset());
  }
}
