import type { Prediction, PredictorId } from "../predictors/BranchPredictor";
import { COUNTER_STATES } from "../predictors/SaturatingCounterTable";

export interface PredictorStat {
  predictions: number;
  mispredictions: number;
}

export type CounterBuckets = readonly [number, number, number, number];

export interface TablePredictorStat extends PredictorStat {
  /** Predictions made from a counter in state 0..3 (strongly not-taken .. strongly taken). */
  predictionsByCounter: CounterBuckets;
  mispredictionsByCounter: CounterBuckets;
}

export type ExitReason = "exit" | "fault";

export interface FaultReport {
  name: string;
  message: string;
  pc: number | null;
}

export interface Stat {
  instructionsRetired: number;
  notTaken: PredictorStat;
  backwardTaken: PredictorStat;
  bimodal: TablePredictorStat;
  gshare: TablePredictorStat;
  exitReason: ExitReason;
  fault?: FaultReport;
}

class PredictorTally {
  predictions = 0;
  mispredictions = 0;
  readonly predictionsByCounter = new Array<number>(COUNTER_STATES).fill(0);
  readonly mispredictionsByCounter = new Array<number>(COUNTER_STATES).fill(0);

  record(prediction: Prediction, taken: boolean): void {
    const missed = prediction.taken !== taken;
    this.predictions += 1;
    if (missed) this.mispredictions += 1;

    if (prediction.counter !== undefined) {
      this.predictionsByCounter[prediction.counter] += 1;
      if (missed) this.mispredictionsByCounter[prediction.counter] += 1;
    }
  }

  toStat(): PredictorStat {
    return Object.freeze({ predictions: this.predictions, mispredictions: this.mispredictions });
  }

  toTableStat(): TablePredictorStat {
    return Object.freeze({
      predictions: this.predictions,
      mispredictions: this.mispredictions,
      predictionsByCounter: toBuckets(this.predictionsByCounter),
      mispredictionsByCounter: toBuckets(this.mispredictionsByCounter),
    });
  }

  reset(): void {
    this.predictions = 0;
    this.mispredictions = 0;
    this.predictionsByCounter.fill(0);
    this.mispredictionsByCounter.fill(0);
  }
}

function toBuckets(values: number[]): CounterBuckets {
  const [a = 0, b = 0, c = 0, d = 0] = values;
  return Object.freeze([a, b, c, d] as const);
}

/**
 * Per-run accumulator. The executor feeds it; `getSnapshot` hands out an
 * immutable copy so a returned Stat never changes afterwards.
 */
export class SimulationStatistics {
  private instructionsRetired = 0;
  private readonly tallies: Record<PredictorId, PredictorTally> = {
    notTaken: new PredictorTally(),
    backwardTaken: new PredictorTally(),
    bimodal: new PredictorTally(),
    gshare: new PredictorTally(),
  };

  recordRetired(): void {
    this.instructionsRetired += 1;
  }

  recordPrediction(id: PredictorId, prediction: Prediction, taken: boolean): void {
    this.tallies[id].record(prediction, taken);
  }

  getInstructionsRetired(): number {
    return this.instructionsRetired;
  }

  reset(): void {
    this.instructionsRetired = 0;
    Object.values(this.tallies).forEach((tally) => tally.reset());
  }

  getSnapshot(exitReason: ExitReason = "exit", fault?: FaultReport): Stat {
    const snapshot: Stat = {
      instructionsRetired: this.instructionsRetired,
      notTaken: this.tallies.notTaken.toStat(),
      backwardTaken: this.tallies.backwardTaken.toStat(),
      bimodal: this.tallies.bimodal.toTableStat(),
      gshare: this.tallies.gshare.toTableStat(),
      exitReason,
    };
    if (fault) {
      snapshot.fault = Object.freeze({ ...fault });
    }
    return Object.freeze(snapshot);
  }
}
