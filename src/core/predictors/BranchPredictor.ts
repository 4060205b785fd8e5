export type PredictorId = "notTaken" | "backwardTaken" | "bimodal" | "gshare";

export interface Prediction {
  taken: boolean;
  /** Counter value the prediction was read from; only table-based predictors set it. */
  counter?: number;
}

/**
 * A passive conditional-branch predictor. Predictions are scored against the
 * actual outcome and never steer execution.
 */
export interface BranchPredictor {
  readonly id: PredictorId;
  predict(pc: number, target: number): Prediction;
  update(pc: number, target: number, taken: boolean, prediction: Prediction): void;
  reset(): void;
}

export class NotTakenPredictor implements BranchPredictor {
  readonly id = "notTaken";

  predict(): Prediction {
    return { taken: false };
  }

  update(): void {
    // stateless
  }

  reset(): void {
    // stateless
  }
}

/** Backward taken, forward not taken: loops usually branch backwards. */
export class BackwardTakenPredictor implements BranchPredictor {
  readonly id = "backwardTaken";

  predict(pc: number, target: number): Prediction {
    return { taken: target >>> 0 < pc >>> 0 };
  }

  update(): void {
    // stateless
  }

  reset(): void {
    // stateless
  }
}
