import { COUNTER_MAX } from "./SaturatingCounterTable";

export interface PredictorConfig {
  /** log2 of the bimodal table size. */
  bimodalIndexBits: number;
  /** log2 of the gshare table size. */
  gshareIndexBits: number;
  /** Width of the global history register; at most gshareIndexBits. */
  gshareHistoryBits: number;
  /** Starting value of every counter (0..3). */
  initialCounter: number;
}

export const MAX_INDEX_BITS = 20;

export const DEFAULT_PREDICTOR_CONFIG: Readonly<PredictorConfig> = Object.freeze({
  bimodalIndexBits: 10,
  gshareIndexBits: 10,
  gshareHistoryBits: 10,
  initialCounter: 1,
});

export function resolvePredictorConfig(overrides: Partial<PredictorConfig> = {}): PredictorConfig {
  const config: PredictorConfig = { ...DEFAULT_PREDICTOR_CONFIG, ...overrides };

  requireIntegerInRange("bimodalIndexBits", config.bimodalIndexBits, 1, MAX_INDEX_BITS);
  requireIntegerInRange("gshareIndexBits", config.gshareIndexBits, 1, MAX_INDEX_BITS);
  requireIntegerInRange("gshareHistoryBits", config.gshareHistoryBits, 0, config.gshareIndexBits);
  requireIntegerInRange("initialCounter", config.initialCounter, 0, COUNTER_MAX);

  return config;
}

function requireIntegerInRange(name: keyof PredictorConfig, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}
