export const COUNTER_MAX = 3;
export const COUNTER_STATES = COUNTER_MAX + 1;
export const TAKEN_THRESHOLD = 2;

/**
 * Table of 2-bit saturating counters. Index values are masked to the table size,
 * so callers can pass raw hashes.
 */
export class SaturatingCounterTable {
  private readonly counters: Uint8Array;
  private readonly mask: number;
  private readonly initialValue: number;

  constructor(indexBits: number, initialValue: number) {
    this.counters = new Uint8Array(2 ** indexBits);
    this.mask = this.counters.length - 1;
    this.initialValue = initialValue;
    this.reset();
  }

  get size(): number {
    return this.counters.length;
  }

  indexOf(hash: number): number {
    return (hash >>> 0) & this.mask;
  }

  read(hash: number): number {
    return this.counters[this.indexOf(hash)];
  }

  isTaken(hash: number): boolean {
    return this.read(hash) >= TAKEN_THRESHOLD;
  }

  train(hash: number, taken: boolean): void {
    const index = this.indexOf(hash);
    const value = this.counters[index];
    if (taken) {
      if (value < COUNTER_MAX) this.counters[index] = value + 1;
    } else if (value > 0) {
      this.counters[index] = value - 1;
    }
  }

  reset(): void {
    this.counters.fill(this.initialValue);
  }
}
