import { branchIndex } from "./BimodalPredictor";
import type { BranchPredictor, Prediction } from "./BranchPredictor";
import { SaturatingCounterTable } from "./SaturatingCounterTable";

/**
 * Gshare: the counter table is indexed by the branch address xor a global
 * history of recent outcomes (newest outcome in bit 0).
 */
export class GsharePredictor implements BranchPredictor {
  readonly id = "gshare";
  private readonly table: SaturatingCounterTable;
  private readonly historyMask: number;
  private history = 0;

  constructor(indexBits: number, historyBits: number, initialCounter: number) {
    this.table = new SaturatingCounterTable(indexBits, initialCounter);
    this.historyMask = 2 ** historyBits - 1;
  }

  predict(pc: number): Prediction {
    const hash = this.hash(pc);
    return { taken: this.table.isTaken(hash), counter: this.table.read(hash) };
  }

  update(pc: number, _target: number, taken: boolean): void {
    this.table.train(this.hash(pc), taken);
    this.history = ((this.history << 1) | (taken ? 1 : 0)) & this.historyMask;
  }

  reset(): void {
    this.table.reset();
    this.history = 0;
  }

  getHistory(): number {
    return this.history;
  }

  getCounter(pc: number): number {
    return this.table.read(this.hash(pc));
  }

  private hash(pc: number): number {
    return branchIndex(pc) ^ this.history;
  }
}
