import type { BranchPredictor, Prediction } from "./BranchPredictor";
import { SaturatingCounterTable } from "./SaturatingCounterTable";

// Instructions are word aligned, so the two lowest address bits carry no information.
export const branchIndex = (pc: number): number => pc >>> 2;

export class BimodalPredictor implements BranchPredictor {
  readonly id = "bimodal";
  private readonly table: SaturatingCounterTable;

  constructor(indexBits: number, initialCounter: number) {
    this.table = new SaturatingCounterTable(indexBits, initialCounter);
  }

  predict(pc: number): Prediction {
    const index = branchIndex(pc);
    return { taken: this.table.isTaken(index), counter: this.table.read(index) };
  }

  update(pc: number, _target: number, taken: boolean): void {
    this.table.train(branchIndex(pc), taken);
  }

  reset(): void {
    this.table.reset();
  }

  getCounter(pc: number): number {
    return this.table.read(branchIndex(pc));
  }
}
