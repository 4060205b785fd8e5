// Sequential RV32IM executor: fetch the word at the PC, decode it, apply its
// semantics, then retire it. There is no pipeline and no delay slot.

import { MachineState } from "../state/MachineState";
import { CpuException, MemoryAccessException, normalizeCpuException } from "../exceptions/ExecutionExceptions";
import { AddressError } from "../exceptions/AccessExceptions";
import type { SimulatorMemory } from "../memory/Memory";
import { BranchPredictorBank } from "../predictors/BranchPredictorBank";
import type { PredictorConfig } from "../predictors/PredictorConfig";
import { SimulationStatistics } from "../stats/SimulationStatistics";
import { SyscallTable } from "../syscalls/SyscallTable";
import type { TraceLog } from "../debugger/TraceLog";
import { decodeInstruction, type DecodedInstruction } from "./Decoder";
import { executeInstruction, type ArchitecturalEffect, type ExecutionContext } from "./Execute";
import { formatWord } from "./Immediates";

export type StepResult = "running" | "exited";

export interface CpuOptions {
  memory: SimulatorMemory;
  state?: MachineState;
  syscalls?: SyscallTable;
  statistics?: SimulationStatistics;
  predictors?: BranchPredictorBank;
  predictorConfig?: Partial<PredictorConfig>;
  trace?: TraceLog | null;
}

export interface RetiredInstruction {
  pc: number;
  decoded: DecodedInstruction;
  nextPc: number;
  branchTaken: boolean;
  effects: readonly ArchitecturalEffect[];
}

export class Cpu {
  private readonly memory: SimulatorMemory;
  private readonly state: MachineState;
  private readonly statistics: SimulationStatistics;
  private readonly predictors: BranchPredictorBank;
  private readonly context: ExecutionContext;
  private readonly trace: TraceLog | null;
  private lastRetired: RetiredInstruction | null = null;

  constructor(options: CpuOptions) {
    this.memory = options.memory;
    this.state = options.state ?? new MachineState();
    this.statistics = options.statistics ?? new SimulationStatistics();
    this.predictors = options.predictors ?? new BranchPredictorBank(this.statistics, options.predictorConfig);
    this.trace = options.trace ?? null;
    this.context = {
      state: this.state,
      memory: this.memory,
      syscalls: options.syscalls ?? new SyscallTable(),
      predictors: this.predictors,
    };
  }

  getState(): MachineState {
    return this.state;
  }

  getStatistics(): SimulationStatistics {
    return this.statistics;
  }

  getPredictors(): BranchPredictorBank {
    return this.predictors;
  }

  getLastRetired(): RetiredInstruction | null {
    return this.lastRetired;
  }

  isHalted(): boolean {
    return this.state.isTerminated();
  }

  /**
   * Executes one instruction. Faults are thrown as CpuException subclasses tagged
   * with the PC of the faulting instruction, which is then not counted as retired.
   * Errors from the trace sink are not faults and propagate unchanged.
   */
  step(): StepResult {
    if (this.state.isTerminated()) {
      return "exited";
    }

    const retired = this.retire(this.state.getProgramCounter());
    this.trace?.record(this.statistics.getInstructionsRetired(), retired);

    return this.state.isTerminated() ? "exited" : "running";
  }

  private retire(pc: number): RetiredInstruction {
    try {
      const decoded = decodeInstruction(this.fetch(pc));
      const { nextPc, branchTaken, effects } = executeInstruction(decoded, pc, this.context);

      this.state.clearZeroRegister();
      this.state.setProgramCounter(nextPc);
      this.statistics.recordRetired();
      this.lastRetired = { pc, decoded, nextPc, branchTaken, effects };
      return this.lastRetired;
    } catch (error) {
      throw normalizeCpuException(error, pc);
    }
  }

  private fetch(pc: number): number {
    if ((pc & 3) !== 0) {
      throw new MemoryAccessException(pc, "execute", pc, `Misaligned instruction address: 0x${formatWord(pc)}`);
    }
    try {
      return this.memory.readWord(pc) >>> 0;
    } catch (error) {
      if (error instanceof AddressError) {
        throw new MemoryAccessException(error.address, "execute", pc, error.message);
      }
      if (error instanceof CpuException) {
        throw error;
      }
      throw new MemoryAccessException(pc, "execute", pc, error instanceof Error ? error.message : undefined);
    }
  }
}
