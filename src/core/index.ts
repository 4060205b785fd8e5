import { Cpu } from "./cpu/Cpu";
import type { ConsoleDevice } from "./devices/Device";
import { StdioDevice } from "./devices/StdioDevice";
import { TraceLog, type LogSink } from "./debugger/TraceLog";
import { MapSymbolTable, type SymbolLookup, type SymbolTable } from "./debugger/SymbolTable";
import { CpuException } from "./exceptions/ExecutionExceptions";
import type { SimulatorMemory } from "./memory/Memory";
import { BranchPredictorBank } from "./predictors/BranchPredictorBank";
import type { PredictorConfig } from "./predictors/PredictorConfig";
import { MachineState } from "./state/MachineState";
import { SimulationStatistics, type Stat } from "./stats/SimulationStatistics";
import { formatWord } from "./cpu/Immediates";
import { SyscallTable } from "./syscalls/SyscallTable";

export * from "./cpu/Cpu";
export * from "./cpu/Decoder";
export * from "./cpu/Execute";
export * from "./cpu/Immediates";
export * from "./memory/Memory";
export * from "./devices/Device";
export * from "./devices/TerminalDevice";
export * from "./devices/StdioDevice";
export * from "./syscalls/SyscallTable";
export * from "./syscalls/SyscallHandlers";
export * from "./debugger/Disassembler";
export * from "./debugger/SymbolTable";
export * from "./debugger/TraceLog";
export * from "./predictors/BranchPredictor";
export * from "./predictors/BranchPredictorBank";
export * from "./predictors/BimodalPredictor";
export * from "./predictors/GsharePredictor";
export * from "./predictors/PredictorConfig";
export * from "./predictors/SaturatingCounterTable";
export * from "./stats/SimulationStatistics";
export * from "./state/MachineState";
export * from "./exceptions/AccessExceptions";
export * from "./exceptions/ExecutionExceptions";

export type DiagnosticSink = (message: string) => void;

export interface SimulateOptions {
  /**
   * Receives a header line, then the register and memory writes and the disassembly
   * of every retired instruction. Without it nothing is disassembled.
   */
  logSink?: LogSink | null;
  /** Names used to annotate branch and jump targets in the trace. */
  symbols?: SymbolTable | SymbolLookup | null;
  /** Character device for the read/write syscalls; standard input/output by default. */
  console?: ConsoleDevice;
  /** Fault reports; `console.error` by default. */
  diagnostics?: DiagnosticSink;
  predictors?: Partial<PredictorConfig>;
  disassemblyMaxLength?: number;
}

const defaultDiagnostics: DiagnosticSink = (message) => console.error(message);

function toSymbolTable(symbols: SymbolTable | SymbolLookup | null | undefined): SymbolTable | null {
  if (!symbols) return null;
  if (isSymbolTable(symbols)) return symbols;
  return new MapSymbolTable(symbols);
}

function isSymbolTable(value: SymbolTable | SymbolLookup): value is SymbolTable {
  return !(value instanceof Map) && typeof value.lookup === "function";
}

/**
 * Runs the program in `memory` from `startAddress` until it invokes an exit service
 * or faults. Faults are reported through `diagnostics` and never thrown; the
 * returned statistics cover every instruction retired before the halt. An error
 * thrown by `logSink` ends the run and reaches the caller as is.
 */
export function simulate(memory: SimulatorMemory, startAddress: number, options: SimulateOptions = {}): Stat {
  if (!Number.isInteger(startAddress)) {
    throw new RangeError(`Invalid start address: ${startAddress}`);
  }
  if ((startAddress & 3) !== 0) {
    throw new RangeError(`Misaligned start address: 0x${formatWord(startAddress)}`);
  }
  const { disassemblyMaxLength } = options;
  if (disassemblyMaxLength !== undefined && (!Number.isInteger(disassemblyMaxLength) || disassemblyMaxLength < 1)) {
    throw new RangeError(`disassemblyMaxLength must be a positive integer, got ${disassemblyMaxLength}`);
  }

  const diagnostics = options.diagnostics ?? defaultDiagnostics;
  const statistics = new SimulationStatistics();
  const trace = options.logSink
    ? new TraceLog(options.logSink, { symbols: toSymbolTable(options.symbols), maxLength: disassemblyMaxLength })
    : null;

  const cpu = new Cpu({
    memory,
    state: new MachineState(startAddress),
    statistics,
    predictors: new BranchPredictorBank(statistics, options.predictors),
    syscalls: new SyscallTable({ console: options.console ?? new StdioDevice() }),
    trace,
  });

  trace?.begin();
  try {
    while (cpu.step() === "running") {
      // keep stepping until exit
    }
  } catch (error) {
    // Cpu.step tags every execution fault; anything else came from a sink.
    if (!(error instanceof CpuException)) throw error;
    diagnostics(`[Simulator] ${error.describe()}`);
    return statistics.getSnapshot("fault", error.toReport());
  }

  return statistics.getSnapshot("exit");
}
