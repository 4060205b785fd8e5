import type { RetiredInstruction } from "../cpu/Cpu";
import type { ArchitecturalEffect } from "../cpu/Execute";
import { formatWord } from "../cpu/Immediates";
import { ZERO_REGISTER } from "../state/MachineState";
import { renderInstruction } from "./Disassembler";
import type { SymbolTable } from "./SymbolTable";

export type LogSink = (line: string) => void;

export const TAKEN_BRANCH_MARKER = " {T}";
export const LOGGING_ENABLED = "Simulator logging enabled";

export interface TraceLogOptions {
  symbols?: SymbolTable | null;
  maxLength?: number;
}

const hex = (value: number): string => `0x${formatWord(value).toUpperCase()}`;

export function formatEffect(effect: ArchitecturalEffect): string {
  if (effect.kind === "memory") {
    return ` Memory write: MEM[${hex(effect.address)}] = ${hex(effect.value)}`;
  }
  return effect.register === ZERO_REGISTER
    ? " Ignored write to x0"
    : ` Register write: x${effect.register} = ${hex(effect.value)}`;
}

/**
 * Logs the register and memory writes of a retired instruction, one line each,
 * then the instruction itself:
 *
 * ```
 *  Register write: x10 = 0x00000015
 *      7 => 00010018 : 00a50533    add a0, a0, a0
 * ```
 *
 * A taken branch ends with ` {T}`.
 */
export class TraceLog {
  constructor(
    private readonly sink: LogSink,
    private readonly options: TraceLogOptions = {},
  ) {}

  begin(): void {
    this.sink(LOGGING_ENABLED);
  }

  record(sequence: number, { pc, decoded, branchTaken, effects }: RetiredInstruction): void {
    for (const effect of effects) {
      this.sink(formatEffect(effect));
    }
    const assembly = renderInstruction(pc, decoded, this.options);
    const marker = branchTaken ? TAKEN_BRANCH_MARKER : "";
    this.sink(`${String(sequence).padStart(6)} => ${formatWord(pc)} : ${formatWord(decoded.raw)}    ${assembly}${marker}`);
  }
}
