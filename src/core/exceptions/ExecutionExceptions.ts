import { formatWord } from "../cpu/Immediates";
import type { AccessType } from "../memory/Memory";
import type { FaultReport } from "../stats/SimulationStatistics";
import { AddressError } from "./AccessExceptions";

/**
 * Anything that halts a run. `pc` is the address of the instruction that faulted; it
 * is filled in by the CPU when the thrower did not know it.
 */
export class CpuException extends Error {
  pc: number | null;

  constructor(message: string, pc: number | null = null) {
    super(message);
    this.pc = pc === null ? null : pc >>> 0;
    this.name = "CpuException";
  }

  withPc(pc: number): this {
    if (this.pc === null) {
      this.pc = pc >>> 0;
    }
    return this;
  }

  toReport(): FaultReport {
    return { name: this.name, message: this.message, pc: this.pc };
  }

  /** `InvalidInstruction at 0x00001004: ...` */
  describe(): string {
    const location = this.pc === null ? "" : ` at 0x${formatWord(this.pc)}`;
    return `${this.name}${location}: ${this.message}`;
  }
}

export class InvalidInstruction extends CpuException {
  readonly instruction: number;

  constructor(instruction: number, pc: number | null = null, message?: string) {
    super(message ?? `Invalid or unimplemented instruction 0x${formatWord(instruction)}`, pc);
    this.instruction = instruction >>> 0;
    this.name = "InvalidInstruction";
  }
}

export class MemoryAccessException extends CpuException {
  readonly address: number;
  readonly access: AccessType;

  constructor(address: number, access: AccessType, pc: number | null = null, message?: string) {
    super(message ?? `Memory ${access} fault at 0x${formatWord(address)}`, pc);
    this.address = address >>> 0;
    this.access = access;
    this.name = "MemoryAccessException";
  }
}

export class SyscallException extends CpuException {
  /** Value of a7 when ecall executed. */
  readonly service: number;

  constructor(service: number, pc: number | null = null, message?: string) {
    super(message ?? `Unsupported syscall service: ${service}`, pc);
    this.service = service;
    this.name = "SyscallException";
  }
}

/**
 * Converts whatever escaped an instruction into a CpuException tagged with `pc`.
 * Errors from collaborators (memory, devices, custom syscall handlers) keep their
 * message and are attached as `cause`.
 */
export function normalizeCpuException(error: unknown, pc: number): CpuException {
  if (error instanceof CpuException) {
    return error.withPc(pc);
  }

  if (error instanceof AddressError) {
    return new MemoryAccessException(error.address, error.access, pc, error.message);
  }

  if (error instanceof Error) {
    const wrapped = new CpuException(error.message, pc);
    wrapped.cause = error;
    return wrapped;
  }

  return new CpuException(`Non-error value thrown: ${String(error)}`, pc);
}
