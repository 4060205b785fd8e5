// Architectural state of a single RV32 hart: the integer register file and the
// program counter. One instance belongs to exactly one run.

export const ZERO_REGISTER = 0;
export const ARGUMENT_REGISTER = 10;
export const SERVICE_REGISTER = 17;

export class MachineState {
  static readonly REGISTER_COUNT = 32;

  private readonly registers: Int32Array;
  private programCounter: number;
  private terminated: boolean;

  constructor(programCounter = 0) {
    this.registers = new Int32Array(MachineState.REGISTER_COUNT);
    this.programCounter = 0;
    this.terminated = false;
    this.reset(programCounter);
  }

  reset(programCounter = 0): void {
    this.registers.fill(0);
    this.programCounter = this.toUint32(programCounter);
    this.terminated = false;
  }

  getRegister(index: number): number {
    this.validateRegisterIndex(index);
    return this.registers[index];
  }

  getRegisterUnsigned(index: number): number {
    return this.getRegister(index) >>> 0;
  }

  setRegister(index: number, value: number): void {
    this.validateRegisterIndex(index);
    if (index === ZERO_REGISTER) return; // x0 is hardwired
    this.registers[index] = this.toInt32(value);
  }

  /**
   * Re-asserts the x0 invariant after an instruction. `setRegister` already refuses
   * writes to x0, so this only matters if the register file is touched some other way.
   */
  clearZeroRegister(): void {
    this.registers[ZERO_REGISTER] = 0;
  }

  getRegisters(): number[] {
    return Array.from(this.registers);
  }

  getProgramCounter(): number {
    return this.programCounter;
  }

  setProgramCounter(value: number): void {
    this.programCounter = this.toUint32(value);
  }

  terminate(): void {
    this.terminated = true;
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  private validateRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= MachineState.REGISTER_COUNT) {
      throw new RangeError(`Register index out of bounds: ${index}`);
    }
  }

  private toInt32(value: number): number {
    return value | 0;
  }

  private toUint32(value: number): number {
    return value >>> 0;
  }
}
