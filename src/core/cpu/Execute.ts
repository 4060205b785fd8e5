// Instruction semantics for RV32IM. Each mnemonic maps to one handler; the decoder
// has already resolved the mnemonic, so nothing here re-inspects opcode bits.

import type { BranchPredictorBank } from "../predictors/BranchPredictorBank";
import type { SimulatorMemory } from "../memory/Memory";
import type { MachineState } from "../state/MachineState";
import type { SyscallTable } from "../syscalls/SyscallTable";
import { InvalidInstruction } from "../exceptions/ExecutionExceptions";
import type {
  BranchMnemonic,
  DecodedInstruction,
  ImmediateMnemonic,
  LoadMnemonic,
  Mnemonic,
  RegisterMnemonic,
  StoreMnemonic,
} from "./Decoder";
import { formatWord, signExtend, toInt32, toUint32 } from "./Immediates";

export const INT32_MIN = -0x80000000;
export const UINT32_MAX = 0xffffffff;

export interface ExecutionContext {
  state: MachineState;
  memory: SimulatorMemory;
  syscalls: SyscallTable;
  predictors: BranchPredictorBank;
}

/** A register or memory write made by one instruction, in program order. */
export type ArchitecturalEffect =
  | { kind: "register"; register: number; value: number }
  | { kind: "memory"; address: number; value: number };

export interface ExecutionResult {
  /** Address of the next instruction to fetch. */
  nextPc: number;
  /** True only for a conditional branch whose condition held. */
  branchTaken: boolean;
  effects: readonly ArchitecturalEffect[];
}

interface ControlFlow {
  nextPc?: number;
  branchTaken?: boolean;
}

type Semantics = (
  decoded: DecodedInstruction,
  pc: number,
  context: ExecutionContext,
  effects: ArchitecturalEffect[],
) => ControlFlow | void;

// --- M extension -------------------------------------------------------------

const highWord = (product: bigint): number => Number(BigInt.asIntN(32, product >> 32n));

export function divSigned(dividend: number, divisor: number): number {
  if (divisor === 0) return -1;
  if (dividend === INT32_MIN && divisor === -1) return INT32_MIN;
  return toInt32(Math.trunc(dividend / divisor));
}

export function divUnsigned(dividend: number, divisor: number): number {
  const a = toUint32(dividend);
  const b = toUint32(divisor);
  if (b === 0) return UINT32_MAX;
  return Math.floor(a / b);
}

export function remSigned(dividend: number, divisor: number): number {
  if (divisor === 0) return dividend;
  if (dividend === INT32_MIN && divisor === -1) return 0;
  return toInt32(dividend % divisor);
}

export function remUnsigned(dividend: number, divisor: number): number {
  const a = toUint32(dividend);
  const b = toUint32(divisor);
  if (b === 0) return a;
  return a % b;
}

// --- operation tables ----------------------------------------------------------

const REGISTER_OPERATIONS: Record<RegisterMnemonic, (left: number, right: number) => number> = {
  add: (l, r) => l + r,
  sub: (l, r) => l - r,
  sll: (l, r) => l << (r & 0x1f),
  slt: (l, r) => (l < r ? 1 : 0),
  sltu: (l, r) => (toUint32(l) < toUint32(r) ? 1 : 0),
  xor: (l, r) => l ^ r,
  srl: (l, r) => l >>> (r & 0x1f),
  sra: (l, r) => l >> (r & 0x1f),
  or: (l, r) => l | r,
  and: (l, r) => l & r,
  mul: (l, r) => Math.imul(l, r),
  mulh: (l, r) => highWord(BigInt(l) * BigInt(r)),
  mulhsu: (l, r) => highWord(BigInt(l) * BigInt(toUint32(r))),
  mulhu: (l, r) => highWord(BigInt(toUint32(l)) * BigInt(toUint32(r))),
  div: divSigned,
  divu: divUnsigned,
  rem: remSigned,
  remu: remUnsigned,
};

const IMMEDIATE_OPERATIONS: Record<ImmediateMnemonic, (value: number, immediate: number, shamt: number) => number> = {
  addi: (v, imm) => v + imm,
  slti: (v, imm) => (v < imm ? 1 : 0),
  sltiu: (v, imm) => (toUint32(v) < toUint32(imm) ? 1 : 0),
  xori: (v, imm) => v ^ imm,
  ori: (v, imm) => v | imm,
  andi: (v, imm) => v & imm,
  slli: (v, _imm, shamt) => v << shamt,
  srli: (v, _imm, shamt) => v >>> shamt,
  srai: (v, _imm, shamt) => v >> shamt,
};

const BRANCH_CONDITIONS: Record<BranchMnemonic, (left: number, right: number) => boolean> = {
  beq: (l, r) => l === r,
  bne: (l, r) => l !== r,
  blt: (l, r) => l < r,
  bge: (l, r) => l >= r,
  bltu: (l, r) => toUint32(l) < toUint32(r),
  bgeu: (l, r) => toUint32(l) >= toUint32(r),
};

const LOADS: Record<LoadMnemonic, (memory: SimulatorMemory, address: number) => number> = {
  lb: (memory, address) => signExtend(memory.readByte(address), 8),
  lh: (memory, address) => signExtend(memory.readHalf(address), 16),
  lw: (memory, address) => memory.readWord(address),
  lbu: (memory, address) => memory.readByte(address) & 0xff,
  lhu: (memory, address) => memory.readHalf(address) & 0xffff,
};

// Each store returns the value it wrote, truncated to its width.
const STORES: Record<StoreMnemonic, (memory: SimulatorMemory, address: number, value: number) => number> = {
  sb: (memory, address, value) => {
    memory.writeByte(address, value & 0xff);
    return value & 0xff;
  },
  sh: (memory, address, value) => {
    memory.writeHalf(address, value & 0xffff);
    return value & 0xffff;
  },
  sw: (memory, address, value) => {
    memory.writeWord(address, toUint32(value));
    return toUint32(value);
  },
};

// --- handler factories -----------------------------------------------------------

const effectiveAddress = (decoded: DecodedInstruction, state: MachineState): number =>
  toUint32(state.getRegister(decoded.rs1) + decoded.immediate.value);

function writeRegister(state: MachineState, effects: ArchitecturalEffect[], register: number, value: number): void {
  state.setRegister(register, value);
  effects.push({ kind: "register", register, value: toUint32(value) });
}

const registerBinary =
  (mnemonic: RegisterMnemonic): Semantics =>
  ({ rd, rs1, rs2 }, _pc, { state }, effects) => {
    writeRegister(state, effects, rd, toInt32(REGISTER_OPERATIONS[mnemonic](state.getRegister(rs1), state.getRegister(rs2))));
  };

const immediateBinary =
  (mnemonic: ImmediateMnemonic): Semantics =>
  ({ rd, rs1, immediate, shamt }, _pc, { state }, effects) => {
    writeRegister(state, effects, rd, toInt32(IMMEDIATE_OPERATIONS[mnemonic](state.getRegister(rs1), immediate.value, shamt)));
  };

const load =
  (mnemonic: LoadMnemonic): Semantics =>
  (decoded, _pc, { state, memory }, effects) => {
    const address = effectiveAddress(decoded, state);
    writeRegister(state, effects, decoded.rd, toInt32(LOADS[mnemonic](memory, address)));
  };

const store =
  (mnemonic: StoreMnemonic): Semantics =>
  (decoded, _pc, { state, memory }, effects) => {
    const address = effectiveAddress(decoded, state);
    const value = STORES[mnemonic](memory, address, state.getRegister(decoded.rs2));
    effects.push({ kind: "memory", address, value });
  };

const branch =
  (mnemonic: BranchMnemonic): Semantics =>
  ({ rs1, rs2, immediate }, pc, { state, predictors }) => {
    const target = toUint32(pc + immediate.value);
    const taken = BRANCH_CONDITIONS[mnemonic](state.getRegister(rs1), state.getRegister(rs2));
    predictors.observe(pc, target, taken);
    return taken ? { nextPc: target, branchTaken: true } : {};
  };

const jumpAndLink: Semantics = ({ rd, immediate }, pc, { state }, effects) => {
  const target = toUint32(pc + immediate.value);
  writeRegister(state, effects, rd, pc + 4);
  return { nextPc: target };
};

const jumpAndLinkRegister: Semantics = ({ rd, rs1, immediate }, pc, { state }, effects) => {
  // Read rs1 before writing rd: they may be the same register.
  const target = toUint32((state.getRegister(rs1) + immediate.value) & ~1);
  writeRegister(state, effects, rd, pc + 4);
  return { nextPc: target };
};

const SEMANTICS: Record<Exclude<Mnemonic, "unknown">, Semantics> = {
  add: registerBinary("add"),
  sub: registerBinary("sub"),
  sll: registerBinary("sll"),
  slt: registerBinary("slt"),
  sltu: registerBinary("sltu"),
  xor: registerBinary("xor"),
  srl: registerBinary("srl"),
  sra: registerBinary("sra"),
  or: registerBinary("or"),
  and: registerBinary("and"),
  mul: registerBinary("mul"),
  mulh: registerBinary("mulh"),
  mulhsu: registerBinary("mulhsu"),
  mulhu: registerBinary("mulhu"),
  div: registerBinary("div"),
  divu: registerBinary("divu"),
  rem: registerBinary("rem"),
  remu: registerBinary("remu"),
  addi: immediateBinary("addi"),
  slti: immediateBinary("slti"),
  sltiu: immediateBinary("sltiu"),
  xori: immediateBinary("xori"),
  ori: immediateBinary("ori"),
  andi: immediateBinary("andi"),
  slli: immediateBinary("slli"),
  srli: immediateBinary("srli"),
  srai: immediateBinary("srai"),
  lb: load("lb"),
  lh: load("lh"),
  lw: load("lw"),
  lbu: load("lbu"),
  lhu: load("lhu"),
  sb: store("sb"),
  sh: store("sh"),
  sw: store("sw"),
  beq: branch("beq"),
  bne: branch("bne"),
  blt: branch("blt"),
  bge: branch("bge"),
  bltu: branch("bltu"),
  bgeu: branch("bgeu"),
  jal: jumpAndLink,
  jalr: jumpAndLinkRegister,
  lui: ({ rd, immediate }, _pc, { state }, effects) => {
    writeRegister(state, effects, rd, immediate.value);
  },
  auipc: ({ rd, immediate }, pc, { state }, effects) => {
    writeRegister(state, effects, rd, pc + immediate.value);
  },
  ecall: (_decoded, _pc, { state, syscalls }) => {
    syscalls.dispatch(state);
  },
};

/**
 * Applies one decoded instruction located at `pc`. Throws InvalidInstruction for
 * anything the decoder could not resolve.
 */
export function executeInstruction(decoded: DecodedInstruction, pc: number, context: ExecutionContext): ExecutionResult {
  if (decoded.mnemonic === "unknown") {
    const message =
      decoded.opClass === "system" ? `Unsupported system instruction 0x${formatWord(decoded.raw)}` : undefined;
    throw new InvalidInstruction(decoded.raw, pc, message);
  }

  const effects: ArchitecturalEffect[] = [];
  const flow = SEMANTICS[decoded.mnemonic](decoded, pc, context, effects) ?? {};
  return {
    nextPc: flow.nextPc ?? toUint32(pc + 4),
    branchTaken: flow.branchTaken ?? false,
    effects,
  };
}
