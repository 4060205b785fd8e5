// RV32IM decoder. Every consumer (executor, disassembler, tests) goes through
// decodeInstruction, so field and immediate extraction exist in exactly one place.

import { extractImmediate, type ImmediateFormat } from "./Immediates";

export const OPCODE = {
  LOAD: 0x03,
  OP_IMM: 0x13,
  AUIPC: 0x17,
  STORE: 0x23,
  OP: 0x33,
  LUI: 0x37,
  BRANCH: 0x63,
  JALR: 0x67,
  JAL: 0x6f,
  SYSTEM: 0x73,
} as const;

export const ECALL_ENCODING = 0x00000073;

const FUNCT7_BASE = 0x00;
const FUNCT7_ALT = 0x20;
const FUNCT7_MULDIV = 0x01;

export type OpcodeClass =
  | "op"
  | "op-imm"
  | "load"
  | "store"
  | "branch"
  | "jal"
  | "jalr"
  | "lui"
  | "auipc"
  | "system"
  | "unknown";

export type RegisterMnemonic =
  | "add"
  | "sub"
  | "sll"
  | "slt"
  | "sltu"
  | "xor"
  | "srl"
  | "sra"
  | "or"
  | "and"
  | "mul"
  | "mulh"
  | "mulhsu"
  | "mulhu"
  | "div"
  | "divu"
  | "rem"
  | "remu";

export type ImmediateMnemonic =
  | "addi"
  | "slti"
  | "sltiu"
  | "xori"
  | "ori"
  | "andi"
  | "slli"
  | "srli"
  | "srai";

export type LoadMnemonic = "lb" | "lh" | "lw" | "lbu" | "lhu";
export type StoreMnemonic = "sb" | "sh" | "sw";
export type BranchMnemonic = "beq" | "bne" | "blt" | "bge" | "bltu" | "bgeu";

export type Mnemonic =
  | RegisterMnemonic
  | ImmediateMnemonic
  | LoadMnemonic
  | StoreMnemonic
  | BranchMnemonic
  | "jal"
  | "jalr"
  | "lui"
  | "auipc"
  | "ecall"
  | "unknown";

export interface Immediate {
  format: ImmediateFormat;
  value: number;
}

export interface DecodedInstruction {
  readonly raw: number;
  readonly opcode: number;
  readonly rd: number;
  readonly funct3: number;
  readonly rs1: number;
  readonly rs2: number;
  readonly funct7: number;
  readonly opClass: OpcodeClass;
  readonly mnemonic: Mnemonic;
  readonly immediate: Readonly<Immediate>;
  /** Shift amount of slli/srli/srai; 0 elsewhere. */
  readonly shamt: number;
}

const REGISTER_BASE: readonly RegisterMnemonic[] = ["add", "sll", "slt", "sltu", "xor", "srl", "or", "and"];
const REGISTER_MULDIV: readonly RegisterMnemonic[] = ["mul", "mulh", "mulhsu", "mulhu", "div", "divu", "rem", "remu"];
const IMMEDIATE_OPS: readonly (ImmediateMnemonic | null)[] = ["addi", null, "slti", "sltiu", "xori", null, "ori", "andi"];
const LOAD_OPS: readonly (LoadMnemonic | null)[] = ["lb", "lh", "lw", null, "lbu", "lhu", null, null];
const STORE_OPS: readonly (StoreMnemonic | null)[] = ["sb", "sh", "sw", null, null, null, null, null];
const BRANCH_OPS: readonly (BranchMnemonic | null)[] = ["beq", "bne", null, null, "blt", "bge", "bltu", "bgeu"];

interface Resolution {
  opClass: OpcodeClass;
  mnemonic: Mnemonic;
  format: ImmediateFormat;
}

const unknown = (opClass: OpcodeClass = "unknown"): Resolution => ({ opClass, mnemonic: "unknown", format: "R" });

function resolveRegisterOp(funct3: number, funct7: number): Resolution {
  let mnemonic: RegisterMnemonic | null = null;
  if (funct7 === FUNCT7_BASE) {
    mnemonic = REGISTER_BASE[funct3];
  } else if (funct7 === FUNCT7_MULDIV) {
    mnemonic = REGISTER_MULDIV[funct3];
  } else if (funct7 === FUNCT7_ALT) {
    mnemonic = funct3 === 0x0 ? "sub" : funct3 === 0x5 ? "sra" : null;
  }
  return mnemonic ? { opClass: "op", mnemonic, format: "R" } : unknown("op");
}

function resolveImmediateOp(funct3: number, funct7: number): Resolution {
  if (funct3 === 0x1) {
    return funct7 === FUNCT7_BASE ? { opClass: "op-imm", mnemonic: "slli", format: "I" } : unknown("op-imm");
  }
  if (funct3 === 0x5) {
    if (funct7 === FUNCT7_BASE) return { opClass: "op-imm", mnemonic: "srli", format: "I" };
    if (funct7 === FUNCT7_ALT) return { opClass: "op-imm", mnemonic: "srai", format: "I" };
    return unknown("op-imm");
  }
  const mnemonic = IMMEDIATE_OPS[funct3];
  return mnemonic ? { opClass: "op-imm", mnemonic, format: "I" } : unknown("op-imm");
}

function resolve(instruction: number, opcode: number, funct3: number, funct7: number): Resolution {
  switch (opcode) {
    case OPCODE.OP:
      return resolveRegisterOp(funct3, funct7);
    case OPCODE.OP_IMM:
      return resolveImmediateOp(funct3, funct7);
    case OPCODE.LOAD: {
      const mnemonic = LOAD_OPS[funct3];
      return mnemonic ? { opClass: "load", mnemonic, format: "I" } : unknown("load");
    }
    case OPCODE.STORE: {
      const mnemonic = STORE_OPS[funct3];
      return mnemonic ? { opClass: "store", mnemonic, format: "S" } : unknown("store");
    }
    case OPCODE.BRANCH: {
      const mnemonic = BRANCH_OPS[funct3];
      return mnemonic ? { opClass: "branch", mnemonic, format: "B" } : unknown("branch");
    }
    case OPCODE.JAL:
      return { opClass: "jal", mnemonic: "jal", format: "J" };
    case OPCODE.JALR:
      return funct3 === 0x0 ? { opClass: "jalr", mnemonic: "jalr", format: "I" } : unknown("jalr");
    case OPCODE.LUI:
      return { opClass: "lui", mnemonic: "lui", format: "U" };
    case OPCODE.AUIPC:
      return { opClass: "auipc", mnemonic: "auipc", format: "U" };
    case OPCODE.SYSTEM:
      return instruction === ECALL_ENCODING ? { opClass: "system", mnemonic: "ecall", format: "I" } : unknown("system");
    default:
      return unknown();
  }
}

/**
 * Decodes a 32-bit RV32IM instruction word. Never throws: anything outside the
 * supported set comes back with `mnemonic: "unknown"` and the caller decides
 * whether that is fatal.
 */
export function decodeInstruction(word: number): DecodedInstruction {
  const raw = word >>> 0;
  const opcode = raw & 0x7f;
  const rd = (raw >>> 7) & 0x1f;
  const funct3 = (raw >>> 12) & 0x7;
  const rs1 = (raw >>> 15) & 0x1f;
  const rs2 = (raw >>> 20) & 0x1f;
  const funct7 = (raw >>> 25) & 0x7f;

  const { opClass, mnemonic, format } = resolve(raw, opcode, funct3, funct7);
  const isShiftImmediate = mnemonic === "slli" || mnemonic === "srli" || mnemonic === "srai";

  return Object.freeze({
    raw,
    opcode,
    rd,
    funct3,
    rs1,
    rs2,
    funct7,
    opClass,
    mnemonic,
    immediate: Object.freeze({ format, value: extractImmediate(format, raw) }),
    shamt: isShiftImmediate ? rs2 : 0,
  });
}

export function isConditionalBranch(decoded: DecodedInstruction): boolean {
  return decoded.opClass === "branch" && decoded.mnemonic !== "unknown";
}
