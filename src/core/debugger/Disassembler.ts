import { decodeInstruction, type DecodedInstruction } from "../cpu/Decoder";
import { formatWord, toUint32 } from "../cpu/Immediates";
import type { SymbolTable } from "./SymbolTable";

export const REGISTER_NAMES = [
  "zero",
  "ra",
  "sp",
  "gp",
  "tp",
  "t0",
  "t1",
  "t2",
  "s0",
  "s1",
  "a0",
  "a1",
  "a2",
  "a3",
  "a4",
  "a5",
  "a6",
  "a7",
  "s2",
  "s3",
  "s4",
  "s5",
  "s6",
  "s7",
  "s8",
  "s9",
  "s10",
  "s11",
  "t3",
  "t4",
  "t5",
  "t6",
] as const;

export const DEFAULT_DISASSEMBLY_LENGTH = 64;

export interface DisassembledInstruction {
  mnemonic: string;
  operands: string[];
  assembly: string;
}

export interface DisassemblyOptions {
  symbols?: SymbolTable | null;
  /** Upper bound on the rendered string; longer output is cut. */
  maxLength?: number;
}

const formatRegister = (registerIndex: number): string => REGISTER_NAMES[registerIndex] ?? `x${registerIndex}`;

const formatAddress = (address: number): string => `0x${formatWord(address)}`;

function annotate(address: number, symbols: SymbolTable | null | undefined): string {
  if (!symbols) return "";
  try {
    const name = symbols.lookup(address);
    return name ? ` <${name}>` : "";
  } catch {
    // Annotation is cosmetic; a broken symbol table just means no names.
    return "";
  }
}

const build = (mnemonic: string, operands: string[], suffix = ""): DisassembledInstruction => ({
  mnemonic,
  operands,
  assembly: (operands.length > 0 ? `${mnemonic} ${operands.join(", ")}` : mnemonic) + suffix,
});

/**
 * Structured disassembly of an already decoded instruction at `address`.
 * Branch, jump and auipc operands are rendered as absolute addresses.
 */
export function disassembleInstruction(
  address: number,
  decoded: DecodedInstruction,
  symbols: SymbolTable | null = null,
): DisassembledInstruction {
  const { mnemonic, rd, rs1, rs2, immediate, shamt } = decoded;

  switch (decoded.opClass) {
    case "op":
      if (mnemonic === "unknown") break;
      return build(mnemonic, [formatRegister(rd), formatRegister(rs1), formatRegister(rs2)]);
    case "op-imm": {
      if (mnemonic === "unknown") break;
      const isShift = mnemonic === "slli" || mnemonic === "srli" || mnemonic === "srai";
      return build(mnemonic, [formatRegister(rd), formatRegister(rs1), `${isShift ? shamt : immediate.value}`]);
    }
    case "load":
    case "jalr":
      if (mnemonic === "unknown") break;
      return build(mnemonic, [formatRegister(rd), `${immediate.value}(${formatRegister(rs1)})`]);
    case "store":
      if (mnemonic === "unknown") break;
      return build(mnemonic, [formatRegister(rs2), `${immediate.value}(${formatRegister(rs1)})`]);
    case "branch": {
      if (mnemonic === "unknown") break;
      const target = toUint32(address + immediate.value);
      return build(mnemonic, [formatRegister(rs1), formatRegister(rs2), formatAddress(target)], annotate(target, symbols));
    }
    case "jal": {
      const target = toUint32(address + immediate.value);
      return build(mnemonic, [formatRegister(rd), formatAddress(target)], annotate(target, symbols));
    }
    case "lui":
      return build(mnemonic, [formatRegister(rd), `0x${(immediate.value >>> 12).toString(16)}`]);
    case "auipc": {
      const result = toUint32(address + immediate.value);
      return build(mnemonic, [formatRegister(rd), formatAddress(result)], annotate(result, symbols));
    }
    case "system":
      if (mnemonic === "ecall") return build(mnemonic, []);
      break;
    case "unknown":
      break;
  }

  return build("unknown", []);
}

/**
 * Renders the instruction as a single line no longer than `maxLength`
 * characters.
 */
export function renderInstruction(address: number, decoded: DecodedInstruction, options: DisassemblyOptions = {}): string {
  const limit = Math.max(0, Math.floor(options.maxLength ?? DEFAULT_DISASSEMBLY_LENGTH));
  const { assembly } = disassembleInstruction(address, decoded, options.symbols ?? null);
  return assembly.length > limit ? assembly.slice(0, limit) : assembly;
}

export function renderWord(address: number, word: number, options: DisassemblyOptions = {}): string {
  return renderInstruction(address, decodeInstruction(word), options);
}
