// Bit-field helpers shared by the decoder, the executor and the disassembler.

export type ImmediateFormat = "R" | "I" | "S" | "B" | "U" | "J";

/**
 * Interprets the low `bits` bits of `value` as a two's complement number.
 */
export function signExtend(value: number, bits: number): number {
  const field = bits >= 32 ? value >>> 0 : (value >>> 0) & (2 ** bits - 1);
  const signBit = 2 ** (bits - 1);
  return field >= signBit ? field - 2 ** bits : field;
}

export const toInt32 = (value: number): number => value | 0;

export const toUint32 = (value: number): number => value >>> 0;

export function immediateI(instruction: number): number {
  return signExtend(instruction >>> 20, 12);
}

export function immediateS(instruction: number): number {
  const value = ((instruction >>> 25) << 5) | ((instruction >>> 7) & 0x1f);
  return signExtend(value, 12);
}

export function immediateB(instruction: number): number {
  let value = ((instruction >>> 31) & 0x1) << 12;
  value |= ((instruction >>> 7) & 0x1) << 11;
  value |= ((instruction >>> 25) & 0x3f) << 5;
  value |= ((instruction >>> 8) & 0xf) << 1;
  return signExtend(value, 13);
}

// Already in final position; reading it as int32 gives the signed value.
export function immediateU(instruction: number): number {
  return toInt32(instruction & 0xfffff000);
}

export function immediateJ(instruction: number): number {
  let value = ((instruction >>> 31) & 0x1) << 20;
  value |= ((instruction >>> 12) & 0xff) << 12;
  value |= ((instruction >>> 20) & 0x1) << 11;
  value |= ((instruction >>> 21) & 0x3ff) << 1;
  return signExtend(value, 21);
}

export function extractImmediate(format: ImmediateFormat, instruction: number): number {
  switch (format) {
    case "R":
      return 0;
    case "I":
      return immediateI(instruction);
    case "S":
      return immediateS(instruction);
    case "B":
      return immediateB(instruction);
    case "U":
      return immediateU(instruction);
    case "J":
      return immediateJ(instruction);
  }
}

export const formatWord = (value: number): string => (value >>> 0).toString(16).padStart(8, "0");
