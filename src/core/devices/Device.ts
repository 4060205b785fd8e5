/** Byte stream used by the character syscalls. `readByte` yields null at end of input. */
export interface ConsoleDevice {
  readByte(): number | null;
  writeByte(value: number): void;
}
