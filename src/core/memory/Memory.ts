import { AddressError } from "../exceptions/AccessExceptions";

const BLOCK_SIZE = 4096;
const BLOCK_MASK = BLOCK_SIZE - 1;
const BLOCK_SHIFT = 12;

export type AccessType = "read" | "write" | "execute";

/**
 * What the executor needs from a backing store. Addresses are unsigned 32-bit and
 * reads return unsigned values; fault and alignment policy belong to the
 * implementation.
 */
export interface SimulatorMemory {
  readByte(address: number): number;
  readHalf(address: number): number;
  readWord(address: number): number;
  writeByte(address: number, value: number): void;
  writeHalf(address: number, value: number): void;
  writeWord(address: number, value: number): void;
}

export interface MemoryOptions {
  /** Throw AddressError on halfword/word accesses that are not naturally aligned. */
  strictAlignment?: boolean;
}

/**
 * Sparse little-endian memory. Pages are allocated on first write; unwritten
 * bytes read as zero.
 */
export class Memory implements SimulatorMemory {
  private readonly blocks = new Map<number, Uint8Array>();
  private readonly strictAlignment: boolean;

  constructor(options: MemoryOptions = {}) {
    this.strictAlignment = options.strictAlignment ?? false;
  }

  reset(): void {
    this.blocks.clear();
  }

  readByte(address: number): number {
    const normalizedAddress = this.validateAddress(address);
    const block = this.blocks.get(normalizedAddress >>> BLOCK_SHIFT);
    if (!block) {
      return 0;
    }
    return block[normalizedAddress & BLOCK_MASK];
  }

  readHalf(address: number): number {
    const normalizedAddress = this.validateAligned(address, 2, "read");
    return this.readByte(normalizedAddress) | (this.readByte(normalizedAddress + 1) << 8);
  }

  readWord(address: number): number {
    const normalizedAddress = this.validateAligned(address, 4, "read");

    let value = 0;
    for (let i = 3; i >= 0; i--) {
      value = (value << 8) | this.readByte(normalizedAddress + i);
    }
    return value >>> 0;
  }

  writeByte(address: number, value: number): void {
    const normalizedAddress = this.validateAddress(address);
    const block = this.getOrCreateBlock(normalizedAddress >>> BLOCK_SHIFT);
    block[normalizedAddress & BLOCK_MASK] = value & 0xff;
  }

  writeHalf(address: number, value: number): void {
    const normalizedAddress = this.validateAligned(address, 2, "write");
    this.writeByte(normalizedAddress, value & 0xff);
    this.writeByte(normalizedAddress + 1, (value >>> 8) & 0xff);
  }

  writeWord(address: number, value: number): void {
    const normalizedAddress = this.validateAligned(address, 4, "write");
    for (let i = 0; i < 4; i++) {
      this.writeByte(normalizedAddress + i, (value >>> (8 * i)) & 0xff);
    }
  }

  loadBytes(baseAddress: number, bytes: ArrayLike<number>): void {
    for (let i = 0; i < bytes.length; i++) {
      this.writeByte(baseAddress + i, bytes[i]);
    }
  }

  /**
   * Writes consecutive little-endian words starting at `baseAddress`, the usual way
   * tests and callers seed a program image.
   */
  loadWords(baseAddress: number, words: readonly number[]): void {
    words.forEach((word, index) => this.writeWord(baseAddress + index * 4, word));
  }

  private getOrCreateBlock(index: number): Uint8Array {
    let block = this.blocks.get(index);
    if (!block) {
      block = new Uint8Array(BLOCK_SIZE);
      this.blocks.set(index, block);
    }
    return block;
  }

  private validateAddress(address: number): number {
    if (!Number.isInteger(address)) {
      throw new RangeError(`Invalid memory address: ${address}`);
    }

    return address >>> 0;
  }

  private validateAligned(address: number, size: 2 | 4, access: AccessType): number {
    const normalizedAddress = this.validateAddress(address);
    if (this.strictAlignment && normalizedAddress % size !== 0) {
      throw new AddressError(normalizedAddress, size, access);
    }
    return normalizedAddress;
  }
}
