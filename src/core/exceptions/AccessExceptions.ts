import type { AccessType } from "../memory/Memory";

export type AlignedAccessSize = 2 | 4;

/**
 * Raised by a strict-alignment memory when a halfword or word access does not sit on
 * its natural boundary. The CPU turns it into a MemoryAccessException.
 */
export class AddressError extends Error {
  readonly address: number;
  readonly access: AccessType;
  readonly size: AlignedAccessSize;

  constructor(address: number, size: AlignedAccessSize, access: AccessType) {
    const normalizedAddress = address >>> 0;
    super(`Unaligned ${size === 2 ? "halfword" : "word"} address: 0x${normalizedAddress.toString(16)}`);
    this.address = normalizedAddress;
    this.access = access;
    this.size = size;
    this.name = "AddressError";
  }
}
