export type SymbolLookup = Map<string, number> | Record<string, number>;

/** Address-to-name lookup used only to annotate disassembly. */
export interface SymbolTable {
  lookup(address: number): string | null;
}

export class MapSymbolTable implements SymbolTable {
  private readonly names = new Map<number, string>();

  constructor(symbols: SymbolLookup = {}) {
    const entries = symbols instanceof Map ? [...symbols.entries()] : Object.entries(symbols);
    for (const [name, address] of entries) {
      const normalized = address >>> 0;
      // When several names share an address the first one wins.
      if (!this.names.has(normalized)) {
        this.names.set(normalized, name);
      }
    }
  }

  lookup(address: number): string | null {
    return this.names.get(address >>> 0) ?? null;
  }

  get size(): number {
    return this.names.size;
  }
}
