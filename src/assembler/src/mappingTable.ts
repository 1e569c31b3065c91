/**
 * Mapping from instruction codes to micro-program addresses
 *
 * The byte written at an instruction's opcode position is the address
 * of its micro-routine in the micro store ROM. The table ships with a
 * small built-in set and is usually extended from a mapping file
 * before assembly starts (see mappingConfig.ts).
 */

// Built-in mappings, keyed by instruction code
const DEFAULT_MAPPINGS: ReadonlyArray<readonly [number, number]> = [
  [0x484C5400, 0x03], // HLT
  [0x4D4F5621, 0x04], // MOV A, X
  [0x41444421, 0x0B], // ADD A, X
  [0x4A4D5010, 0x50], // JMP X
  [0x42520010, 0x80], // BR X
];

export class MappingTable {
  private readonly targets = new Map<number, number>();

  static withDefaults(): MappingTable {
    const table = new MappingTable();
    for (const [code, target] of DEFAULT_MAPPINGS) {
      table.set(code, target);
    }
    return table;
  }

  lookup(code: number): number | undefined {
    return this.targets.get(code >>> 0);
  }

  has(code: number): boolean {
    return this.targets.has(code >>> 0);
  }

  set(code: number, target: number): void {
    this.targets.set(code >>> 0, target & 0xFF);
  }

  get size(): number {
    return this.targets.size;
  }
}
