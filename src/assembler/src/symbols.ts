/**
 * Directive store and label table, both owned by a single assembly run
 */

import type { SymbolTable } from './types.js';

export const BASE_ADDRESS_DIRECTIVE = 'base_addr';

// Recognised directives and their default values
const DIRECTIVE_DEFAULTS: Record<string, number> = {
  [BASE_ADDRESS_DIRECTIVE]: 0x00,
};

export class DirectiveStore {
  private readonly values = new Map<string, number>(Object.entries(DIRECTIVE_DEFAULTS));

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): number {
    return this.values.get(name) ?? 0;
  }

  set(name: string, value: number): void {
    this.values.set(name, value & 0xFF);
  }

  get baseAddress(): number {
    return this.get(BASE_ADDRESS_DIRECTIVE);
  }
}

export class LabelTable {
  private readonly addresses = new Map<string, number>();

  /**
   * Record a label at the given program address. Redefining a label
   * replaces its previous address.
   */
  define(name: string, address: number): void {
    this.addresses.set(name, address);
  }

  resolve(name: string): number | undefined {
    return this.addresses.get(name);
  }

  get size(): number {
    return this.addresses.size;
  }

  toRecord(): SymbolTable {
    return Object.fromEntries(this.addresses);
  }
}
