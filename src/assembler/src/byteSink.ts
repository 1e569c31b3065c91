import type { ByteSink } from './types.js';

/**
 * Collects emitted bytes in memory
 */
export class MemorySink implements ByteSink {
  private readonly data: number[] = [];

  write(value: number): void {
    this.data.push(value & 0xFF);
  }

  bytes(): Uint8Array {
    return new Uint8Array(this.data);
  }

  get length(): number {
    return this.data.length;
  }
}
