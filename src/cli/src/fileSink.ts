import { closeSync, openSync, rmSync, writeSync } from 'fs';
import type { ByteSink } from '../../assembler/src/index.js';

/**
 * Writes emitted bytes straight to the output image.
 *
 * The file exists from construction on. Callers must end with either
 * commit() or discard(); discard() removes whatever was written.
 */
export class FileSink implements ByteSink {
  readonly path: string;
  private fd: number | null;
  private written = 0;

  constructor(path: string) {
    this.path = path;
    this.fd = openSync(path, 'w');
  }

  write(value: number): void {
    if (this.fd === null) {
      throw new Error(`Output file ${this.path} is already closed`);
    }
    writeSync(this.fd, Uint8Array.of(value & 0xFF));
    this.written++;
  }

  get bytesWritten(): number {
    return this.written;
  }

  commit(): void {
    this.close();
  }

  discard(): void {
    this.close();
    rmSync(this.path, { force: true });
  }

  private close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}
