import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileSink } from './fileSink.js';

describe('FileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mcasm-sink-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write bytes to the file on commit', () => {
    const path = join(dir, 'out.b');
    const sink = new FileSink(path);
    sink.write(0x0B);
    sink.write(0x104);
    sink.commit();

    expect(sink.bytesWritten).toBe(2);
    expect(Array.from(readFileSync(path))).toEqual([0x0B, 0x04]);
  });

  it('should remove the file on discard', () => {
    const path = join(dir, 'out.b');
    const sink = new FileSink(path);
    sink.write(0x03);
    sink.discard();

    expect(existsSync(path)).toBe(false);
  });

  it('should refuse writes after closing', () => {
    const path = join(dir, 'out.b');
    const sink = new FileSink(path);
    sink.commit();

    expect(() => sink.write(0x03)).toThrow(`Output file ${path} is already closed`);
  });
});
