/**
 * File-level assembly tests
 *
 * Runs the assembler against real files in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { assembleFile, type AssemblyRequest } from './assembleFile.js';

const samplesDir = join(dirname(fileURLToPath(import.meta.url)), '../../../samples');

describe('assembleFile', () => {
  let dir: string;

  const request = (overrides: Partial<AssemblyRequest> = {}): AssemblyRequest => ({
    sourcePath: join(dir, 'program.asm'),
    outputPath: join(dir, 'ram.b'),
    mappingFile: join(dir, 'mapping.conf'),
    carryAdjust: 2,
    ...overrides,
  });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'mcasm-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write the image using the built-in mappings', () => {
    writeFileSync(join(dir, 'program.asm'), 'MOV $04, 3\nADD $04, 5\nHLT\n');

    const report = assembleFile(request());

    expect(report.success).toBe(true);
    expect(report.errors).toEqual([]);
    expect(report.mappingEntries).toBeNull();
    expect(report.artifacts?.byteCount).toBe(7);
    expect(Array.from(readFileSync(join(dir, 'ram.b')))).toEqual([
      0x04, 0x04, 0x03, 0x0B, 0x04, 0x05, 0x03,
    ]);
  });

  it('should extend the mappings from the mapping file', () => {
    writeFileSync(join(dir, 'program.asm'), 'SUB $04, 5\n');
    writeFileSync(join(dir, 'mapping.conf'), '# extra instructions\nSUB A, X : 0C\nBRZ X : 81\n');

    const report = assembleFile(request());

    expect(report.success).toBe(true);
    expect(report.mappingEntries).toBe(2);
    expect(Array.from(readFileSync(join(dir, 'ram.b')))).toEqual([0x0C, 0x04, 0x05]);
  });

  it('should remove the output when assembly fails', () => {
    writeFileSync(join(dir, 'program.asm'), 'HLT\nSUB $04, 5\n');

    const report = assembleFile(request());

    expect(report.success).toBe(false);
    expect(report.errors).toEqual([
      'Invalid instruction, code 0x53554221 cannot be mapped: "SUB $04, 5" [line 2]',
    ]);
    expect(existsSync(join(dir, 'ram.b'))).toBe(false);
  });

  it('should report a missing source file', () => {
    const report = assembleFile(request({ sourcePath: join(dir, 'missing.asm') }));

    expect(report.success).toBe(false);
    expect(report.artifacts).toBeUndefined();
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].startsWith(`Error opening ${join(dir, 'missing.asm')}: `)).toBe(true);
    expect(existsSync(join(dir, 'ram.b'))).toBe(false);
  });

  it('should report a malformed mapping file', () => {
    writeFileSync(join(dir, 'program.asm'), 'HLT\n');
    writeFileSync(join(dir, 'mapping.conf'), 'SUB A, X 0C\n');

    const report = assembleFile(request());

    expect(report.success).toBe(false);
    expect(report.errors).toEqual([
      `${join(dir, 'mapping.conf')}: Invalid format: "SUB A, X 0C" [line 1]`,
    ]);
    expect(existsSync(join(dir, 'ram.b'))).toBe(false);
  });

  it('should honour the carry adjust for backward branches', () => {
    writeFileSync(join(dir, 'program.asm'), 'top:\nHLT\nBR top\n');

    assembleFile(request({ carryAdjust: 1 }));
    expect(Array.from(readFileSync(join(dir, 'ram.b')))).toEqual([0x03, 0x80, 0xFE]);

    assembleFile(request({ carryAdjust: 2 }));
    expect(Array.from(readFileSync(join(dir, 'ram.b')))).toEqual([0x03, 0x80, 0xFD]);
  });

  it('should assemble the bundled sample program', () => {
    const report = assembleFile(request({
      sourcePath: join(samplesDir, 'counter.asm'),
      mappingFile: join(samplesDir, 'mapping.conf'),
    }));

    expect(report.errors).toEqual([]);
    expect(report.mappingEntries).toBe(13);
    expect(report.artifacts?.baseAddress).toBe(0x10);
    expect(report.artifacts?.symbolTable).toEqual({ start: 0x10, tick: 0x16, done: 0x23 });
    expect(Array.from(readFileSync(join(dir, 'ram.b')))).toEqual([
      0x04, 0x40, 0x08,
      0x05, 0xC0, 0x40,
      0x0C, 0x40, 0x01,
      0x05, 0xC0, 0x40,
      0x19, 0x40, 0x00,
      0x81, 0x03,
      0x80, 0xF3,
      0x03,
    ]);
  });
});
