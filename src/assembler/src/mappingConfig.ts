/**
 * Mapping configuration parser
 *
 * Each line maps an instruction pattern to the micro-program address of
 * its micro-routine, in hex:
 *
 *   # comment
 *   ADD A, X : 4C
 *   HLT      : 03
 *
 * In a pattern A or B stands for a direct address operand and X for an
 * immediate one.
 */

import {
  encodeInstructionCode,
  OPERAND_DIRECT,
  OPERAND_IMMEDIATE,
  OPERAND_NONE,
  type OperandType,
} from './instructionCode.js';
import { parseHexDigit } from './lineParser.js';
import type { MappingTable } from './mappingTable.js';
import { AssemblyFailure, type AssemblerError } from './types.js';

export interface MappingEntry {
  line: number;
  pattern: string;
  code: number;
  target: number;
}

export class MappingConfigError extends Error {
  readonly details: AssemblerError;

  constructor(details: AssemblerError) {
    super(details.message);
    this.name = 'MappingConfigError';
    this.details = details;
  }
}

function parsePattern(pattern: string): number {
  let i = 0;
  let mnemonic = '';
  while (i < pattern.length && pattern[i] !== ' ' && pattern[i] !== '\t') {
    mnemonic += pattern[i].toUpperCase();
    i++;
  }

  const types: [OperandType, OperandType] = [OPERAND_NONE, OPERAND_NONE];
  let index: 0 | 1 = 0;

  for (; i < pattern.length; i++) {
    const char = pattern[i].toUpperCase();
    if (char === ' ' || char === '\t') continue;

    if (char === ',') {
      if (index === 1) {
        throw new AssemblyFailure('leading-comma', 'Leading comma in instruction');
      }
      index = 1;
      continue;
    }

    if (char === 'A' || char === 'B') {
      types[index] = OPERAND_DIRECT;
    } else if (char === 'X') {
      types[index] = OPERAND_IMMEDIATE;
    } else {
      throw new AssemblyFailure('invalid-operand-type', `Invalid operand type specified: '${pattern[i]}'`);
    }
  }

  return encodeInstructionCode(mnemonic, types[0], types[1]);
}

function parseTarget(text: string): number {
  if (text.length === 0) {
    throw new AssemblyFailure('invalid-target-address', 'Missing MPC address');
  }

  let target = 0;
  for (const char of text) {
    const nibble = parseHexDigit(char);
    if (nibble === null) {
      throw new AssemblyFailure(
        'invalid-target-address',
        `Invalid MPC address '${char}', address must be in hexadecimal`
      );
    }
    target = ((target << 4) | nibble) & 0xFF;
  }
  return target;
}

/**
 * Parse mapping configuration text.
 *
 * @throws MappingConfigError on the first malformed line
 */
export function parseMappingConfig(text: string): MappingEntry[] {
  const entries: MappingEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    const lineNumber = i + 1;
    if (line.length === 0 || line.startsWith('#')) continue;

    try {
      const colonIndex = line.lastIndexOf(':');
      if (colonIndex < 0) {
        throw new AssemblyFailure('invalid-mapping-format', 'Invalid format');
      }

      const pattern = line.substring(0, colonIndex).trim();
      const code = parsePattern(pattern);
      const target = parseTarget(line.substring(colonIndex + 1).trim());
      entries.push({ line: lineNumber, pattern, code, target });
    } catch (error) {
      if (error instanceof AssemblyFailure) {
        throw new MappingConfigError({
          line: lineNumber,
          message: `${error.message}: "${line}" [line ${lineNumber}]`,
          severity: 'error',
          kind: error.kind,
          source: line,
        });
      }
      throw error;
    }
  }

  return entries;
}

/**
 * Add the entries of a mapping configuration to a table, replacing
 * existing mappings for the same instruction code
 *
 * @returns the number of entries applied
 */
export function applyMappingConfig(table: MappingTable, text: string): number {
  const entries = parseMappingConfig(text);
  for (const entry of entries) {
    table.set(entry.code, entry.target);
  }
  return entries.length;
}
