/**
 * Instruction codes
 *
 * Every instruction is identified by a 32-bit code built from its
 * mnemonic and the types of its operands:
 *
 *   31        24 23       16 15        8 7     4 3     0
 *   | mnem[0]   | mnem[1]   | mnem[2]   | op1   | op2   |
 *
 * e.g. ADD $04, 5 -> 'A' 'D' 'D' (direct, immediate) -> 0x41444421
 *
 * Operand values never take part in the code, only their types.
 */

import { AssemblyFailure } from './types.js';

// Operand type constants
export const OPERAND_NONE = 0x0;
export const OPERAND_IMMEDIATE = 0x1;
export const OPERAND_DIRECT = 0x2;

export type OperandType =
  | typeof OPERAND_NONE
  | typeof OPERAND_IMMEDIATE
  | typeof OPERAND_DIRECT;

export const MAX_MNEMONIC_LENGTH = 3;

export function encodeInstructionCode(
  mnemonic: string,
  operand1: OperandType,
  operand2: OperandType
): number {
  if (mnemonic.length === 0 || mnemonic.length > MAX_MNEMONIC_LENGTH) {
    throw new AssemblyFailure('invalid-mnemonic', `Invalid mnemonic: "${mnemonic}"`);
  }

  let code = 0;
  for (let i = 0; i < mnemonic.length; i++) {
    code |= (mnemonic.charCodeAt(i) & 0xFF) << (8 * (3 - i));
  }
  code |= (operand1 << 4) | (operand2 & 0x0F);

  // Keep the result unsigned once the top byte is set
  return code >>> 0;
}

export function formatInstructionCode(code: number): string {
  return '0x' + code.toString(16).toUpperCase().padStart(8, '0');
}
