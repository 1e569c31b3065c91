/**
 * Branch and jump operand resolution
 *
 * A jump operand is read two ways at once: as a label name and as a hex
 * address. A known label always wins.
 *
 * JMP and JSR take the label's absolute address. The B* family (BR, BRZ,
 * BRN) takes a signed displacement that the ALU adds to the PC while the
 * PC points at the operand byte, hence the +1 for forward branches.
 * Adding a negative two's-complement displacement also lets the PSW
 * carry-out feed back into the ALU carry-in, which costs one more byte
 * on backward branches: CARRY_ADJUST is 2 when carry-out is wired to
 * carry-in and 1 when it is not.
 */

import { parseHexDigit } from './lineParser.js';
import type { LabelTable } from './symbols.js';
import { AssemblyFailure } from './types.js';

export const DEFAULT_CARRY_ADJUST = 2;

const MAX_LITERAL_DIGITS = 2;

export type BranchTarget =
  | { kind: 'label'; name: string; address: number }
  | { kind: 'literal'; value: number }
  | { kind: 'invalid'; text: string };

export function isRelativeBranch(mnemonic: string): boolean {
  return mnemonic.startsWith('B');
}

function toSigned8(value: number): number {
  const byte = value & 0xFF;
  return byte >= 0x80 ? byte - 0x100 : byte;
}

/**
 * Decide whether the operand text names a label or a literal address
 */
export function interpretBranchTarget(text: string, labels: LabelTable): BranchTarget {
  const name = text.trim();

  const address = labels.resolve(name);
  if (address !== undefined) {
    return { kind: 'label', name, address };
  }

  if (name.length === 0 || name.length > MAX_LITERAL_DIGITS) {
    return { kind: 'invalid', text: name };
  }

  let value = 0;
  for (const char of name) {
    const nibble = parseHexDigit(char);
    if (nibble === null) {
      return { kind: 'invalid', text: name };
    }
    value = (value << 4) | nibble;
  }
  return { kind: 'literal', value };
}

/**
 * Signed displacement from the branch at currentAddress to targetAddress,
 * as a byte
 */
export function relativeOffset(
  targetAddress: number,
  currentAddress: number,
  carryAdjust: number = DEFAULT_CARRY_ADJUST
): number {
  const target = toSigned8(targetAddress);
  const offset = targetAddress < currentAddress
    ? target - (currentAddress + carryAdjust)
    : target - (currentAddress + 1);
  return offset & 0xFF;
}

/**
 * Compute the operand byte of a jump/branch.
 *
 * @param currentAddress - address of the instruction's opcode byte
 */
export function resolveBranchOperand(
  mnemonic: string,
  target: BranchTarget,
  currentAddress: number,
  carryAdjust: number = DEFAULT_CARRY_ADJUST
): number {
  switch (target.kind) {
    case 'literal':
      return target.value & 0xFF;
    case 'label':
      if (isRelativeBranch(mnemonic)) {
        return relativeOffset(target.address, currentAddress, carryAdjust);
      }
      return target.address & 0xFF;
    case 'invalid':
      throw new AssemblyFailure(
        'invalid-branch-target',
        `Operand "${target.text}" is neither a valid label or immediate address`
      );
  }
}
