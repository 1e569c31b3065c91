import { describe, it, expect } from 'vitest';
import {
  encodeInstructionCode,
  formatInstructionCode,
  OPERAND_DIRECT,
  OPERAND_IMMEDIATE,
  OPERAND_NONE,
} from './instructionCode.js';
import { AssemblyFailure } from './types.js';

describe('Instruction codes', () => {
  describe('encodeInstructionCode', () => {
    it('should pack a three letter mnemonic with two operand types', () => {
      expect(encodeInstructionCode('ADD', OPERAND_DIRECT, OPERAND_IMMEDIATE)).toBe(0x41444421);
      expect(encodeInstructionCode('MOV', OPERAND_DIRECT, OPERAND_IMMEDIATE)).toBe(0x4D4F5621);
    });

    it('should leave the operand byte empty when there are no operands', () => {
      expect(encodeInstructionCode('HLT', OPERAND_NONE, OPERAND_NONE)).toBe(0x484C5400);
    });

    it('should zero unused mnemonic characters', () => {
      expect(encodeInstructionCode('BR', OPERAND_IMMEDIATE, OPERAND_NONE)).toBe(0x42520010);
      expect(encodeInstructionCode('OR', OPERAND_DIRECT, OPERAND_DIRECT)).toBe(0x4F520022);
    });

    it('should ignore operand values and only use their types', () => {
      const a = encodeInstructionCode('CMP', OPERAND_IMMEDIATE, OPERAND_NONE);
      const b = encodeInstructionCode('CMP', OPERAND_DIRECT, OPERAND_NONE);
      expect(a).toBe(0x434D5010);
      expect(b).toBe(0x434D5020);
    });

    it('should reject mnemonics longer than three characters', () => {
      expect(() => encodeInstructionCode('HALT', OPERAND_NONE, OPERAND_NONE)).toThrow(AssemblyFailure);
      expect(() => encodeInstructionCode('HALT', OPERAND_NONE, OPERAND_NONE)).toThrow('Invalid mnemonic: "HALT"');
    });

    it('should reject an empty mnemonic', () => {
      expect(() => encodeInstructionCode('', OPERAND_NONE, OPERAND_NONE)).toThrow('Invalid mnemonic');
    });
  });

  describe('formatInstructionCode', () => {
    it('should render eight upper-case hex digits', () => {
      expect(formatInstructionCode(0x41444421)).toBe('0x41444421');
      expect(formatInstructionCode(0x10)).toBe('0x00000010');
    });
  });
});
