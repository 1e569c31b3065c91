/**
 * Line classification and operand parsing
 *
 * Source syntax, one statement per line:
 *
 *   # comment
 *   @base_addr=1F         directive
 *   loop1:                label
 *   MOV $04, 3            instruction ($ = direct address, bare = immediate)
 *   BRZ loop1             jump/branch to a label or a hex address
 *
 * All numbers are hexadecimal. Mnemonics are case-insensitive, labels are not.
 */

import {
  OPERAND_DIRECT,
  OPERAND_IMMEDIATE,
  OPERAND_NONE,
  type OperandType,
} from './instructionCode.js';
import type { DirectiveStore } from './symbols.js';
import { AssemblyFailure } from './types.js';

// Mnemonics whose single operand may name a label
export const JUMP_MNEMONICS: ReadonlySet<string> = new Set(['JMP', 'JSR', 'BR', 'BRZ', 'BRN']);

const LABEL_PATTERN = /^([A-Za-z_][A-Za-z0-9_.]*)\s*:$/;
const LABEL_PREFIX_PATTERN = /^([A-Za-z_][A-Za-z0-9_.]*)\s*:/;

export interface Operand {
  type: OperandType;
  value: number;
}

interface LineInfo {
  line: number;
  text: string;
}

export interface BlankLine extends LineInfo {
  kind: 'blank';
}

export interface CommentLine extends LineInfo {
  kind: 'comment';
}

export interface DirectiveLine extends LineInfo {
  kind: 'directive';
}

export interface LabelLine extends LineInfo {
  kind: 'label';
  name: string;
}

export interface InstructionLine extends LineInfo {
  kind: 'instruction';
  mnemonic: string;
  operands: Operand[];
  // Raw operand text of a jump/branch, resolved in pass 2
  branchTarget?: string;
}

export type SourceLine = BlankLine | CommentLine | DirectiveLine | LabelLine | InstructionLine;

export interface Directive {
  name: string;
  value: number;
}

/**
 * Convert a single hex digit to its value
 */
export function parseHexDigit(char: string): number | null {
  const code = char.toUpperCase().charCodeAt(0);
  if (code >= 0x30 && code <= 0x39) return code - 0x30; // 0-9
  if (code >= 0x41 && code <= 0x46) return code - 0x37; // A-F
  return null;
}

/**
 * Remove an inline comment
 */
export function stripComment(text: string): string {
  const commentIndex = text.indexOf('#');
  return commentIndex >= 0 ? text.substring(0, commentIndex) : text;
}

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t';
}

/**
 * Classify one source line. Instruction lines are parsed completely;
 * directive lines are left for parseDirective so that they are only
 * interpreted once.
 */
export function classifyLine(raw: string, lineNumber: number): SourceLine {
  const text = raw.trim();

  if (text.length === 0) {
    return { kind: 'blank', line: lineNumber, text };
  }

  if (text.startsWith('#')) {
    return { kind: 'comment', line: lineNumber, text };
  }

  if (text.startsWith('@')) {
    return { kind: 'directive', line: lineNumber, text };
  }

  const code = stripComment(text).trim();
  const labelMatch = code.match(LABEL_PATTERN);
  if (labelMatch) {
    return { kind: 'label', line: lineNumber, text, name: labelMatch[1] };
  }

  const inlineLabel = code.match(LABEL_PREFIX_PATTERN);
  if (inlineLabel) {
    throw new AssemblyFailure(
      'invalid-label-syntax',
      `Label "${inlineLabel[1]}" must be on a line of its own`
    );
  }

  return parseInstruction(text, lineNumber);
}

function parseInstruction(text: string, lineNumber: number): InstructionLine {
  let i = 0;
  let mnemonic = '';
  while (i < text.length && !isWhitespace(text[i]) && text[i] !== '#') {
    mnemonic += text[i].toUpperCase();
    i++;
  }

  const rest = text.substring(i);

  // Jumps always carry one immediate operand. Whether it is a label or an
  // address is only known once every label has been seen.
  if (JUMP_MNEMONICS.has(mnemonic)) {
    return {
      kind: 'instruction',
      line: lineNumber,
      text,
      mnemonic,
      operands: [{ type: OPERAND_IMMEDIATE, value: 0 }],
      branchTarget: stripComment(rest).trim(),
    };
  }

  return {
    kind: 'instruction',
    line: lineNumber,
    text,
    mnemonic,
    operands: parseOperands(rest),
  };
}

/**
 * Parse up to two comma separated operands.
 *
 * Values accumulate one nibble at a time into a single byte, so digits
 * beyond the second wrap around rather than being rejected.
 */
export function parseOperands(text: string): Operand[] {
  const types: [OperandType, OperandType] = [OPERAND_NONE, OPERAND_NONE];
  const values: [number, number] = [0, 0];
  const digits: [number, number] = [0, 0];
  const started: [boolean, boolean] = [false, false];
  let index: 0 | 1 = 0;

  let i = 0;
  while (i < text.length) {
    const char = text[i].toUpperCase();

    if (char === '#') break;

    if (isWhitespace(char)) {
      i++;
      continue;
    }

    if (char === ',') {
      if (index === 1 || !started[0]) {
        throw new AssemblyFailure('leading-comma', 'Leading comma in instruction');
      }
      index = 1;
      i++;
      continue;
    }

    if (char === '$') {
      types[index] = OPERAND_DIRECT;
      started[index] = true;
      i++;
      continue;
    }

    // Optional 0x prefix
    if (char === '0' && digits[index] === 0 && text[i + 1]?.toUpperCase() === 'X') {
      started[index] = true;
      i += 2;
      continue;
    }

    const nibble = parseHexDigit(char);
    if (nibble === null) {
      throw new AssemblyFailure('invalid-operand-character', `Invalid operand character '${text[i]}'`);
    }

    values[index] = ((values[index] << 4) | nibble) & 0xFF;
    digits[index]++;
    started[index] = true;
    if (types[index] === OPERAND_NONE) {
      types[index] = OPERAND_IMMEDIATE;
    }
    i++;
  }

  const count = types[1] !== OPERAND_NONE ? 2 : types[0] !== OPERAND_NONE ? 1 : 0;
  const operands: Operand[] = [];
  for (let n = 0; n < count; n++) {
    operands.push({ type: types[n], value: values[n] });
  }
  return operands;
}

/**
 * Parse a directive line of the form "@name=value"
 */
export function parseDirective(text: string, directives: DirectiveStore): Directive {
  const equalsIndex = text.lastIndexOf('=');
  if (!text.startsWith('@') || equalsIndex < 0) {
    throw new AssemblyFailure('invalid-directive-syntax', 'Invalid assembler directive assignment');
  }

  const name = text.substring(1, equalsIndex).trim();
  const valueText = text.substring(equalsIndex + 1).trim();

  if (!directives.has(name)) {
    throw new AssemblyFailure('unknown-directive', `Invalid assembler directive '${name}'`);
  }

  let value = 0;
  let digitCount = 0;
  for (const char of valueText) {
    if (char === '#') break;
    if (isWhitespace(char)) continue;

    const nibble = parseHexDigit(char);
    if (nibble === null) {
      throw new AssemblyFailure('invalid-directive-value', `Invalid hex value "${valueText}"`);
    }
    value = ((value << 4) | nibble) & 0xFF;
    digitCount++;
  }

  if (digitCount === 0 || digitCount > 2) {
    throw new AssemblyFailure('invalid-directive-value', `Invalid hex value "${valueText}"`);
  }

  return { name, value };
}
