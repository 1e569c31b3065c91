/**
 * Microcode Assembler
 *
 * A two-pass assembler that translates an instruction listing into the
 * byte image loaded into the RAM of a microcoded processor.
 *
 * Pass 1 walks the source to record label addresses and apply
 * directives. Pass 2 walks it again from the start, resolves every
 * operand and emits, per instruction, the micro-program address of its
 * opcode followed by one byte per operand.
 */

import {
  interpretBranchTarget,
  resolveBranchOperand,
  DEFAULT_CARRY_ADJUST,
} from './branchResolver.js';
import {
  encodeInstructionCode,
  formatInstructionCode,
  OPERAND_NONE,
} from './instructionCode.js';
import { classifyLine, parseDirective, type InstructionLine } from './lineParser.js';
import { MappingTable } from './mappingTable.js';
import { BASE_ADDRESS_DIRECTIVE, DirectiveStore, LabelTable } from './symbols.js';
import {
  AssemblyFailure,
  type AssembledArtifacts,
  type AssemblerError,
  type ByteSink,
  type ListingEntry,
  type SourceMapEntry,
} from './types.js';

export interface AssemblerOptions {
  /** Defaults to the built-in mappings */
  mappingTable?: MappingTable;
  carryAdjust?: number;
  /** Receives each byte as it is emitted in pass 2 */
  sink?: ByteSink;
}

// State shared by both passes of a single run
interface AssemblyContext {
  mappingTable: MappingTable;
  carryAdjust: number;
  directives: DirectiveStore;
  labels: LabelTable;
  // Line currently being scanned, for diagnostics
  cursor: { line: number; text: string };
}

interface Emitter {
  emit(address: number, value: number, line: number, kind: ListingEntry['kind'], text?: string): void;
}

function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

/**
 * Look up the micro-program address for an instruction
 */
function lookupTarget(instruction: InstructionLine, ctx: AssemblyContext): number {
  const [first, second] = instruction.operands;
  const code = encodeInstructionCode(
    instruction.mnemonic,
    first?.type ?? OPERAND_NONE,
    second?.type ?? OPERAND_NONE
  );

  const target = ctx.mappingTable.lookup(code);
  if (target === undefined) {
    throw new AssemblyFailure(
      'unencodable-instruction',
      `Invalid instruction, code ${formatInstructionCode(code)} cannot be mapped`
    );
  }
  return target;
}

/**
 * Pass 1: apply directives and record label addresses
 */
function pass1(lines: string[], ctx: AssemblyContext): void {
  let address = 0;

  for (let i = 0; i < lines.length; i++) {
    ctx.cursor = { line: i + 1, text: lines[i].trim() };
    const parsed = classifyLine(lines[i], i + 1);

    switch (parsed.kind) {
      case 'directive': {
        const directive = parseDirective(parsed.text, ctx.directives);
        ctx.directives.set(directive.name, directive.value);
        if (directive.name === BASE_ADDRESS_DIRECTIVE) {
          address += directive.value;
        }
        break;
      }
      case 'label':
        ctx.labels.define(parsed.name, address);
        break;
      case 'instruction':
        lookupTarget(parsed, ctx);
        address += 1 + parsed.operands.length;
        break;
      default:
        break;
    }
  }
}

/**
 * Pass 2: resolve operands and emit bytes
 *
 * @returns the program address after the last emitted byte
 */
function pass2(
  lines: string[],
  ctx: AssemblyContext,
  emitter: Emitter,
  sourceMap: SourceMapEntry[]
): number {
  let address = ctx.directives.baseAddress;

  for (let i = 0; i < lines.length; i++) {
    ctx.cursor = { line: i + 1, text: lines[i].trim() };
    const parsed = classifyLine(lines[i], i + 1);

    // Directives were applied in pass 1 and labels carry no bytes
    if (parsed.kind !== 'instruction') {
      continue;
    }

    const operandBytes = parsed.operands.map(op => op.value);
    if (parsed.branchTarget !== undefined) {
      const target = interpretBranchTarget(parsed.branchTarget, ctx.labels);
      operandBytes[0] = resolveBranchOperand(parsed.mnemonic, target, address, ctx.carryAdjust);
    }

    const opcode = lookupTarget(parsed, ctx);

    sourceMap.push({ address, line: parsed.line });
    emitter.emit(address, opcode, parsed.line, 'opcode', parsed.text);
    address++;

    for (const value of operandBytes) {
      emitter.emit(address, value, parsed.line, 'operand');
      address++;
    }
  }

  return address;
}

/**
 * Main assembler function
 *
 * The first error stops the run. It is reported in `errors` and the
 * returned output is empty.
 */
export function assemble(source: string, options: AssemblerOptions = {}): AssembledArtifacts {
  const ctx: AssemblyContext = {
    mappingTable: options.mappingTable ?? MappingTable.withDefaults(),
    carryAdjust: options.carryAdjust ?? DEFAULT_CARRY_ADJUST,
    directives: new DirectiveStore(),
    labels: new LabelTable(),
    cursor: { line: 0, text: '' },
  };

  const lines = splitLines(source);
  const bytes: number[] = [];
  const listing: ListingEntry[] = [];
  const sourceMap: SourceMapEntry[] = [];
  const errors: AssemblerError[] = [];

  const emitter: Emitter = {
    emit(address, value, line, kind, text) {
      bytes.push(value);
      listing.push(text === undefined ? { address, value, line, kind } : { address, value, line, kind, text });
      options.sink?.write(value);
    },
  };

  let endAddress = 0;
  try {
    pass1(lines, ctx);
    endAddress = pass2(lines, ctx, emitter, sourceMap);
  } catch (error) {
    if (!(error instanceof AssemblyFailure)) {
      throw error;
    }
    errors.push({
      line: ctx.cursor.line,
      message: `${error.message}: "${ctx.cursor.text}" [line ${ctx.cursor.line}]`,
      severity: 'error',
      kind: error.kind,
      source: ctx.cursor.text,
    });
  }

  const failed = errors.length > 0;
  const baseAddress = ctx.directives.baseAddress;

  return {
    output: failed ? new Uint8Array(0) : new Uint8Array(bytes),
    listing,
    sourceMap,
    symbolTable: ctx.labels.toRecord(),
    baseAddress,
    byteCount: failed ? 0 : endAddress - baseAddress,
    errors,
  };
}
