/**
 * Shared types for the microcode assembler
 */

export type AssemblyErrorKind =
  | 'invalid-directive-value'
  | 'unknown-directive'
  | 'invalid-directive-syntax'
  | 'leading-comma'
  | 'invalid-operand-character'
  | 'invalid-label-syntax'
  | 'invalid-mnemonic'
  | 'invalid-branch-target'
  | 'unencodable-instruction'
  | 'invalid-mapping-format'
  | 'invalid-operand-type'
  | 'invalid-target-address';

export interface AssemblerError {
  line: number;
  message: string;
  severity: 'error';
  kind: AssemblyErrorKind;
  source: string;
}

/**
 * Thrown by the line-level components. The driver catches it once and
 * turns it into an AssemblerError for the caller.
 */
export class AssemblyFailure extends Error {
  readonly kind: AssemblyErrorKind;

  constructor(kind: AssemblyErrorKind, message: string) {
    super(message);
    this.name = 'AssemblyFailure';
    this.kind = kind;
  }
}

export interface SourceMapEntry {
  address: number;
  line: number;
}

export interface ListingEntry {
  address: number;
  value: number;
  line: number;
  kind: 'opcode' | 'operand';
  // Present on opcode rows only
  text?: string;
}

export type SymbolTable = Record<string, number>;

export interface AssembledArtifacts {
  output: Uint8Array;
  listing: ListingEntry[];
  sourceMap: SourceMapEntry[];
  symbolTable: SymbolTable;
  baseAddress: number;
  byteCount: number;
  errors: AssemblerError[];
}

/**
 * Receives bytes in program-address order as pass 2 emits them.
 */
export interface ByteSink {
  write(value: number): void;
}
