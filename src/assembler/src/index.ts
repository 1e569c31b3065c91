export { assemble } from './assembler.js';
export type { AssemblerOptions } from './assembler.js';
export {
  DEFAULT_CARRY_ADJUST,
  interpretBranchTarget,
  isRelativeBranch,
  relativeOffset,
  resolveBranchOperand,
} from './branchResolver.js';
export type { BranchTarget } from './branchResolver.js';
export { MemorySink } from './byteSink.js';
export {
  encodeInstructionCode,
  formatInstructionCode,
  OPERAND_DIRECT,
  OPERAND_IMMEDIATE,
  OPERAND_NONE,
} from './instructionCode.js';
export type { OperandType } from './instructionCode.js';
export { classifyLine, JUMP_MNEMONICS, parseDirective, parseOperands } from './lineParser.js';
export type { Operand, SourceLine } from './lineParser.js';
export { applyMappingConfig, MappingConfigError, parseMappingConfig } from './mappingConfig.js';
export type { MappingEntry } from './mappingConfig.js';
export { MappingTable } from './mappingTable.js';
export { BASE_ADDRESS_DIRECTIVE, DirectiveStore, LabelTable } from './symbols.js';
export { AssemblyFailure } from './types.js';
export type {
  AssembledArtifacts,
  AssemblerError,
  AssemblyErrorKind,
  ByteSink,
  ListingEntry,
  SourceMapEntry,
  SymbolTable,
} from './types.js';
