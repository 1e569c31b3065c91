import { existsSync, readFileSync } from 'fs';
import {
  applyMappingConfig,
  assemble,
  MappingConfigError,
  MappingTable,
  type AssembledArtifacts,
} from '../../assembler/src/index.js';
import { FileSink } from './fileSink.js';

export interface AssemblyRequest {
  sourcePath: string;
  outputPath: string;
  mappingFile: string;
  carryAdjust: number;
}

export interface AssemblyReport {
  request: AssemblyRequest;
  success: boolean;
  // Entries read from the mapping file, null when there is none
  mappingEntries: number | null;
  artifacts?: AssembledArtifacts;
  errors: string[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load the built-in mappings, then the mapping file if it exists
 */
function loadMappingTable(mappingFile: string): { table: MappingTable; entries: number | null } {
  const table = MappingTable.withDefaults();
  if (!existsSync(mappingFile)) {
    return { table, entries: null };
  }
  const entries = applyMappingConfig(table, readFileSync(mappingFile, 'utf8'));
  return { table, entries };
}

/**
 * Assemble a source file into a binary image.
 *
 * Bytes go to the output file as they are produced; if assembly fails the
 * file is removed again so no partial image is left behind.
 */
export function assembleFile(request: AssemblyRequest): AssemblyReport {
  const failed = (message: string, mappingEntries: number | null = null): AssemblyReport => ({
    request,
    success: false,
    mappingEntries,
    errors: [message],
  });

  let source: string;
  try {
    source = readFileSync(request.sourcePath, 'utf8');
  } catch (error) {
    return failed(`Error opening ${request.sourcePath}: ${describeError(error)}`);
  }

  let mapping: { table: MappingTable; entries: number | null };
  try {
    mapping = loadMappingTable(request.mappingFile);
  } catch (error) {
    if (error instanceof MappingConfigError) {
      return failed(`${request.mappingFile}: ${error.message}`);
    }
    return failed(`Error reading ${request.mappingFile}: ${describeError(error)}`);
  }

  let sink: FileSink;
  try {
    sink = new FileSink(request.outputPath);
  } catch (error) {
    return failed(`Error creating ${request.outputPath}: ${describeError(error)}`, mapping.entries);
  }

  let committed = false;
  try {
    const artifacts = assemble(source, {
      mappingTable: mapping.table,
      carryAdjust: request.carryAdjust,
      sink,
    });

    if (artifacts.errors.length === 0) {
      sink.commit();
      committed = true;
    }

    return {
      request,
      success: committed,
      mappingEntries: mapping.entries,
      artifacts,
      errors: artifacts.errors.map(e => e.message),
    };
  } finally {
    if (!committed) {
      sink.discard();
    }
  }
}
