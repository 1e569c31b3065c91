export const USAGE = 'Program Usage: mcasm code.asm [out.b]';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'assemble'; sourcePath: string; outputPath: string }
  | { kind: 'invalid'; message: string };

/**
 * Interpret the command line (without the node and script entries)
 */
export function parseArguments(args: string[], defaultOutput: string): CliCommand {
  if (args.length === 0) {
    return { kind: 'invalid', message: `Invalid Input. Assembly File Required:\n  ${USAGE}` };
  }

  if (args.length > 2) {
    return { kind: 'invalid', message: `Invalid Input. Too Many Arguments:\n  ${USAGE}` };
  }

  if (args.length === 1 && args[0] === 'help') {
    return { kind: 'help' };
  }

  return {
    kind: 'assemble',
    sourcePath: args[0],
    outputPath: args[1] ?? defaultOutput,
  };
}
