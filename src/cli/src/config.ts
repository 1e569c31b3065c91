import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export interface AssemblerConfig {
  mappingFile: string;
  outputFile: string;
  carryAdjust: number;
  validate(): void;
}

export function createConfig(env: NodeJS.ProcessEnv): AssemblerConfig {
  return {
    // Instruction mapping file, optional
    mappingFile: env.ASM_MAPPING_FILE || 'mapping.conf',

    // Output image written when no output path is given
    outputFile: env.ASM_OUTPUT_FILE || 'ram.b',

    // Use 1 when the PSW carry-out is not fed back into the ALU carry-in
    carryAdjust: parseInt(env.ASM_CARRY_ADJUST || '2', 10),

    // Validate required config
    validate(): void {
      if (this.carryAdjust !== 1 && this.carryAdjust !== 2) {
        throw new Error(
          `Unsupported ASM_CARRY_ADJUST: ${env.ASM_CARRY_ADJUST}\n` +
          'Supported values: 1, 2'
        );
      }
      if (!this.outputFile.trim()) {
        throw new Error('ASM_OUTPUT_FILE must not be blank.');
      }
    }
  };
}

export const config = createConfig(process.env);
