/**
 * Help Screen Component
 * Usage notes for the command line and the source syntax
 */

import React from 'react';
import { Box, Text } from 'ink';
import { Banner } from './Banner.js';

interface HelpSection {
  title: string;
  lines: string[];
}

const SECTIONS: HelpSection[] = [
  {
    title: 'General Usage',
    lines: [
      'Show this text:      mcasm help',
      'Assemble a program:  mcasm CODEFILE.asm [OUTPUTFILE.b]',
      '',
      'OUTPUTFILE.b receives the binary image and defaults to ASM_OUTPUT_FILE (ram.b).',
      'Mappings from mnemonic and operand pattern to MPC address are read from',
      'ASM_MAPPING_FILE (mapping.conf) when it exists, e.g. "ADD A, X : 4C".',
    ],
  },
  {
    title: 'Source Syntax',
    lines: [
      '# this is a comment',
      'MOV $04, 3      # (0x04) = 3',
      'ADD $04, 5      # (0x04) = (0x04) + 5',
      '',
      '* values are hexadecimal',
      "* '$' marks a memory reference, a bare value is immediate",
      '* mnemonics are case-insensitive',
    ],
  },
  {
    title: 'Jumps and Branches',
    lines: [
      'JMP X   jump to absolute address X',
      'JSR X   jump to subroutine at absolute address X',
      'BR X    relative branch by offset X',
      'BRZ X   relative branch by offset X when zero is set',
      'BRN X   relative branch by offset X when negative is set',
      '',
      'X is a hex value or a label. Labels are turned into an absolute address',
      "for jumps and a two's complement offset for branches (BR FC goes back 4).",
      'Set ASM_CARRY_ADJUST=1 when the PSW carry-out does not feed the ALU carry-in.',
    ],
  },
  {
    title: 'Directives',
    lines: [
      '@base_addr=1F   load the program at 0x1F (default 0x00)',
    ],
  },
];

export const HelpScreen: React.FC = () => (
  <Box flexDirection="column">
    <Box marginBottom={1}>
      <Banner />
    </Box>
    {SECTIONS.map((section) => (
      <Box key={section.title} flexDirection="column" marginBottom={1}>
        <Text bold color="cyan">{section.title}</Text>
        {section.lines.map((line, index) => (
          <Text key={index}>{line === '' ? ' ' : `  ${line}`}</Text>
        ))}
      </Box>
    ))}
  </Box>
);
