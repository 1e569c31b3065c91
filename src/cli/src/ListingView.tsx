/**
 * Listing View Component
 * Shows every emitted byte next to its address and source text
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ListingEntry } from '../../assembler/src/index.js';

interface ListingViewProps {
  entries: ListingEntry[];
}

const COLUMN_WIDTH = 8;

export function formatByte(value: number): string {
  return '0x' + value.toString(16).padStart(2, '0').toUpperCase();
}

export function formatListingRow(entry: ListingEntry): string {
  const row = formatByte(entry.address).padEnd(COLUMN_WIDTH) +
    formatByte(entry.value).padEnd(COLUMN_WIDTH) +
    (entry.text ?? '');
  return row.trimEnd();
}

export const ListingView: React.FC<ListingViewProps> = ({ entries }) => {
  const rows: JSX.Element[] = entries.map((entry) => (
    <Text key={entry.address}>{formatListingRow(entry)}</Text>
  ));

  return (
    <Box flexDirection="column">
      <Text dimColor>{'Addr.'.padEnd(COLUMN_WIDTH) + 'Byte'.padEnd(COLUMN_WIDTH) + 'Instr.'}</Text>
      {rows}
    </Box>
  );
};
