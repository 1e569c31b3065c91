/**
 * Report View Component
 * Summarises one assembler run: mapping source, listing and outcome
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { AssemblyReport } from './assembleFile.js';
import { Banner } from './Banner.js';
import { formatByte, ListingView } from './ListingView.js';

interface ReportViewProps {
  report: AssemblyReport;
}

export const ReportView: React.FC<ReportViewProps> = ({ report }) => {
  const { request, artifacts } = report;

  return (
    <Box flexDirection="column">
      <Banner />

      {report.mappingEntries !== null && (
        <Text>Loaded {report.mappingEntries} mappings from {request.mappingFile}</Text>
      )}

      {artifacts && artifacts.baseAddress !== 0 && (
        <Text>Address Offset = {formatByte(artifacts.baseAddress)}</Text>
      )}

      {artifacts && artifacts.listing.length > 0 && <ListingView entries={artifacts.listing} />}

      {report.success && artifacts ? (
        <Text color="green">
          ✅ {request.sourcePath} successfully assembled to {request.outputPath} in {artifacts.byteCount} bytes.
        </Text>
      ) : (
        report.errors.map((message, index) => (
          <Text key={index} color="red">❌ {message}</Text>
        ))
      )}
    </Box>
  );
};
