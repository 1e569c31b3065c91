#!/usr/bin/env node
/**
 * mcasm entry point
 * Assembles one source file and renders the result in the terminal
 */

import React, { useEffect } from 'react';
import { render, useApp } from 'ink';
import { config } from './config.js';
import { parseArguments } from './arguments.js';
import { assembleFile } from './assembleFile.js';
import { HelpScreen } from './HelpScreen.js';
import { ReportView } from './ReportView.js';
import { UsageError } from './UsageError.js';

interface RenderOnceProps {
  children: React.ReactNode;
}

// Exits the ink app right after the first frame
const RenderOnce: React.FC<RenderOnceProps> = ({ children }) => {
  const { exit } = useApp();

  useEffect(() => {
    exit();
  }, [exit]);

  return <>{children}</>;
};

async function show(element: React.ReactElement): Promise<void> {
  const app = render(<RenderOnce>{element}</RenderOnce>);
  await app.waitUntilExit();
}

async function main(): Promise<number> {
  try {
    config.validate();

    const command = parseArguments(process.argv.slice(2), config.outputFile);

    if (command.kind === 'invalid') {
      await show(<UsageError message={command.message} />);
      return 1;
    }

    if (command.kind === 'help') {
      await show(<HelpScreen />);
      return 0;
    }

    const report = assembleFile({
      sourcePath: command.sourcePath,
      outputPath: command.outputPath,
      mappingFile: config.mappingFile,
      carryAdjust: config.carryAdjust,
    });

    await show(<ReportView report={report} />);
    return report.success ? 0 : 1;
  } catch (error) {
    console.error('❌ Assembler failed:', error instanceof Error ? error.message : error);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exitCode = 1;
  }
);
