#!/usr/bin/env node

import { createProgram } from './program';

const program = createProgram();

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
