#!/usr/bin/env node
/**
 * identsuggest CLI entry point
 */

import { createProgram } from './program.js';

const program = createProgram();

// Show help if no command
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(process.argv);
