#!/usr/bin/env tsx

import { createProgram } from './program.js';

const program = createProgram();

// Show help if no command
if (!process.argv.slice(2).length) {
  program.outputHelp();
}

await program.parseAsync(process.argv);
