#!/usr/bin/env tsx

import { createProgram } from './program.js';

const program = createProgram();

process.on('unhandledRejection', reason => {
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
