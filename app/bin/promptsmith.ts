#!/usr/bin/env node

import { program } from '../cli.js';

// Default to 'history list' when no command is given
const args = process.argv.length <= 2 ? [...process.argv, 'history', 'list'] : process.argv;
program.parseAsync(args).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
