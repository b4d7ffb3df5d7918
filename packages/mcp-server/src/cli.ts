#!/usr/bin/env node
/**
 * CLI entry point for the RDG mapper
 */

import { main } from './commands.js';

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
