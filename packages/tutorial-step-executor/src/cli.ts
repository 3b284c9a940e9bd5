#!/usr/bin/env node

/**
 * CLI for the tutorial step executor
 *
 * Usage: docdrift <tutorial.md> [options]
 */

import { runCli } from './cli/run.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[ERROR] ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`);
    process.exitCode = 1;
  }
);
