#!/usr/bin/env node

/**
 * implgen CLI entry point.
 *
 * This is the main entry point for the 'implgen' CLI command.
 */

/* eslint-disable no-console */
import { runCli } from './run.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exit(exitCode);
  },
  (error: unknown) => {
    console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack !== undefined) {
      console.error(error.stack);
    }
    process.exit(1);
  }
);
