#!/usr/bin/env node
/**
 * querydock CLI entry point
 *
 * Registers datasets, runs SQL query files and exports their results.
 */

import { CommanderError } from 'commander';
import { createProgram } from './program.js';
import { ExitCode } from './errors.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed the message
      process.exit(error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.INVALID_ARGS);
    }
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.GENERAL_ERROR);
  }
}

// Run the CLI
void main();
