/**
 * CLI command: tables
 *
 * List the tables registered from configuration and --dataset flags.
 */

import type { Command } from 'commander';
import { withContext } from '../context.js';
import { handleError } from '../errors.js';
import { addCommonOptions, toContextOptions, type CommonOptions } from '../options.js';
import { formatRegistrationWarnings, formatTables } from '../output.js';

/**
 * Execute the tables command
 */
async function executeTables(options: CommonOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext((context) => {
      formatRegistrationWarnings(context.registration, { json: isJson });
      formatTables(context.session.registrations(), { json: isJson });
      return Promise.resolve();
    }, toContextOptions(options));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the tables command with the program
 */
export function registerTablesCommand(program: Command): void {
  const command = program.command('tables').description('List registered tables');

  addCommonOptions(command).action(async (options: CommonOptions) => {
    await executeTables(options);
  });
}
