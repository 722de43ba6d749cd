/**
 * CLI command: describe
 *
 * Show column names and types of a registered table.
 */

import type { Command } from 'commander';
import { withContext } from '../context.js';
import { handleError } from '../errors.js';
import { addCommonOptions, toContextOptions, type CommonOptions } from '../options.js';
import { formatSchema } from '../output.js';

/**
 * Execute the describe command
 */
async function executeDescribe(table: string, options: CommonOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    await withContext(async (context) => {
      const columns = await context.registrar.getSchema(table);
      formatSchema(table, columns, { json: isJson });
    }, toContextOptions(options));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the describe command with the program
 */
export function registerDescribeCommand(program: Command): void {
  const command = program
    .command('describe <table>')
    .description('Show the schema of a registered table');

  addCommonOptions(command).action(async (table: string, options: CommonOptions) => {
    await executeDescribe(table, options);
  });
}
