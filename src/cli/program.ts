/**
 * CLI program definition
 */

import { Command } from 'commander';
import { VERSION } from '../version.js';
import { registerRunCommand } from './commands/run.js';
import { registerTablesCommand } from './commands/tables.js';
import { registerDescribeCommand } from './commands/describe.js';
import { registerQueryCommand } from './commands/query.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('querydock')
    .description('Register data files as SQL tables and run query files against them')
    .version(VERSION)
    // subcommands inherit this, so usage errors reach main() instead of exiting with 1
    .exitOverride();

  registerRunCommand(program);
  registerTablesCommand(program);
  registerDescribeCommand(program);
  registerQueryCommand(program);

  return program;
}
