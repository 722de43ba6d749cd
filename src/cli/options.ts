/**
 * Options shared by every command: project location, extra datasets,
 * logging and output mode
 */

import type { Command } from 'commander';
import type { DeepPartial } from '../config/config.js';
import { LogLevelSchema, type Dataset, type QueryDockConfig } from '../config/schema.js';
import type { CreateContextOptions } from './context.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Raw values of the shared options as commander hands them over
 */
export interface CommonOptions {
  root?: string;
  config?: string;
  dataset?: string[];
  logLevel?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Accumulate a repeatable option
 */
export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parse one `<table>=<path>` dataset argument
 *
 * Only the first `=` separates; the path may contain more.
 */
export function parseDatasetOption(value: string): Dataset {
  const separator = value.indexOf('=');
  const table = separator === -1 ? '' : value.slice(0, separator).trim();
  const path = separator === -1 ? '' : value.slice(separator + 1).trim();

  if (table === '' || path === '') {
    throw new InvalidArgumentError(`Invalid dataset '${value}': expected <table>=<path>`);
  }
  return { table, path };
}

/**
 * Add the shared options to a command
 */
export function addCommonOptions(command: Command): Command {
  return command
    .option('--root <dir>', 'Project root that relative paths resolve against')
    .option('-c, --config <file>', 'Configuration file (default: nearest querydock.config.json)')
    .option('-d, --dataset <table=path>', 'Register a dataset (repeatable)', collectValues)
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .option('--json', 'Output in JSON format')
    .option('-q, --quiet', 'Suppress non-essential output');
}

/**
 * Turn the shared options into context options
 *
 * @throws InvalidArgumentError for a malformed dataset or log level
 */
export function toContextOptions(
  options: CommonOptions,
  overrides: DeepPartial<QueryDockConfig> = {}
): CreateContextOptions {
  const contextOptions: CreateContextOptions = {
    extraDatasets: (options.dataset ?? []).map(parseDatasetOption),
  };

  if (options.root !== undefined) {
    contextOptions.rootDir = options.root;
  }
  if (options.config !== undefined) {
    contextOptions.configPath = options.config;
  }

  const merged: DeepPartial<QueryDockConfig> = { ...overrides };
  if (options.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(options.logLevel);
    if (!level.success) {
      throw new InvalidArgumentError(
        `Log level must be one of ${LogLevelSchema.options.join(', ')} (got '${options.logLevel}')`
      );
    }
    merged.logging = { ...merged.logging, level: level.data };
  } else if (options.json === true || options.quiet === true) {
    // below the config file and environment, so a configured level still wins
    contextOptions.defaults = { logging: { level: 'warn' } };
  }

  contextOptions.overrides = merged;
  return contextOptions;
}
