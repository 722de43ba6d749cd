/**
 * CLI command: query
 *
 * Run one ad-hoc statement against the registered tables, print the first
 * rows and optionally export the full result.
 */

import type { Command } from 'commander';
import { formatForPath, parseFormat, type DataFormat } from '../../engine/format.js';
import type { TabularResult } from '../../engine/types.js';
import { withLogging } from '../../logging/logger.js';
import { exportResult, resolveExportPath, type ExportTarget } from '../../pipeline/export.js';
import { withContext } from '../context.js';
import { handleError, InvalidArgumentError } from '../errors.js';
import { addCommonOptions, toContextOptions, type CommonOptions } from '../options.js';
import { formatQueryOutput, formatRegistrationWarnings, type QueryOutputDisplay } from '../output.js';

const DEFAULT_LIMIT = 20;

/**
 * Query command options
 */
export interface QueryOptions extends CommonOptions {
  limit?: string;
  out?: string;
  outDir?: string;
  name?: string;
  format?: string;
}

/**
 * Parse --limit; 0 prints no rows
 */
export function parseLimit(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_LIMIT;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError(`Limit must be a non-negative integer (got '${value}')`);
  }
  return limit;
}

/**
 * Export format for the query command
 *
 * An explicit --format wins, then the extension of --out, then the
 * configured export format.
 */
export function resolveQueryFormat(options: QueryOptions, configured: DataFormat): DataFormat {
  if (options.format !== undefined) {
    return parseFormat(options.format);
  }
  if (options.out !== undefined) {
    return formatForPath(options.out) ?? configured;
  }
  return configured;
}

/**
 * Export target for the query command, or null when nothing is written
 */
export function queryExportTarget(options: QueryOptions): ExportTarget | null {
  if (options.out !== undefined) {
    return { path: options.out };
  }
  if (options.outDir !== undefined) {
    return { baseDir: options.outDir, fileName: options.name ?? 'output' };
  }
  return null;
}

/**
 * Execute the query command
 */
async function executeQuery(sql: string, options: QueryOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const limit = parseLimit(options.limit);
    const target = queryExportTarget(options);

    await withContext(async (context) => {
      formatRegistrationWarnings(context.registration, { json: isJson });

      const result: TabularResult = await withLogging(context.logger, 'query', () => context.session.query(sql));
      try {
        const output: QueryOutputDisplay = {
          columns: [...result.columns],
          rows: limit > 0 ? await result.rows(limit) : [],
          rowCount: result.rowCount,
        };

        if (target !== null) {
          const format = resolveQueryFormat(options, context.config.pipeline.exportFormat);
          const destination = resolveExportPath(target, format, context.rootDir);
          output.outputPath = await exportResult(
            context.session.engine,
            result,
            destination,
            format,
            context.config.pipeline.csvHeader
          );
        }

        formatQueryOutput(output, { json: isJson, quiet: options.quiet === true });
      } finally {
        await result.release();
      }
    }, toContextOptions(options));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the query command with the program
 */
export function registerQueryCommand(program: Command): void {
  const command = program
    .command('query <sql>')
    .description('Run a SQL statement against the registered tables')
    .option('-l, --limit <n>', `Rows to print (default: ${String(DEFAULT_LIMIT)})`)
    .option('-o, --out <file>', 'Write the full result to this file')
    .option('--out-dir <dir>', 'Write the full result to <dir>/<name>.<ext>')
    .option('--name <name>', 'File name for --out-dir, without extension (default: output)')
    .option('-f, --format <format>', 'Export format: parquet, csv, json');

  addCommonOptions(command).action(async (sql: string, options: QueryOptions) => {
    await executeQuery(sql, options);
  });
}
