/**
 * CLI command: run
 *
 * Register the configured datasets, run every .sql file in the SQL
 * directory and export each result. This is the default command.
 */

import type { Command } from 'commander';
import type { DeepPartial } from '../../config/config.js';
import type { QueryDockConfig } from '../../config/schema.js';
import { parseFormat } from '../../engine/format.js';
import { PipelineRunner } from '../../pipeline/runner.js';
import { withContext } from '../context.js';
import { ExitCode, handleError } from '../errors.js';
import { addCommonOptions, toContextOptions, type CommonOptions } from '../options.js';
import { formatPipelineReport, formatRegistrationWarnings } from '../output.js';
import { createProgressDisplay } from '../progress.js';

/**
 * Run command options
 */
export interface RunOptions extends CommonOptions {
  sqlDir?: string;
  outputDir?: string;
  format?: string;
  failFast?: boolean;
  csvHeader?: boolean;
}

/**
 * Build configuration overrides from the flags that were actually given
 */
export function runOverrides(options: RunOptions, csvHeaderFromCli: boolean): DeepPartial<QueryDockConfig> {
  const pipeline: NonNullable<DeepPartial<QueryDockConfig>['pipeline']> = {};

  if (options.sqlDir !== undefined) pipeline.sqlDir = options.sqlDir;
  if (options.outputDir !== undefined) pipeline.outputDir = options.outputDir;
  if (options.format !== undefined) pipeline.exportFormat = parseFormat(options.format);
  if (options.failFast === true) pipeline.failFast = true;
  // commander defaults a --no-* flag to true, so only a flag from the command line counts
  if (csvHeaderFromCli && options.csvHeader !== undefined) pipeline.csvHeader = options.csvHeader;

  return { pipeline };
}

/**
 * Execute the run command
 */
async function executeRun(options: RunOptions, command: Command): Promise<void> {
  const isJson = options.json === true;
  const csvHeaderFromCli = command.getOptionValueSource('csvHeader') === 'cli';

  try {
    const contextOptions = toContextOptions(options, runOverrides(options, csvHeaderFromCli));

    const report = await withContext(async (context) => {
      formatRegistrationWarnings(context.registration, { json: isJson });

      const { pipeline } = context.config;
      const progress = createProgressDisplay({ json: isJson, quiet: options.quiet === true });
      const abort = new AbortController();
      const onSigint = (): void => {
        abort.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        return await new PipelineRunner(context.session).run({
          sqlDir: pipeline.sqlDir,
          outputDir: pipeline.outputDir,
          exportFormat: pipeline.exportFormat,
          failFast: pipeline.failFast,
          csvHeader: pipeline.csvHeader,
          rootDir: context.rootDir,
          signal: abort.signal,
          onProgress: progress.createCallback(),
        });
      } finally {
        process.removeListener('SIGINT', onSigint);
        progress.finish();
      }
    }, contextOptions);

    formatPipelineReport(report, { json: isJson, quiet: options.quiet === true });

    if (report.failed > 0) {
      process.exitCode = ExitCode.PIPELINE_FAILED;
    }
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the run command with the program
 */
export function registerRunCommand(program: Command): void {
  const command = program
    .command('run', { isDefault: true })
    .description('Run every .sql file in the SQL directory and export the results')
    .option('-s, --sql-dir <dir>', 'Directory of .sql files')
    .option('-o, --output-dir <dir>', 'Directory for exported results')
    .option('-f, --format <format>', 'Export format: parquet, csv, json')
    .option('--fail-fast', 'Stop at the first failing query')
    .option('--no-csv-header', 'Omit the header row from CSV exports');

  addCommonOptions(command).action(async (options: RunOptions, cmd: Command) => {
    await executeRun(options, cmd);
  });
}
