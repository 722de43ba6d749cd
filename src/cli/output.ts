/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 * Everything here writes to stdout; progress and logs go to stderr.
 */

import chalk from 'chalk';
import type { ColumnInfo, CellValue, Row } from '../engine/types.js';
import type { RegistrationReport, TableRegistration } from '../catalog/types.js';
import type { PipelineOutcome, PipelineReport } from '../pipeline/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Suppress non-essential output */
  quiet?: boolean;
}

/**
 * Query output for display
 */
export interface QueryOutputDisplay {
  columns: ColumnInfo[];
  rows: Row[];
  rowCount: number;
  /** Where the full result was written, if it was */
  outputPath?: string;
}

function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatOutcomeLine(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case 'succeeded':
      return `  ${chalk.green('✓')} ${outcome.file} → ${outcome.outputPath ?? ''} (${String(outcome.rowCount ?? 0)} rows)`;
    case 'failed':
      return `  ${chalk.red('✗')} ${outcome.file}: ${outcome.error?.message ?? 'Unknown error'}`;
    case 'skipped':
      return `  ${chalk.yellow('-')} ${outcome.file} (skipped: ${outcome.skipReason === 'aborted' ? 'aborted' : 'fail fast'})`;
  }
}

/**
 * Format a pipeline report for output
 */
export function formatPipelineReport(report: PipelineReport, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  if (options.quiet !== true) {
    if (report.outcomes.length === 0) {
      console.log(`\nNo .sql files found in ${report.sqlDir}`);
    } else {
      console.log(`\nQueries in ${report.sqlDir}:`);
      for (const outcome of report.outcomes) {
        console.log(formatOutcomeLine(outcome));
      }
    }
  }

  const summary = `${String(report.succeeded)} succeeded, ${String(report.failed)} failed, ${String(report.skipped)} skipped`;
  console.log(`\n${report.failed > 0 ? chalk.red(summary) : chalk.green(summary)} in ${formatDuration(report.durationMs)}`);
}

/**
 * Format registered tables for output
 */
export function formatTables(registrations: TableRegistration[], options: OutputOptions): void {
  if (options.json === true) {
    const output = registrations.map((r) => ({
      table: r.tableName,
      format: r.format,
      source: r.source,
      files: r.files,
    }));
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  if (registrations.length === 0) {
    console.log('No tables registered.');
    console.log('Add datasets to querydock.config.json or pass --dataset <table>=<path>.');
    return;
  }

  console.log(`\nRegistered tables (${String(registrations.length)}):\n`);
  for (const r of registrations) {
    const fileCount = r.files.length === 1 ? '1 file' : `${String(r.files.length)} files`;
    console.log(`  ${chalk.bold(r.tableName)} [${r.format}, ${fileCount}]`);
    console.log(`    ${chalk.dim(r.source)}`);
  }
}

/**
 * Format a table schema for output
 */
export function formatSchema(tableName: string, columns: ColumnInfo[], options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify({ table: tableName, columns }, null, 2));
    return;
  }

  console.log(`\n${chalk.bold(tableName)}`);
  const width = Math.max(0, ...columns.map((c) => c.name.length));
  for (const column of columns) {
    console.log(`  ${column.name.padEnd(width)}  ${chalk.cyan(column.type)}`);
  }
}

/**
 * Render a cell for plain-text tables
 */
export function renderCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Lay out rows as an aligned plain-text table
 */
export function renderRows(columns: readonly ColumnInfo[], rows: readonly Row[]): string[] {
  const names = columns.map((c) => c.name);
  const cells = rows.map((row) => names.map((name) => renderCell(row[name])));
  const widths = names.map((name, i) => Math.max(name.length, ...cells.map((line) => (line[i] ?? '').length)));

  const pad = (values: string[]): string => values.map((v, i) => v.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [pad(names), widths.map((w) => '-'.repeat(w)).join('  '), ...cells.map(pad)];
}

/**
 * Format query rows for output
 */
export function formatQueryOutput(output: QueryOutputDisplay, options: OutputOptions): void {
  if (options.json === true) {
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  for (const line of renderRows(output.columns, output.rows)) {
    console.log(line);
  }

  if (options.quiet !== true) {
    const shown = output.rows.length;
    const more = output.rowCount > shown ? ` (showing ${String(shown)})` : '';
    console.log(chalk.dim(`\n${String(output.rowCount)} rows${more}`));
    if (output.outputPath !== undefined) {
      console.log(chalk.dim(`Written to ${output.outputPath}`));
    }
  }
}

/**
 * Report registration failures collected under continueOnError
 */
export function formatRegistrationWarnings(report: RegistrationReport, options: OutputOptions): void {
  if (options.json === true || report.failed.length === 0) {
    return;
  }
  for (const failure of report.failed) {
    console.error(chalk.yellow(`Warning: table ${failure.tableName} not registered: ${failure.error.message}`));
  }
}
