/**
 * CLI error types and handlers
 *
 * Defines CLI-specific errors with exit codes for proper process termination,
 * and maps domain errors onto them. Errors can carry a structured hint that
 * tells the reader what to do next.
 */

import { ZodError } from 'zod';
import { RegistrationError, SchemaError, SchemaErrorCode } from '../catalog/types.js';
import { FormatError } from '../engine/format.js';
import { PipelineError, PipelineErrorCode } from '../pipeline/types.js';

/**
 * Structured error hint
 */
export interface ErrorHint {
  error: string;
  action_required: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments or configuration */
  INVALID_ARGS = 2,
  /** Table or directory not found */
  NOT_FOUND = 3,
  /** Dataset registration failed */
  REGISTRATION_FAILED = 4,
  /** At least one query file failed */
  PIPELINE_FAILED = 5,
}

/**
 * Base CLI error class with hint support
 */
export class CLIError extends Error {
  public readonly errorHint: ErrorHint | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly cause?: Error,
    errorHint?: ErrorHint
  ) {
    super(message);
    this.name = 'CLIError';
    this.errorHint = errorHint;
  }

  /**
   * Create a CLIError carrying a structured hint
   */
  static withHint(errorHint: ErrorHint, exitCode: ExitCode = ExitCode.GENERAL_ERROR, cause?: Error): CLIError {
    return new CLIError(errorHint.error, exitCode, cause, errorHint);
  }
}

/**
 * Error for invalid command arguments
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Common hints with pre-defined messages
 */
export const ErrorHints = {
  sqlDirNotFound: (message: string): ErrorHint => ({
    error: message,
    action_required: 'Create the directory or point --sql-dir at the folder holding your .sql files',
    hint: 'Relative paths resolve against the project root, not the current directory',
  }),

  tableNotFound: (table: string): ErrorHint => ({
    error: `Table not found: ${table}`,
    action_required: 'Register the table in querydock.config.json or pass --dataset <table>=<path>',
    command: 'querydock tables',
  }),

  registrationFailed: (message: string): ErrorHint => ({
    error: 'Dataset registration failed',
    action_required: 'Check the dataset path and extension (parquet, csv or json)',
    hint: message,
  }),

  unsupportedFormat: (message: string): ErrorHint => ({
    error: message,
    action_required: 'Use one of: parquet, csv, json',
  }),

  configInvalid: (details: string): ErrorHint => ({
    error: 'Invalid configuration',
    action_required: 'Fix querydock.config.json or the QUERYDOCK_* environment variables',
    hint: details,
  }),
} as const;

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Map any thrown value to a CLIError with the right exit code
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  if (error instanceof ZodError) {
    return CLIError.withHint(ErrorHints.configInvalid(describeZodError(error)), ExitCode.INVALID_ARGS, error);
  }

  if (error instanceof FormatError) {
    return CLIError.withHint(ErrorHints.unsupportedFormat(error.message), ExitCode.INVALID_ARGS, error);
  }

  if (error instanceof RegistrationError) {
    return CLIError.withHint(ErrorHints.registrationFailed(error.message), ExitCode.REGISTRATION_FAILED, error);
  }

  if (error instanceof SchemaError && error.code === SchemaErrorCode.TABLE_NOT_FOUND) {
    return CLIError.withHint(ErrorHints.tableNotFound(error.tableName), ExitCode.NOT_FOUND, error);
  }

  if (error instanceof PipelineError && error.code === PipelineErrorCode.SQL_DIR_NOT_FOUND) {
    return CLIError.withHint(ErrorHints.sqlDirNotFound(error.message), ExitCode.NOT_FOUND, error);
  }

  if (error instanceof Error) {
    return new CLIError(error.message, ExitCode.GENERAL_ERROR, error);
  }

  return new CLIError(String(error));
}

/**
 * Format a hint for output
 */
export function formatErrorHint(error: ErrorHint, json = false): string {
  if (json) {
    return JSON.stringify(error, null, 2);
  }

  const lines: string[] = [`Error: ${error.error}`, '', `Action required: ${error.action_required}`];

  if (error.command) {
    lines.push('', `Run: ${error.command}`);
  }

  if (error.hint) {
    lines.push('', `Hint: ${error.hint}`);
  }

  return lines.join('\n');
}

/**
 * Render an error the way handleError prints it
 */
export function formatError(error: CLIError, json = false): string {
  if (error.errorHint) {
    return formatErrorHint(error.errorHint, json);
  }
  if (json) {
    return JSON.stringify({ error: { code: error.exitCode, message: error.message } });
  }
  return `Error: ${error.message}`;
}

/**
 * Handle an error and exit the process with appropriate code
 */
export function handleError(error: unknown, json = false): never {
  const cliError = toCLIError(error);
  console.error(formatError(cliError, json));
  process.exit(cliError.exitCode);
}

