/**
 * Catalog types for querydock
 */

import type { DataFormat } from '../engine/format.js';

/**
 * A table bound in the session catalog
 */
export interface TableRegistration {
  /** Logical table name */
  tableName: string;
  /** Path or glob as given by the caller (resolved to an absolute path) */
  source: string;
  /** Format inferred from the extension */
  format: DataFormat;
  /** Files the source matched at registration time */
  files: string[];
  /** When the binding was made */
  registeredAt: Date;
}

/**
 * Options for registerData
 */
export interface RegisterOptions {
  /** Replace an existing binding for the same name (default: true) */
  overwrite?: boolean;
  /** Record failures and continue with the remaining pairs (default: false) */
  continueOnError?: boolean;
  /** Directory that relative paths resolve against (default: session root) */
  baseDir?: string;
}

/**
 * One failed registration in a continue-on-error run
 */
export interface RegistrationFailure {
  tableName: string;
  source: string;
  error: RegistrationError;
}

/**
 * Outcome of a registerData call
 */
export interface RegistrationReport {
  registered: TableRegistration[];
  failed: RegistrationFailure[];
}

/**
 * Registration error
 */
export class RegistrationError extends Error {
  constructor(
    message: string,
    public readonly code: RegistrationErrorCode,
    public readonly tableName?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RegistrationError';
  }
}

/**
 * Registration error codes
 */
export enum RegistrationErrorCode {
  /** paths and table names differ in length */
  ARITY_MISMATCH = 'ARITY_MISMATCH',
  /** Extension is not parquet, csv or json */
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  /** Glob matched no files */
  NO_MATCHING_FILES = 'NO_MATCHING_FILES',
  /** Name already bound and overwrite is disabled */
  TABLE_COLLISION = 'TABLE_COLLISION',
  /** Engine could not bind the source */
  ENGINE_REJECTED = 'ENGINE_REJECTED',
}

/**
 * Schema lookup error
 */
export class SchemaError extends Error {
  constructor(
    message: string,
    public readonly code: SchemaErrorCode,
    public readonly tableName: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

/**
 * Schema error codes
 */
export enum SchemaErrorCode {
  /** Table is not registered in the session */
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  /** Engine failed to describe a registered table */
  DESCRIBE_FAILED = 'DESCRIBE_FAILED',
}
