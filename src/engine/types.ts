/**
 * Query engine capability interface
 *
 * querydock never plans or executes SQL itself. Everything below is the
 * surface it needs from an embedded engine.
 */

import type { DataFormat } from './format.js';

/**
 * A single cell as seen from JavaScript. Wide integers, decimals and
 * temporal values arrive as strings.
 */
export type CellValue = string | number | boolean | null | CellValue[] | { [key: string]: CellValue };

/**
 * A row keyed by column name, in column order
 */
export type Row = Record<string, CellValue>;

/**
 * Column name and engine type name (e.g. INTEGER, DOUBLE, VARCHAR)
 */
export interface ColumnInfo {
  name: string;
  type: string;
}

/**
 * Engine-owned query result
 *
 * A result can only be written by the engine that produced it, and holds
 * engine resources until released.
 */
export interface TabularResult {
  /** Result schema, in column order */
  readonly columns: ColumnInfo[];
  /** Number of rows */
  readonly rowCount: number;
  /** Read rows, optionally only the first `limit` */
  rows(limit?: number): Promise<Row[]>;
  /** Free the engine resources backing this result */
  release(): Promise<void>;
}

/**
 * Options for writing a result to disk
 */
export interface WriteOptions {
  /** Emit a header row for CSV output (default: true) */
  csvHeader?: boolean;
}

/**
 * Capabilities consumed from the embedded SQL engine
 */
export interface QueryEngine {
  /** Bind a table name to one or more files (paths or globs), replacing any earlier binding */
  register(tableName: string, sources: readonly string[], format: DataFormat): Promise<void>;
  /** Execute one SQL statement and materialise its result */
  execute(sql: string): Promise<TabularResult>;
  /** Serialise a result produced by this engine to a file */
  write(result: TabularResult, destination: string, format: DataFormat, options?: WriteOptions): Promise<void>;
  /** Schema of a registered table */
  schema(tableName: string): Promise<ColumnInfo[]>;
  /** Names of the tables the engine currently knows */
  listTables(): Promise<string[]>;
  /** Release the engine */
  close(): Promise<void>;
}

/**
 * Engine error
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

/**
 * Engine error codes
 */
export enum EngineErrorCode {
  /** Registration rejected by the engine (missing file, unreadable schema) */
  REGISTER_FAILED = 'REGISTER_FAILED',
  /** SQL failed to parse, bind or run */
  QUERY_FAILED = 'QUERY_FAILED',
  /** Query text holds more than one statement */
  MULTIPLE_STATEMENTS = 'MULTIPLE_STATEMENTS',
  /** Result could not be written */
  WRITE_FAILED = 'WRITE_FAILED',
  /** Result was produced by a different engine, or already released */
  FOREIGN_RESULT = 'FOREIGN_RESULT',
  /** Table unknown to the engine */
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  /** Engine already closed */
  CLOSED = 'CLOSED',
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
