/**
 * DuckDB adapter for the query engine interface
 *
 * Runs an embedded, in-process DuckDB database through @duckdb/node-api.
 * Registered tables are views over read_parquet/read_csv/read_json, so
 * registration only touches file metadata. Query results are materialised
 * into temporary tables until they are written and released.
 */

import { DuckDBInstance, type DuckDBConnection } from '@duckdb/node-api';
import type { DataFormat } from './format.js';
import { quoteIdentifier, quoteLiteral, quoteLiteralList, stripTrailingSemicolons } from './sql.js';
import {
  EngineError,
  EngineErrorCode,
  toError,
  type ColumnInfo,
  type QueryEngine,
  type Row,
  type TabularResult,
  type WriteOptions,
} from './types.js';

/**
 * DuckDB engine options
 */
export interface DuckDbEngineOptions {
  /** Database file path, or ':memory:' (default) */
  database?: string;
  /** Worker threads inside DuckDB (default: DuckDB's choice) */
  threads?: number;
}

const RESULT_TABLE_PREFIX = '__querydock_result_';

/**
 * Build the table function call that reads a set of files in a format
 */
function readerFor(format: DataFormat, sources: readonly string[]): string {
  const files = quoteLiteralList(sources);
  switch (format) {
    case 'parquet':
      return `read_parquet(${files})`;
    case 'csv':
      return `read_csv(${files}, auto_detect = true)`;
    case 'json':
      return `read_json(${files}, auto_detect = true)`;
  }
}

/**
 * COPY options for an output format
 */
function copyOptionsFor(format: DataFormat, csvHeader: boolean): string {
  switch (format) {
    case 'parquet':
      return 'FORMAT PARQUET';
    case 'csv':
      return `FORMAT CSV, HEADER ${csvHeader ? 'true' : 'false'}`;
    case 'json':
      return 'FORMAT JSON';
  }
}

/**
 * Result held in a DuckDB temporary table
 */
class DuckDbResult implements TabularResult {
  private released = false;

  constructor(
    readonly owner: DuckDbEngine,
    readonly tableName: string,
    readonly columns: ColumnInfo[],
    readonly rowCount: number
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  async rows(limit?: number): Promise<Row[]> {
    if (this.released) {
      throw new EngineError('Result has already been released', EngineErrorCode.FOREIGN_RESULT);
    }
    return this.owner.readResultRows(this.tableName, limit);
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await this.owner.dropResultTable(this.tableName);
  }
}

/**
 * Query engine backed by an embedded DuckDB instance
 */
export class DuckDbEngine implements QueryEngine {
  private closed = false;
  private resultCounter = 0;

  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly connection: DuckDBConnection
  ) {}

  /**
   * Open a DuckDB database and connect to it
   */
  static async create(options: DuckDbEngineOptions = {}): Promise<DuckDbEngine> {
    const settings: Record<string, string> = {};
    if (options.threads !== undefined) {
      settings.threads = String(options.threads);
    }

    const instance = await DuckDBInstance.create(options.database ?? ':memory:', settings);
    const connection = await instance.connect();
    return new DuckDbEngine(instance, connection);
  }

  async register(tableName: string, sources: readonly string[], format: DataFormat): Promise<void> {
    this.ensureOpen();
    if (sources.length === 0) {
      throw new EngineError(`No sources given for table ${tableName}`, EngineErrorCode.REGISTER_FAILED);
    }

    const sql = `CREATE OR REPLACE VIEW ${quoteIdentifier(tableName)} AS SELECT * FROM ${readerFor(format, sources)}`;
    try {
      await this.connection.run(sql);
    } catch (error) {
      const err = toError(error);
      throw new EngineError(
        `Failed to register table ${tableName}: ${err.message}`,
        EngineErrorCode.REGISTER_FAILED,
        err
      );
    }
  }

  async execute(sql: string): Promise<TabularResult> {
    this.ensureOpen();
    const body = stripTrailingSemicolons(sql);

    const statementCount = body === '' ? 0 : await this.countStatements(body);
    if (statementCount === 0) {
      throw new EngineError('Query text is empty', EngineErrorCode.QUERY_FAILED);
    }
    if (statementCount > 1) {
      throw new EngineError(
        `Expected a single statement, found ${String(statementCount)}`,
        EngineErrorCode.MULTIPLE_STATEMENTS
      );
    }

    this.resultCounter += 1;
    const tableName = `${RESULT_TABLE_PREFIX}${String(this.resultCounter)}`;
    const table = quoteIdentifier(tableName);

    await this.materialize(table, body);

    try {
      const columns = await this.describeTable(tableName);
      const counted = await this.readAll(`SELECT COUNT(*)::INTEGER AS row_count FROM ${table}`);
      const rowCount = Number(counted[0]?.row_count ?? 0);
      return new DuckDbResult(this, tableName, columns, rowCount);
    } catch (error) {
      await this.dropResultTable(tableName);
      throw error;
    }
  }

  async write(
    result: TabularResult,
    destination: string,
    format: DataFormat,
    options: WriteOptions = {}
  ): Promise<void> {
    this.ensureOpen();
    if (!(result instanceof DuckDbResult) || result.owner !== this || result.isReleased) {
      throw new EngineError(
        'Result was not produced by this engine or has been released',
        EngineErrorCode.FOREIGN_RESULT
      );
    }

    const copyOptions = copyOptionsFor(format, options.csvHeader ?? true);
    const sql = `COPY (SELECT * FROM ${quoteIdentifier(result.tableName)}) TO ${quoteLiteral(destination)} (${copyOptions})`;
    try {
      await this.connection.run(sql);
    } catch (error) {
      const err = toError(error);
      throw new EngineError(
        `Failed to write ${destination}: ${err.message}`,
        EngineErrorCode.WRITE_FAILED,
        err
      );
    }
  }

  async schema(tableName: string): Promise<ColumnInfo[]> {
    this.ensureOpen();
    const wanted = tableName.toLowerCase();
    const match = (await this.listTables()).find((name) => name.toLowerCase() === wanted);
    if (match === undefined) {
      throw new EngineError(`Table not found: ${tableName}`, EngineErrorCode.TABLE_NOT_FOUND);
    }
    return this.describeTable(match);
  }

  async listTables(): Promise<string[]> {
    this.ensureOpen();
    const rows = await this.readAll(
      'SELECT table_name FROM information_schema.tables ' +
        'WHERE table_catalog = current_database() AND table_schema = current_schema() ' +
        'ORDER BY table_name'
    );
    return rows.map((row) => String(row.table_name));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.connection.closeSync();
    this.instance.closeSync();
  }

  /** @internal */
  async readResultRows(tableName: string, limit?: number): Promise<Row[]> {
    this.ensureOpen();
    const limitClause = limit !== undefined ? ` LIMIT ${String(Math.max(0, Math.floor(limit)))}` : '';
    return this.readAll(`SELECT * FROM ${quoteIdentifier(tableName)}${limitClause}`);
  }

  /** @internal */
  async dropResultTable(tableName: string): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.connection.run(`DROP TABLE IF EXISTS ${quoteIdentifier(tableName)}`);
  }

  /** @internal */
  async describeTable(tableName: string): Promise<ColumnInfo[]> {
    const rows = await this.readAll(`DESCRIBE ${quoteIdentifier(tableName)}`);
    return rows.map((row) => ({
      name: String(row.column_name ?? ''),
      type: String(row.column_type ?? 'UNKNOWN'),
    }));
  }

  /**
   * Store the result of one statement in a temporary table
   *
   * CREATE TABLE AS takes only query-shaped text. Statements such as
   * DESCRIBE, SUMMARIZE or SHOW that the parser rejects there are retried
   * as a subquery.
   */
  private async materialize(table: string, body: string): Promise<void> {
    // The newlines keep a trailing line comment from swallowing anything
    try {
      await this.connection.run(`CREATE OR REPLACE TEMP TABLE ${table} AS\n${body}\n`);
      return;
    } catch (error) {
      const err = toError(error);
      if (!err.message.startsWith('Parser Error')) {
        throw new EngineError(`Query failed: ${err.message}`, EngineErrorCode.QUERY_FAILED, err);
      }
      try {
        await this.connection.run(`CREATE OR REPLACE TEMP TABLE ${table} AS SELECT * FROM (\n${body}\n)`);
      } catch {
        throw new EngineError(`Query failed: ${err.message}`, EngineErrorCode.QUERY_FAILED, err);
      }
    }
  }

  private async countStatements(sql: string): Promise<number> {
    try {
      const extracted = await this.connection.extractStatements(sql);
      return extracted.count;
    } catch (error) {
      const err = toError(error);
      throw new EngineError(`Query failed: ${err.message}`, EngineErrorCode.QUERY_FAILED, err);
    }
  }

  private async readAll(sql: string): Promise<Row[]> {
    const reader = await this.connection.runAndReadAll(sql);
    return reader.getRowObjectsJson();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new EngineError('Engine has been closed', EngineErrorCode.CLOSED);
    }
  }
}

/**
 * Create a DuckDB-backed query engine
 */
export async function createDuckDbEngine(options: DuckDbEngineOptions = {}): Promise<DuckDbEngine> {
  return DuckDbEngine.create(options);
}
