/**
 * Dataset registrar
 *
 * Binds data files (Parquet, CSV, JSON) to table names in a session.
 * The format comes from the file extension; for a glob whose own extension
 * says nothing, from the first file it matches.
 */

import { isAbsolute, resolve } from 'node:path';
import { FormatError, formatForPath, inferFormat, type DataFormat } from '../engine/format.js';
import { EngineError, EngineErrorCode, toError, type ColumnInfo } from '../engine/types.js';
import { createChildLogger, logOperationError, type QueryDockLogger } from '../logging/logger.js';
import { expandGlob, hasGlob } from './glob.js';
import type { Session } from './session.js';
import {
  RegistrationError,
  RegistrationErrorCode,
  SchemaError,
  SchemaErrorCode,
  type RegisterOptions,
  type RegistrationReport,
  type TableRegistration,
} from './types.js';

/**
 * A path resolved to its format and matching files
 */
interface ResolvedSource {
  source: string;
  format: DataFormat;
  files: string[];
}

/**
 * Work out format and files for one source path
 */
async function resolveSource(path: string, baseDir: string, tableName: string): Promise<ResolvedSource> {
  const source = isAbsolute(path) ? path : resolve(baseDir, path);

  if (!hasGlob(source)) {
    return { source, format: toRegistrationFormat(source, tableName), files: [source] };
  }

  const files = await expandGlob(source);
  const first = files[0];
  if (first === undefined) {
    throw new RegistrationError(
      `No files match ${path} for table ${tableName}`,
      RegistrationErrorCode.NO_MATCHING_FILES,
      tableName
    );
  }

  const format = formatForPath(source) ?? toRegistrationFormat(first, tableName);
  return { source, format, files };
}

function toRegistrationFormat(path: string, tableName: string): DataFormat {
  try {
    return inferFormat(path);
  } catch (error) {
    if (error instanceof FormatError) {
      throw new RegistrationError(error.message, RegistrationErrorCode.UNSUPPORTED_FORMAT, tableName, error);
    }
    throw error;
  }
}

export class DatasetRegistrar {
  private readonly logger: QueryDockLogger;

  constructor(private readonly session: Session) {
    this.logger = createChildLogger(session.logger, { component: 'registrar' });
  }

  /**
   * Register each path under the table name at the same position
   *
   * Pairs are processed in order. By default a failure aborts the call
   * (pairs already registered stay registered); with continueOnError the
   * failures are collected in the report instead.
   *
   * @throws RegistrationError on length mismatch, or on the first failure
   */
  async registerData(
    paths: readonly string[],
    tableNames: readonly string[],
    options: RegisterOptions = {}
  ): Promise<RegistrationReport> {
    if (paths.length !== tableNames.length) {
      throw new RegistrationError(
        `The number of paths (${String(paths.length)}) must match the number of table names (${String(tableNames.length)})`,
        RegistrationErrorCode.ARITY_MISMATCH
      );
    }

    const overwrite = options.overwrite ?? true;
    const continueOnError = options.continueOnError ?? false;
    const baseDir = options.baseDir ?? this.session.rootDir;
    const report: RegistrationReport = { registered: [], failed: [] };

    for (const [index, path] of paths.entries()) {
      const tableName = tableNames[index];
      if (tableName === undefined) {
        continue;
      }

      try {
        const registration = await this.registerOne(path, tableName, baseDir, overwrite);
        report.registered.push(registration);
      } catch (error) {
        const registrationError = this.toRegistrationError(error, tableName);
        logOperationError(this.logger, 'register', registrationError, { table: tableName, path });
        if (!continueOnError) {
          throw registrationError;
        }
        report.failed.push({ tableName, source: path, error: registrationError });
      }
    }

    return report;
  }

  /**
   * Registered table names, in registration order
   */
  listTables(): string[] {
    return this.session.tableNames();
  }

  /**
   * Column names and types of a registered table
   *
   * @throws SchemaError if the table is not registered or cannot be described
   */
  async getSchema(tableName: string): Promise<ColumnInfo[]> {
    const registration = this.session.get(tableName);
    if (registration === undefined) {
      throw new SchemaError(`Table not found: ${tableName}`, SchemaErrorCode.TABLE_NOT_FOUND, tableName);
    }

    try {
      return await this.session.engine.schema(registration.tableName);
    } catch (error) {
      const err = toError(error);
      const code =
        err instanceof EngineError && err.code === EngineErrorCode.TABLE_NOT_FOUND
          ? SchemaErrorCode.TABLE_NOT_FOUND
          : SchemaErrorCode.DESCRIBE_FAILED;
      throw new SchemaError(`Failed to describe ${tableName}: ${err.message}`, code, tableName, err);
    }
  }

  private async registerOne(
    path: string,
    tableName: string,
    baseDir: string,
    overwrite: boolean
  ): Promise<TableRegistration> {
    if (!overwrite && this.session.has(tableName)) {
      throw new RegistrationError(
        `Table ${tableName} is already registered`,
        RegistrationErrorCode.TABLE_COLLISION,
        tableName
      );
    }

    const resolved = await resolveSource(path, baseDir, tableName);

    try {
      await this.session.engine.register(tableName, resolved.files, resolved.format);
    } catch (error) {
      const err = toError(error);
      throw new RegistrationError(err.message, RegistrationErrorCode.ENGINE_REJECTED, tableName, err);
    }

    const registration: TableRegistration = {
      tableName,
      source: resolved.source,
      format: resolved.format,
      files: resolved.files,
      registeredAt: new Date(),
    };
    const replaced = this.session.has(tableName);
    this.session.bind(registration);

    this.logger.info(
      { table: tableName, format: registration.format, files: registration.files.length, replaced },
      `Table registered: ${tableName}`
    );
    return registration;
  }

  private toRegistrationError(error: unknown, tableName: string): RegistrationError {
    if (error instanceof RegistrationError) {
      return error;
    }
    const err = toError(error);
    return new RegistrationError(err.message, RegistrationErrorCode.ENGINE_REJECTED, tableName, err);
  }
}

/**
 * Create a registrar for a session
 */
export function createRegistrar(session: Session): DatasetRegistrar {
  return new DatasetRegistrar(session);
}
