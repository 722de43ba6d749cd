/**
 * Session: the engine plus the catalog of tables registered on it
 *
 * A session is created explicitly, handed to the registrar and the pipeline
 * runner, and closed by whoever created it. There is no global catalog.
 */

import { createDuckDbEngine, type DuckDbEngineOptions } from '../engine/duckdb.js';
import type { QueryEngine, TabularResult } from '../engine/types.js';
import { createSilentLogger, type QueryDockLogger } from '../logging/logger.js';
import type { TableRegistration } from './types.js';

/**
 * Session construction options
 */
export interface SessionOptions {
  /** Engine the session drives */
  engine: QueryEngine;
  /** Project root that relative paths resolve against (default: cwd) */
  rootDir?: string;
  /** Logger (default: silent) */
  logger?: QueryDockLogger;
}

/**
 * Options for opening a DuckDB-backed session
 */
export interface OpenSessionOptions extends DuckDbEngineOptions {
  rootDir?: string;
  logger?: QueryDockLogger;
}

/**
 * Catalog key for a table name; the engine resolves identifiers without regard to case
 */
function catalogKey(tableName: string): string {
  return tableName.toLowerCase();
}

export class Session {
  readonly engine: QueryEngine;
  readonly rootDir: string;
  readonly logger: QueryDockLogger;

  // Map keeps first-insertion order, so a re-bound name stays where it was.
  // Keys are case-folded: `T` after `t` re-binds the same table.
  private readonly catalog = new Map<string, TableRegistration>();
  private closed = false;

  constructor(options: SessionOptions) {
    this.engine = options.engine;
    this.rootDir = options.rootDir ?? process.cwd();
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Open a session on a fresh DuckDB engine
   */
  static async open(options: OpenSessionOptions = {}): Promise<Session> {
    const engineOptions: DuckDbEngineOptions = {};
    if (options.database !== undefined) {
      engineOptions.database = options.database;
    }
    if (options.threads !== undefined) {
      engineOptions.threads = options.threads;
    }

    const engine = await createDuckDbEngine(engineOptions);
    const sessionOptions: SessionOptions = { engine };
    if (options.rootDir !== undefined) {
      sessionOptions.rootDir = options.rootDir;
    }
    if (options.logger !== undefined) {
      sessionOptions.logger = options.logger;
    }
    return new Session(sessionOptions);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Record a binding, replacing any earlier one for the same name in any case
   */
  bind(registration: TableRegistration): void {
    this.catalog.set(catalogKey(registration.tableName), registration);
  }

  has(tableName: string): boolean {
    return this.catalog.has(catalogKey(tableName));
  }

  get(tableName: string): TableRegistration | undefined {
    return this.catalog.get(catalogKey(tableName));
  }

  /**
   * Registered table names in registration order
   */
  tableNames(): string[] {
    return [...this.catalog.values()].map((registration) => registration.tableName);
  }

  registrations(): TableRegistration[] {
    return [...this.catalog.values()];
  }

  /**
   * Run one SQL statement against the registered tables
   *
   * The caller owns the returned result and should release it.
   */
  async query(sql: string): Promise<TabularResult> {
    return this.engine.execute(sql);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.catalog.clear();
    await this.engine.close();
  }
}

/**
 * Open a DuckDB-backed session
 */
export async function openSession(options: OpenSessionOptions = {}): Promise<Session> {
  return Session.open(options);
}

/**
 * Run a function with a session, closing it afterwards
 */
export async function withSession<T>(
  session: Session,
  fn: (session: Session) => Promise<T>
): Promise<T> {
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
