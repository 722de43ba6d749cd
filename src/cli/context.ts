/**
 * CLI context manager
 *
 * Provides shared initialization for CLI commands: configuration, logger,
 * a session on a fresh engine, and the configured datasets registered on it.
 */

import { loadProject, type LoadConfigOptions } from '../config/config.js';
import type { Dataset, QueryDockConfig } from '../config/schema.js';
import { Session, type OpenSessionOptions } from '../catalog/session.js';
import { DatasetRegistrar } from '../catalog/registrar.js';
import type { RegistrationReport } from '../catalog/types.js';
import { createLogger, setDefaultLogger, type QueryDockLogger } from '../logging/logger.js';

/**
 * CLI context containing all initialized components
 */
export interface CLIContext {
  /** Loaded configuration */
  config: QueryDockConfig;
  /** Project root relative paths resolve against */
  rootDir: string;
  /** Configuration file used, if any */
  configPath: string | null;
  logger: QueryDockLogger;
  session: Session;
  registrar: DatasetRegistrar;
  /** Result of registering the configured datasets */
  registration: RegistrationReport;
  /** Close the session */
  close(): Promise<void>;
}

/**
 * Options for creating CLI context
 */
export interface CreateContextOptions extends LoadConfigOptions {
  /** Datasets given on the command line, registered after the configured ones */
  extraDatasets?: Dataset[];
  /** Skip dataset registration */
  skipRegistration?: boolean;
}

/**
 * Create CLI context with all components initialized
 *
 * @throws ZodError for invalid configuration, RegistrationError when a
 *   dataset cannot be registered and continueOnError is off
 */
export async function createCLIContext(options: CreateContextOptions = {}): Promise<CLIContext> {
  const project = loadProject(options);
  const { config, rootDir } = project;

  const logger = createLogger(config.logging);
  setDefaultLogger(logger);

  const sessionOptions: OpenSessionOptions = {
    database: config.engine.database,
    rootDir,
    logger,
  };
  if (config.engine.threads !== undefined) {
    sessionOptions.threads = config.engine.threads;
  }
  const session = await Session.open(sessionOptions);
  const registrar = new DatasetRegistrar(session);

  let registration: RegistrationReport = { registered: [], failed: [] };
  if (options.skipRegistration !== true) {
    const datasets = [...config.datasets, ...(options.extraDatasets ?? [])];
    try {
      registration = await registrar.registerData(
        datasets.map((d) => d.path),
        datasets.map((d) => d.table),
        {
          overwrite: config.registration.overwrite,
          continueOnError: config.registration.continueOnError,
          baseDir: rootDir,
        }
      );
    } catch (error) {
      await session.close();
      throw error;
    }
  }

  return {
    config,
    rootDir,
    configPath: project.configPath,
    logger,
    session,
    registrar,
    registration,
    async close(): Promise<void> {
      await session.close();
    },
  };
}

/**
 * Run a function with CLI context, ensuring cleanup on exit
 */
export async function withContext<T>(
  fn: (context: CLIContext) => Promise<T>,
  options: CreateContextOptions = {}
): Promise<T> {
  const context = await createCLIContext(options);
  try {
    return await fn(context);
  } finally {
    await context.close();
  }
}
