/**
 * Configuration loader for querydock
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  DEFAULT_CONFIG,
  QueryDockConfigSchema,
  validateConfig,
  type QueryDockConfig,
} from './schema.js';
import { findConfigFile, findProjectRoot, type ProjectRootOptions } from './paths.js';

/**
 * Recursive partial, for overrides
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

/**
 * Map of environment variable names to configuration paths
 * All environment variables use the QUERYDOCK_ prefix.
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  // Engine
  QUERYDOCK_DATABASE: ['engine', 'database'],
  QUERYDOCK_THREADS: ['engine', 'threads'],
  // Registration
  QUERYDOCK_OVERWRITE: ['registration', 'overwrite'],
  // Pipeline
  QUERYDOCK_SQL_DIR: ['pipeline', 'sqlDir'],
  QUERYDOCK_OUTPUT_DIR: ['pipeline', 'outputDir'],
  QUERYDOCK_EXPORT_FORMAT: ['pipeline', 'exportFormat'],
  QUERYDOCK_FAIL_FAST: ['pipeline', 'failFast'],
  QUERYDOCK_CSV_HEADER: ['pipeline', 'csvHeader'],
  // Logging
  QUERYDOCK_LOG_LEVEL: ['logging', 'level'],
  QUERYDOCK_LOG_FILE: ['logging', 'file'],
  QUERYDOCK_LOG_PRETTY: ['logging', 'pretty'],
};

const NUMERIC_PATHS = ['engine.threads'];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from source replace target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.includes(path.join('.'))) {
    const num = parseInt(value, 10);
    if (!isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Load configuration from a JSON file
 */
function loadFileConfig(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${message}`);
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration from ${filePath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Explicit project root */
  rootDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Defaults that the file, environment and overrides can still change */
  defaults?: DeepPartial<QueryDockConfig>;
  /** Additional configuration to merge */
  overrides?: DeepPartial<QueryDockConfig>;
}

/**
 * A loaded configuration and where it came from
 */
export interface LoadedProject {
  config: QueryDockConfig;
  /** Project root every relative path resolves against */
  rootDir: string;
  /** Configuration file used, if any */
  configPath: string | null;
}

/**
 * Load and validate configuration and locate the project root
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration, then `defaults`
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 *
 * @throws ZodError if the merged configuration is invalid
 */
export function loadProject(options: LoadConfigOptions = {}): LoadedProject {
  const searchDir = resolve(options.searchDir ?? process.cwd());
  let config: Record<string, unknown> = { ...DEFAULT_CONFIG };
  if (options.defaults !== undefined) {
    config = deepMerge(config, options.defaults);
  }

  let configPath: string | null = null;
  if (options.skipFile !== true) {
    configPath =
      options.configPath !== undefined ? resolve(searchDir, options.configPath) : findConfigFile(searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  const rootOptions: ProjectRootOptions = { searchDir, configPath };
  if (options.rootDir !== undefined) {
    rootOptions.rootDir = options.rootDir;
  }

  return {
    config: validateConfig(config),
    rootDir: findProjectRoot(rootOptions),
    configPath,
  };
}

/**
 * Load and validate querydock configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): QueryDockConfig {
  return loadProject(options).config;
}

/**
 * Get the default configuration
 */
export function getDefaultConfig(): QueryDockConfig {
  return DEFAULT_CONFIG;
}

/**
 * Create a configuration instance with partial overrides
 */
export function createConfig(overrides: DeepPartial<QueryDockConfig>): QueryDockConfig {
  return QueryDockConfigSchema.parse(deepMerge({ ...DEFAULT_CONFIG }, overrides));
}
