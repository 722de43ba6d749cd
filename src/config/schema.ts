/**
 * Configuration schema for querydock
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';
import { DATA_FORMATS } from '../engine/format.js';

/**
 * Data file formats understood by the engine
 */
export const DataFormatSchema = z.enum(DATA_FORMATS);

/**
 * A dataset to register: one path (or glob) bound to one table name
 */
export const DatasetSchema = z.object({
  table: z.string().min(1),
  path: z.string().min(1),
});

/**
 * Embedded engine configuration
 */
export const EngineConfigSchema = z.object({
  /** Database file, or ':memory:' for a throwaway in-process database */
  database: z.string().min(1).default(':memory:'),
  threads: z.number().int().min(1).optional(),
});

/**
 * Registration policy
 */
export const RegistrationConfigSchema = z.object({
  /** Re-registering a table name replaces the earlier binding */
  overwrite: z.boolean().default(true),
  /** Record failed registrations and keep going instead of aborting */
  continueOnError: z.boolean().default(false),
});

/**
 * Pipeline configuration
 *
 * Relative directories resolve against the project root.
 */
export const PipelineConfigSchema = z.object({
  sqlDir: z.string().min(1).default('sql'),
  outputDir: z.string().min(1).default('data/exports'),
  exportFormat: DataFormatSchema.default('parquet'),
  failFast: z.boolean().default(false),
  csvHeader: z.boolean().default(true),
});

/**
 * Log levels accepted in configuration and on the command line
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Complete querydock configuration schema
 */
export const QueryDockConfigSchema = z.object({
  datasets: z.array(DatasetSchema).default([]),
  engine: EngineConfigSchema.default({}),
  registration: RegistrationConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

/**
 * TypeScript types derived from schemas
 */
export type Dataset = z.infer<typeof DatasetSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type RegistrationConfig = z.infer<typeof RegistrationConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type QueryDockConfig = z.infer<typeof QueryDockConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: QueryDockConfig = QueryDockConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): QueryDockConfig {
  return QueryDockConfigSchema.parse(config);
}

/**
 * Safe validation that returns result object instead of throwing
 */
export function safeValidateConfig(config: unknown): z.SafeParseReturnType<unknown, QueryDockConfig> {
  return QueryDockConfigSchema.safeParse(config);
}
