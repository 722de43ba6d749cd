/**
 * querydock - SQL query files over Parquet, CSV and JSON data
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';
export * from './config/paths.js';

// Logging exports
export * from './logging/logger.js';

// Engine exports
export * from './engine/format.js';
export * from './engine/types.js';
export * from './engine/sql.js';
export { DuckDbEngine, createDuckDbEngine, type DuckDbEngineOptions } from './engine/duckdb.js';

// Catalog exports
export * from './catalog/types.js';
export * from './catalog/session.js';
export * from './catalog/registrar.js';
export { expandGlob, hasGlob } from './catalog/glob.js';

// Pipeline exports
export * from './pipeline/types.js';
export * from './pipeline/runner.js';
export * from './pipeline/export.js';
export { listQueryFiles, readQueryUnit } from './pipeline/query-files.js';

// Version info
export { VERSION } from './version.js';
