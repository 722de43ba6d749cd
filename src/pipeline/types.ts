/**
 * Pipeline types for querydock
 */

import type { DataFormat } from '../engine/format.js';
import type { QueryDockLogger } from '../logging/logger.js';

/**
 * One .sql file, read in full
 */
export interface QueryUnit {
  /** File name including extension */
  fileName: string;
  /** File name without the .sql extension; names the export artifact */
  stem: string;
  /** Absolute path */
  path: string;
  /** Full query text */
  sql: string;
}

/**
 * Per-file status
 */
export type OutcomeStatus = 'succeeded' | 'failed' | 'skipped';

/**
 * Where in the per-file sequence a failure happened
 */
export enum OutcomeErrorCode {
  /** Query file could not be read */
  QUERY_READ_FAILED = 'QUERY_READ_FAILED',
  /** Engine rejected or failed the query */
  QUERY_EXECUTION_FAILED = 'QUERY_EXECUTION_FAILED',
  /** Result could not be written */
  EXPORT_FAILED = 'EXPORT_FAILED',
}

/**
 * Result of processing one query file
 */
export interface PipelineOutcome {
  /** Query file name */
  file: string;
  /** Query file stem */
  stem: string;
  status: OutcomeStatus;
  /** Export artifact path (set on success) */
  outputPath?: string;
  /** Rows exported (set on success) */
  rowCount?: number;
  /** Failure details (set on failure) */
  error?: {
    code: OutcomeErrorCode;
    message: string;
  };
  /** Why the file was not attempted (set when skipped) */
  skipReason?: 'fail_fast' | 'aborted';
  durationMs: number;
}

/**
 * Full pipeline report
 */
export interface PipelineReport {
  sqlDir: string;
  outputDir: string;
  exportFormat: DataFormat;
  outcomes: PipelineOutcome[];
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
}

/**
 * Progress event types for a pipeline run
 */
export type PipelineEventType =
  | 'started'
  | 'query_started'
  | 'query_succeeded'
  | 'query_failed'
  | 'query_skipped'
  | 'completed';

/**
 * Progress event emitted during a run
 */
export interface PipelineProgressEvent {
  type: PipelineEventType;
  /** Query file (for query_* events) */
  file?: string;
  /** Position of the file, 1-based */
  index?: number;
  /** Number of query files */
  total?: number;
  /** Export artifact path (for query_succeeded) */
  outputPath?: string;
  /** Rows exported (for query_succeeded) */
  rowCount?: number;
  /** Error message (for query_failed) */
  error?: string;
  timestamp: Date;
}

/**
 * Pipeline options
 */
export interface PipelineOptions {
  /** Directory of .sql files; relative paths resolve against rootDir */
  sqlDir: string;
  /** Directory for export artifacts; relative paths resolve against rootDir */
  outputDir: string;
  /** Export format (default: parquet) */
  exportFormat?: DataFormat;
  /** Stop after the first failed query; the rest are reported as skipped (default: false) */
  failFast?: boolean;
  /** Header row in CSV exports (default: true) */
  csvHeader?: boolean;
  /** Project root (default: the session root) */
  rootDir?: string;
  /** Checked between query files; once aborted, the rest are skipped */
  signal?: AbortSignal;
  /** Progress callback */
  onProgress?: (event: PipelineProgressEvent) => void;
  /** Logger (default: the session logger) */
  logger?: QueryDockLogger;
}

/**
 * Fatal pipeline error (the run could not start)
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Pipeline error codes
 */
export enum PipelineErrorCode {
  /** sqlDir does not exist or is not a directory */
  SQL_DIR_NOT_FOUND = 'SQL_DIR_NOT_FOUND',
  /** outputDir could not be created */
  OUTPUT_DIR_UNAVAILABLE = 'OUTPUT_DIR_UNAVAILABLE',
}
