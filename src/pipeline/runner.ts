/**
 * Pipeline runner
 *
 * Runs every .sql file in a directory against a session, one at a time in
 * file-name order, and exports each result to `<outputDir>/<stem>.<ext>`.
 * A failing file is reported in its outcome and does not stop the run
 * unless failFast is set.
 */

import { mkdir } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataFormat } from '../engine/format.js';
import { toError, type TabularResult } from '../engine/types.js';
import type { Session } from '../catalog/session.js';
import { resolveProjectPath } from '../config/paths.js';
import {
  createChildLogger,
  logOperationComplete,
  logOperationStart,
  type QueryDockLogger,
} from '../logging/logger.js';
import { artifactPath, exportResult } from './export.js';
import { listQueryFiles, queryStem, readQueryUnit } from './query-files.js';
import {
  OutcomeErrorCode,
  PipelineError,
  PipelineErrorCode,
  type PipelineOptions,
  type PipelineOutcome,
  type PipelineProgressEvent,
  type PipelineReport,
  type QueryUnit,
} from './types.js';

/**
 * Settings for one run, with defaults applied and directories resolved
 */
interface RunSettings {
  sqlDir: string;
  outputDir: string;
  exportFormat: DataFormat;
  csvHeader: boolean;
  logger: QueryDockLogger;
}

function failedOutcome(
  path: string,
  code: OutcomeErrorCode,
  error: unknown,
  startedAt: number
): PipelineOutcome {
  return {
    file: basename(path),
    stem: queryStem(path),
    status: 'failed',
    error: { code, message: toError(error).message },
    durationMs: Date.now() - startedAt,
  };
}

function skippedOutcome(path: string, reason: 'fail_fast' | 'aborted'): PipelineOutcome {
  return {
    file: basename(path),
    stem: queryStem(path),
    status: 'skipped',
    skipReason: reason,
    durationMs: 0,
  };
}

export class PipelineRunner {
  constructor(private readonly session: Session) {}

  /**
   * Run all query files and collect one outcome per file
   *
   * @throws PipelineError if the SQL directory is missing or the output
   *   directory cannot be created
   */
  async run(options: PipelineOptions): Promise<PipelineReport> {
    const startedAt = Date.now();
    const rootDir = options.rootDir ?? this.session.rootDir;
    const settings: RunSettings = {
      sqlDir: resolveProjectPath(rootDir, options.sqlDir),
      outputDir: resolveProjectPath(rootDir, options.outputDir),
      exportFormat: options.exportFormat ?? 'parquet',
      csvHeader: options.csvHeader ?? true,
      logger: createChildLogger(options.logger ?? this.session.logger, { operation: 'pipeline' }),
    };
    const failFast = options.failFast ?? false;
    const emit = (event: Omit<PipelineProgressEvent, 'timestamp'>): void => {
      options.onProgress?.({ ...event, timestamp: new Date() });
    };

    const files = await listQueryFiles(settings.sqlDir);

    try {
      await mkdir(settings.outputDir, { recursive: true });
    } catch (error) {
      throw new PipelineError(
        `Cannot create output directory ${settings.outputDir}`,
        PipelineErrorCode.OUTPUT_DIR_UNAVAILABLE,
        toError(error)
      );
    }

    logOperationStart(settings.logger, 'pipeline', {
      sqlDir: settings.sqlDir,
      outputDir: settings.outputDir,
      exportFormat: settings.exportFormat,
      queries: files.length,
    });
    emit({ type: 'started', total: files.length });

    const outcomes: PipelineOutcome[] = [];
    let stopReason: 'fail_fast' | 'aborted' | null = null;

    for (const [index, path] of files.entries()) {
      const position = { index: index + 1, total: files.length };

      if (stopReason === null && options.signal?.aborted === true) {
        stopReason = 'aborted';
      }
      if (stopReason !== null) {
        const skipped = skippedOutcome(path, stopReason);
        outcomes.push(skipped);
        emit({ type: 'query_skipped', file: skipped.file, ...position });
        continue;
      }

      emit({ type: 'query_started', file: basename(path), ...position });
      const outcome = await this.runQueryFile(path, settings);
      outcomes.push(outcome);

      if (outcome.status === 'succeeded') {
        const event: Omit<PipelineProgressEvent, 'timestamp'> = {
          type: 'query_succeeded',
          file: outcome.file,
          ...position,
        };
        if (outcome.outputPath !== undefined) event.outputPath = outcome.outputPath;
        if (outcome.rowCount !== undefined) event.rowCount = outcome.rowCount;
        emit(event);
      } else {
        emit({ type: 'query_failed', file: outcome.file, error: outcome.error?.message ?? 'Unknown error', ...position });
        if (failFast) {
          stopReason = 'fail_fast';
        }
      }
    }

    const report: PipelineReport = {
      sqlDir: settings.sqlDir,
      outputDir: settings.outputDir,
      exportFormat: settings.exportFormat,
      outcomes,
      succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
      skipped: outcomes.filter((o) => o.status === 'skipped').length,
      durationMs: Date.now() - startedAt,
    };

    logOperationComplete(settings.logger, 'pipeline', report.durationMs, {
      succeeded: report.succeeded,
      failed: report.failed,
      skipped: report.skipped,
    });
    emit({ type: 'completed', total: files.length });

    return report;
  }

  /**
   * Read, execute and export one query file
   */
  private async runQueryFile(path: string, settings: RunSettings): Promise<PipelineOutcome> {
    const startedAt = Date.now();
    const logger = createChildLogger(settings.logger, { file: basename(path) });

    let unit: QueryUnit;
    try {
      unit = await readQueryUnit(path);
    } catch (error) {
      logger.error({ err: toError(error) }, 'Failed to read query file');
      return failedOutcome(path, OutcomeErrorCode.QUERY_READ_FAILED, error, startedAt);
    }

    logger.info(`Executing query from file: ${unit.fileName}`);

    let result: TabularResult;
    try {
      result = await this.session.query(unit.sql);
    } catch (error) {
      logger.error({ err: toError(error) }, 'Query failed');
      return failedOutcome(path, OutcomeErrorCode.QUERY_EXECUTION_FAILED, error, startedAt);
    }

    const destination = artifactPath(settings.outputDir, unit.stem, settings.exportFormat);
    let outcome: PipelineOutcome;
    try {
      await exportResult(this.session.engine, result, destination, settings.exportFormat, settings.csvHeader);
      outcome = {
        file: unit.fileName,
        stem: unit.stem,
        status: 'succeeded',
        outputPath: destination,
        rowCount: result.rowCount,
        durationMs: Date.now() - startedAt,
      };
      logger.info({ outputPath: destination, rows: result.rowCount }, `Exported results to: ${destination}`);
    } catch (error) {
      logger.error({ err: toError(error), outputPath: destination }, 'Export failed');
      outcome = failedOutcome(path, OutcomeErrorCode.EXPORT_FAILED, error, startedAt);
    }

    try {
      await result.release();
    } catch (error) {
      logger.warn({ err: toError(error) }, 'Failed to release query result');
    }

    return outcome;
  }
}

/**
 * Create a pipeline runner for a session
 */
export function createPipelineRunner(session: Session): PipelineRunner {
  return new PipelineRunner(session);
}

/**
 * Run the pipeline once against a session
 */
export async function runPipeline(session: Session, options: PipelineOptions): Promise<PipelineReport> {
  return new PipelineRunner(session).run(options);
}
