import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Session } from '../../../src/catalog/session.js';
import { PipelineRunner, runPipeline } from '../../../src/pipeline/runner.js';
import {
  OutcomeErrorCode,
  PipelineError,
  PipelineErrorCode,
  type PipelineEventType,
} from '../../../src/pipeline/types.js';
import { FakeEngine } from '../../helpers/fake-engine.js';
import { catchRejection } from '../../helpers/errors.js';

const COUNTS_SQL = 'SELECT COUNT(*) AS value FROM trips;\n';
const BAD_SQL = 'SELECT INVALID FROM trips';
const LAST_SQL = 'SELECT 3 AS value';

describe('PipelineRunner', () => {
  let dir: string;
  let engine: FakeEngine;
  let session: Session;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'querydock-runner-'));
    mkdirSync(join(dir, 'sql'));
    writeFileSync(join(dir, 'sql', '01_counts.sql'), COUNTS_SQL);
    writeFileSync(join(dir, 'sql', '02_bad.sql'), BAD_SQL);
    writeFileSync(join(dir, 'sql', '03_last.sql'), LAST_SQL);

    engine = new FakeEngine();
    session = new Session({ engine, rootDir: dir });
  });

  afterEach(async () => {
    await session.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should run every file in order and isolate a failing query', async () => {
    const report = await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out' });

    expect(engine.executed).toEqual([COUNTS_SQL, BAD_SQL, LAST_SQL]);
    expect(report.outcomes.map((o) => o.status)).toEqual(['succeeded', 'failed', 'succeeded']);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.skipped).toBe(0);
    expect(report.sqlDir).toBe(join(dir, 'sql'));
    expect(report.outputDir).toBe(join(dir, 'out'));
    expect(report.exportFormat).toBe('parquet');
  });

  it('should describe each outcome', async () => {
    const report = await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out' });
    const [first, second] = report.outcomes;

    expect(first).toMatchObject({
      file: '01_counts.sql',
      stem: '01_counts',
      status: 'succeeded',
      outputPath: join(dir, 'out', '01_counts.parquet'),
      rowCount: 1,
    });
    expect(second).toMatchObject({
      file: '02_bad.sql',
      stem: '02_bad',
      status: 'failed',
      error: { code: OutcomeErrorCode.QUERY_EXECUTION_FAILED, message: 'Query failed: Parser Error: syntax error' },
    });
    expect(second?.outputPath).toBeUndefined();
  });

  it('should write one artifact per successful query', async () => {
    await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out' });

    expect(existsSync(join(dir, 'out', '01_counts.parquet'))).toBe(true);
    expect(existsSync(join(dir, 'out', '02_bad.parquet'))).toBe(false);
    expect(existsSync(join(dir, 'out', '03_last.parquet'))).toBe(true);
  });

  it('should release every result it produced', async () => {
    await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out' });

    expect(engine.results).toHaveLength(2);
    expect(engine.results.every((r) => r.released)).toBe(true);
  });

  it('should pass the export format and CSV header setting through', async () => {
    await new PipelineRunner(session).run({
      sqlDir: 'sql',
      outputDir: 'out',
      exportFormat: 'csv',
      csvHeader: false,
    });

    expect(engine.written).toEqual([
      { destination: join(dir, 'out', '01_counts.csv'), format: 'csv', csvHeader: false, rowCount: 1 },
      { destination: join(dir, 'out', '03_last.csv'), format: 'csv', csvHeader: false, rowCount: 1 },
    ]);
  });

  it('should skip the remaining files after a failure with failFast', async () => {
    const report = await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out', failFast: true });

    expect(report.outcomes.map((o) => o.status)).toEqual(['succeeded', 'failed', 'skipped']);
    expect(report.outcomes[2]?.skipReason).toBe('fail_fast');
    expect(engine.executed).toHaveLength(2);
  });

  it('should report an export failure against its file', async () => {
    const destination = join(dir, 'out', '03_last.parquet');
    const failingEngine = new FakeEngine({ rejectWrite: (path) => path === destination });
    const failingSession = new Session({ engine: failingEngine, rootDir: dir });

    const report = await runPipeline(failingSession, { sqlDir: 'sql', outputDir: 'out' });

    expect(report.outcomes[2]).toMatchObject({
      status: 'failed',
      error: { code: OutcomeErrorCode.EXPORT_FAILED, message: `Failed to write ${destination}: permission denied` },
    });
    expect(failingEngine.results.every((r) => r.released)).toBe(true);
    await failingSession.close();
  });

  it('should stop once the signal is aborted', async () => {
    const controller = new AbortController();

    const report = await new PipelineRunner(session).run({
      sqlDir: 'sql',
      outputDir: 'out',
      signal: controller.signal,
      onProgress: (event) => {
        if (event.type === 'query_succeeded') {
          controller.abort();
        }
      },
    });

    expect(report.outcomes.map((o) => o.status)).toEqual(['succeeded', 'skipped', 'skipped']);
    expect(report.outcomes.map((o) => o.skipReason)).toEqual([undefined, 'aborted', 'aborted']);
    expect(engine.executed).toEqual([COUNTS_SQL]);
  });

  it('should emit progress events in order', async () => {
    const events: PipelineEventType[] = [];

    await new PipelineRunner(session).run({
      sqlDir: 'sql',
      outputDir: 'out',
      onProgress: (event) => {
        events.push(event.type);
      },
    });

    expect(events).toEqual([
      'started',
      'query_started',
      'query_succeeded',
      'query_started',
      'query_failed',
      'query_started',
      'query_succeeded',
      'completed',
    ]);
  });

  it('should succeed with no outcomes for an empty directory', async () => {
    mkdirSync(join(dir, 'empty'));

    const report = await new PipelineRunner(session).run({ sqlDir: 'empty', outputDir: 'out' });

    expect(report.outcomes).toEqual([]);
    expect(report.succeeded).toBe(0);
    expect(report.failed).toBe(0);
    expect(existsSync(join(dir, 'out'))).toBe(true);
  });

  it('should fail before running anything when the SQL directory is missing', async () => {
    const error = await catchRejection(new PipelineRunner(session).run({ sqlDir: 'nope', outputDir: 'out' }));

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({ code: PipelineErrorCode.SQL_DIR_NOT_FOUND });
    expect(engine.executed).toEqual([]);
  });

  it('should resolve directories against an explicit root', async () => {
    const other = join(dir, 'other');
    mkdirSync(join(other, 'sql'), { recursive: true });
    writeFileSync(join(other, 'sql', 'only.sql'), LAST_SQL);

    const report = await new PipelineRunner(session).run({ sqlDir: 'sql', outputDir: 'out', rootDir: other });

    expect(report.outcomes.map((o) => o.outputPath)).toEqual([join(other, 'out', 'only.parquet')]);
  });
});
