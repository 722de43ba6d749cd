import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { artifactPath, exportResult, resolveExportPath } from '../../../src/pipeline/export.js';
import { FakeEngine } from '../../helpers/fake-engine.js';

describe('export paths', () => {
  it('should use an explicit path as given, resolved against the root', () => {
    expect(resolveExportPath({ path: 'out/result.csv' }, 'parquet', '/project')).toBe('/project/out/result.csv');
    expect(resolveExportPath({ path: '/tmp/result.json' }, 'json', '/project')).toBe('/tmp/result.json');
  });

  it('should prefer the path over baseDir and fileName', () => {
    const target = { path: 'chosen.parquet', baseDir: 'exports', fileName: 'ignored' };

    expect(resolveExportPath(target, 'parquet', '/project')).toBe('/project/chosen.parquet');
  });

  it('should build <baseDir>/<fileName>.<ext>', () => {
    expect(resolveExportPath({ baseDir: 'exports', fileName: 'summary' }, 'json', '/project')).toBe(
      '/project/exports/summary.json'
    );
  });

  it('should fall back to output.<ext> in the root', () => {
    expect(resolveExportPath({}, 'parquet', '/project')).toBe('/project/output.parquet');
    expect(resolveExportPath({ baseDir: 'exports' }, 'csv', '/project')).toBe('/project/output.csv');
    expect(resolveExportPath({ path: '' }, 'json', '/project')).toBe('/project/output.json');
  });

  it('should name artifacts after the query stem', () => {
    expect(artifactPath('/out', 'trip_counts', 'csv')).toBe('/out/trip_counts.csv');
  });
});

describe('exportResult', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'querydock-export-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create missing directories and write through the engine', async () => {
    const engine = new FakeEngine();
    const result = await engine.execute('SELECT 1 AS value');
    const destination = join(dir, 'a', 'b', 'result.csv');

    const written = await exportResult(engine, result, destination, 'csv', false);

    expect(written).toBe(destination);
    expect(existsSync(destination)).toBe(true);
    expect(JSON.parse(readFileSync(destination, 'utf-8'))).toEqual({
      destination,
      format: 'csv',
      csvHeader: false,
      rowCount: 1,
    });
  });
});
