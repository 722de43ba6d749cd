import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { listQueryFiles, queryStem, readQueryUnit } from '../../../src/pipeline/query-files.js';
import { PipelineError, PipelineErrorCode } from '../../../src/pipeline/types.js';
import { catchRejection } from '../../helpers/errors.js';

describe('query files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'querydock-sql-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should list only .sql files, in code-unit order', async () => {
    writeFileSync(join(dir, 'b_second.sql'), 'SELECT 2');
    writeFileSync(join(dir, 'a_first.SQL'), 'SELECT 1');
    writeFileSync(join(dir, 'Z_upper.sql'), 'SELECT 0');
    writeFileSync(join(dir, 'notes.md'), '# notes');
    mkdirSync(join(dir, 'nested.sql'));

    expect(await listQueryFiles(dir)).toEqual([
      join(dir, 'Z_upper.sql'),
      join(dir, 'a_first.SQL'),
      join(dir, 'b_second.sql'),
    ]);
  });

  it('should return an empty list for an empty directory', async () => {
    expect(await listQueryFiles(dir)).toEqual([]);
  });

  it('should fail for a missing directory', async () => {
    const missing = join(dir, 'missing');

    const error = await catchRejection(listQueryFiles(missing));

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      code: PipelineErrorCode.SQL_DIR_NOT_FOUND,
      message: `SQL directory not found: ${missing}`,
    });
  });

  it('should strip only the last extension for the stem', () => {
    expect(queryStem('/queries/trip_counts.sql')).toBe('trip_counts');
    expect(queryStem('daily.v2.sql')).toBe('daily.v2');
  });

  it('should read a query file in full', async () => {
    const path = join(dir, 'counts.sql');
    writeFileSync(path, '-- count rows\nSELECT COUNT(*) FROM trips;\n');

    expect(await readQueryUnit(path)).toEqual({
      fileName: 'counts.sql',
      stem: 'counts',
      path,
      sql: '-- count rows\nSELECT COUNT(*) FROM trips;\n',
    });
  });
});
