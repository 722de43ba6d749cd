import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram } from '../../src/cli/program.js';
import { ExitCode } from '../../src/cli/errors.js';

describe('run command exit status', () => {
  let dir: string;
  let configPath: string;
  let previousExitCode: typeof process.exitCode;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'querydock-run-'));
    mkdirSync(join(dir, 'sql'));
    configPath = join(dir, 'querydock.config.json');
    writeFileSync(
      configPath,
      JSON.stringify({
        pipeline: { sqlDir: 'sql', outputDir: 'out', exportFormat: 'csv' },
        logging: { level: 'silent' },
      })
    );

    previousExitCode = process.exitCode;
    process.exitCode = undefined;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = previousExitCode;
    rmSync(dir, { recursive: true, force: true });
  });

  async function run(): Promise<void> {
    await createProgram().parseAsync(['run', '--config', configPath, '--json'], { from: 'user' });
  }

  it('should exit with the pipeline failure code when a query fails', async () => {
    writeFileSync(join(dir, 'sql', 'good.sql'), 'SELECT 1 AS x');
    writeFileSync(join(dir, 'sql', 'bad.sql'), 'SELEC nonsense');

    await run();

    expect(process.exitCode).toBe(ExitCode.PIPELINE_FAILED);
  });

  it('should leave the exit status alone when every query succeeds', async () => {
    writeFileSync(join(dir, 'sql', 'good.sql'), 'SELECT 1 AS x');

    await run();

    expect(process.exitCode).toBeUndefined();
  });

  it('should leave the exit status alone for an empty SQL directory', async () => {
    await run();

    expect(process.exitCode).toBeUndefined();
  });
});
