import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  createChildLogger,
  createLogger,
  createSilentLogger,
  getLogger,
  logOperationError,
  setDefaultLogger,
  withLogging,
  type QueryDockLogger,
} from '../../../src/logging/logger.js';
import { catchRejection } from '../../helpers/errors.js';

function memoryLogger(): { logger: QueryDockLogger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'info' },
    {
      write(message: string): void {
        const line: Record<string, unknown> = JSON.parse(message);
        lines.push(line);
      },
    }
  );
  return { logger, lines };
}

describe('logging', () => {
  it('should create a logger at the configured level', () => {
    expect(createLogger({ level: 'debug', pretty: false }).level).toBe('debug');
    expect(createSilentLogger().level).toBe('silent');
  });

  it('should bind context on child loggers', () => {
    const child = createChildLogger(createSilentLogger(), { operation: 'pipeline', file: 'a.sql' });

    expect(child.bindings()).toEqual({ operation: 'pipeline', file: 'a.sql' });
  });

  it('should return the logger set as default', () => {
    const logger = createSilentLogger();
    setDefaultLogger(logger);

    expect(getLogger()).toBe(logger);
  });

  it('should log operation errors with their message', () => {
    const { logger, lines } = memoryLogger();

    logOperationError(logger, 'register', new Error('bad file'), { table: 'trips' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      operation: 'register',
      table: 'trips',
      msg: 'Failed register: bad file',
      error: { message: 'bad file', name: 'Error' },
    });
  });

  it('should log start and completion around an operation', async () => {
    const { logger, lines } = memoryLogger();

    const value = await withLogging(logger, 'query', () => Promise.resolve(42));

    expect(value).toBe(42);
    expect(lines.map((l) => l.msg)).toEqual(['Starting query', expect.stringMatching(/^Completed query in \d+ms$/)]);
  });

  it('should log and rethrow a failure', async () => {
    const { logger, lines } = memoryLogger();

    const error = await catchRejection(withLogging(logger, 'query', () => Promise.reject(new Error('no table'))));

    expect(error).toMatchObject({ message: 'no table' });
    expect(lines.map((l) => l.msg)).toEqual(['Starting query', 'Failed query: no table']);
  });
});
