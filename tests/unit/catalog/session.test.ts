import { describe, it, expect } from 'vitest';
import { Session, withSession } from '../../../src/catalog/session.js';
import { FakeEngine } from '../../helpers/fake-engine.js';
import { catchRejection } from '../../helpers/errors.js';

describe('Session', () => {
  it('should default the root to the working directory', () => {
    const session = new Session({ engine: new FakeEngine() });

    expect(session.rootDir).toBe(process.cwd());
  });

  it('should run queries through its engine', async () => {
    const engine = new FakeEngine();
    const session = new Session({ engine });

    const result = await session.query('SELECT 1 AS value');

    expect(engine.executed).toEqual(['SELECT 1 AS value']);
    expect(await result.rows()).toEqual([{ value: 1 }]);
  });

  it('should clear the catalog and close the engine once', async () => {
    const engine = new FakeEngine();
    const session = new Session({ engine });
    session.bind({
      tableName: 'trips',
      source: '/data/trips.parquet',
      format: 'parquet',
      files: ['/data/trips.parquet'],
      registeredAt: new Date(0),
    });

    await session.close();
    await session.close();

    expect(session.isClosed).toBe(true);
    expect(session.tableNames()).toEqual([]);
    expect(engine.closed).toBe(true);
  });

  it('should look up and re-bind names without regard to case', () => {
    const session = new Session({ engine: new FakeEngine() });
    const registration = (tableName: string, source: string) => ({
      tableName,
      source,
      format: 'csv' as const,
      files: [source],
      registeredAt: new Date(0),
    });

    session.bind(registration('trips', '/data/a.csv'));
    session.bind(registration('stops', '/data/b.csv'));
    session.bind(registration('Trips', '/data/c.csv'));

    expect(session.tableNames()).toEqual(['Trips', 'stops']);
    expect(session.has('TRIPS')).toBe(true);
    expect(session.get('trips')?.source).toBe('/data/c.csv');
  });

  it('should close the session when the callback fails', async () => {
    const engine = new FakeEngine();
    const session = new Session({ engine });

    const error = await catchRejection(
      withSession(session, () => Promise.reject(new Error('callback failed')))
    );

    expect(error).toMatchObject({ message: 'callback failed' });
    expect(session.isClosed).toBe(true);
  });
});
