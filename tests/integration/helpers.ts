/**
 * Shared setup for tests that run against an in-process DuckDB
 */

import { fileURLToPath } from 'node:url';
import type { Session } from '../../src/catalog/session.js';
import type { DataFormat } from '../../src/engine/format.js';
import { exportResult } from '../../src/pipeline/export.js';

/**
 * Absolute path of a file under tests/fixtures
 */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

/**
 * Materialise a query into a data file, for building test inputs
 */
export async function writeQueryResult(
  session: Session,
  sql: string,
  destination: string,
  format: DataFormat = 'parquet'
): Promise<void> {
  const result = await session.query(sql);
  try {
    await exportResult(session.engine, result, destination, format);
  } finally {
    await result.release();
  }
}

/**
 * Run a query and read all of its rows
 */
export async function queryRows(session: Session, sql: string): Promise<unknown[]> {
  const result = await session.query(sql);
  try {
    return await result.rows();
  } finally {
    await result.release();
  }
}

export const MEASUREMENTS_SQL =
  'SELECT 1::INTEGER AS id, 10.0::DOUBLE AS value UNION ALL SELECT 2::INTEGER, 20.0::DOUBLE';
