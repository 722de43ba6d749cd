/**
 * Query file discovery
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { toError } from '../engine/types.js';
import { PipelineError, PipelineErrorCode, type QueryUnit } from './types.js';

const QUERY_EXTENSION = '.sql';

/**
 * Code-unit comparison, so order does not depend on the process locale
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * List the .sql files directly inside a directory, sorted by file name
 *
 * @returns Absolute paths
 * @throws PipelineError if the directory is missing or unreadable
 */
export async function listQueryFiles(sqlDir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(sqlDir, { withFileTypes: true });
  } catch (error) {
    throw new PipelineError(
      `SQL directory not found: ${sqlDir}`,
      PipelineErrorCode.SQL_DIR_NOT_FOUND,
      toError(error)
    );
  }

  return entries
    .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === QUERY_EXTENSION)
    .map((entry) => entry.name)
    .sort(compareNames)
    .map((name) => join(sqlDir, name));
}

/**
 * File name without its extension
 */
export function queryStem(path: string): string {
  const name = basename(path);
  return name.slice(0, name.length - extname(name).length);
}

/**
 * Read one query file in full
 */
export async function readQueryUnit(path: string): Promise<QueryUnit> {
  const sql = await readFile(path, 'utf-8');
  return {
    fileName: basename(path),
    stem: queryStem(path),
    path,
    sql,
  };
}
