/**
 * Export artifact paths and writing
 */

import { mkdir } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { formatExtension, type DataFormat } from '../engine/format.js';
import type { QueryEngine, TabularResult } from '../engine/types.js';

/**
 * Where to write an export; the first usable option wins
 */
export interface ExportTarget {
  /** Full destination path, used as given */
  path?: string;
  /** Directory for `<fileName>.<ext>`; only used together with fileName */
  baseDir?: string;
  /** File name without extension; only used together with baseDir */
  fileName?: string;
}

/**
 * Resolve an export target to an absolute destination
 *
 * Precedence: explicit path, then baseDir + fileName with the format's
 * extension, then `output.<ext>` in the root directory.
 */
export function resolveExportPath(target: ExportTarget, format: DataFormat, rootDir: string): string {
  const extension = formatExtension(format);
  let destination: string;

  if (target.path !== undefined && target.path !== '') {
    destination = target.path;
  } else if (
    target.baseDir !== undefined &&
    target.baseDir !== '' &&
    target.fileName !== undefined &&
    target.fileName !== ''
  ) {
    destination = join(target.baseDir, `${target.fileName}.${extension}`);
  } else {
    destination = `output.${extension}`;
  }

  return isAbsolute(destination) ? destination : resolve(rootDir, destination);
}

/**
 * Artifact path for a query file stem inside an output directory
 */
export function artifactPath(outputDir: string, stem: string, format: DataFormat): string {
  return join(outputDir, `${stem}.${formatExtension(format)}`);
}

/**
 * Write a result, creating the destination directory if needed
 */
export async function exportResult(
  engine: QueryEngine,
  result: TabularResult,
  destination: string,
  format: DataFormat,
  csvHeader = true
): Promise<string> {
  await mkdir(dirname(destination), { recursive: true });
  await engine.write(result, destination, format, { csvHeader });
  return destination;
}
