/**
 * Data file formats and extension-based inference
 */

import { extname } from 'node:path';

export const DATA_FORMATS = ['parquet', 'csv', 'json'] as const;

/**
 * File format of a registered source or an export artifact
 */
export type DataFormat = (typeof DATA_FORMATS)[number];

/**
 * Format error codes
 */
export enum FormatErrorCode {
  /** Extension or format name is not one of parquet/csv/json */
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
}

/**
 * Error thrown when a path or name does not map to a known format
 */
export class FormatError extends Error {
  constructor(
    message: string,
    public readonly code: FormatErrorCode,
    public readonly subject: string
  ) {
    super(message);
    this.name = 'FormatError';
  }
}

const EXTENSION_FORMATS: Record<string, DataFormat> = {
  '.parquet': 'parquet',
  '.csv': 'csv',
  '.json': 'json',
};

/**
 * Type guard for format names
 */
export function isDataFormat(value: string): value is DataFormat {
  return DATA_FORMATS.some((format) => format === value);
}

/**
 * Look up the format for a path's extension, or null if it has none we know
 */
export function formatForPath(path: string): DataFormat | null {
  return EXTENSION_FORMATS[extname(path).toLowerCase()] ?? null;
}

/**
 * Infer the format of a data file from its extension (case-insensitive)
 *
 * @throws FormatError if the extension is missing or not recognised
 */
export function inferFormat(path: string): DataFormat {
  const format = formatForPath(path);
  if (format === null) {
    const extension = extname(path);
    const shown = extension === '' ? '(none)' : `'${extension.toLowerCase()}'`;
    throw new FormatError(
      `Unsupported file type ${shown} for file: ${path}`,
      FormatErrorCode.UNSUPPORTED_FORMAT,
      path
    );
  }
  return format;
}

/**
 * Parse a user-supplied format name (e.g. from --format)
 *
 * @throws FormatError if the name is not one of parquet/csv/json
 */
export function parseFormat(name: string): DataFormat {
  const normalized = name.trim().toLowerCase();
  if (!isDataFormat(normalized)) {
    throw new FormatError(
      `Export format must be one of ${DATA_FORMATS.join(', ')} (got '${name}')`,
      FormatErrorCode.UNSUPPORTED_FORMAT,
      name
    );
  }
  return normalized;
}

/**
 * File extension (without dot) written for a format
 */
export function formatExtension(format: DataFormat): string {
  return format;
}
