import { describe, it, expect } from 'vitest';
import {
  FormatError,
  FormatErrorCode,
  formatExtension,
  formatForPath,
  inferFormat,
  isDataFormat,
  parseFormat,
} from '../../../src/engine/format.js';
import { catchError } from '../../helpers/errors.js';

describe('data formats', () => {
  describe('inferFormat', () => {
    it('should map known extensions to formats', () => {
      expect(inferFormat('data/trips.parquet')).toBe('parquet');
      expect(inferFormat('/abs/stops.csv')).toBe('csv');
      expect(inferFormat('routes.json')).toBe('json');
    });

    it('should ignore extension case', () => {
      expect(inferFormat('TRIPS.PARQUET')).toBe('parquet');
      expect(inferFormat('stops.Csv')).toBe('csv');
    });

    it('should reject an unknown extension', () => {
      expect(() => inferFormat('notes.txt')).toThrow("Unsupported file type '.txt' for file: notes.txt");
    });

    it('should reject a path without extension', () => {
      expect(() => inferFormat('data/README')).toThrow('Unsupported file type (none) for file: data/README');
    });

    it('should carry the code and subject on the error', () => {
      const error = catchError(() => inferFormat('archive.gz'));

      expect(error).toBeInstanceOf(FormatError);
      expect(error).toMatchObject({ code: FormatErrorCode.UNSUPPORTED_FORMAT, subject: 'archive.gz' });
    });
  });

  describe('formatForPath', () => {
    it('should return null instead of throwing', () => {
      expect(formatForPath('a.xlsx')).toBeNull();
      expect(formatForPath('data/*.csv')).toBe('csv');
    });
  });

  describe('parseFormat', () => {
    it('should normalise case and whitespace', () => {
      expect(parseFormat(' CSV ')).toBe('csv');
      expect(parseFormat('Parquet')).toBe('parquet');
    });

    it('should reject unknown names', () => {
      expect(() => parseFormat('xlsx')).toThrow("Export format must be one of parquet, csv, json (got 'xlsx')");
    });
  });

  it('should recognise format names', () => {
    expect(isDataFormat('json')).toBe(true);
    expect(isDataFormat('JSON')).toBe(false);
  });

  it('should use the format name as extension', () => {
    expect(formatExtension('parquet')).toBe('parquet');
    expect(formatExtension('csv')).toBe('csv');
  });
});
