/**
 * Glob expansion for dataset paths
 *
 * The registrar hands the engine the matched files rather than the pattern,
 * so minimatch syntax the engine lacks (braces) still works.
 */

import { readdir, stat } from 'node:fs/promises';
import { isAbsolute, join, resolve, sep } from 'node:path';
import { minimatch } from 'minimatch';

const GLOB_CHARS = /[*?[\]{}]/;

/**
 * Whether a path contains glob syntax
 */
export function hasGlob(path: string): boolean {
  return GLOB_CHARS.test(path);
}

/**
 * Split a pattern into the directory that holds no glob syntax and the rest
 */
export function splitGlobBase(pattern: string): { base: string; rest: string } {
  const segments = pattern.split(/[\\/]/);
  const baseSegments: string[] = [];

  for (const segment of segments) {
    if (hasGlob(segment)) {
      break;
    }
    baseSegments.push(segment);
  }

  // The last static segment is a file name, not a directory, when nothing follows it
  if (baseSegments.length === segments.length) {
    baseSegments.pop();
  }

  const base = baseSegments.length === 0 ? '.' : baseSegments.join('/') || '/';
  const rest = segments.slice(baseSegments.length).join('/');
  return { base, rest };
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * Expand a glob pattern into the files it matches, sorted
 *
 * Relative patterns resolve against `cwd`. Returned paths are absolute.
 * A pattern without glob syntax returns itself when the file exists.
 */
export async function expandGlob(pattern: string, cwd: string = process.cwd()): Promise<string[]> {
  const absolutePattern = toPosix(isAbsolute(pattern) ? pattern : resolve(cwd, pattern));

  if (!hasGlob(absolutePattern)) {
    try {
      const info = await stat(absolutePattern);
      return info.isFile() ? [absolutePattern] : [];
    } catch {
      return [];
    }
  }

  const { base, rest } = splitGlobBase(absolutePattern);
  const recursive = rest.includes('/') || rest.includes('**');

  let entries: string[];
  try {
    entries = await readdir(base, { recursive });
  } catch {
    return [];
  }

  const matches: string[] = [];
  for (const entry of entries) {
    const candidate = toPosix(join(base, entry));
    if (!minimatch(candidate, absolutePattern)) {
      continue;
    }
    const info = await stat(candidate);
    if (info.isFile()) {
      matches.push(candidate);
    }
  }

  return matches.sort();
}
