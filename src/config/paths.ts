/**
 * Project path utilities for querydock
 *
 * Every relative path querydock handles (datasets, SQL directory, output
 * directory) resolves against a project root instead of the working
 * directory, so a run behaves the same wherever it is started from.
 */

import { existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';

/**
 * Configuration file names, in order of priority
 */
export const CONFIG_FILE_NAMES = [
  'querydock.config.json',
  'querydock.json',
  '.querydockrc.json',
] as const;

/**
 * Walk up from a directory until a directory holding one of the given
 * file names is found
 *
 * @returns Path of the first match, or null
 */
export function findUp(fileNames: readonly string[], startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    for (const fileName of fileNames) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Find the nearest querydock configuration file
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  return findUp(CONFIG_FILE_NAMES, startDir);
}

/**
 * Options for locating the project root
 */
export interface ProjectRootOptions {
  /** Explicit root; wins over everything else */
  rootDir?: string;
  /** Configuration file in use; its directory is the root */
  configPath?: string | null;
  /** Where to start searching (default: cwd) */
  searchDir?: string;
}

/**
 * Locate the project root
 *
 * Priority:
 * 1. Explicit root directory
 * 2. Directory of the configuration file
 * 3. Nearest ancestor holding a package.json
 * 4. The search directory itself
 */
export function findProjectRoot(options: ProjectRootOptions = {}): string {
  const searchDir = resolve(options.searchDir ?? process.cwd());

  if (options.rootDir !== undefined && options.rootDir !== '') {
    return resolve(searchDir, options.rootDir);
  }

  if (options.configPath !== undefined && options.configPath !== null) {
    return dirname(resolve(searchDir, options.configPath));
  }

  const packageJson = findUp(['package.json'], searchDir);
  if (packageJson !== null) {
    return dirname(packageJson);
  }

  return searchDir;
}

/**
 * Resolve a path against the project root (absolute paths are kept)
 */
export function resolveProjectPath(rootDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(rootDir, path);
}
