/**
 * Path Utilities
 *
 * Provides path expansion for configuration files and the default location
 * of the device catalog.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * File name of the device catalog when no output path is given
 */
export const DEFAULT_CATALOG_FILENAME = 'qemu-devices.txt';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand environment variables (Windows-style %VAR% and Unix-style $VAR)
  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Make relative paths absolute relative to config file directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the default device catalog path.
 *
 * @param baseDir - Directory to place the catalog in (default: current directory)
 * @returns Absolute path to qemu-devices.txt in baseDir
 */
export function getDefaultCatalogPath(baseDir: string = process.cwd()): string {
  return resolve(baseDir, DEFAULT_CATALOG_FILENAME);
}
