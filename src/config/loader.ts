/**
 * Configuration Loader
 *
 * Loads YAML machine descriptions from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a filesystem error.
 */
function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found: ${filePath}`,
        'CONFIG_NOT_FOUND',
        'Ensure the configuration file exists and is readable.',
        filePath
      );
    }
    if (code === 'EACCES') {
      throw new ConfigError(
        `Permission denied reading configuration file: ${filePath}`,
        'CONFIG_NOT_FOUND',
        'Check the file permissions.',
        filePath
      );
    }
    throw new ConfigError(
      `Failed to read configuration file: ${filePath}`,
      'CONFIG_NOT_FOUND',
      undefined,
      filePath
    );
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigError(
      `Invalid YAML syntax in ${filePath}: ${reason}`,
      'CONFIG_INVALID_YAML',
      undefined,
      filePath
    );
  }
}
