/**
 * Machine Files
 *
 * Load, validate and render a YAML machine description in one step.
 */

import { resolve } from 'node:path';

import { loadYamlFile } from '../config/loader.js';
import { buildOptions, resolveConfig } from '../config/resolver.js';
import type { ResolvedMachine } from '../config/types.js';
import { validateConfig } from '../config/validator.js';
import { ConfigError } from './errors.js';
import type { RenderResult } from './types.js';

/**
 * Load and validate a machine file.
 *
 * @throws ConfigError if the file is missing, is not YAML or fails validation
 */
export async function loadMachine(file: string): Promise<ResolvedMachine> {
  const configPath = resolve(file);
  const raw = await loadYamlFile(configPath);
  const validation = validateConfig(raw);

  if (!validation.valid) {
    throw new ConfigError(
      `Configuration validation failed: ${file}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed fields and run `qemucfg validate` again.',
      configPath,
      validation.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return resolveConfig(validation.config, configPath);
}

/**
 * Render a machine file into a QEMU invocation.
 */
export async function renderMachine(file: string): Promise<RenderResult> {
  const machine = await loadMachine(file);
  const options = buildOptions(machine);

  return {
    configPath: machine.configPath,
    args: options.toArgs(),
    commandLine: options.toCommandLine(),
  };
}
