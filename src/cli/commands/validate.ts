/**
 * Validate Command Handler
 *
 * Validates a YAML machine description against the schema and replays it
 * through QemuOptions, without running QEMU. Drive paths are taken as given.
 */

import { loadMachine } from '../../core/machine.js';
import { buildOptions } from '../../config/resolver.js';
import { handleError } from '../errors.js';
import { createOutput } from '../output.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating configuration: ${file}`);

    const machine = await loadMachine(file);
    buildOptions(machine);

    output.validationSuccess(machine.drives.length, machine.qemu);
  } catch (error) {
    handleError(output, error);
  }

  output.flush();
  process.exit(0);
}
