/**
 * Devices Command Handler
 *
 * Runs `<qemu> -device help` and writes the device catalog file.
 */

import { resolve } from 'node:path';

import { DeviceCatalogGenerator } from '../../catalog/generator.js';
import { InvalidArgumentError } from '../../core/errors.js';
import { configureLogger } from '../../lib/logger.js';
import { getDefaultCatalogPath } from '../../lib/paths.js';
import { handleError } from '../errors.js';
import { createOutput } from '../output.js';

/**
 * Options for the devices command
 */
export interface DevicesCommandOptions {
  qemu?: string;
  output?: string;
  timeout?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Parse the --timeout value.
 *
 * @throws InvalidArgumentError unless it is a positive integer
 */
export function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError(
      `--timeout must be a positive number of milliseconds, got "${value}"`,
      'timeout'
    );
  }
  return timeout;
}

/**
 * Execute the devices command.
 */
export async function devicesCommand(options: DevicesCommandOptions): Promise<void> {
  const output = createOutput('devices', options);
  const logger = configureLogger(options.json ? 'json' : 'human');

  try {
    const outputPath = options.output ? resolve(options.output) : getDefaultCatalogPath();
    const generator = new DeviceCatalogGenerator({
      qemuPath: options.qemu,
      timeout: parseTimeout(options.timeout),
      verbose: options.verbose,
      logger,
    });

    const catalog = await generator.generateDevicesFile(outputPath);

    output.catalogSummary(
      {
        outputPath,
        classes: catalog.size,
        devices: catalog.deviceCount,
        buses: catalog.buses(),
        catalog: catalog.toJSON(),
      },
      logger.getEntries()
    );

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
