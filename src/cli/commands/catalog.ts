/**
 * Catalog Command Handler
 *
 * Lists the devices recorded in a catalog file.
 */

import { resolve } from 'node:path';

import { readDevicesFile } from '../../catalog/format.js';
import { InvalidArgumentError } from '../../core/errors.js';
import { handleError } from '../errors.js';
import { createOutput } from '../output.js';

export interface CatalogCommandOptions {
  class?: string;
  json?: boolean;
}

export async function catalogCommand(
  file: string,
  options: CatalogCommandOptions
): Promise<void> {
  const output = createOutput('catalog', options);

  try {
    const catalog = await readDevicesFile(resolve(file));

    if (options.class !== undefined && !catalog.has(options.class)) {
      throw new InvalidArgumentError(
        `Unknown device class "${options.class}". Known classes: ${catalog.classes().join(', ')}`,
        'class'
      );
    }

    output.catalogListing(catalog, options.class);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
