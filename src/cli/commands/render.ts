/**
 * Render Command Handler
 *
 * Prints the QEMU command line for a machine description. Nothing is
 * executed.
 */

import { renderMachine } from '../../core/machine.js';
import { handleError } from '../errors.js';
import { createOutput } from '../output.js';

export interface RenderCommandOptions {
  json?: boolean;
}

export async function renderCommand(
  file: string,
  options: RenderCommandOptions
): Promise<void> {
  const output = createOutput('render', options);

  try {
    const render = await renderMachine(file);
    output.commandLine(render);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
