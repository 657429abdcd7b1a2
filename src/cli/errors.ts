/**
 * CLI Error Handling
 */

import { ConfigError, getExitCode, isQemucfgError } from '../core/errors.js';
import type { OutputFormatter } from './output.js';

/**
 * Report an error and exit with the matching exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (error instanceof ConfigError && error.validationErrors) {
    output.validationError(error.validationErrors);
  } else if (isQemucfgError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
