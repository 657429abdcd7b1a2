/**
 * Verbose Output Helpers
 *
 * Formats QEMU invocations for --verbose CLI output.
 * Used by QemuExecutor to print the command to stderr before spawning it.
 */

import { quoteShellArg } from './render.js';

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[qemu] ';

/**
 * ANSI SGR 90: bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0: reset.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Check whether stderr supports ANSI escape codes.
 *
 * Returns true when stderr is a TTY (interactive terminal).
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Format a command for verbose output.
 *
 * Produces one `[qemu] `-prefixed, shell-quoted line fenced by blank lines,
 * optionally wrapped in ANSI gray.
 *
 * @param command - Binary followed by its arguments
 * @param ansi - Whether to wrap output in ANSI gray escape codes
 * @returns Formatted string ready for `process.stderr.write()`
 */
export function formatCommand(command: readonly string[], ansi: boolean): string {
  const plain = `\n${PREFIX}${command.map(quoteShellArg).join(' ')}\n\n`;

  if (ansi) {
    return `${ANSI_GRAY}${plain}${ANSI_RESET}`;
  }

  return plain;
}
