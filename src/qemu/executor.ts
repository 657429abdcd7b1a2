/**
 * QEMU Executor
 *
 * Spawns the QEMU binary with a fixed argument list and captures its output.
 */

import { spawn } from 'node:child_process';

import { ExternalToolError } from '../core/errors.js';
import { DEFAULT_QEMU_BINARY } from './options.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Options for a single invocation
 */
export interface RunOptions {
  /** Kill the process and fail after this many milliseconds (default: no limit) */
  timeout?: number;
}

/**
 * Captured output of a finished invocation
 */
export interface ToolOutput {
  stdout: string;
  stderr: string;
}

/**
 * Anything that can run the QEMU binary with arguments and return its output.
 *
 * QemuExecutor is the real implementation; tests substitute fakes.
 */
export interface ToolRunner {
  run(args: readonly string[], options?: RunOptions): Promise<ToolOutput>;
}

/**
 * Options for constructing a QemuExecutor
 */
export interface QemuExecutorOptions {
  /** Path to the QEMU system emulator (default: 'qemu-system-x86_64') */
  qemuPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
}

/**
 * Runs the QEMU binary and collects stdout/stderr as UTF-8 text.
 */
export class QemuExecutor implements ToolRunner {
  private readonly qemuPath: string;
  private readonly verbose: boolean;

  constructor(options?: QemuExecutorOptions) {
    this.qemuPath = options?.qemuPath ?? DEFAULT_QEMU_BINARY;
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Run QEMU and resolve with its output once it exits with status 0.
   *
   * @throws ExternalToolError if the binary is missing, cannot be spawned,
   *   exits non-zero or exceeds the timeout
   */
  async run(args: readonly string[], options: RunOptions = {}): Promise<ToolOutput> {
    const { timeout } = options;
    const command = [this.qemuPath, ...args];

    if (this.verbose) {
      process.stderr.write(formatCommand(command, supportsAnsi()));
    }

    return new Promise<ToolOutput>((resolve, reject) => {
      const child = spawn(this.qemuPath, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const fail = (error: ExternalToolError): void => {
        if (settled) return;
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        reject(error);
      };

      const timeoutId =
        timeout !== undefined
          ? setTimeout(() => {
              child.kill('SIGTERM');
              fail(
                new ExternalToolError(
                  `${this.qemuPath} timed out after ${timeout}ms`,
                  'timeout',
                  null,
                  stderr,
                  command
                )
              );
            }, timeout)
          : undefined;

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');

      child.stdout.on('data', (data: string) => {
        stdout += data;
      });

      child.stderr.on('data', (data: string) => {
        stderr += data;
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          fail(
            new ExternalToolError(
              `QEMU binary not found: ${this.qemuPath}`,
              'not-found',
              null,
              stderr,
              command
            )
          );
          return;
        }
        fail(
          new ExternalToolError(
            `Failed to spawn ${this.qemuPath}: ${error.message}`,
            'spawn-failed',
            null,
            stderr,
            command
          )
        );
      });

      child.on('close', (code: number | null) => {
        if (code !== 0) {
          fail(
            new ExternalToolError(
              formatExitMessage(this.qemuPath, code, stderr),
              'non-zero-exit',
              code,
              stderr,
              command
            )
          );
          return;
        }
        if (settled) return;
        settled = true;
        if (timeoutId) clearTimeout(timeoutId);
        resolve({ stdout, stderr });
      });
    });
  }
}

/**
 * Strip ANSI escape codes and carriage returns.
 */
function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Build a failure message from the exit status and the first stderr line.
 */
export function formatExitMessage(
  binary: string,
  exitCode: number | null,
  stderr: string
): string {
  const status = exitCode === null ? 'was terminated by a signal' : `exited with code ${exitCode}`;
  const firstLine = stripAnsiCodes(stderr)
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0);

  return firstLine ? `${binary} ${status}: ${firstLine}` : `${binary} ${status}`;
}
