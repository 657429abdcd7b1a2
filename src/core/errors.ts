/**
 * Error Types for qemucfg
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all qemucfg errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_ATTACHMENT'
  | 'EXTERNAL_TOOL_FAILED'
  | 'PARSE_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_ARGUMENT: 1,
  UNKNOWN_ATTACHMENT: 1,
  EXTERNAL_TOOL_FAILED: 2,
  PARSE_FAILED: 2,
};

/**
 * Base error class for all qemucfg errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class QemucfgError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'QemucfgError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, QemucfgError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * A scalar or string argument was rejected at the call that supplied it.
 */
export class InvalidArgumentError extends QemucfgError {
  constructor(
    message: string,
    public readonly argument: string
  ) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * A boot-order call referenced an attachment id this options instance never issued.
 */
export class UnknownAttachmentError extends QemucfgError {
  constructor(public readonly attachmentId: string) {
    super(
      `Unknown attachment id: ${attachmentId}`,
      'UNKNOWN_ATTACHMENT',
      'Use an id returned by addCdrom() or addHardDrive() on the same options instance.'
    );
    this.name = 'UnknownAttachmentError';
    Object.setPrototypeOf(this, UnknownAttachmentError.prototype);
  }
}

/**
 * Why an external tool invocation failed
 */
export type ExternalToolFailure =
  | 'not-found'
  | 'spawn-failed'
  | 'non-zero-exit'
  | 'timeout';

/**
 * Error for failures running the QEMU binary.
 *
 * `toolExitCode` is the process exit status (null when the process never
 * exited on its own); `exitCode` stays the CLI exit code.
 */
export class ExternalToolError extends QemucfgError {
  constructor(
    message: string,
    public readonly reason: ExternalToolFailure,
    public readonly toolExitCode: number | null,
    public readonly stderr: string,
    public readonly command: readonly string[]
  ) {
    super(message, 'EXTERNAL_TOOL_FAILED', suggestionFor(reason));
    this.name = 'ExternalToolError';
    Object.setPrototypeOf(this, ExternalToolError.prototype);
  }
}

function suggestionFor(reason: ExternalToolFailure): string | undefined {
  switch (reason) {
    case 'not-found':
      return 'Install QEMU or pass the binary location with --qemu <path>.';
    case 'timeout':
      return 'Raise the limit with --timeout <ms>.';
    default:
      return undefined;
  }
}

/**
 * Error for malformed device listings and catalog files.
 */
export class ParseError extends QemucfgError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly lineText: string
  ) {
    super(`Line ${line}: ${message}`, 'PARSE_FAILED');
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends QemucfgError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Check if an error is a QemucfgError.
 */
export function isQemucfgError(error: unknown): error is QemucfgError {
  return error instanceof QemucfgError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isQemucfgError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
