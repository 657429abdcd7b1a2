/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { DeviceCatalog, DeviceCatalogJson } from '../catalog/catalog.js';
import type { ErrorCode, QemucfgError } from '../core/errors.js';
import type { CatalogSummary, RenderResult } from '../core/types.js';
import type { LogEntry } from '../lib/logger.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  render?: RenderResult;
  catalog?: DeviceCatalogJson;
  outputPath?: string;
  log?: LogEntry[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   */
  error(message: string, error?: QemucfgError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  validationSuccess(drives: number, qemu: string): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`QEMU: ${qemu}`);
      this.info(`Drives: ${drives}`);
      this.dedent();
    }

    this.result.summary = { drives };
  }

  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // Render Output
  // ===========================================================================

  /**
   * Print a rendered command line. Human mode prints only the command so
   * it can be piped or copied.
   */
  commandLine(render: RenderResult): void {
    if (this.mode === 'human') {
      console.log(render.commandLine);
    }
    this.result.render = render;
  }

  // ===========================================================================
  // Catalog Output
  // ===========================================================================

  catalogSummary(summary: CatalogSummary, log: readonly LogEntry[]): void {
    if (this.mode === 'human') {
      this.indent();
      this.info(`Classes: ${summary.classes}`);
      this.info(`Devices: ${summary.devices}`);
      this.info(`Buses: ${summary.buses.join(', ') || 'none'}`);
      this.dedent();
    }

    this.result.outputPath = summary.outputPath;
    this.result.catalog = summary.catalog;
    if (log.length > 0) {
      this.result.log = [...log];
    }
    this.result.summary = {
      classes: summary.classes,
      devices: summary.devices,
    };
  }

  /**
   * Print the devices of a catalog, optionally limited to one class.
   */
  catalogListing(catalog: DeviceCatalog, deviceClass?: string): void {
    const classes = deviceClass !== undefined ? [deviceClass] : catalog.classes();

    if (this.mode === 'human') {
      for (const name of classes) {
        this.info(`${name}:`);
        this.indent();
        this.table(
          ['NAME', 'BUS', 'DESCRIPTION'],
          catalog
            .get(name)
            .map((device) => [device.name, device.bus ?? '', device.description ?? ''])
        );
        this.dedent();
        this.newline();
      }
    }

    const json: DeviceCatalogJson = {};
    for (const name of classes) {
      json[name] = [...catalog.get(name)];
    }
    this.result.catalog = json;
    this.result.summary = {
      classes: classes.length,
      devices: classes.reduce((sum, name) => sum + catalog.get(name).length, 0),
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
