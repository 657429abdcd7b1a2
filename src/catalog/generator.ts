/**
 * Device Catalog Generator
 *
 * Runs `<qemu> -device help`, parses the listing and writes the catalog
 * file. The file is only written once the whole listing parsed.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { QemuExecutor, type ToolRunner } from '../qemu/executor.js';
import { getDefaultCatalogPath } from '../lib/paths.js';
import { logger as globalLogger, type Logger } from '../lib/logger.js';
import type { DeviceCatalog } from './catalog.js';
import { serializeCatalog } from './format.js';
import { parseDeviceHelp } from './parser.js';

/**
 * Arguments that make QEMU list its device models
 */
export const DEVICE_HELP_ARGS: readonly string[] = ['-device', 'help'];

/**
 * Options for constructing a DeviceCatalogGenerator
 */
export interface DeviceCatalogGeneratorOptions {
  /** QEMU binary used when no runner is given */
  qemuPath?: string;
  /** Runner for the QEMU binary (default: a QemuExecutor for qemuPath) */
  runner?: ToolRunner;
  /** Timeout for the QEMU invocation in milliseconds (default: none) */
  timeout?: number;
  /** Echo the QEMU command to stderr; only used with the default runner */
  verbose?: boolean;
  /** Logger for progress messages (default: the global logger) */
  logger?: Logger;
}

export class DeviceCatalogGenerator {
  private readonly runner: ToolRunner;
  private readonly timeout: number | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: DeviceCatalogGeneratorOptions = {}) {
    this.runner =
      options.runner ??
      new QemuExecutor({ qemuPath: options.qemuPath, verbose: options.verbose });
    this.timeout = options.timeout;
    this.logger = options.logger;
  }

  /**
   * Run QEMU and parse its device listing without writing anything.
   *
   * @throws ExternalToolError if QEMU cannot be run
   * @throws ParseError if the listing is malformed
   */
  async extractCatalog(): Promise<DeviceCatalog> {
    const { stdout } = await this.runner.run(DEVICE_HELP_ARGS, { timeout: this.timeout });
    const catalog = parseDeviceHelp(stdout);
    this.log().info(
      `Found ${catalog.deviceCount} devices in ${catalog.size} device classes`
    );
    return catalog;
  }

  /**
   * Generate the catalog and write it to `outputPath`, replacing any
   * existing file.
   *
   * @param outputPath - Destination (default: qemu-devices.txt in the current directory)
   * @returns The catalog that was written
   */
  async generateDevicesFile(
    outputPath: string = getDefaultCatalogPath()
  ): Promise<DeviceCatalog> {
    const catalog = await this.extractCatalog();
    const target = resolve(outputPath);

    await mkdir(dirname(target), { recursive: true });

    // Write to temp file first, then rename over the target
    const tempPath = `${target}.tmp`;
    try {
      await writeFile(tempPath, serializeCatalog(catalog), 'utf-8');
      await rename(tempPath, target);
    } catch (error) {
      // The temp file may not exist if writeFile failed
      await unlink(tempPath).catch(() => undefined);
      throw error;
    }

    this.log().success(`Device catalog written to ${target}`);
    return catalog;
  }

  private log(): Logger {
    return this.logger ?? globalLogger;
  }
}
