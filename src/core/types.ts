/**
 * Core Types
 *
 * Result shapes shared by the library entry points and the CLI.
 */

import type { DeviceCatalogJson } from '../catalog/catalog.js';

/**
 * Rendered invocation of a machine description
 */
export interface RenderResult {
  /** Absolute path of the YAML file that was rendered */
  configPath: string;
  /** Binary followed by its arguments */
  args: string[];
  /** Shell-ready command line */
  commandLine: string;
}

/**
 * Outcome of a catalog generation
 */
export interface CatalogSummary {
  /** Catalog file that was written */
  outputPath: string;
  classes: number;
  devices: number;
  buses: string[];
  catalog: DeviceCatalogJson;
}
