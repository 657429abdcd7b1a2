/**
 * Configuration Types for qemucfg
 *
 * These types represent the YAML machine description and the resolved
 * configuration with paths expanded.
 */

import type { AccelerationMode, AttachmentKind } from '../qemu/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root object parsed from a machine YAML file
 */
export interface MachineConfig {
  /** QEMU binary. Default: qemu-system-x86_64 */
  qemu?: string;
  /** Guest RAM in MB. Mutually exclusive with memory_gb */
  memory?: number;
  /** Guest RAM in GB */
  memory_gb?: number;
  acceleration?: AccelerationMode;
  /** CPU model for -cpu */
  cpu?: string;
  cores?: number;
  drives: DriveConfig[];
}

/**
 * One attached image
 */
export interface DriveConfig {
  type: AttachmentKind;
  /** Image path, relative to the config file */
  path: string;
  /** Boot priority, lower boots first */
  boot_index?: number;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Drive with its path made absolute
 */
export interface ResolvedDrive {
  type: AttachmentKind;
  path: string;
  bootIndex?: number;
}

/**
 * Machine description ready to be replayed through QemuOptions
 */
export interface ResolvedMachine {
  /** QEMU binary (bare names are left for PATH lookup) */
  qemu: string;
  ram?: { amount: number; unit: 'M' | 'G' };
  acceleration?: AccelerationMode;
  cpu?: string;
  cores?: number;
  drives: ResolvedDrive[];
  /** Absolute path to the YAML config file */
  configPath: string;
}
