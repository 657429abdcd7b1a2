/**
 * Configuration Resolver
 *
 * Expands paths and applies defaults to a validated machine description,
 * then replays it through the QemuOptions API.
 */

import { dirname, resolve } from 'node:path';

import { expandPath } from '../lib/paths.js';
import { DEFAULT_QEMU_BINARY, QemuOptions } from '../qemu/options.js';
import type { MachineConfig, ResolvedDrive, ResolvedMachine } from './types.js';

/**
 * Treat the qemu setting as a path only when it names a directory;
 * bare binary names are left for PATH lookup.
 */
function resolveBinary(binary: string, basePath: string): string {
  return binary.includes('/') || binary.includes('\\') || binary.startsWith('~')
    ? expandPath(binary, basePath)
    : binary;
}

/**
 * Resolve a machine description with paths expanded relative to the config file.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file
 */
export function resolveConfig(config: MachineConfig, configPath: string): ResolvedMachine {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);

  const drives: ResolvedDrive[] = config.drives.map((drive) => ({
    type: drive.type,
    path: expandPath(drive.path, basePath),
    ...(drive.boot_index !== undefined && { bootIndex: drive.boot_index }),
  }));

  let ram: ResolvedMachine['ram'];
  if (config.memory !== undefined) {
    ram = { amount: config.memory, unit: 'M' };
  } else if (config.memory_gb !== undefined) {
    ram = { amount: config.memory_gb, unit: 'G' };
  }

  return {
    qemu: resolveBinary(config.qemu ?? DEFAULT_QEMU_BINARY, basePath),
    ...(ram && { ram }),
    ...(config.acceleration !== undefined && { acceleration: config.acceleration }),
    ...(config.cpu !== undefined && { cpu: config.cpu }),
    ...(config.cores !== undefined && { cores: config.cores }),
    drives,
    configPath: absoluteConfigPath,
  };
}

/**
 * Build a QemuOptions instance from a resolved machine.
 *
 * Drives are attached in file order, so their ids are drive_0, drive_1, ...
 *
 * @throws InvalidArgumentError if a value is rejected by QemuOptions
 */
export function buildOptions(machine: ResolvedMachine): QemuOptions {
  const options = new QemuOptions(machine.qemu);

  if (machine.ram?.unit === 'M') {
    options.setRamMegabytes(machine.ram.amount);
  } else if (machine.ram?.unit === 'G') {
    options.setRamGigabytes(machine.ram.amount);
  }
  if (machine.acceleration !== undefined) {
    options.setAccelerationMode(machine.acceleration);
  }
  if (machine.cpu !== undefined) {
    options.setProcessor(machine.cpu);
  }
  if (machine.cores !== undefined) {
    options.setCoresCount(machine.cores);
  }

  for (const drive of machine.drives) {
    const id =
      drive.type === 'cdrom' ? options.addCdrom(drive.path) : options.addHardDrive(drive.path);
    if (drive.bootIndex !== undefined) {
      options.setBootOrder(id, drive.bootIndex);
    }
  }

  return options;
}
