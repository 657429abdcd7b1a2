/**
 * qemucfg
 *
 * Public library entry point.
 */

export * from './qemu/types.js';
export * from './qemu/options.js';
export * from './qemu/render.js';
export * from './qemu/executor.js';
export * from './catalog/catalog.js';
export * from './catalog/parser.js';
export * from './catalog/format.js';
export * from './catalog/generator.js';
export * from './core/errors.js';
export * from './core/types.js';
export * from './core/machine.js';
export type { MachineConfig, DriveConfig, ResolvedMachine, ResolvedDrive } from './config/types.js';
export { buildOptions, resolveConfig } from './config/resolver.js';
export { validateConfig } from './config/validator.js';
