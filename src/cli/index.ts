#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { validateCommand } from './commands/validate.js';
import { renderCommand } from './commands/render.js';
import { devicesCommand } from './commands/devices.js';
import { catalogCommand } from './commands/catalog.js';

// Get version from package.json (two levels up from both src/cli and dist/cli)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

program
  .name('qemucfg')
  .description('Build QEMU command lines from YAML and catalog QEMU device models')
  .version(version);

program
  .command('validate <file>')
  .description('Validate a machine description against the schema')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

program
  .command('render <file>')
  .description('Print the QEMU command line for a machine description')
  .option('--json', 'Output as JSON')
  .action(renderCommand);

program
  .command('devices')
  .description('Run `qemu -device help` and write the device catalog')
  .option('--qemu <path>', 'QEMU binary', 'qemu-system-x86_64')
  .option('-o, --output <file>', 'Catalog file (default: ./qemu-devices.txt)')
  .option('--timeout <ms>', 'Fail if QEMU runs longer than this')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print the QEMU command before execution')
  .action(devicesCommand);

program
  .command('catalog <file>')
  .description('List devices from a catalog file')
  .option('--class <name>', 'Only list one device class')
  .option('--json', 'Output as JSON')
  .action(catalogCommand);

program.parse();
