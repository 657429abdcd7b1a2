/**
 * Unit tests for Configuration Resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { resolve } from 'node:path';

import { resolveConfig, buildOptions } from '../../../src/config/resolver.js';
import type { MachineConfig } from '../../../src/config/types.js';

const CONFIG_PATH = resolve('/vm/machine.yaml');

describe('resolveConfig', () => {
  it('should resolve drive paths relative to the config file', () => {
    const resolved = resolveConfig(
      { drives: [{ type: 'cdrom', path: 'iso/install.iso', boot_index: 0 }] },
      CONFIG_PATH
    );

    assert.deepStrictEqual(resolved.drives, [
      { type: 'cdrom', path: resolve('/vm/iso/install.iso'), bootIndex: 0 },
    ]);
    assert.strictEqual(resolved.configPath, CONFIG_PATH);
  });

  it('should default the binary and leave bare names alone', () => {
    assert.strictEqual(resolveConfig({ drives: [] }, CONFIG_PATH).qemu, 'qemu-system-x86_64');
    assert.strictEqual(
      resolveConfig({ qemu: 'qemu-system-aarch64', drives: [] }, CONFIG_PATH).qemu,
      'qemu-system-aarch64'
    );
  });

  it('should resolve a relative binary path', () => {
    const resolved = resolveConfig({ qemu: './bin/qemu-system-x86_64', drives: [] }, CONFIG_PATH);

    assert.strictEqual(resolved.qemu, resolve('/vm/bin/qemu-system-x86_64'));
  });

  it('should map memory settings to RAM units', () => {
    assert.deepStrictEqual(resolveConfig({ memory: 2048, drives: [] }, CONFIG_PATH).ram, {
      amount: 2048,
      unit: 'M',
    });
    assert.deepStrictEqual(resolveConfig({ memory_gb: 4, drives: [] }, CONFIG_PATH).ram, {
      amount: 4,
      unit: 'G',
    });
    assert.strictEqual(resolveConfig({ drives: [] }, CONFIG_PATH).ram, undefined);
  });

  it('should omit unset optional fields', () => {
    const resolved = resolveConfig({ drives: [{ type: 'hard-drive', path: '/disk/a.img' }] }, CONFIG_PATH);

    assert.strictEqual('acceleration' in resolved, false);
    assert.strictEqual('bootIndex' in (resolved.drives[0] ?? {}), false);
  });
});

describe('buildOptions', () => {
  it('should replay the machine through QemuOptions', () => {
    const config: MachineConfig = {
      qemu: '/usr/bin/qemu-system-x86_64',
      memory_gb: 2,
      acceleration: 'kvm',
      cpu: 'host',
      cores: 2,
      drives: [
        { type: 'hard-drive', path: '/disk/a.img' },
        { type: 'cdrom', path: '/iso/b.iso', boot_index: 0 },
      ],
    };

    const options = buildOptions(resolveConfig(config, CONFIG_PATH));

    assert.deepStrictEqual(options.toArgs(), [
      '/usr/bin/qemu-system-x86_64',
      '-m',
      '2G',
      '-accel',
      'kvm',
      '-cpu',
      'host',
      '-smp',
      '2',
      '-drive',
      `file=${resolve('/iso/b.iso')},id=drive_1,media=cdrom,if=none`,
      '-device',
      'ide-cd,drive=drive_1,bootindex=0',
      '-drive',
      `file=${resolve('/disk/a.img')},id=drive_0,media=disk,if=none`,
      '-device',
      'ide-hd,drive=drive_0',
    ]);
  });
});
