/**
 * Unit tests for DeviceCatalog
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DeviceCatalog } from '../../../src/catalog/catalog.js';

function sampleCatalog(): DeviceCatalog {
  const catalog = new DeviceCatalog();
  catalog.addDevice('Storage devices', { name: 'ide-cd', bus: 'IDE', description: 'virtual IDE CD-ROM' });
  catalog.addDevice('Storage devices', { name: 'virtio-blk-pci', bus: 'PCI', alias: 'virtio-blk' });
  catalog.addDevice('USB devices', { name: 'usb-tablet', bus: 'usb-bus' });
  catalog.addClass('Watchdog devices');
  return catalog;
}

describe('DeviceCatalog', () => {
  it('should keep classes in insertion order', () => {
    assert.deepStrictEqual(sampleCatalog().classes(), ['Storage devices', 'USB devices', 'Watchdog devices']);
  });

  it('should count classes and devices', () => {
    const catalog = sampleCatalog();

    assert.strictEqual(catalog.size, 3);
    assert.strictEqual(catalog.deviceCount, 3);
  });

  it('should not reset a class that is added again', () => {
    const catalog = sampleCatalog();
    catalog.addClass('Storage devices');

    assert.strictEqual(catalog.get('Storage devices').length, 2);
  });

  it('should return an empty list for an unknown class', () => {
    const catalog = sampleCatalog();

    assert.deepStrictEqual(catalog.get('Sound devices'), []);
    assert.strictEqual(catalog.has('Sound devices'), false);
    assert.strictEqual(catalog.has('Watchdog devices'), true);
  });

  it('should not expose its internal lists', () => {
    const catalog = sampleCatalog();
    const devices = catalog.get('USB devices');

    assert.ok(Array.isArray(devices));
    assert.ok(Object.isFrozen(devices[0]));
    assert.strictEqual(catalog.get('USB devices').length, 1);
  });

  it('should find devices by name or alias', () => {
    const catalog = sampleCatalog();

    assert.deepStrictEqual(catalog.find('virtio-blk'), {
      deviceClass: 'Storage devices',
      device: { name: 'virtio-blk-pci', bus: 'PCI', alias: 'virtio-blk' },
    });
    assert.strictEqual(catalog.find('usb-tablet')?.deviceClass, 'USB devices');
    assert.strictEqual(catalog.find('e1000'), undefined);
  });

  it('should list distinct buses sorted', () => {
    assert.deepStrictEqual(sampleCatalog().buses(), ['IDE', 'PCI', 'usb-bus']);
  });

  it('should convert to JSON', () => {
    assert.deepStrictEqual(sampleCatalog().toJSON(), {
      'Storage devices': [
        { name: 'ide-cd', bus: 'IDE', description: 'virtual IDE CD-ROM' },
        { name: 'virtio-blk-pci', bus: 'PCI', alias: 'virtio-blk' },
      ],
      'USB devices': [{ name: 'usb-tablet', bus: 'usb-bus' }],
      'Watchdog devices': [],
    });
  });
});
