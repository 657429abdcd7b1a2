/**
 * Unit tests for the device catalog file format
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DeviceCatalog } from '../../../src/catalog/catalog.js';
import {
  CATALOG_FILE_HEADER,
  escapeField,
  unescapeField,
  serializeCatalog,
  parseCatalogText,
} from '../../../src/catalog/format.js';
import { ParseError } from '../../../src/core/errors.js';

describe('escapeField', () => {
  it('should escape backslash, tab, newline and carriage return', () => {
    assert.strictEqual(escapeField('a\\b\tc\nd\re'), 'a\\\\b\\tc\\nd\\re');
  });

  it('should leave other text alone', () => {
    assert.strictEqual(escapeField('Intel Gigabit Ethernet'), 'Intel Gigabit Ethernet');
  });
});

describe('unescapeField', () => {
  it('should reverse escapeField', () => {
    assert.strictEqual(unescapeField('a\\\\b\\tc\\nd\\re', 1, ''), 'a\\b\tc\nd\re');
  });

  it('should reject unknown escapes', () => {
    assert.throws(
      () => unescapeField('a\\x', 5, '  a\\x'),
      (error: unknown) =>
        error instanceof ParseError && error.line === 5 && error.message === 'Line 5: invalid escape sequence "\\x"'
    );
  });

  it('should reject a trailing backslash', () => {
    assert.throws(() => unescapeField('a\\', 1, ''), ParseError);
  });
});

describe('serializeCatalog', () => {
  it('should write the header, classes and tab-separated entries', () => {
    const catalog = new DeviceCatalog();
    catalog.addDevice('Storage devices', { name: 'ide-cd', bus: 'IDE', description: 'virtual IDE CD-ROM' });
    catalog.addDevice('Storage devices', { name: 'virtio-blk-pci', bus: 'PCI', alias: 'virtio-blk' });
    catalog.addClass('Watchdog devices');

    assert.strictEqual(
      serializeCatalog(catalog),
      [
        CATALOG_FILE_HEADER,
        '[Storage devices]',
        '  ide-cd\tIDE\t\tvirtual IDE CD-ROM',
        '  virtio-blk-pci\tPCI\tvirtio-blk\t',
        '[Watchdog devices]',
        '',
      ].join('\n')
    );
  });

  it('should write only the header for an empty catalog', () => {
    assert.strictEqual(serializeCatalog(new DeviceCatalog()), '# qemucfg device catalog\n');
  });
});

describe('parseCatalogText', () => {
  it('should read back what serializeCatalog wrote', () => {
    const catalog = new DeviceCatalog();
    catalog.addDevice('Network devices', {
      name: 'e1000',
      bus: 'PCI',
      alias: 'e1000-82540em',
      description: 'tab\there',
    });
    catalog.addClass('Sound devices');

    const parsed = parseCatalogText(serializeCatalog(catalog));

    assert.deepStrictEqual(parsed.toJSON(), catalog.toJSON());
  });

  it('should skip comments and blank lines', () => {
    const parsed = parseCatalogText('# comment\n\n[Misc devices]\n  pvpanic\t\t\t\n');

    assert.deepStrictEqual(parsed.toJSON(), { 'Misc devices': [{ name: 'pvpanic' }] });
  });

  it('should reject an entry before any class', () => {
    assert.throws(
      () => parseCatalogText(`${CATALOG_FILE_HEADER}\n  pvpanic\t\t\t\n`),
      (error: unknown) =>
        error instanceof ParseError && error.message === 'Line 2: device entry before any [class] header'
    );
  });

  it('should reject a wrong field count', () => {
    assert.throws(
      () => parseCatalogText('[Misc devices]\n  pvpanic\tISA\n'),
      (error: unknown) =>
        error instanceof ParseError && error.message === 'Line 2: expected 4 tab-separated fields, found 2'
    );
  });

  it('should reject an empty device name', () => {
    assert.throws(
      () => parseCatalogText('[Misc devices]\n  \tISA\t\t\n'),
      (error: unknown) => error instanceof ParseError && error.message === 'Line 2: device entry has an empty name'
    );
  });

  it('should reject an unrecognized line', () => {
    assert.throws(
      () => parseCatalogText('[Misc devices]\npvpanic\n'),
      (error: unknown) => error instanceof ParseError && error.line === 2
    );
  });
});
