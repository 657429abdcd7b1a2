/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  expandPath,
  getDefaultCatalogPath,
  DEFAULT_CATALOG_FILENAME,
} from '../../../src/lib/paths.js';

describe('expandPath', () => {
  describe('tilde expansion', () => {
    it('should expand ~ to home directory', () => {
      assert.strictEqual(expandPath('~', '/base'), homedir());
    });

    it('should expand ~/path to home directory path', () => {
      assert.strictEqual(expandPath('~/images/disk.qcow2', '/base'), join(homedir(), 'images/disk.qcow2'));
    });
  });

  describe('relative path resolution', () => {
    it('should resolve relative path against base path', () => {
      const basePath = resolve('/vm/config');

      assert.strictEqual(expandPath('iso/install.iso', basePath), resolve(basePath, 'iso/install.iso'));
    });

    it('should preserve absolute paths', () => {
      const absolutePath = resolve('/disk/img.qcow2');

      assert.strictEqual(expandPath(absolutePath, '/base'), absolutePath);
    });
  });

  describe('environment variable expansion', () => {
    let original: string | undefined;

    beforeEach(() => {
      original = process.env['QEMUCFG_TEST_IMAGES'];
      process.env['QEMUCFG_TEST_IMAGES'] = '/srv/images';
    });

    afterEach(() => {
      if (original === undefined) {
        delete process.env['QEMUCFG_TEST_IMAGES'];
      } else {
        process.env['QEMUCFG_TEST_IMAGES'] = original;
      }
    });

    it('should expand $VAR', () => {
      assert.strictEqual(
        expandPath('$QEMUCFG_TEST_IMAGES/disk.img', '/base'),
        resolve('/srv/images/disk.img')
      );
    });

    it('should expand %VAR%', () => {
      assert.strictEqual(
        expandPath('%QEMUCFG_TEST_IMAGES%/disk.img', '/base'),
        resolve('/srv/images/disk.img')
      );
    });
  });
});

describe('getDefaultCatalogPath', () => {
  it('should place the catalog in the given directory', () => {
    assert.strictEqual(getDefaultCatalogPath('/work'), resolve('/work', 'qemu-devices.txt'));
  });

  it('should default to the current directory', () => {
    assert.strictEqual(getDefaultCatalogPath(), join(process.cwd(), DEFAULT_CATALOG_FILENAME));
  });
});
