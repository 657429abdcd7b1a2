/**
 * Unit tests for Logger
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';

import { Logger, configureLogger, setLogger, logger } from '../../../src/lib/logger.js';

describe('Logger', () => {
  it('should default to human mode', () => {
    assert.strictEqual(new Logger().getMode(), 'human');
  });

  it('should record messages in JSON mode', () => {
    const log = new Logger('json');

    log.info('Found 6 devices in 3 device classes');
    log.success('Device catalog written');
    log.warning('careful');
    log.error('failed');

    assert.deepStrictEqual(log.getEntries(), [
      { level: 'info', message: 'Found 6 devices in 3 device classes' },
      { level: 'success', message: 'Device catalog written' },
      { level: 'warning', message: 'careful' },
      { level: 'error', message: 'failed' },
    ]);
  });

  it('should not record messages in human mode', () => {
    const log = new Logger('human');
    const originalLog = console.log;
    const printed: string[] = [];
    console.log = (message: string) => {
      printed.push(message);
    };

    try {
      log.success('done');
      log.info('plain');
    } finally {
      console.log = originalLog;
    }

    assert.deepStrictEqual(printed, ['✓ done', 'plain']);
    assert.strictEqual(log.getEntries().length, 0);
  });
});

describe('global logger', () => {
  const original = logger;

  afterEach(() => {
    setLogger(original);
  });

  it('should be replaced by configureLogger', () => {
    const configured = configureLogger('json');

    assert.strictEqual(configured.getMode(), 'json');
    assert.notStrictEqual(configured, original);
  });
});
