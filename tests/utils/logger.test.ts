import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';

import { ConsoleLogger } from '../../src/utils/logger.js';
import { LogLevel } from '../../src/types/index.js';
import { FIXED_NOW } from '../fixtures.js';

function captureStderr(): () => unknown[] {
  const spy = mock.method(console, 'error', () => undefined);
  return () => spy.mock.calls.map(call => call.arguments[0]);
}

describe('ConsoleLogger', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('drops messages below its level and stamps the rest', () => {
    const lines = captureStderr();
    const log = new ConsoleLogger(LogLevel.WARN, () => FIXED_NOW);
    log.debug('walking packages');
    log.info('discovered 3 packages');
    log.warn('Taking over stale lock', { path: '/repo/.changesets/.lock' });
    log.error('write failed', 42);

    assert.deepEqual(lines(), [
      '2026-03-01T12:00:00.000Z [WARN] Taking over stale lock {"path":"/repo/.changesets/.lock"}',
      '2026-03-01T12:00:00.000Z [ERROR] write failed 42'
    ]);
  });

  it('honours level changes', () => {
    const lines = captureStderr();
    const log = new ConsoleLogger(LogLevel.ERROR, () => FIXED_NOW);
    log.debug('hidden');
    log.setLevel(LogLevel.DEBUG);
    log.debug('shown');
    assert.deepEqual(lines(), ['2026-03-01T12:00:00.000Z [DEBUG] shown']);
  });
});
