/**
 * SessionLogger Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import { SessionLogEntry, SessionLogger, isSessionLogCategory } from '../../../src/logging/session-logger';

describe('SessionLogger', () => {
  let logger: SessionLogger;

  beforeEach(() => {
    logger = new SessionLogger({ mirrorToConsole: false });
  });

  it('should record entries with level, category and details', () => {
    const entry = logger.info('SPAWN', 'Primary CV process started', { pid: 1000 });

    assert.equal(entry.level, 'info');
    assert.equal(entry.category, 'SPAWN');
    assert.equal(entry.message, 'Primary CV process started');
    assert.deepEqual(entry.details, { pid: 1000 });
    assert.deepEqual(logger.getAll(), [entry]);
  });

  it('should keep error message and stack in the entry', () => {
    const error = new Error('spawn failed');
    const entry = logger.logError('Start failed', error, { launcher: 'python3' });

    assert.equal(entry.level, 'error');
    assert.equal(entry.category, 'ERROR');
    assert.equal(entry.details?.launcher, 'python3');
    assert.equal(entry.details?.error, 'spawn failed');
    assert.equal(entry.details?.stack, error.stack);
  });

  it('should stringify non-Error failures', () => {
    const entry = logger.logError('Odd failure', 'just a string');
    assert.equal(entry.details?.error, 'just a string');
    assert.equal(entry.details?.stack, undefined);
  });

  it('should drop the oldest entries past maxEntries', () => {
    const small = new SessionLogger({ maxEntries: 2, mirrorToConsole: false });
    small.debug('PUMP', 'one');
    small.debug('PUMP', 'two');
    small.debug('PUMP', 'three');

    assert.deepEqual(small.getAll().map((e) => e.message), ['two', 'three']);
  });

  it('should filter by category and return recent entries', () => {
    logger.info('LIFECYCLE', 'a');
    logger.warn('CONFIG', 'b');
    logger.info('LIFECYCLE', 'c');

    assert.deepEqual(logger.getByCategory('LIFECYCLE').map((e) => e.message), ['a', 'c']);
    assert.deepEqual(logger.getRecent(2).map((e) => e.message), ['b', 'c']);
  });

  it('should recognize only known categories', () => {
    assert.equal(isSessionLogCategory('STATE_FILE'), true);
    assert.equal(isSessionLogCategory('state_file'), false);
    assert.equal(isSessionLogCategory('VERBOSE'), false);
  });

  it('should clear entries', () => {
    logger.info('LIFECYCLE', 'a');
    logger.clear();
    assert.deepEqual(logger.getAll(), []);
  });

  it('should notify subscribers until they unsubscribe', () => {
    const seen: SessionLogEntry[] = [];
    const unsubscribe = logger.subscribe({ onLog: (e) => seen.push(e) });
    assert.equal(logger.getSubscriberCount(), 1);

    logger.info('HTTP', 'first');
    unsubscribe();
    logger.info('HTTP', 'second');

    assert.deepEqual(seen.map((e) => e.message), ['first']);
    assert.equal(logger.getSubscriberCount(), 0);
  });

  it('should keep logging when a subscriber throws', () => {
    logger.subscribe({
      onLog() {
        throw new Error('subscriber down');
      },
    });

    logger.info('HTTP', 'still recorded');
    assert.equal(logger.getAll().length, 1);
  });

  describe('console mirroring', () => {
    const originalLog = console.log;
    const originalWarn = console.warn;
    let lines: string[];

    beforeEach(() => {
      lines = [];
      console.log = (line: string) => lines.push(`log ${line}`);
      console.warn = (line: string) => lines.push(`warn ${line}`);
    });

    afterEach(() => {
      console.log = originalLog;
      console.warn = originalWarn;
    });

    it('should mirror info and warn but not debug', () => {
      const mirrored = new SessionLogger();
      mirrored.debug('PUMP', 'quiet');
      mirrored.info('LIFECYCLE', 'Session started');
      mirrored.warn('LIFECYCLE', 'Primary exited');

      assert.deepEqual(lines, [
        'log [session] LIFECYCLE Session started',
        'warn [session] LIFECYCLE Primary exited',
      ]);
    });
  });
});
