/**
 * SessionService Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { SessionService } from '../../../src/session/session-service';
import { SessionLogger } from '../../../src/logging/session-logger';
import { ErrorCode } from '../../../src/errors/error-codes';
import { FakeSpawner } from '../../helpers/fake-process';
import { createSessionRoot, removeSessionRoot } from '../../helpers/session-root';

describe('SessionService', () => {
  let root: string;
  let spawner: FakeSpawner;
  let logger: SessionLogger;
  let service: SessionService;

  beforeEach(() => {
    root = createSessionRoot();
    spawner = new FakeSpawner();
    logger = new SessionLogger({ mirrorToConsole: false });
    service = new SessionService({ root, spawner: spawner.spawn, logger });
  });

  afterEach(async () => {
    await service.shutdown();
    removeSessionRoot(root);
  });

  it('should resolve its paths under the root', () => {
    assert.equal(service.paths.root, path.resolve(root));
    assert.equal(service.paths.workoutIdFile, path.join(path.resolve(root), 'workout_id.json'));
  });

  it('should start and stop the session through the supervisor', async () => {
    const started = await service.start();
    assert.ok(started.success);
    assert.equal(started.value.pid, 1000);
    assert.equal(service.status().state, 'running');

    const stopped = await service.stop();
    assert.ok(stopped.success);
    assert.equal(stopped.value.wasRunning, true);
    assert.equal(service.status().state, 'idle');
  });

  describe('writeWorkoutId', () => {
    it('should write the command file and log it', () => {
      const result = service.writeWorkoutId('squat', 'On');

      assert.deepEqual(result, { success: true, value: { workout_id: 'squat', session: 'on' } });
      assert.equal(
        fs.readFileSync(path.join(root, 'workout_id.json'), 'utf-8'),
        '{"workout_id":"squat","session":"on"}\n'
      );
      assert.equal(logger.getByCategory('STATE_FILE').at(-1)?.message, 'Workout id set: squat (on)');
    });

    it('should return and log a write failure', () => {
      const broken = new SessionService({
        root,
        spawner: spawner.spawn,
        logger,
        workoutIdFile: path.join('missing-dir', 'workout_id.json'),
      });

      const result = broken.writeWorkoutId('squat', 'on');

      assert.equal(result.success, false);
      if (!result.success) {
        assert.equal(result.error.code, ErrorCode.E304_STATE_FILE_WRITE_FAILED);
      }
      const entry = logger.getByCategory('ERROR').at(-1);
      assert.equal(entry?.message, 'Workout id write failed');
      assert.equal(entry?.details?.code, ErrorCode.E304_STATE_FILE_WRITE_FAILED);
    });
  });

  describe('getRepCount', () => {
    it('should summarize the rep log', () => {
      fs.writeFileSync(
        path.join(root, 'cv', 'reps_log.jsonl'),
        '{"timestamp_ms":100}\nnot json\n{"timestamp_ms":200,"summary":{"ok":true}}\n'
      );

      assert.deepEqual(service.getRepCount(), {
        count: 3,
        last_summary: { ok: true },
        rep_timestamps: [100, 200],
      });
    });

    it('should return zero reps without failing when the log is missing', () => {
      assert.deepEqual(service.getRepCount(), { count: 0, rep_timestamps: [] });
      assert.equal(logger.getByCategory('STATE_FILE').at(-1)?.level, 'debug');
    });
  });

  describe('getLiveMetrics', () => {
    it('should return the live snapshot', () => {
      fs.writeFileSync(path.join(root, 'cv', 'session_live.json'), '{"Depth":"below parallel"}');
      assert.deepEqual(service.getLiveMetrics(), { Depth: 'below parallel' });
    });

    it('should return null when the snapshot is missing', () => {
      assert.equal(service.getLiveMetrics(), null);
    });
  });
});
