/**
 * Live metrics reader Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { readLiveMetrics } from '../../../src/state/live-metrics-reader';
import { ErrorCode } from '../../../src/errors/error-codes';

describe('readLiveMetrics', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'live-metrics-test-'));
    file = path.join(dir, 'session_live.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return the parsed snapshot as-is', () => {
    fs.writeFileSync(file, '{"exercise":"squat","Depth":"parallel","Knees":"out"}');

    const result = readLiveMetrics(file);

    assert.deepEqual(result.value, { exercise: 'squat', Depth: 'parallel', Knees: 'out' });
    assert.equal(result.issue, undefined);
  });

  it('should pass through any JSON value', () => {
    fs.writeFileSync(file, '[1,2,3]');
    assert.deepEqual(readLiveMetrics(file).value, [1, 2, 3]);
  });

  it('should return null when the file is missing', () => {
    const result = readLiveMetrics(file);

    assert.equal(result.value, null);
    assert.equal(result.issue?.code, ErrorCode.E301_STATE_FILE_MISSING);
  });

  it('should return null for a partially written file', () => {
    fs.writeFileSync(file, '{"exercise":"sq');

    const result = readLiveMetrics(file);

    assert.equal(result.value, null);
    assert.equal(result.issue?.code, ErrorCode.E303_STATE_FILE_MALFORMED);
  });
});
