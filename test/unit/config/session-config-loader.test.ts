/**
 * Session config loader Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadSessionConfig, splitCommandLine } from '../../../src/config/session-config-loader';
import { ErrorCode } from '../../../src/errors/error-codes';

describe('loadSessionConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-config-test-'));
    configPath = path.join(dir, 'session_config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return the listed session scripts', () => {
    fs.writeFileSync(configPath, JSON.stringify({
      session_scripts: ['python ProcessedData/synthesizer.py', 'python tools/cleaner.py --once'],
    }));

    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, ['python ProcessedData/synthesizer.py', 'python tools/cleaner.py --once']);
    assert.equal(result.issue, undefined);
  });

  it('should treat a missing session_scripts field as empty', () => {
    fs.writeFileSync(configPath, '{"other": true}');

    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, []);
    assert.equal(result.issue, undefined);
  });

  it('should degrade to no scripts when the file is missing', () => {
    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, []);
    assert.equal(result.issue?.code, ErrorCode.E101_SESSION_CONFIG_MISSING);
  });

  it('should degrade to no scripts when the JSON is invalid', () => {
    fs.writeFileSync(configPath, '{ not json');

    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, []);
    assert.equal(result.issue?.code, ErrorCode.E103_SESSION_CONFIG_MALFORMED);
  });

  it('should degrade to no scripts when session_scripts has the wrong shape', () => {
    fs.writeFileSync(configPath, '{"session_scripts": "python a.py"}');

    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, []);
    assert.equal(result.issue?.code, ErrorCode.E103_SESSION_CONFIG_MALFORMED);
    assert.match(result.issue?.message ?? '', /session_scripts/);
  });

  it('should degrade when the path cannot be read as a file', () => {
    fs.mkdirSync(configPath);

    const result = loadSessionConfig(configPath);

    assert.deepEqual(result.value, []);
    assert.equal(result.issue?.code, ErrorCode.E102_SESSION_CONFIG_UNREADABLE);
  });
});

describe('splitCommandLine', () => {
  it('should split on runs of whitespace', () => {
    assert.deepEqual(splitCommandLine('  python   ProcessedData/synthesizer.py\t--fast '), {
      program: 'python',
      args: ['ProcessedData/synthesizer.py', '--fast'],
    });
  });

  it('should accept a bare program', () => {
    assert.deepEqual(splitCommandLine('cleaner'), { program: 'cleaner', args: [] });
  });

  it('should return null for blank commands', () => {
    assert.equal(splitCommandLine(''), null);
    assert.equal(splitCommandLine('   '), null);
  });

  it('should not interpret quotes', () => {
    assert.deepEqual(splitCommandLine('python "my script.py"'), {
      program: 'python',
      args: ['"my', 'script.py"'],
    });
  });
});
