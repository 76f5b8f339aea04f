/**
 * Serve argument parsing Unit Tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as path from 'path';
import { DEFAULT_HOST, DEFAULT_PORT, parseServeArgs } from '../../../src/cli/serve-args';

describe('parseServeArgs', () => {
  const cwd = path.resolve('/home/athlete/app');

  it('should use defaults with no flags or environment', () => {
    assert.deepEqual(parseServeArgs([], {}, cwd), {
      ok: true,
      args: { root: cwd, port: DEFAULT_PORT, host: DEFAULT_HOST, launchers: undefined },
    });
  });

  it('should read flags', () => {
    const result = parseServeArgs(
      ['--root', 'cv-root', '--port', '7000', '--host', '0.0.0.0', '--launcher', 'py', '--launcher', 'python3'],
      {},
      cwd
    );

    assert.deepEqual(result, {
      ok: true,
      args: { root: path.join(cwd, 'cv-root'), port: 7000, host: '0.0.0.0', launchers: ['py', 'python3'] },
    });
  });

  it('should fall back to environment variables', () => {
    const result = parseServeArgs([], { CV_SESSION_ROOT: '/opt/cv', CV_SESSION_PORT: '6100', CV_SESSION_HOST: 'localhost' }, cwd);

    assert.deepEqual(result, {
      ok: true,
      args: { root: path.resolve('/opt/cv'), port: 6100, host: 'localhost', launchers: undefined },
    });
  });

  it('should let flags win over the environment', () => {
    const result = parseServeArgs(['--port', '7001'], { CV_SESSION_PORT: '6100' }, cwd);
    assert.ok(result.ok);
    assert.equal(result.args.port, 7001);
  });

  it('should reject an out-of-range port', () => {
    assert.deepEqual(parseServeArgs(['--port', '70000'], {}, cwd), {
      ok: false,
      error: 'Invalid port: 70000. Must be a number between 1 and 65535.',
    });
  });

  it('should reject an invalid port in the environment', () => {
    const result = parseServeArgs([], { CV_SESSION_PORT: 'abc' }, cwd);
    assert.equal(result.ok, false);
  });

  it('should reject unknown and incomplete options', () => {
    assert.deepEqual(parseServeArgs(['--verbose'], {}, cwd), { ok: false, error: 'Unknown or incomplete option: --verbose' });
    assert.deepEqual(parseServeArgs(['--root'], {}, cwd), { ok: false, error: 'Unknown or incomplete option: --root' });
  });
});
