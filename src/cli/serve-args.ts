/**
 * Argument parsing for `cv-session serve`
 */

import * as path from 'path';

export interface ServeArguments {
  root: string;
  port: number;
  host: string;
  launchers?: string[];
}

export const DEFAULT_PORT = 5680;
export const DEFAULT_HOST = '127.0.0.1';

export type ParseResult =
  | { ok: true; args: ServeArguments }
  | { ok: false; error: string };

function parsePort(value: string): number | null {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    return null;
  }
  return port;
}

/**
 * Flags win over environment variables, which win over defaults:
 * --root / CV_SESSION_ROOT, --port / CV_SESSION_PORT, --host / CV_SESSION_HOST
 */
export function parseServeArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ParseResult {
  let root = env.CV_SESSION_ROOT || cwd;
  let host = env.CV_SESSION_HOST || DEFAULT_HOST;
  let port = DEFAULT_PORT;
  let launchers: string[] | undefined;

  if (env.CV_SESSION_PORT) {
    const fromEnv = parsePort(env.CV_SESSION_PORT);
    if (fromEnv === null) {
      return { ok: false, error: `Invalid CV_SESSION_PORT: ${env.CV_SESSION_PORT}. Must be a number between 1 and 65535.` };
    }
    port = fromEnv;
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === '--root' && value) {
      root = value;
      i++;
    } else if (arg === '--port' && value) {
      const parsed = parsePort(value);
      if (parsed === null) {
        return { ok: false, error: `Invalid port: ${value}. Must be a number between 1 and 65535.` };
      }
      port = parsed;
      i++;
    } else if (arg === '--host' && value) {
      host = value;
      i++;
    } else if (arg === '--launcher' && value) {
      launchers = [...(launchers ?? []), value];
      i++;
    } else {
      return { ok: false, error: `Unknown or incomplete option: ${arg}` };
    }
  }

  return {
    ok: true,
    args: { root: path.resolve(cwd, root), port, host, launchers },
  };
}
