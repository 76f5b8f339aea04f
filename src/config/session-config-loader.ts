/**
 * Session Config Loader
 *
 * Reads session_config.json:
 *   { "session_scripts": ["python ProcessedData/synthesizer.py", ...] }
 *
 * A missing, unreadable or malformed file means "no session scripts".
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ErrorCode } from '../errors/error-codes';
import { Degradable, available, degraded } from '../errors/outcome';

export const SessionConfigSchema = z.object({
  session_scripts: z.array(z.string()).default([]),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export interface CommandLine {
  program: string;
  args: string[];
}

export function loadSessionConfig(configPath: string): Degradable<string[]> {
  if (!fs.existsSync(configPath)) {
    return degraded([], ErrorCode.E101_SESSION_CONFIG_MISSING, configPath);
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    return degraded([], ErrorCode.E102_SESSION_CONFIG_UNREADABLE, `${configPath}: ${String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return degraded([], ErrorCode.E103_SESSION_CONFIG_MALFORMED, `${configPath}: ${String(error)}`);
  }

  const parsed = SessionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first.path.length > 0 ? first.path.join('.') : '(root)';
    return degraded([], ErrorCode.E103_SESSION_CONFIG_MALFORMED, `${configPath}: ${where} ${first.message}`);
  }

  return available(parsed.data.session_scripts);
}

/**
 * Split a command line on whitespace: first token is the program.
 * No quoting rules apply. Returns null for a blank command.
 */
export function splitCommandLine(command: string): CommandLine | null {
  const parts = command.split(/\s+/).filter((part) => part.length > 0);
  if (parts.length === 0) {
    return null;
  }
  const [program, ...args] = parts;
  return { program, args };
}
