/**
 * Rep log reader
 *
 * cv/reps_log.jsonl is appended by the CV process, one JSON object per rep:
 *   {"timestamp_ms": 1520, "summary": {...}}
 * Both fields are optional. A log that does not exist yet means no reps.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ErrorCode } from '../errors/error-codes';
import { Degradable, available, degraded } from '../errors/outcome';

export const RepLogEntrySchema = z.object({
  timestamp_ms: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).nullish(),
  summary: z.unknown().optional(),
});

export type RepLogEntry = z.infer<typeof RepLogEntrySchema>;

export interface RepCountResult {
  count: number;
  last_summary?: unknown;
  rep_timestamps: number[];
}

export function emptyRepCount(): RepCountResult {
  return { count: 0, rep_timestamps: [] };
}

export function parseRepLogLine(line: string): RepLogEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = RepLogEntrySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Count reps in log content.
 *
 * Every non-empty line counts, parseable or not. Timestamps come from the
 * lines that parse. The summary comes from the final line alone.
 */
export function summarizeRepLog(content: string): RepCountResult {
  const lines = content
    .split('\n')
    .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line))
    .filter((line) => line.length > 0);

  const repTimestamps: number[] = [];
  for (const line of lines) {
    const entry = parseRepLogLine(line);
    if (entry && entry.timestamp_ms !== undefined && entry.timestamp_ms !== null) {
      repTimestamps.push(entry.timestamp_ms);
    }
  }

  const result: RepCountResult = { count: lines.length, rep_timestamps: repTimestamps };
  if (lines.length > 0) {
    const last = parseRepLogLine(lines[lines.length - 1]);
    if (last && last.summary !== undefined && last.summary !== null) {
      result.last_summary = last.summary;
    }
  }
  return result;
}

export function readRepCount(filePath: string): Degradable<RepCountResult> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    return missing
      ? degraded(emptyRepCount(), ErrorCode.E301_STATE_FILE_MISSING, filePath)
      : degraded(emptyRepCount(), ErrorCode.E302_STATE_FILE_UNREADABLE, `${filePath}: ${String(error)}`);
  }
  return available(summarizeRepLog(content));
}
