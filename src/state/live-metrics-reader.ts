/**
 * Live metrics reader
 *
 * cv/session_live.json is overwritten by the CV process whenever the live
 * state changes (e.g. Depth, Knees for squats). It may not exist yet or be
 * caught mid-write, so both cases read as "no metrics".
 */

import * as fs from 'fs';
import { ErrorCode } from '../errors/error-codes';
import { Degradable, available, degraded } from '../errors/outcome';

export type LiveMetrics = unknown;

export function readLiveMetrics(filePath: string): Degradable<LiveMetrics | null> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    return degraded(null, ErrorCode.E301_STATE_FILE_MISSING, `${filePath}: ${String(error)}`);
  }

  try {
    const metrics: unknown = JSON.parse(content);
    return available(metrics);
  } catch (error) {
    return degraded(null, ErrorCode.E303_STATE_FILE_MALFORMED, `${filePath}: ${String(error)}`);
  }
}
