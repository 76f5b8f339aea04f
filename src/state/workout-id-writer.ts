/**
 * Workout id command file
 *
 * The bridge tells the CV process which workout is active and whether the
 * session is on by overwriting a one-line JSON file:
 *   {"workout_id":"squat","session":"on"}
 */

import { ErrorCode } from '../errors/error-codes';
import { Fallible, fail, succeed } from '../errors/outcome';
import { atomicWriteFileSync } from '../logging/atomic-file-writer';

export type SessionFlag = 'on' | 'off';

export interface WorkoutIdRecord {
  workout_id: string;
  session: SessionFlag;
}

/**
 * "on" in any letter case is on; every other value is off
 */
export function normalizeSessionFlag(session: string): SessionFlag {
  return session.toLowerCase() === 'on' ? 'on' : 'off';
}

export function serializeWorkoutId(record: WorkoutIdRecord): string {
  return `${JSON.stringify({ workout_id: record.workout_id, session: record.session })}\n`;
}

/**
 * Replace the workout id file. Write failures are returned, not swallowed.
 */
export function writeWorkoutId(filePath: string, workoutId: string, session: string): Fallible<WorkoutIdRecord> {
  const record: WorkoutIdRecord = {
    workout_id: workoutId,
    session: normalizeSessionFlag(session),
  };

  const result = atomicWriteFileSync(filePath, serializeWorkoutId(record), { createParentDirs: false });
  if (!result.success) {
    return fail(ErrorCode.E304_STATE_FILE_WRITE_FAILED, `${filePath}: ${result.error.message}`);
  }
  return succeed(record);
}
