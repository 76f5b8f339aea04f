/**
 * Session Options
 *
 * Every file the bridge touches sits at a well-known location under one
 * fixed root, shared with the CV process.
 */

import * as path from 'path';

export interface SessionOptions {
  /** Root directory all relative paths resolve against */
  root: string;
  /** Launchers tried in order for the primary script until one spawns */
  launchers?: string[];
  /** Primary CV script, relative to root */
  primaryScript?: string;
  /** Session config listing auxiliary scripts, relative to root */
  configFile?: string;
  /** Append-only rep log written by the CV process, relative to root */
  repLogFile?: string;
  /** Live metrics snapshot written by the CV process, relative to root */
  liveMetricsFile?: string;
  /** Workout id command file read by the CV process, relative to root */
  workoutIdFile?: string;
}

export const DEFAULT_SESSION_OPTIONS = {
  launchers: ['python3', 'python'],
  primaryScript: path.join('cv', 'cv_stdout_frames.py'),
  configFile: 'session_config.json',
  repLogFile: path.join('cv', 'reps_log.jsonl'),
  liveMetricsFile: path.join('cv', 'session_live.json'),
  workoutIdFile: 'workout_id.json',
};

/**
 * Absolute locations derived from SessionOptions
 */
export interface SessionPaths {
  root: string;
  launchers: string[];
  primaryScript: string;
  configFile: string;
  repLogFile: string;
  liveMetricsFile: string;
  workoutIdFile: string;
}

export function resolveSessionPaths(options: SessionOptions): SessionPaths {
  const root = path.resolve(options.root);
  const at = (relative: string | undefined, fallback: string): string =>
    path.resolve(root, relative || fallback);

  const launchers = options.launchers && options.launchers.length > 0
    ? [...options.launchers]
    : [...DEFAULT_SESSION_OPTIONS.launchers];

  return {
    root,
    launchers,
    primaryScript: at(options.primaryScript, DEFAULT_SESSION_OPTIONS.primaryScript),
    configFile: at(options.configFile, DEFAULT_SESSION_OPTIONS.configFile),
    repLogFile: at(options.repLogFile, DEFAULT_SESSION_OPTIONS.repLogFile),
    liveMetricsFile: at(options.liveMetricsFile, DEFAULT_SESSION_OPTIONS.liveMetricsFile),
    workoutIdFile: at(options.workoutIdFile, DEFAULT_SESSION_OPTIONS.workoutIdFile),
  };
}
