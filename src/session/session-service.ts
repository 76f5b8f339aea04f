/**
 * Session Service
 *
 * The public operations of the bridge, bound to one explicit context
 * (paths, event channel, logger, supervisor) owned by whoever manages the
 * application's lifetime:
 *
 * - start() / stop()            process group lifecycle
 * - writeWorkoutId(id, session) command channel to the CV process
 * - getRepCount()               rep log snapshot (never fails)
 * - getLiveMetrics()            live metrics snapshot (never fails)
 */

import { SessionOptions, SessionPaths, resolveSessionPaths } from '../config/session-options';
import { Degradable, Fallible } from '../errors/outcome';
import { SessionEventChannel } from '../events/session-event-channel';
import { SessionLogger } from '../logging/session-logger';
import { LiveMetrics, readLiveMetrics } from '../state/live-metrics-reader';
import { RepCountResult, readRepCount } from '../state/rep-log-reader';
import { WorkoutIdRecord, writeWorkoutId } from '../state/workout-id-writer';
import {
  SessionStatus,
  SessionSupervisor,
  StartInfo,
  StopInfo,
} from '../supervisor/session-supervisor';
import { ProcessSpawner } from '../supervisor/process-spawner';

export interface SessionServiceOptions extends SessionOptions {
  channel?: SessionEventChannel;
  logger?: SessionLogger;
  spawner?: ProcessSpawner;
}

export class SessionService {
  readonly paths: SessionPaths;
  readonly channel: SessionEventChannel;
  readonly logger: SessionLogger;
  readonly supervisor: SessionSupervisor;

  constructor(options: SessionServiceOptions) {
    this.paths = resolveSessionPaths(options);
    this.channel = options.channel ?? new SessionEventChannel();
    this.logger = options.logger ?? new SessionLogger();
    this.supervisor = new SessionSupervisor({
      paths: this.paths,
      channel: this.channel,
      logger: this.logger,
      spawner: options.spawner,
    });
  }

  start(): Promise<Fallible<StartInfo>> {
    return this.supervisor.start();
  }

  stop(): Promise<Fallible<StopInfo>> {
    return this.supervisor.stop();
  }

  status(): SessionStatus {
    return this.supervisor.status();
  }

  writeWorkoutId(workoutId: string, session: string): Fallible<WorkoutIdRecord> {
    const result = writeWorkoutId(this.paths.workoutIdFile, workoutId, session);
    if (result.success) {
      this.logger.info('STATE_FILE', `Workout id set: ${result.value.workout_id} (${result.value.session})`);
    } else {
      this.logger.logError('Workout id write failed', result.error, { code: result.error.code });
    }
    return result;
  }

  getRepCount(): RepCountResult {
    return this.unwrap(readRepCount(this.paths.repLogFile));
  }

  getLiveMetrics(): LiveMetrics | null {
    return this.unwrap(readLiveMetrics(this.paths.liveMetricsFile));
  }

  shutdown(): Promise<void> {
    return this.supervisor.shutdown();
  }

  private unwrap<T>(read: Degradable<T>): T {
    if (read.issue) {
      this.logger.debug('STATE_FILE', read.issue.message, { code: read.issue.code });
    }
    return read.value;
  }
}

export function createSessionService(options: SessionServiceOptions): SessionService {
  return new SessionService(options);
}
