/**
 * Session Supervisor
 *
 * Single owner of the primary CV process and the session scripts started
 * with it:
 * - start() is idempotent: a present primary handle means "already running"
 * - the primary is launched with a fallback launcher, stdout piped into the
 *   output pump, stderr left on the operator's terminal
 * - session scripts from session_config.json are best-effort
 * - stop() kills the whole group (SIGKILL, no drain) and does not wait
 *
 * Handles are only read or changed while holding the session lock, which is
 * held from the presence check through handle storage. A start that throws
 * partway kills whatever it had started before the lock is poisoned.
 *
 * A primary that exits on its own is recorded but its handle is kept: the
 * session stays "running" (and start() stays a no-op) until stop().
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import { SpawnOptions } from 'child_process';
import { SessionPaths } from '../config/session-options';
import { loadSessionConfig, splitCommandLine } from '../config/session-config-loader';
import { ErrorCode } from '../errors/error-codes';
import { Fallible, fail, succeed } from '../errors/outcome';
import { SessionError, describeError } from '../errors/session-error';
import { SESSION_TOPIC, SessionEventChannel } from '../events/session-event-channel';
import { SessionLock } from '../locks/session-lock';
import { SessionLogger } from '../logging/session-logger';
import { OutputPump, PumpStats, startOutputPump } from './output-pump';
import { ManagedProcess, ProcessSpawner, nodeSpawner, spawnConfirmed } from './process-spawner';

interface PrimaryHandle {
  process: ManagedProcess;
  pid: number | null;
  launcher: string;
  startedAt: Date;
  pump: OutputPump;
  stopRequested: boolean;
  exit: { code: number | null; signal: NodeJS.Signals | null } | null;
}

interface AuxiliaryHandle {
  process: ManagedProcess;
  pid: number | null;
  command: string;
}

export interface StartInfo {
  pid: number | null;
  alreadyRunning: boolean;
  auxiliaryCount: number;
  skippedAuxiliaryCount: number;
}

export interface StopInfo {
  wasRunning: boolean;
  auxiliaryStopped: number;
}

export interface SessionStatus {
  state: 'idle' | 'running';
  primary: {
    pid: number | null;
    launcher: string;
    startedAt: string;
    exited: boolean;
    exitCode: number | null;
    exitSignal: string | null;
  } | null;
  auxiliaries: Array<{ pid: number | null; command: string }>;
  pump: PumpStats | null;
  lockPoisoned: boolean;
}

/**
 * Supervisor events
 */
export interface SessionSupervisorEvents {
  'primary:started': (pid: number | null) => void;
  'primary:exited': (code: number | null, signal: NodeJS.Signals | null) => void;
  'auxiliary:spawned': (command: string, pid: number | null) => void;
  'session:stopped': (info: StopInfo) => void;
}

export interface SessionSupervisorOptions {
  paths: SessionPaths;
  channel: SessionEventChannel;
  logger: SessionLogger;
  /** Defaults to child_process.spawn */
  spawner?: ProcessSpawner;
}

export class SessionSupervisor extends EventEmitter {
  private readonly paths: SessionPaths;
  private readonly channel: SessionEventChannel;
  private readonly logger: SessionLogger;
  private readonly spawner: ProcessSpawner;
  private readonly lock = new SessionLock();

  private primary: PrimaryHandle | null = null;
  private auxiliaries: AuxiliaryHandle[] = [];

  constructor(options: SessionSupervisorOptions) {
    super();
    this.paths = options.paths;
    this.channel = options.channel;
    this.logger = options.logger;
    this.spawner = options.spawner ?? nodeSpawner;
  }

  /**
   * Start the primary CV process, its output pump and the session scripts
   */
  async start(): Promise<Fallible<StartInfo>> {
    return this.guard('start', () => this.startLocked());
  }

  /**
   * Kill the primary and every session script, then forget them
   */
  async stop(): Promise<Fallible<StopInfo>> {
    return this.guard('stop', async () => succeed(this.terminateAll()));
  }

  /**
   * Application teardown: stop, and kill directly if the lock is unusable
   */
  async shutdown(): Promise<void> {
    const result = await this.stop();
    this.removeAllListeners();
    if (!result.success) {
      this.killOwned();
    }
  }

  status(): SessionStatus {
    const primary = this.primary;
    return {
      state: primary ? 'running' : 'idle',
      primary: primary
        ? {
            pid: primary.pid,
            launcher: primary.launcher,
            startedAt: primary.startedAt.toISOString(),
            exited: primary.exit !== null,
            exitCode: primary.exit?.code ?? null,
            exitSignal: primary.exit?.signal ?? null,
          }
        : null,
      auxiliaries: this.auxiliaries.map((aux) => ({ pid: aux.pid, command: aux.command })),
      pump: primary ? primary.pump.getStats() : null,
      lockPoisoned: this.lock.isPoisoned(),
    };
  }

  isRunning(): boolean {
    return this.primary !== null;
  }

  private async startLocked(): Promise<Fallible<StartInfo>> {
    if (this.primary) {
      this.logger.debug('LIFECYCLE', 'Start ignored: primary already running', { pid: this.primary.pid });
      return succeed({
        pid: this.primary.pid,
        alreadyRunning: true,
        auxiliaryCount: this.auxiliaries.length,
        skippedAuxiliaryCount: 0,
      });
    }

    if (!fs.existsSync(this.paths.primaryScript)) {
      this.logger.warn('SPAWN', `Primary script not found at ${this.paths.primaryScript}`);
      return fail(ErrorCode.E104_PRIMARY_SCRIPT_NOT_FOUND, this.paths.primaryScript);
    }

    const spawned = await this.spawnPrimary();
    if (!spawned.success) {
      return spawned;
    }

    const { process: child, launcher } = spawned.value;
    const stdout = child.stdout;
    if (!stdout) {
      this.killQuietly(child, 'primary');
      return fail(ErrorCode.E202_PRIMARY_STDOUT_MISSING, launcher);
    }

    const handle: PrimaryHandle = {
      process: child,
      pid: child.pid ?? null,
      launcher,
      startedAt: new Date(),
      pump: startOutputPump(stdout, this.channel, { logger: this.logger }),
      stopRequested: false,
      exit: null,
    };
    this.primary = handle;
    child.once('exit', (code, signal) => this.onPrimaryExit(handle, code, signal));

    try {
      this.logger.info('LIFECYCLE', `Primary CV process started via ${launcher}`, { pid: handle.pid });
      this.emit('primary:started', handle.pid);

      const skipped = await this.spawnAuxiliaries();
      const auxiliaryCount = this.auxiliaries.length;

      this.publishSessionEvent({ type: 'started', pid: handle.pid, auxiliaryCount });

      return succeed({
        pid: handle.pid,
        alreadyRunning: false,
        auxiliaryCount,
        skippedAuxiliaryCount: skipped,
      });
    } catch (error) {
      // An incomplete start leaves nothing running
      const rolledBack = this.killOwned();
      this.logger.warn('LIFECYCLE', 'Start did not complete; started processes killed', { ...rolledBack });
      throw error;
    }
  }

  private async spawnPrimary(): Promise<Fallible<{ process: ManagedProcess; launcher: string }>> {
    const options: SpawnOptions = {
      cwd: this.paths.root,
      stdio: ['ignore', 'pipe', 'inherit'],
    };
    const failures: string[] = [];

    for (const launcher of this.paths.launchers) {
      try {
        const child = await spawnConfirmed(
          this.spawner,
          launcher,
          [this.paths.primaryScript],
          options,
          (error) => this.logger.logError('Primary CV process error', error, { launcher })
        );
        return succeed({ process: child, launcher });
      } catch (error) {
        failures.push(`${launcher}: ${describeError(error)}`);
        this.logger.warn('SPAWN', `Launcher ${launcher} failed`, { error: describeError(error) });
      }
    }

    return fail(ErrorCode.E201_PRIMARY_SPAWN_FAILED, failures.join('; '));
  }

  /**
   * Spawn the configured session scripts into the session.
   * @returns the number of scripts skipped
   */
  private async spawnAuxiliaries(): Promise<number> {
    const config = loadSessionConfig(this.paths.configFile);
    if (config.issue) {
      this.logger.debug('CONFIG', `No session scripts: ${config.issue.message}`, { code: config.issue.code });
    }

    const options: SpawnOptions = {
      cwd: this.paths.root,
      stdio: ['ignore', 'ignore', 'ignore'],
    };
    let skipped = 0;

    for (const command of config.value) {
      const commandLine = splitCommandLine(command);
      if (!commandLine) {
        continue;
      }
      let child: ManagedProcess;
      try {
        child = await spawnConfirmed(
          this.spawner,
          commandLine.program,
          commandLine.args,
          options,
          (error) => this.logger.debug('AUXILIARY', `Session script error: ${error.message}`, { command })
        );
      } catch (error) {
        skipped++;
        this.logger.debug('AUXILIARY', `Session script skipped: ${command}`, {
          code: ErrorCode.E203_AUXILIARY_SPAWN_FAILED,
          error: describeError(error),
        });
        continue;
      }

      const aux: AuxiliaryHandle = { process: child, pid: child.pid ?? null, command };
      this.auxiliaries.push(aux);
      this.logger.info('AUXILIARY', `Session script started: ${command}`, { pid: aux.pid });
      this.emit('auxiliary:spawned', command, aux.pid);
    }

    return skipped;
  }

  /**
   * Take every handle out of the session and SIGKILL it
   */
  private killOwned(): StopInfo {
    const primary = this.primary;
    const auxiliaries = this.auxiliaries;
    this.primary = null;
    this.auxiliaries = [];

    if (primary) {
      primary.stopRequested = true;
      this.killQuietly(primary.process, 'primary');
    }
    for (const aux of auxiliaries) {
      this.killQuietly(aux.process, aux.command);
    }

    return { wasRunning: primary !== null, auxiliaryStopped: auxiliaries.length };
  }

  private terminateAll(): StopInfo {
    const info = this.killOwned();
    if (info.wasRunning || info.auxiliaryStopped > 0) {
      this.logger.info('LIFECYCLE', 'Session stopped', { ...info });
      this.publishSessionEvent({ type: 'stopped', ...info });
    }
    this.emit('session:stopped', info);
    return info;
  }

  private killQuietly(child: ManagedProcess, label: string): void {
    try {
      if (!child.kill('SIGKILL')) {
        this.logger.debug('LIFECYCLE', `Kill not delivered to ${label} (already exited)`, { pid: child.pid });
      }
    } catch (error) {
      this.logger.debug('LIFECYCLE', `Kill failed for ${label}`, {
        code: ErrorCode.E204_PROCESS_KILL_FAILED,
        error: describeError(error),
      });
    }
  }

  private onPrimaryExit(handle: PrimaryHandle, code: number | null, signal: NodeJS.Signals | null): void {
    handle.exit = { code, signal };
    if (handle.stopRequested) {
      return;
    }
    // The handle stays in place; only stop() ends the session
    this.logger.warn('LIFECYCLE', 'Primary CV process exited without stop; session scripts keep running', {
      pid: handle.pid,
      code,
      signal,
    });
    this.emit('primary:exited', code, signal);
    this.publishSessionEvent({ type: 'primary-exited', pid: handle.pid, code, signal });
  }

  private publishSessionEvent(event: Record<string, unknown>): void {
    this.channel.publish(SESSION_TOPIC, JSON.stringify(event));
  }

  private async guard<T>(label: string, critical: () => Promise<Fallible<T>>): Promise<Fallible<T>> {
    try {
      return await this.lock.runExclusive(label, critical);
    } catch (error) {
      if (error instanceof SessionError) {
        this.logger.logError(`${label} refused`, error, { code: error.code });
        return { success: false, error };
      }
      this.logger.logError(`${label} failed; session lock poisoned`, error);
      return fail(ErrorCode.E401_SESSION_LOCK_POISONED, `${label} failed: ${describeError(error)}`);
    }
  }
}

export function createSessionSupervisor(options: SessionSupervisorOptions): SessionSupervisor {
  return new SessionSupervisor(options);
}
