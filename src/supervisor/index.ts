/**
 * Supervisor Module
 *
 * Process lifecycle for the primary CV process and its session scripts,
 * and the output pump that streams primary stdout into the event channel.
 */

export {
  SessionSupervisor,
  createSessionSupervisor,
} from './session-supervisor';
export type {
  SessionStatus,
  SessionSupervisorEvents,
  SessionSupervisorOptions,
  StartInfo,
  StopInfo,
} from './session-supervisor';

export { OutputPump, startOutputPump } from './output-pump';
export type {
  EventPublisher,
  OutputPumpOptions,
  PumpEndReason,
  PumpStats,
  PumpSummary,
} from './output-pump';

export { nodeSpawner, spawnConfirmed } from './process-spawner';
export type { ManagedProcess, ProcessSpawner } from './process-spawner';
