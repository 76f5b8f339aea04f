/**
 * CV Session Bridge
 *
 * Bridges a long-running computer-vision process to a front end: process
 * lifecycle, stdout frame streaming, session scripts and the JSON state
 * files shared with the CV process.
 */

export { SessionService, createSessionService } from './session/session-service';
export type { SessionServiceOptions } from './session/session-service';

export { DEFAULT_SESSION_OPTIONS, resolveSessionPaths } from './config/session-options';
export type { SessionOptions, SessionPaths } from './config/session-options';
export { SessionConfigSchema, loadSessionConfig, splitCommandLine } from './config/session-config-loader';
export type { CommandLine, SessionConfig } from './config/session-config-loader';

export { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './errors/error-codes';
export { SessionError, describeError } from './errors/session-error';
export { available, degraded, fail, succeed } from './errors/outcome';
export type { Degradable, Fallible, RecoverableIssue } from './errors/outcome';

export {
  CV_FRAME_TOPIC,
  SESSION_TOPIC,
  SessionEventChannel,
} from './events/session-event-channel';
export type {
  PublishReport,
  SessionEvent,
  SessionEventChannelOptions,
  SessionEventSubscriber,
  SessionTopic,
} from './events/session-event-channel';

export { SESSION_LOG_CATEGORIES, SessionLogger, isSessionLogCategory } from './logging/session-logger';
export type {
  SessionLogCategory,
  SessionLogEntry,
  SessionLogLevel,
  SessionLoggerOptions,
  SessionLogSubscriber,
} from './logging/session-logger';

export * from './supervisor/index';
export * from './state/index';

export { WebServer, createApp } from './web/server';
export type { WebServerConfig, WebServerState } from './web/server';
