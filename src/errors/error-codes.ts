/**
 * Error Codes for the CV session bridge
 *
 * E1xx: Configuration errors - primary cannot be located
 * E2xx: Lifecycle errors - primary process could not be started
 * E3xx: State file errors - shared JSON files could not be read or written
 * E4xx: Locking errors - session state is no longer trustworthy
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  LIFECYCLE = 'LIFECYCLE',
  STATE_FILE = 'STATE_FILE',
  LOCKING = 'LOCKING',
}

/**
 * Error Codes
 */
export enum ErrorCode {
  // E1xx: Configuration
  E101_SESSION_CONFIG_MISSING = 'E101',
  E102_SESSION_CONFIG_UNREADABLE = 'E102',
  E103_SESSION_CONFIG_MALFORMED = 'E103',
  E104_PRIMARY_SCRIPT_NOT_FOUND = 'E104',

  // E2xx: Lifecycle
  E201_PRIMARY_SPAWN_FAILED = 'E201',
  E202_PRIMARY_STDOUT_MISSING = 'E202',
  E203_AUXILIARY_SPAWN_FAILED = 'E203',
  E204_PROCESS_KILL_FAILED = 'E204',

  // E3xx: State files
  E301_STATE_FILE_MISSING = 'E301',
  E302_STATE_FILE_UNREADABLE = 'E302',
  E303_STATE_FILE_MALFORMED = 'E303',
  E304_STATE_FILE_WRITE_FAILED = 'E304',

  // E4xx: Locking
  E401_SESSION_LOCK_POISONED = 'E401',
}

const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.E101_SESSION_CONFIG_MISSING]: 'Session config file not found',
  [ErrorCode.E102_SESSION_CONFIG_UNREADABLE]: 'Session config file could not be read',
  [ErrorCode.E103_SESSION_CONFIG_MALFORMED]: 'Session config file is malformed',
  [ErrorCode.E104_PRIMARY_SCRIPT_NOT_FOUND]: 'Primary CV script not found',

  [ErrorCode.E201_PRIMARY_SPAWN_FAILED]: 'Failed to spawn the primary CV process',
  [ErrorCode.E202_PRIMARY_STDOUT_MISSING]: 'Primary CV process has no stdout pipe',
  [ErrorCode.E203_AUXILIARY_SPAWN_FAILED]: 'Failed to spawn a session script',
  [ErrorCode.E204_PROCESS_KILL_FAILED]: 'Failed to terminate a process',

  [ErrorCode.E301_STATE_FILE_MISSING]: 'State file not found',
  [ErrorCode.E302_STATE_FILE_UNREADABLE]: 'State file could not be read',
  [ErrorCode.E303_STATE_FILE_MALFORMED]: 'State file is malformed',
  [ErrorCode.E304_STATE_FILE_WRITE_FAILED]: 'Failed to write state file',

  [ErrorCode.E401_SESSION_LOCK_POISONED]: 'Session lock is poisoned',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (code.startsWith('E2')) {
    return ErrorCategory.LIFECYCLE;
  }
  if (code.startsWith('E3')) {
    return ErrorCategory.STATE_FILE;
  }
  return ErrorCategory.LOCKING;
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code];
}
