/**
 * Session Logger
 *
 * Structured, in-memory record of what the bridge did to its processes and
 * state files. Recent entries are served to the front end; entries at info
 * and above are mirrored to the console for the operator.
 */

export type SessionLogLevel = 'debug' | 'info' | 'warn' | 'error';

export const SESSION_LOG_CATEGORIES = [
  'LIFECYCLE',
  'SPAWN',
  'AUXILIARY',
  'PUMP',
  'CONFIG',
  'STATE_FILE',
  'HTTP',
  'ERROR',
] as const;

export type SessionLogCategory = (typeof SESSION_LOG_CATEGORIES)[number];

export function isSessionLogCategory(value: string): value is SessionLogCategory {
  return SESSION_LOG_CATEGORIES.some((category) => category === value);
}

export interface SessionLogEntry {
  timestamp: string;
  level: SessionLogLevel;
  category: SessionLogCategory;
  message: string;
  details?: Record<string, unknown>;
}

export interface SessionLogSubscriber {
  onLog(entry: SessionLogEntry): void;
}

export interface SessionLoggerOptions {
  /** Maximum entries kept in memory (default: 1000) */
  maxEntries?: number;
  /** Mirror info/warn/error entries to the console (default: true) */
  mirrorToConsole?: boolean;
}

export class SessionLogger {
  private entries: SessionLogEntry[] = [];
  private subscribers: Set<SessionLogSubscriber> = new Set();
  private readonly maxEntries: number;
  private readonly mirrorToConsole: boolean;

  constructor(options: SessionLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.mirrorToConsole = options.mirrorToConsole ?? true;
  }

  log(
    level: SessionLogLevel,
    category: SessionLogCategory,
    message: string,
    details?: Record<string, unknown>
  ): SessionLogEntry {
    const entry: SessionLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details,
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    if (this.mirrorToConsole) {
      this.writeToConsole(entry);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch (error) {
        if (this.mirrorToConsole) {
          console.error('[session] log subscriber failed:', error);
        }
      }
    }

    return entry;
  }

  debug(category: SessionLogCategory, message: string, details?: Record<string, unknown>): SessionLogEntry {
    return this.log('debug', category, message, details);
  }

  info(category: SessionLogCategory, message: string, details?: Record<string, unknown>): SessionLogEntry {
    return this.log('info', category, message, details);
  }

  warn(category: SessionLogCategory, message: string, details?: Record<string, unknown>): SessionLogEntry {
    return this.log('warn', category, message, details);
  }

  /**
   * Log a failure. Stack traces are kept in the entry, not on the console.
   */
  logError(message: string, error: unknown, details: Record<string, unknown> = {}): SessionLogEntry {
    return this.log('error', 'ERROR', message, {
      ...details,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }

  getAll(): SessionLogEntry[] {
    return [...this.entries];
  }

  getByCategory(category: SessionLogCategory): SessionLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getRecent(count: number = 50): SessionLogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: SessionLogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  private writeToConsole(entry: SessionLogEntry): void {
    const line = `[session] ${entry.category} ${entry.message}`;
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.log(line);
        break;
      default:
        // debug stays in memory
        break;
    }
  }
}
