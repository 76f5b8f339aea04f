/**
 * Session Lock
 *
 * Serializes check-and-mutate sections over the supervisor's process handles.
 * Sections run one at a time in arrival order, including across awaits.
 *
 * A section that throws leaves the handles in an unknown state: the lock is
 * poisoned and every later acquisition fails with E401.
 */

import { ErrorCode } from '../errors/error-codes';
import { SessionError, describeError } from '../errors/session-error';

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private poisonCause: string | null = null;
  private held = false;

  isPoisoned(): boolean {
    return this.poisonCause !== null;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Run `critical` while holding the lock.
   * @throws SessionError E401 if the lock was poisoned by an earlier section
   */
  async runExclusive<T>(label: string, critical: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    this.held = true;
    try {
      if (this.poisonCause !== null) {
        throw new SessionError(ErrorCode.E401_SESSION_LOCK_POISONED, this.poisonCause);
      }
      try {
        return await critical();
      } catch (error) {
        this.poisonCause = `${label} failed: ${describeError(error)}`;
        throw error;
      }
    } finally {
      this.held = false;
      release();
    }
  }
}
