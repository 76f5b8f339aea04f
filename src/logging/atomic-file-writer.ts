/**
 * Atomic File Writer
 *
 * Replaces a file's contents in one write with a bounded retry, optionally
 * followed by fsync. Used for the small JSON files the CV process polls.
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_MAX_RETRIES = 3;

export interface AtomicWriteOptions {
  /** Maximum retry attempts after the first failure (default: 3) */
  maxRetries?: number;
  /** fsync after the write (default: false) */
  fsync?: boolean;
  /** Create missing parent directories (default: true) */
  createParentDirs?: boolean;
  /** File permissions (default: 0o644) */
  mode?: number;
}

export type AtomicWriteResult =
  | { success: true; retryCount: number }
  | { success: false; retryCount: number; error: Error };

function writeOnce(filePath: string, content: string, options: AtomicWriteOptions): void {
  if (options.createParentDirs ?? true) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  fs.writeFileSync(filePath, content, { encoding: 'utf-8', mode: options.mode ?? 0o644 });

  if (options.fsync) {
    const fd = fs.openSync(filePath, 'r');
    try {
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }
}

/**
 * Synchronous overwrite with retry. The caller decides what a failure means.
 */
export function atomicWriteFileSync(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): AtomicWriteResult {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  let lastError: Error = new Error(`No write attempted for ${filePath}`);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      writeOnce(filePath, content, options);
      return { success: true, retryCount: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }
  }

  return { success: false, retryCount: maxRetries, error: lastError };
}
