/**
 * Process Spawner
 *
 * The slice of ChildProcess the supervisor relies on, and a spawn that only
 * resolves once the OS has actually started the program. Node reports a
 * missing executable asynchronously ('error' instead of 'spawn'), so a
 * returned ChildProcess alone does not mean the process is running.
 */

import { spawn, SpawnOptions } from 'child_process';
import { Readable } from 'stream';

export interface ManagedProcess {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: 'error', listener: (error: Error) => void): this;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type ProcessSpawner = (command: string, args: string[], options: SpawnOptions) => ManagedProcess;

export const nodeSpawner: ProcessSpawner = (command, args, options) => spawn(command, args, options);

/**
 * Spawn and wait for the 'spawn' or 'error' event, whichever comes first.
 *
 * @param onLateError - receives errors emitted after the process started
 *   (e.g. a failed kill); without a listener Node would rethrow them
 */
export function spawnConfirmed(
  spawner: ProcessSpawner,
  command: string,
  args: string[],
  options: SpawnOptions,
  onLateError: (error: Error) => void
): Promise<ManagedProcess> {
  return new Promise((resolve, reject) => {
    let child: ManagedProcess;
    try {
      child = spawner(command, args, options);
    } catch (error) {
      reject(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    let settled = false;
    child.once('spawn', () => {
      if (!settled) {
        settled = true;
        resolve(child);
      }
    });
    child.on('error', (error) => {
      if (!settled) {
        settled = true;
        reject(error);
        return;
      }
      onLateError(error);
    });
  });
}
