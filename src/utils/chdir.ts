/**
 * @fileoverview Scoped working-directory changes
 *
 * The process working directory is global, so every scoped change goes
 * through one process-wide mutex and is undone on every exit path.
 */

import { AsyncSemaphore } from './async.js';
import { logDebug } from '../telemetry/logger.js';

const workingDirectoryLock = new AsyncSemaphore(1);

/**
 * Run `task` with `directory` as the working directory, restoring the previous
 * one afterwards. A null or undefined directory runs the task in place.
 */
export async function withWorkingDirectory<T>(
  directory: string | null | undefined,
  task: () => Promise<T>,
): Promise<T> {
  if (directory === null || directory === undefined) {
    return task();
  }

  return workingDirectoryLock.run(async () => {
    const previous = process.cwd();
    process.chdir(directory);
    logDebug(`[chdir] entered ${directory}`);
    try {
      return await task();
    } finally {
      process.chdir(previous);
      logDebug(`[chdir] restored ${previous}`);
    }
  });
}
