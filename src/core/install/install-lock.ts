import { promises as fs } from 'fs';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { FILE_PATTERNS, LOCK_POLL_INTERVAL_MS } from '../../constants/index.js';
import { LockError, hasErrnoCode } from '../../utils/errors.js';
import { ensureDir } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface InstallLock {
  path: string;
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export function installLockPath(locksDir: string, tool: string, version: string): string {
  return join(locksDir, `${tool}@${version}${FILE_PATTERNS.LOCK_FILES}`);
}

/**
 * Take locks/<tool>@<version>.lock, waiting while another process holds it.
 * The lock file is created exclusively and holds the owner's pid.
 */
export async function acquireInstallLock(
  locksDir: string,
  tool: string,
  version: string,
  options: AcquireLockOptions
): Promise<InstallLock> {
  const path = installLockPath(locksDir, tool, version);
  const pollIntervalMs = options.pollIntervalMs ?? LOCK_POLL_INTERVAL_MS;
  const deadline = Date.now() + options.timeoutMs;
  await ensureDir(locksDir);

  let announced = false;
  for (;;) {
    options.signal?.throwIfAborted();
    try {
      const handle = await fs.open(path, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n`);
      } finally {
        await handle.close();
      }
      logger.debug(`Acquired install lock ${path}`);
      return {
        path,
        async release() {
          await fs.rm(path, { force: true });
          logger.debug(`Released install lock ${path}`);
        }
      };
    } catch (error) {
      if (!hasErrnoCode(error, 'EEXIST')) {
        throw new LockError(`Failed to create lock file ${path}`, { path, error });
      }
    }

    if (Date.now() >= deadline) {
      throw new LockError(
        `Timed out after ${options.timeoutMs}ms waiting for another installation of ${tool}@${version}. If no other install is running, remove ${path}`,
        { path, tool, version }
      );
    }
    if (!announced) {
      logger.info(`Waiting for another installation of ${tool}@${version} to finish`);
      announced = true;
    }
    await sleep(pollIntervalMs, undefined, { signal: options.signal });
  }
}

export async function withInstallLock<T>(
  locksDir: string,
  tool: string,
  version: string,
  options: AcquireLockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const lock = await acquireInstallLock(locksDir, tool, version, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
