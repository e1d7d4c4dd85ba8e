import lockfile from 'proper-lockfile';

import { LOCKS } from '../constants/index.js';
import { describeError, FileSystemError } from './errors.js';
import { isErrnoException } from './fs.js';
import { logger } from './logger.js';
import { sleep } from './time.js';

/**
 * Advisory locks shared between modkeeper processes working on one server
 * directory. A lock on `path` is the directory `<path>.lock`; `path` itself
 * need not exist.
 */

export type ReleaseLock = () => Promise<void>;

function isHeldElsewhere(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ELOCKED';
}

async function acquire(path: string): Promise<ReleaseLock> {
  const release = await lockfile.lock(path, {
    realpath: false,
    stale: LOCKS.STALE_MS,
    retries: 0,
    onCompromised: (error: Error) => {
      logger.error(`Lock on ${path} was lost: ${error.message}`);
    }
  });

  return async () => {
    try {
      await release();
    } catch (error) {
      logger.warn(`Could not release lock on ${path}: ${describeError(error)}`);
    }
  };
}

/**
 * Wait until the lock on `path` is free and take it. Only a lock held by
 * someone else is waited for; any other failure is thrown at once.
 */
export async function acquireFileLock(path: string): Promise<ReleaseLock> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await acquire(path);
    } catch (error) {
      if (!isHeldElsewhere(error)) {
        throw new FileSystemError(`cannot lock ${path}: ${describeError(error)}`, { path });
      }
      if (attempt >= LOCKS.MAX_RETRIES) {
        throw new FileSystemError(`timed out waiting for the lock on ${path}`, { path });
      }
      await sleep(LOCKS.RETRY_INTERVAL_MS);
    }
  }
}

/**
 * Take the lock on `path` if nobody holds it. Null when it is held.
 */
export async function tryFileLock(path: string): Promise<ReleaseLock | null> {
  try {
    return await acquire(path);
  } catch (error) {
    if (isHeldElsewhere(error)) {
      return null;
    }
    throw new FileSystemError(`cannot lock ${path}: ${describeError(error)}`, { path });
  }
}

export async function withFileLock<T>(path: string, task: () => Promise<T>): Promise<T> {
  const release = await acquireFileLock(path);
  try {
    return await task();
  } finally {
    await release();
  }
}
