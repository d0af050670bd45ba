import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import * as lockfile from 'proper-lockfile';
import { LockUnavailableException } from './exceptions/lock-unavailable.exception';
import { actionsLogger, Logger } from './logger';
import { ensureDir } from './store';
import { errorMessage } from './util';

// A holder that stops refreshing its lock for this long is presumed dead.
const STALE_LOCK_MS = 10000;

export class OperationLock {
  constructor(
    readonly path: string,
    private readonly logger: Logger = actionsLogger,
  ) {}

  /** Blocks until the lock is held, with no timeout, and releases it however `fn` ends. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.path, {
        stale: STALE_LOCK_MS,
        realpath: false,
        onCompromised: (error) => this.logger.warning(`Lock ${this.path} was compromised: ${error.message}`),
        retries: {
          forever: true,
          minTimeout: 25,
          maxTimeout: 250,
          factor: 1.5,
        },
      });
    } catch (error) {
      throw new LockUnavailableException(this.path, errorMessage(error));
    }

    try {
      return await fn();
    } finally {
      await release();
    }
  }
}

// Operation names can be whole scripts; keep a readable prefix and disambiguate with a digest.
export const lockFileName = (operation: string): string => {
  const readable = operation.replace(/[^A-Za-z0-9_.-]+/g, '_').slice(0, 40);
  const digest = crypto.createHash('sha1').update(operation).digest('hex').slice(0, 12);
  return `${readable}-${digest}.lock`;
};

/**
 * Hands out one advisory lock per operation. When the lock directory cannot be
 * prepared the operation is cached without mutual exclusion, and says so.
 */
export class RecomputeMutex {
  private readonly logger: Logger;

  constructor(
    readonly locksDir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? actionsLogger;
  }

  async forOperation(operation: string): Promise<OperationLock | undefined> {
    const lockPath = path.join(this.locksDir, lockFileName(operation));
    try {
      await ensureDir(this.locksDir);
      if (!fs.existsSync(lockPath)) {
        await fs.promises.writeFile(lockPath, '');
      }
      return new OperationLock(lockPath, this.logger);
    } catch (error) {
      this.logger.warning(
        `${operation}: locking unavailable (${errorMessage(error)}), caching will not use mutual-exclusion.`,
      );
      return undefined;
    }
  }
}
