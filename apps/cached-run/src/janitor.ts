import fs from 'fs';
import path from 'path';
import { from, lastValueFrom, mergeMap, toArray } from 'rxjs';
import {
  CLEANUP_LOCK,
  CLEANUP_MARKER,
  DEFAULT_CLEANUP_INTERVAL_SECONDS,
  STALE_SWEEP_LOCK_MS,
  SWEEP_CONCURRENCY,
} from './constants';
import { actionsLogger, Logger } from './logger';
import { ArtifactStore } from './store';
import { SweepResult } from './types';
import { errorMessage, hasErrorCode } from './util';

export interface JanitorOptions {
  logger?: Logger;
  clock?: () => number;
}

export interface SweepOptions {
  force?: boolean;
}

interface Bucket {
  dir: string;
  ttlSeconds: number;
}

/**
 * Reclaims expired artifacts and dangling pointers. Best effort: anything that
 * disappears or cannot be removed mid-sweep is skipped and picked up next time.
 */
export class Janitor {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly store: ArtifactStore, options: JanitorOptions = {}) {
    this.logger = options.logger ?? actionsLogger;
    this.clock = options.clock ?? Date.now;
  }

  get markerPath(): string {
    return path.join(this.store.root, CLEANUP_MARKER);
  }

  get lockPath(): string {
    return path.join(this.store.root, CLEANUP_LOCK);
  }

  /** Smallest TTL on disk bounds the interval, so short-lived entries are not kept a full minute. */
  static minimumInterval(ttls: number[]): number {
    return Math.min(DEFAULT_CLEANUP_INTERVAL_SECONDS, ...ttls.filter((ttl) => ttl > 0));
  }

  async sweep(options: SweepOptions = {}): Promise<SweepResult | undefined> {
    if (!fs.existsSync(this.store.root)) {
      return undefined;
    }

    const buckets = await this.listBuckets();
    const interval = Janitor.minimumInterval(buckets.map((bucket) => bucket.ttlSeconds));
    if (!options.force && (await this.sweptWithin(interval))) {
      return undefined;
    }

    if (!(await this.acquire())) {
      this.logger.debug('Cache sweep already running, skipping.');
      return undefined;
    }

    try {
      await this.touchMarker();
      let removedArtifacts = 0;
      let removedPointers = 0;
      for (const bucket of buckets) {
        removedArtifacts += await this.removeExpired(bucket);
        removedPointers += await this.removeDangling(bucket);
      }
      this.logger.debug(`Cache sweep removed ${removedArtifacts} artifact(s) and ${removedPointers} pointer(s).`);
      return { removedArtifacts, removedPointers };
    } finally {
      await fs.promises.rm(this.lockPath, { recursive: true, force: true });
    }
  }

  private async listBuckets(): Promise<Bucket[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.store.dataDir, { withFileTypes: true });
    } catch {
      return [];
    }
    return entries
      .filter((entry) => entry.isDirectory() && /^\d+$/.test(entry.name))
      .map((entry) => ({
        dir: path.join(this.store.dataDir, entry.name),
        ttlSeconds: parseInt(entry.name, 10),
      }));
  }

  private async sweptWithin(intervalSeconds: number): Promise<boolean> {
    try {
      const { mtimeMs } = await fs.promises.stat(this.markerPath);
      return this.clock() - mtimeMs < intervalSeconds * 1000;
    } catch {
      return false;
    }
  }

  private async touchMarker(): Promise<void> {
    const now = this.clock() / 1000;
    await fs.promises.writeFile(this.markerPath, '');
    await fs.promises.utimes(this.markerPath, now, now);
  }

  private async acquire(): Promise<boolean> {
    try {
      await fs.promises.mkdir(this.lockPath);
      return true;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        this.logger.debug(`Cannot take sweep lock: ${errorMessage(error)}`);
        return false;
      }
    }

    // A lock this old belongs to a sweep that died; take it over.
    try {
      const { mtimeMs } = await fs.promises.stat(this.lockPath);
      if (this.clock() - mtimeMs < STALE_SWEEP_LOCK_MS) {
        return false;
      }
      await fs.promises.rm(this.lockPath, { recursive: true, force: true });
      await fs.promises.mkdir(this.lockPath);
      return true;
    } catch {
      return false;
    }
  }

  private async entries(bucket: Bucket, kind: 'directory' | 'symlink'): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(bucket.dir, { withFileTypes: true });
      return entries
        .filter((entry) => (kind === 'directory' ? entry.isDirectory() : entry.isSymbolicLink()))
        .map((entry) => path.join(bucket.dir, entry.name));
    } catch {
      return [];
    }
  }

  private async removeEach(paths: string[], remove: (target: string) => Promise<boolean>): Promise<number> {
    const results = await lastValueFrom(
      from(paths).pipe(
        mergeMap(async (target) => {
          try {
            return await remove(target);
          } catch (error) {
            this.logger.debug(`Cache sweep skipped ${target}: ${errorMessage(error)}`);
            return false;
          }
        }, SWEEP_CONCURRENCY),
        toArray(),
      ),
    );
    return results.filter(Boolean).length;
  }

  private async removeExpired(bucket: Bucket): Promise<number> {
    const now = this.clock();
    const artifacts = await this.entries(bucket, 'directory');
    return this.removeEach(artifacts, async (artifactDir) => {
      const { mtimeMs } = await fs.promises.lstat(artifactDir);
      if (now - mtimeMs < bucket.ttlSeconds * 1000) {
        return false;
      }
      await fs.promises.rm(artifactDir, { recursive: true, force: true });
      return true;
    });
  }

  private async removeDangling(bucket: Bucket): Promise<number> {
    const pointers = await this.entries(bucket, 'symlink');
    return this.removeEach(pointers, async (pointer) => {
      try {
        await fs.promises.stat(pointer);
        return false;
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }
      await fs.promises.unlink(pointer);
      return true;
    });
  }
}
