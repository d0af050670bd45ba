import { ENV_NAME_PATTERN } from './constants';
import { ConfigurationException } from './exceptions/configuration.exception';
import { LockUnavailableException } from './exceptions/lock-unavailable.exception';
import { toSeconds } from './duration';
import { fingerprint, resolveEnv } from './fingerprint';
import { BackgroundJobs, InProcessJobs, Refreshable } from './jobs';
import { Janitor, SweepOptions } from './janitor';
import { actionsLogger, Logger } from './logger';
import { MemoizedOperation } from './memoize';
import { OperationLock, RecomputeMutex } from './mutex';
import { CacheSettings, loadSettings } from './settings';
import { classify } from './staleness';
import { ArtifactStore } from './store';
import { CachedResult, CacheStatus, Capture, Operation, Staleness, SweepResult, WrapOptions } from './types';
import { errorMessage } from './util';

export interface CommandCacheOptions {
  settings?: CacheSettings;
  logger?: Logger;
  jobs?: BackgroundJobs;
  clock?: () => number;
  envSource?: NodeJS.ProcessEnv;
}

export interface CachePolicy {
  ttlSeconds: number;
  refreshSeconds: number;
  env: string[];
  locked: boolean;
}

const toResult = ({ stdout, stderr, exitCode }: Capture, status: CacheStatus): CachedResult => ({
  stdout,
  stderr,
  exitCode,
  status,
});

export const validateEnvNames = (names: string[]): void => {
  for (const name of names) {
    if (!ENV_NAME_PATTERN.test(name)) {
      throw new ConfigurationException(`Invalid environment variable name: '${name}'`);
    }
  }
};

export function parsePolicy(options: WrapOptions): CachePolicy {
  const ttlSeconds = toSeconds(options.ttl);
  const refreshSeconds = options.refresh === undefined ? ttlSeconds : toSeconds(options.refresh);

  if (ttlSeconds <= 0) {
    throw new ConfigurationException(`TTL must be greater than zero, got '${options.ttl}'`);
  }
  if (refreshSeconds > ttlSeconds) {
    throw new ConfigurationException(
      `Refresh (${options.refresh}) cannot be longer than TTL (${options.ttl})`,
    );
  }

  const env = options.env ?? [];
  validateEnvNames(env);

  return { ttlSeconds, refreshSeconds, env: [...env], locked: options.locked ?? false };
}

/**
 * Disk-backed cache of operation results. One instance per process is the normal
 * setup; several instances sharing a cache root behave like separate processes.
 */
export class CommandCache {
  readonly settings: CacheSettings;
  readonly store: ArtifactStore;
  readonly janitor: Janitor;
  readonly mutex: RecomputeMutex;
  readonly jobs: BackgroundJobs;
  readonly logger: Logger;
  readonly clock: () => number;
  readonly envSource: NodeJS.ProcessEnv;
  private rootUnavailable = false;

  constructor(options: CommandCacheOptions = {}) {
    this.logger = options.logger ?? actionsLogger;
    this.settings = options.settings ?? loadSettings({ logger: this.logger });
    this.clock = options.clock ?? Date.now;
    this.envSource = options.envSource ?? process.env;
    this.jobs = options.jobs ?? new InProcessJobs(this.logger);
    this.store = new ArtifactStore(this.settings.root);
    this.janitor = new Janitor(this.store, { logger: this.logger, clock: this.clock });
    this.mutex = new RecomputeMutex(this.settings.locksDir, this.logger);
  }

  /** Throws ConfigurationException, without wrapping anything, when the options are invalid. */
  wrap(operation: Operation, options: WrapOptions): CachedOperation {
    if (!operation.name) {
      throw new ConfigurationException('Cached operations need a name');
    }
    return new CachedOperation(this, operation, parsePolicy(options));
  }

  memoize(operation: Operation, envNames: string[] = []): MemoizedOperation {
    validateEnvNames(envNames);
    return new MemoizedOperation(operation, envNames, this.envSource);
  }

  isEnabled(): boolean {
    return this.settings.isEnabled();
  }

  setEnabled(enabled: boolean): void {
    this.settings.setEnabled(enabled);
  }

  sweep(options: SweepOptions = {}): Promise<SweepResult | undefined> {
    return this.janitor.sweep(options);
  }

  drain(): Promise<void> {
    return this.jobs.drain();
  }

  /** False when the cache root cannot be created; the first failure is reported. */
  async ensureRoot(): Promise<boolean> {
    try {
      await this.store.ensureRoot();
      this.rootUnavailable = false;
      return true;
    } catch (error) {
      if (!this.rootUnavailable) {
        this.logger.warning(`${errorMessage(error)}; running without cache.`);
      }
      this.rootUnavailable = true;
      return false;
    }
  }
}

/** An operation whose results are served from, and published to, the cache. */
export class CachedOperation implements Operation, Refreshable {
  private readonly lock: Promise<OperationLock | undefined>;

  constructor(
    private readonly cache: CommandCache,
    readonly orig: Operation,
    readonly policy: CachePolicy,
  ) {
    this.lock = policy.locked ? cache.mutex.forOperation(orig.name) : Promise.resolve(undefined);
  }

  get name(): string {
    return this.orig.name;
  }

  fingerprint(args: string[]): string {
    const env = resolveEnv(this.policy.env, this.cache.envSource);
    return fingerprint(this.orig.name, args, env, this.cache.settings.hashAlgorithm);
  }

  async invoke(args: string[]): Promise<CachedResult> {
    if (!this.cache.isEnabled() || !(await this.cache.ensureRoot())) {
      return this.bypass(args);
    }
    this.cache.jobs.sweep(this.cache.janitor);

    const key = this.fingerprint(args);
    const artifact = await this.cache.store.read(key, this.policy.ttlSeconds);
    const state = classify(artifact, this.cache.clock(), this.policy.ttlSeconds, this.policy.refreshSeconds);
    if (artifact && state === Staleness.FRESH) {
      return toResult(artifact, CacheStatus.HIT);
    }
    if (artifact && state === Staleness.STALE) {
      this.cache.jobs.refresh(this, args);
      return toResult(artifact, CacheStatus.STALE);
    }
    return this.recompute(args, key, state === Staleness.EXPIRED ? CacheStatus.EXPIRED : CacheStatus.MISS);
  }

  /** Populates the cache in the background; returns without waiting. */
  warm(args: string[]): void {
    if (this.cache.isEnabled()) {
      this.cache.jobs.refresh(this, args);
    }
  }

  /** Writes and publishes a new artifact for `args`, without consulting the cache. */
  async refreshNow(args: string[]): Promise<CachedResult> {
    if (!(await this.cache.ensureRoot())) {
      return this.bypass(args);
    }
    const written = await this.cache.store.write(this.orig, args, this.fingerprint(args), this.policy.ttlSeconds);
    return toResult(written, CacheStatus.MISS);
  }

  /** Drops the published result and recomputes it in the foreground. */
  async forceInvalidate(args: string[]): Promise<CachedResult> {
    if (!this.cache.isEnabled() || !(await this.cache.ensureRoot())) {
      return this.bypass(args);
    }
    const key = this.fingerprint(args);
    await this.cache.store.invalidate(key, this.policy.ttlSeconds);
    return this.recompute(args, key, CacheStatus.MISS);
  }

  private async bypass(args: string[]): Promise<CachedResult> {
    return toResult(await this.orig.invoke(args), CacheStatus.BYPASS);
  }

  private async write(args: string[], key: string, status: CacheStatus): Promise<CachedResult> {
    const written = await this.cache.store.write(this.orig, args, key, this.policy.ttlSeconds);
    return toResult(written, status);
  }

  /**
   * Foreground recomputation. Under the operation lock, a result published by
   * another caller while this one waited is served instead of recomputing, and
   * refreshed in the background when it is already past its refresh age.
   */
  private async recompute(args: string[], key: string, status: CacheStatus): Promise<CachedResult> {
    const lock = await this.lock;
    if (!lock) {
      return this.write(args, key, status);
    }

    try {
      return await lock.run(async () => {
        const published = await this.cache.store.read(key, this.policy.ttlSeconds);
        const state = classify(published, this.cache.clock(), this.policy.ttlSeconds, this.policy.refreshSeconds);
        if (published && state === Staleness.FRESH) {
          return toResult(published, CacheStatus.HIT);
        }
        if (published && state === Staleness.STALE) {
          this.cache.jobs.refresh(this, args);
          return toResult(published, CacheStatus.STALE);
        }
        return this.write(args, key, status);
      });
    } catch (error) {
      if (!(error instanceof LockUnavailableException)) {
        throw error;
      }
      this.cache.logger.warning(`${error.message}; caching ${this.name} without mutual-exclusion.`);
      return this.write(args, key, status);
    }
  }
}
