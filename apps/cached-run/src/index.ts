export type { Artifact, Capture, CachedResult, EnvBinding, Operation, SweepResult, WrapOptions } from './types';
export { CacheStatus, Staleness } from './types';
export { CommandCache, CachedOperation, parsePolicy, validateEnvNames } from './cache';
export type { CachePolicy, CommandCacheOptions } from './cache';
export { CommandOperation, FunctionOperation, shellOperation } from './operation';
export type { CommandOptions, FunctionOutput, OperationFn } from './operation';
export { MemoizedOperation, memoize } from './memoize';
export type { MemoizedResult } from './memoize';
export { ArtifactStore } from './store';
export type { WriteResult } from './store';
export { Janitor } from './janitor';
export { RecomputeMutex, OperationLock } from './mutex';
export { InProcessJobs } from './jobs';
export type { BackgroundJobs } from './jobs';
export { CacheSettings, loadSettings } from './settings';
export { fingerprint, resolveEnv } from './fingerprint';
export { toSeconds } from './duration';
export { classify } from './staleness';
export { benchmark } from './benchmark';
export { actionsLogger, consoleLogger } from './logger';
export type { Logger } from './logger';
export { ConfigurationException } from './exceptions/configuration.exception';
export { InvalidDurationException } from './exceptions/invalid-duration.exception';
export { LockUnavailableException } from './exceptions/lock-unavailable.exception';
export { CacheRootException } from './exceptions/cache-root.exception';
