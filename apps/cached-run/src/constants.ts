export const DEFAULT_HASH_ALGORITHM = 'sha256';

// The sweep never runs more often than this, shortened to the smallest TTL bucket on disk.
export const DEFAULT_CLEANUP_INTERVAL_SECONDS = 60;

// A sweep lock left behind by a crashed process is reclaimed after this long.
export const STALE_SWEEP_LOCK_MS = 10 * 60 * 1000;

export const SWEEP_CONCURRENCY = 5;

export const CACHE_DIR_MODE = 0o700;

export const ARTIFACT_FILES = {
  STDOUT: 'out',
  STDERR: 'err',
  EXIT: 'exit',
} as const;

export const CLEANUP_MARKER = 'cleanup';
export const CLEANUP_LOCK = 'cleanup.lock';
export const DATA_DIR = 'data';

export const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
