export interface Capture {
  stdout: Buffer;
  stderr: Buffer;
  exitCode: number;
}

export interface Artifact extends Capture {
  fingerprint: string;
  path: string;
  createdAt: number; // epoch millis, taken from the artifact directory mtime
}

/** Something that can be invoked with positional arguments and produces a capture. */
export interface Operation {
  readonly name: string;
  invoke(args: string[]): Promise<Capture>;
}

export type EnvBinding = [name: string, value: string];

export enum Staleness {
  FRESH = 'fresh',
  STALE = 'stale',
  EXPIRED = 'expired',
  MISS = 'miss',
}

export enum CacheStatus {
  HIT = 'hit',
  STALE = 'stale',
  EXPIRED = 'expired',
  MISS = 'miss',
  BYPASS = 'bypass',
}

export interface CachedResult extends Capture {
  status: CacheStatus;
}

export interface WrapOptions {
  ttl: string;
  refresh?: string;
  env?: string[];
  locked?: boolean;
}

export interface SweepResult {
  removedArtifacts: number;
  removedPointers: number;
}
