import fs from 'fs';
import os from 'os';
import path from 'path';
import { performance } from 'perf_hooks';
import { CommandCache } from './cache';
import { Logger } from './logger';
import { DEFAULT_HASH_ALGORITHM } from './constants';
import { CacheSettings } from './settings';
import { Operation } from './types';

export interface BenchmarkResult {
  original: number;
  cold: number;
  warm: number;
}

const time = async (fn: () => Promise<unknown>): Promise<number> => {
  const start = performance.now();
  await fn();
  return (performance.now() - start) / 1000;
};

/**
 * Times an operation unwrapped, then against a cold and a warm cache. Runs
 * against a throwaway cache root so the real cache is left untouched.
 */
export async function benchmark(operation: Operation, args: string[], logger: Logger): Promise<BenchmarkResult> {
  const root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'cached-run-benchmark-'));
  const cache = new CommandCache({ settings: new CacheSettings(root, DEFAULT_HASH_ALGORITHM), logger });
  try {
    const cached = cache.wrap(operation, { ttl: '1h' });
    const original = await time(() => operation.invoke(args));
    const cold = await time(() => cached.invoke(args));
    const warm = await time(() => cached.invoke(args));
    return { original, cold, warm };
  } finally {
    await cache.drain();
    await fs.promises.rm(root, { recursive: true, force: true });
  }
}

export const formatBenchmark = ({ original, cold, warm }: BenchmarkResult): string =>
  [
    `Original:\t${original.toFixed(3)}`,
    `Cold Cache:\t${cold.toFixed(3)}`,
    `Warm Cache:\t${warm.toFixed(3)}`,
  ].join('\n');
