import { Artifact, Staleness } from './types';

export const ageOf = (artifact: Pick<Artifact, 'createdAt'>, now: number): number =>
  Math.max(0, now - artifact.createdAt);

/**
 * Classifies a published artifact against the refresh and TTL windows (seconds).
 * refresh <= ttl is checked when an operation is wrapped, not here.
 */
export function classify(
  artifact: Pick<Artifact, 'createdAt'> | undefined,
  now: number,
  ttlSeconds: number,
  refreshSeconds: number,
): Staleness {
  if (!artifact) {
    return Staleness.MISS;
  }

  const age = ageOf(artifact, now);
  if (age >= ttlSeconds * 1000) {
    return Staleness.EXPIRED;
  }
  if (age >= refreshSeconds * 1000) {
    return Staleness.STALE;
  }
  return Staleness.FRESH;
}
