import crypto from 'crypto';
import { DEFAULT_HASH_ALGORITHM } from './constants';
import { Logger } from './logger';
import { EnvBinding } from './types';

// NUL terminates every field. No process argument or environment value can contain it.
const FIELD_END = '\0';

export function resolveEnv(names: string[], source: NodeJS.ProcessEnv = process.env): EnvBinding[] {
  return names.map((name) => [name, source[name] ?? '']);
}

/**
 * Picks the digest used for fingerprints. An algorithm this Node.js build does not
 * provide is reported and replaced by the default rather than failing the caller.
 */
export function resolveHashAlgorithm(requested: string | undefined, logger: Logger): string {
  if (!requested) {
    return DEFAULT_HASH_ALGORITHM;
  }
  const algorithm = requested.toLowerCase();
  if (crypto.getHashes().includes(algorithm)) {
    return algorithm;
  }
  logger.warning(`Hash algorithm '${requested}' is not available, falling back to ${DEFAULT_HASH_ALGORITHM}.`);
  return DEFAULT_HASH_ALGORITHM;
}

export function encodeKey(identity: string, args: string[], env: EnvBinding[]): string {
  const fields = [identity, String(args.length), ...args, ...env.map(([name, value]) => `${name}=${value}`)];
  for (const field of fields) {
    if (field.includes(FIELD_END)) {
      throw new Error(`Cache key fields cannot contain NUL bytes: ${JSON.stringify(field)}`);
    }
  }
  return fields.map((field) => field + FIELD_END).join('');
}

export function fingerprint(
  identity: string,
  args: string[],
  env: EnvBinding[],
  algorithm: string = DEFAULT_HASH_ALGORITHM,
): string {
  return crypto.createHash(algorithm).update(encodeKey(identity, args, env), 'utf8').digest('hex');
}
