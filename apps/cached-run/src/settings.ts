import fs from 'fs';
import os from 'os';
import path from 'path';
import * as ini from 'ini';
import { resolveHashAlgorithm } from './fingerprint';
import { actionsLogger, Logger } from './logger';
import { errorMessage } from './util';

export interface SettingsSource {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
  logger?: Logger;
}

interface FileSettings {
  dir?: string;
  hash?: string;
  enabled?: boolean;
}

/**
 * Process-wide cache configuration. Everything except the enabled flag is fixed
 * once loaded; the flag is consulted on every cached call.
 */
export class CacheSettings {
  private enabled: boolean;

  constructor(
    readonly root: string,
    readonly hashAlgorithm: string,
    enabled = true,
  ) {
    this.enabled = enabled;
  }

  get locksDir(): string {
    return `${this.root}.locks`;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }
}

export const defaultCacheRoot = (env: NodeJS.ProcessEnv = process.env): string =>
  path.join(env.TMPDIR || os.tmpdir(), `cached-run-${os.userInfo().uid}`);

const parseBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return undefined;

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'on':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'off':
    case 'no':
      return false;
    default:
      return undefined;
  }
};

export const readSettingsFile = (configFile: string): FileSettings => {
  const configPath = path.resolve(configFile);
  if (!fs.existsSync(configPath)) {
    throw new Error(`The specified config file does not exist: ${configPath}`);
  }

  const parsed: unknown = ini.parse(fs.readFileSync(configPath, 'utf8'));
  const section: unknown = typeof parsed === 'object' && parsed !== null && 'cache' in parsed ? parsed.cache : undefined;
  if (typeof section !== 'object' || section === null) {
    return {};
  }

  const settings: FileSettings = {};
  if ('dir' in section && typeof section.dir === 'string') settings.dir = section.dir;
  if ('hash' in section && typeof section.hash === 'string') settings.hash = section.hash;
  if ('enabled' in section) settings.enabled = parseBoolean(section.enabled);
  return settings;
};

export function loadSettings(source: SettingsSource = {}): CacheSettings {
  const env = source.env ?? process.env;
  const logger = source.logger ?? actionsLogger;

  let fileSettings: FileSettings = {};
  const configFile = source.configFile || env.CACHED_RUN_CONFIG;
  if (configFile) {
    try {
      fileSettings = readSettingsFile(configFile);
    } catch (error) {
      logger.warning(`Ignoring cache config: ${errorMessage(error)}`);
    }
  }

  const root = env.CACHED_RUN_DIR || fileSettings.dir || defaultCacheRoot(env);
  const hashAlgorithm = resolveHashAlgorithm(env.CACHED_RUN_HASH || fileSettings.hash, logger);
  const enabled = parseBoolean(env.CACHED_RUN_ENABLED) ?? fileSettings.enabled ?? true;

  return new CacheSettings(path.resolve(root), hashAlgorithm, enabled);
}
