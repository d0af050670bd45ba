import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger } from './logger';
import { CacheSettings, defaultCacheRoot, loadSettings, readSettingsFile } from './settings';

describe('settings', () => {
  let tmp: string;
  let logger: jest.Mocked<Logger>;

  const writeConfig = async (content: string) => {
    const file = path.join(tmp, 'cached-run.ini');
    await fs.promises.writeFile(file, content);
    return file;
  };

  beforeEach(async () => {
    tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'settings-spec-'));
    logger = { debug: jest.fn(), info: jest.fn(), warning: jest.fn() };
  });

  afterEach(async () => {
    await fs.promises.rm(tmp, { recursive: true, force: true });
  });

  describe('CacheSettings', () => {
    it('should keep locks beside the cache root', () => {
      expect(new CacheSettings('/var/cache/run', 'sha256').locksDir).toBe('/var/cache/run.locks');
    });

    it('should toggle the enabled flag', () => {
      const settings = new CacheSettings('/c', 'sha256');
      settings.setEnabled(false);
      expect(settings.isEnabled()).toBe(false);
    });
  });

  describe('defaultCacheRoot', () => {
    it('should live under TMPDIR and be per user', () => {
      expect(defaultCacheRoot({ TMPDIR: '/scratch' })).toBe(path.join('/scratch', `cached-run-${os.userInfo().uid}`));
    });
  });

  describe('readSettingsFile', () => {
    it('should read the cache section', async () => {
      const file = await writeConfig('[cache]\ndir = /srv/cache\nhash = sha1\nenabled = off\n');
      expect(readSettingsFile(file)).toEqual({ dir: '/srv/cache', hash: 'sha1', enabled: false });
    });

    it('should ignore other sections', async () => {
      const file = await writeConfig('[other]\ndir = /elsewhere\n');
      expect(readSettingsFile(file)).toEqual({});
    });

    it('should fail for a missing file', () => {
      const file = path.join(tmp, 'missing.ini');
      expect(() => readSettingsFile(file)).toThrow(`The specified config file does not exist: ${file}`);
    });
  });

  describe('loadSettings', () => {
    it('should default to an enabled sha256 cache in the temp directory', () => {
      const settings = loadSettings({ env: { TMPDIR: tmp }, logger });

      expect(settings.root).toBe(path.join(tmp, `cached-run-${os.userInfo().uid}`));
      expect(settings.hashAlgorithm).toBe('sha256');
      expect(settings.isEnabled()).toBe(true);
    });

    it('should take values from the config file', async () => {
      const file = await writeConfig('[cache]\ndir = /srv/cache\nhash = sha1\nenabled = false\n');

      const settings = loadSettings({ env: {}, configFile: file, logger });

      expect(settings.root).toBe('/srv/cache');
      expect(settings.hashAlgorithm).toBe('sha1');
      expect(settings.isEnabled()).toBe(false);
    });

    it('should find the config file through the environment', async () => {
      const file = await writeConfig('[cache]\ndir = /srv/cache\n');
      expect(loadSettings({ env: { CACHED_RUN_CONFIG: file }, logger }).root).toBe('/srv/cache');
    });

    it('should let the environment override the config file', async () => {
      const file = await writeConfig('[cache]\ndir = /srv/cache\nenabled = false\n');

      const settings = loadSettings({
        env: { CACHED_RUN_DIR: '/env/cache', CACHED_RUN_ENABLED: 'yes', CACHED_RUN_HASH: 'SHA1' },
        configFile: file,
        logger,
      });

      expect(settings.root).toBe('/env/cache');
      expect(settings.hashAlgorithm).toBe('sha1');
      expect(settings.isEnabled()).toBe(true);
    });

    it('should resolve a relative root', () => {
      expect(loadSettings({ env: { CACHED_RUN_DIR: 'rel/cache' }, logger }).root).toBe(path.resolve('rel/cache'));
    });

    it('should warn about an unreadable config file and use defaults', () => {
      const file = path.join(tmp, 'missing.ini');

      const settings = loadSettings({ env: { TMPDIR: tmp }, configFile: file, logger });

      expect(settings.root).toBe(path.join(tmp, `cached-run-${os.userInfo().uid}`));
      expect(logger.warning).toHaveBeenCalledWith(
        `Ignoring cache config: The specified config file does not exist: ${file}`,
      );
    });

    it('should fall back to sha256 for an unknown hash', () => {
      const settings = loadSettings({ env: { CACHED_RUN_HASH: 'crc-nope' }, logger });

      expect(settings.hashAlgorithm).toBe('sha256');
      expect(logger.warning).toHaveBeenCalledWith("Hash algorithm 'crc-nope' is not available, falling back to sha256.");
    });
  });
});
