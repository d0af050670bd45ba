import fs from 'fs';
import os from 'os';
import path from 'path';
import * as lockfile from 'proper-lockfile';
import { Logger } from './logger';
import { lockFileName, OperationLock, RecomputeMutex } from './mutex';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mutex', () => {
  let tmp: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(async () => {
    tmp = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mutex-spec-'));
    logger = { debug: jest.fn(), info: jest.fn(), warning: jest.fn() };
  });

  afterEach(async () => {
    await fs.promises.rm(tmp, { recursive: true, force: true });
  });

  describe('lockFileName', () => {
    it('should keep a readable prefix of the operation name', () => {
      expect(lockFileName('git status')).toMatch(/^git_status-[0-9a-f]{12}\.lock$/);
    });

    it('should bound the length of long names', () => {
      const name = lockFileName(`bash:${'echo hello; '.repeat(50)}`);
      expect(name.length).toBe(40 + 1 + 12 + '.lock'.length);
    });

    it('should tell apart names with the same readable form', () => {
      expect(lockFileName('a b')).not.toBe(lockFileName('a/b'));
    });
  });

  describe('OperationLock', () => {
    let lockPath: string;

    beforeEach(async () => {
      lockPath = path.join(tmp, 'op.lock');
      await fs.promises.writeFile(lockPath, '');
    });

    it('should return what the callback returns and release the lock', async () => {
      const lock = new OperationLock(lockPath, logger);

      await expect(lock.run(async () => 42)).resolves.toBe(42);
      expect(await lockfile.check(lockPath, { realpath: false })).toBe(false);
    });

    it('should release the lock when the callback throws', async () => {
      const lock = new OperationLock(lockPath, logger);

      await expect(
        lock.run(async () => {
          throw new Error('failed');
        }),
      ).rejects.toThrow('failed');
      expect(await lockfile.check(lockPath, { realpath: false })).toBe(false);
    });

    it('should let one holder in at a time', async () => {
      const first = new OperationLock(lockPath, logger);
      const second = new OperationLock(lockPath, logger);
      let holders = 0;
      let maxHolders = 0;

      const hold = async () => {
        holders += 1;
        maxHolders = Math.max(maxHolders, holders);
        await delay(50);
        holders -= 1;
      };

      await Promise.all([first.run(hold), second.run(hold), first.run(hold)]);
      expect(maxHolders).toBe(1);
    });
  });

  describe('RecomputeMutex', () => {
    it('should create the lock file for an operation', async () => {
      const locksDir = path.join(tmp, 'cache.locks');
      const lock = await new RecomputeMutex(locksDir, logger).forOperation('git status');

      expect(lock?.path).toBe(path.join(locksDir, lockFileName('git status')));
      expect(fs.existsSync(path.join(locksDir, lockFileName('git status')))).toBe(true);
    });

    it('should warn and go without a lock when the directory cannot be created', async () => {
      const blocker = path.join(tmp, 'file');
      await fs.promises.writeFile(blocker, '');

      const lock = await new RecomputeMutex(path.join(blocker, 'locks'), logger).forOperation('git status');

      expect(lock).toBeUndefined();
      expect(logger.warning).toHaveBeenCalledWith(
        expect.stringMatching(/^git status: locking unavailable \(.+\), caching will not use mutual-exclusion\.$/),
      );
    });
  });
});
