import fs from 'fs';
import os from 'os';
import path from 'path';
import vm from 'vm';
import { errorMessage, hasErrorCode } from './util';

describe('util', () => {
  describe('hasErrorCode', () => {
    it('should match errno errors from fs', async () => {
      const missing = path.join(os.tmpdir(), 'util-spec-missing', 'file');
      const error = await fs.promises.unlink(missing).catch((reason: unknown) => reason);

      expect(hasErrorCode(error, 'ENOENT')).toBe(true);
      expect(hasErrorCode(error, 'EEXIST')).toBe(false);
    });

    it('should match errors created in another realm', () => {
      const foreign: unknown = vm.runInNewContext('Object.assign(new Error("gone"), { code: "ENOENT" })');

      expect(foreign instanceof Error).toBe(false);
      expect(hasErrorCode(foreign, 'EEXIST', 'ENOENT')).toBe(true);
    });

    it('should reject values without a string code', () => {
      expect(hasErrorCode(undefined, 'ENOENT')).toBe(false);
      expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
      expect(hasErrorCode({ code: 2 }, 'ENOENT')).toBe(false);
    });
  });

  describe('errorMessage', () => {
    it('should read the message of errors from another realm', () => {
      expect(errorMessage(vm.runInNewContext('new Error("boom")'))).toBe('boom');
    });

    it('should stringify anything else', () => {
      expect(errorMessage(42)).toBe('42');
    });
  });
});
