import crypto from 'crypto';
import fs from 'fs';
import { FileHandle } from 'fs/promises';
import path from 'path';
import { ARTIFACT_FILES, CACHE_DIR_MODE, DATA_DIR } from './constants';
import { CacheRootException } from './exceptions/cache-root.exception';
import { Artifact, Capture, Operation } from './types';
import { errorMessage, hasErrorCode } from './util';

export const ensureDir = async (dir: string): Promise<void> => {
  if (fs.existsSync(dir)) {
    return;
  }
  await fs.promises.mkdir(dir, { recursive: true, mode: CACHE_DIR_MODE });
  // mkdir's mode is subject to the umask; the cache must only be readable by its owner.
  await fs.promises.chmod(dir, CACHE_DIR_MODE);
};

export interface WriteResult extends Capture {
  /** Absent when the result could not be published. */
  artifact?: Artifact;
}

const parseExitCode = (raw: Buffer): number | undefined => {
  const text = raw.toString('utf8');
  return /^\d+$/.test(text) ? parseInt(text, 10) : undefined;
};

/**
 * Disk layout:
 *
 * <root>/
 * ├── cleanup              # marker, mtime = last sweep
 * └── data/
 *     └── <ttlSeconds>/    # one bucket per TTL
 *         ├── AbC123/      # artifact: out, err, exit
 *         └── <fingerprint> -> AbC123
 */
export class ArtifactStore {
  constructor(readonly root: string) {}

  get dataDir(): string {
    return path.join(this.root, DATA_DIR);
  }

  bucketDir(ttlSeconds: number): string {
    return path.join(this.dataDir, String(ttlSeconds));
  }

  pointerPath(fingerprint: string, ttlSeconds: number): string {
    return path.join(this.bucketDir(ttlSeconds), fingerprint);
  }

  async ensureRoot(): Promise<void> {
    try {
      await ensureDir(this.root);
    } catch (error) {
      throw new CacheRootException(this.root, errorMessage(error));
    }
  }

  /**
   * Invokes the operation, then writes its capture into a fresh directory and
   * publishes it. Directories replaced by a newer publish are left in place for
   * the janitor, since a reader may still be reading them. When a concurrent sweep
   * removes the directory before it is published, the capture is returned without
   * an artifact.
   */
  async write(operation: Operation, args: string[], fingerprint: string, ttlSeconds: number): Promise<WriteResult> {
    const capture = await operation.invoke(args);

    await this.ensureRoot();
    const bucket = this.bucketDir(ttlSeconds);
    let artifactDir: string | undefined;
    try {
      await ensureDir(bucket);
      artifactDir = await fs.promises.mkdtemp(path.join(bucket, 'a'));
      await Promise.all([
        fs.promises.writeFile(path.join(artifactDir, ARTIFACT_FILES.STDOUT), capture.stdout),
        fs.promises.writeFile(path.join(artifactDir, ARTIFACT_FILES.STDERR), capture.stderr),
      ]);
      // exit is written last: its presence marks a complete artifact.
      await fs.promises.writeFile(path.join(artifactDir, ARTIFACT_FILES.EXIT), String(capture.exitCode));
      await this.publish(artifactDir, this.pointerPath(fingerprint, ttlSeconds));
      const { mtimeMs } = await fs.promises.stat(artifactDir);

      return { ...capture, artifact: { ...capture, fingerprint, path: artifactDir, createdAt: mtimeMs } };
    } catch (error) {
      if (artifactDir) {
        await fs.promises.rm(artifactDir, { recursive: true, force: true });
      }
      if (hasErrorCode(error, 'ENOENT')) {
        return capture;
      }
      throw error;
    }
  }

  private async publish(artifactDir: string, pointer: string): Promise<void> {
    const staging = path.join(
      path.dirname(pointer),
      `.${path.basename(pointer)}.${crypto.randomBytes(6).toString('hex')}`,
    );
    await fs.promises.symlink(path.basename(artifactDir), staging);
    try {
      await fs.promises.rename(staging, pointer);
    } catch (error) {
      await fs.promises.rm(staging, { force: true });
      throw error;
    }
  }

  /**
   * Resolves the published pointer once and opens every file before reading any
   * of them, so a concurrent sweep unlinking the directory cannot cut a read short.
   * Anything missing or malformed is a miss.
   */
  async read(fingerprint: string, ttlSeconds: number): Promise<Artifact | undefined> {
    let artifactDir: string;
    try {
      artifactDir = await fs.promises.realpath(this.pointerPath(fingerprint, ttlSeconds));
    } catch {
      return undefined;
    }

    const handles: FileHandle[] = [];
    try {
      for (const file of [ARTIFACT_FILES.STDOUT, ARTIFACT_FILES.STDERR, ARTIFACT_FILES.EXIT]) {
        handles.push(await fs.promises.open(path.join(artifactDir, file), 'r'));
      }
      const [stdoutHandle, stderrHandle, exitHandle] = handles;
      const { mtimeMs } = await fs.promises.stat(artifactDir);
      const [stdout, stderr, exitRaw] = await Promise.all([
        stdoutHandle.readFile(),
        stderrHandle.readFile(),
        exitHandle.readFile(),
      ]);

      const exitCode = parseExitCode(exitRaw);
      if (exitCode === undefined) {
        return undefined;
      }
      return { fingerprint, path: artifactDir, stdout, stderr, exitCode, createdAt: mtimeMs };
    } catch {
      return undefined;
    } finally {
      await Promise.all(handles.map((handle) => handle.close()));
    }
  }

  /** Unpublishes the fingerprint. The artifact directory itself is reclaimed by the janitor. */
  async invalidate(fingerprint: string, ttlSeconds: number): Promise<boolean> {
    try {
      await fs.promises.unlink(this.pointerPath(fingerprint, ttlSeconds));
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }
}
