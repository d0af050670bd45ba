import { spawn } from 'child_process';
import { InProcessJobs, Refreshable } from './jobs';
import { Logger } from './logger';
import { errorMessage } from './util';

/**
 * Background jobs for short-lived processes. Refreshes are handed to a detached
 * `cached-run warm` child so the caller can exit as soon as it has replied;
 * sweeps stay in process since they only touch the filesystem.
 *
 * `optionArgv` carries the flags that recreate the cached operation (ttl, env,
 * cache dir, ...), and `command` the wrapped executable with its base arguments.
 */
export class DetachedJobs extends InProcessJobs {
  constructor(
    private readonly cliPath: string,
    private readonly optionArgv: string[],
    private readonly command: string[],
    private readonly log: Logger,
    private readonly execPath: string = process.execPath,
  ) {
    super(log);
  }

  override refresh(_target: Refreshable, args: string[]): void {
    const argv = [this.cliPath, 'warm', ...this.optionArgv, '--', ...this.command, ...args];
    try {
      const child = spawn(this.execPath, argv, {
        detached: true,
        stdio: 'ignore',
      });
      child.on('error', (error) => this.log.debug(`Background refresh failed: ${error.message}`));
      child.unref();
    } catch (error) {
      this.log.debug(`Cannot start background refresh: ${errorMessage(error)}`);
    }
  }
}
