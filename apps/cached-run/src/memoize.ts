import { resolveEnv } from './fingerprint';
import { Capture, EnvBinding, Operation } from './types';

interface MemoizedEntry {
  args: string[];
  env: EnvBinding[];
  stdout: Buffer;
  exitCode: number;
}

export interface MemoizedResult extends Capture {
  memoized: boolean;
}

const sameValues = (a: string[], b: string[]): boolean =>
  a.length === b.length && a.every((value, index) => value === b[index]);

/**
 * Remembers the last successful stdout of an operation for one set of inputs.
 * Any call with different arguments or environment drops it, whether or not
 * that call succeeds. The entry lives
 * in this process only: child processes and other invocations never see it.
 *
 * A replayed result has empty stderr; stderr is only ever seen from the real
 * invocation that produced the entry.
 */
export class MemoizedOperation implements Operation {
  private entry: MemoizedEntry | undefined;

  constructor(
    readonly orig: Operation,
    readonly envNames: string[] = [],
    private readonly envSource: NodeJS.ProcessEnv = process.env,
  ) {}

  get name(): string {
    return this.orig.name;
  }

  private static matches(entry: MemoizedEntry, args: string[], env: EnvBinding[]): boolean {
    return (
      entry.exitCode === 0 &&
      sameValues(entry.args, args) &&
      sameValues(
        entry.env.map(([, value]) => value),
        env.map(([, value]) => value),
      )
    );
  }

  async invoke(args: string[]): Promise<MemoizedResult> {
    const env = resolveEnv(this.envNames, this.envSource);
    const entry = this.entry;
    if (entry && MemoizedOperation.matches(entry, args, env)) {
      return { stdout: Buffer.from(entry.stdout), stderr: Buffer.alloc(0), exitCode: entry.exitCode, memoized: true };
    }

    this.entry = undefined;
    const result = await this.orig.invoke(args);
    if (result.exitCode === 0) {
      this.entry = { args: [...args], env, stdout: Buffer.from(result.stdout), exitCode: result.exitCode };
    }
    return { ...result, memoized: false };
  }

  clear(): void {
    this.entry = undefined;
  }
}

export const memoize = (operation: Operation, envNames: string[] = []): MemoizedOperation =>
  new MemoizedOperation(operation, envNames);
