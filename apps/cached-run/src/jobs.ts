import { actionsLogger, Logger } from './logger';
import { errorMessage } from './util';

export interface Refreshable {
  readonly name: string;
  refreshNow(args: string[]): Promise<unknown>;
}

export interface Sweepable {
  sweep(): Promise<unknown>;
}

/**
 * Work the cache starts but never waits for: stale refreshes, warm-ups and sweeps.
 * Callers cannot cancel a job once scheduled.
 */
export interface BackgroundJobs {
  refresh(target: Refreshable, args: string[]): void;
  sweep(janitor: Sweepable): void;
  drain(): Promise<void>;
}

/** Runs jobs as promises of the current process. */
export class InProcessJobs implements BackgroundJobs {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly logger: Logger = actionsLogger) {}

  get size(): number {
    return this.pending.size;
  }

  refresh(target: Refreshable, args: string[]): void {
    this.track(`refresh ${target.name}`, () => target.refreshNow(args));
  }

  sweep(janitor: Sweepable): void {
    this.track('sweep', () => janitor.sweep());
  }

  /** Resolves once every job scheduled so far, and any they scheduled, has finished. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  private track(label: string, job: () => Promise<unknown>): void {
    const promise: Promise<void> = Promise.resolve()
      .then(job)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.debug(`Background ${label} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.pending.delete(promise);
      });
    this.pending.add(promise);
  }
}
