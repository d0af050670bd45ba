import { InProcessJobs, Refreshable } from './jobs';
import { Logger } from './logger';

describe('InProcessJobs', () => {
  let logger: jest.Mocked<Logger>;
  let jobs: InProcessJobs;

  beforeEach(() => {
    logger = { debug: jest.fn(), info: jest.fn(), warning: jest.fn() };
    jobs = new InProcessJobs(logger);
  });

  const target = (refreshNow: Refreshable['refreshNow']): Refreshable => ({ name: 'target', refreshNow });

  it('should start jobs without waiting for them', async () => {
    const refreshNow = jest.fn().mockResolvedValue(undefined);

    jobs.refresh(target(refreshNow), ['a']);

    expect(refreshNow).not.toHaveBeenCalled();
    expect(jobs.size).toBe(1);
    await jobs.drain();
    expect(refreshNow).toHaveBeenCalledWith(['a']);
    expect(jobs.size).toBe(0);
  });

  it('should log failed jobs instead of rejecting', async () => {
    jobs.refresh(target(() => Promise.reject(new Error('disk full'))), []);
    jobs.sweep({ sweep: () => Promise.reject(new Error('gone')) });

    await expect(jobs.drain()).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith('Background refresh target failed: disk full');
    expect(logger.debug).toHaveBeenCalledWith('Background sweep failed: gone');
  });

  it('should wait for jobs scheduled by other jobs', async () => {
    const order: string[] = [];
    jobs.sweep({
      sweep: async () => {
        order.push('outer');
        jobs.sweep({
          sweep: async () => {
            order.push('inner');
          },
        });
      },
    });

    await jobs.drain();

    expect(order).toEqual(['outer', 'inner']);
    expect(jobs.size).toBe(0);
  });

  it('should catch jobs that throw synchronously', async () => {
    jobs.sweep({
      sweep: () => {
        throw new Error('sync');
      },
    });

    await jobs.drain();
    expect(logger.debug).toHaveBeenCalledWith('Background sweep failed: sync');
  });
});
