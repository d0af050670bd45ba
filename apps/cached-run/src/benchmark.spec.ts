import fs from 'fs';
import os from 'os';
import { benchmark, formatBenchmark } from './benchmark';
import { Logger } from './logger';
import { FunctionOperation } from './operation';

describe('benchmark', () => {
  const logger: Logger = { debug: jest.fn(), info: jest.fn(), warning: jest.fn() };

  it('should time the operation unwrapped, then through a cold and a warm cache', async () => {
    let calls = 0;
    const operation = new FunctionOperation('count', () => {
      calls += 1;
      return { stdout: String(calls) };
    });

    const result = await benchmark(operation, [], logger);

    expect(calls).toBe(2);
    expect(result.original).toBeGreaterThanOrEqual(0);
    expect(result.cold).toBeGreaterThanOrEqual(0);
    expect(result.warm).toBeGreaterThanOrEqual(0);
  });

  it('should remove its throwaway cache', async () => {
    const before = (await fs.promises.readdir(os.tmpdir())).filter((name) => name.startsWith('cached-run-benchmark-'));

    await benchmark(new FunctionOperation('noop', () => ({})), [], logger);

    const after = (await fs.promises.readdir(os.tmpdir())).filter((name) => name.startsWith('cached-run-benchmark-'));
    expect(after).toEqual(before);
  });

  it('should format seconds with millisecond precision', () => {
    expect(formatBenchmark({ original: 1.5, cold: 1.6004, warm: 0.0123 })).toBe(
      'Original:\t1.500\nCold Cache:\t1.600\nWarm Cache:\t0.012',
    );
  });
});
