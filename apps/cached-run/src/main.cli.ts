#!/usr/bin/env node
// cached-run run --ttl 1m --refresh 10s --env PWD -- git status --short
// cached-run sweep --force --verbose

import yargs, { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';

import * as packageJson from '../../../package.json';
import { benchmark, formatBenchmark } from './benchmark';
import { CachedOperation, CommandCache } from './cache';
import { DetachedJobs } from './detached';
import { consoleLogger, Logger } from './logger';
import { CommandOperation } from './operation';
import { loadSettings } from './settings';
import { CachedResult } from './types';
import { errorMessage } from './util';

interface GlobalArgs {
  config?: string;
  cacheDir?: string;
  verbose: boolean;
}

interface CacheArgs extends GlobalArgs {
  ttl: string;
  refresh?: string;
  env: string[];
  locked: boolean;
  name?: string;
}

const withCacheOptions = <T>(y: Argv<T>) =>
  y
    .option('ttl', { type: 'string', default: '1m', describe: 'How long a result may be served, e.g. 30s, 5m, 1h30m' })
    .option('refresh', { type: 'string', describe: 'Age after which a result is refreshed in the background (default: ttl)' })
    .option('env', { type: 'string', array: true, default: [] as string[], describe: 'Environment variable the result depends on' })
    .option('locked', { type: 'boolean', default: false, describe: 'Let only one process recompute a missing result' })
    .option('name', { type: 'string', describe: 'Cache identity of the command (default: the executable)' });

export const commandLine = (argv: { [key: string]: unknown }): string[] => {
  const rest = argv['--'];
  const command = Array.isArray(rest) ? rest.map(String) : [];
  if (command.length === 0) {
    throw new Error('Missing command. Usage: cached-run <command> [options] -- <executable> [args...]');
  }
  return command;
};

/** Flags that let a detached `warm` child rebuild the same cached operation. */
export const forwardedOptions = (argv: CacheArgs): string[] => [
  `--ttl=${argv.ttl}`,
  ...(argv.refresh ? [`--refresh=${argv.refresh}`] : []),
  ...argv.env.map((name) => `--env=${name}`),
  ...(argv.name ? [`--name=${argv.name}`] : []),
  ...(argv.cacheDir ? [`--cache-dir=${argv.cacheDir}`] : []),
  ...(argv.config ? [`--config=${argv.config}`] : []),
];

const createCache = (argv: GlobalArgs, logger: Logger, jobs?: DetachedJobs): CommandCache => {
  const env = argv.cacheDir ? { ...process.env, CACHED_RUN_DIR: argv.cacheDir } : process.env;
  const settings = loadSettings({ env, configFile: argv.config, logger });
  return new CommandCache({ settings, logger, jobs });
};

const prepare = (argv: CacheArgs & { [key: string]: unknown }, detach: boolean) => {
  const logger = consoleLogger(argv.verbose);
  const [executable, ...args] = commandLine(argv);
  const operation = new CommandOperation(executable, [], { name: argv.name });
  const jobs = detach ? new DetachedJobs(__filename, forwardedOptions(argv), [executable], logger) : undefined;
  const cache = createCache(argv, logger, jobs);
  const cached: CachedOperation = cache.wrap(operation, {
    ttl: argv.ttl,
    refresh: argv.refresh,
    env: argv.env,
    locked: argv.locked,
  });
  return { logger, cache, cached, args };
};

const replay = (result: CachedResult, logger: Logger) => {
  logger.debug(`cache status: ${result.status}`);
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  process.exitCode = result.exitCode;
};

const fail = (error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
};

export const cli = (argv: string[]) =>
  yargs(argv)
    .scriptName('cached-run')
    .usage('$0 <command> [options] -- <executable> [args...]')
    .version(packageJson.version)
    .parserConfiguration({ 'populate--': true })
    .option('config', { type: 'string', describe: 'Path to an ini file with a [cache] section' })
    .option('cache-dir', { type: 'string', describe: 'Cache root directory' })
    .option('verbose', { type: 'boolean', default: false, describe: 'Verbose logging' })
    .command(
      'run',
      'Run a command through the cache',
      (y) => withCacheOptions(y),
      async (argv) => {
        try {
          const { logger, cache, cached, args } = prepare(argv, true);
          replay(await cached.invoke(args), logger);
          await cache.drain();
        } catch (error) {
          fail(error);
        }
      },
    )
    .command(
      'warm',
      'Compute and publish a fresh result without printing it',
      (y) => withCacheOptions(y),
      async (argv) => {
        try {
          const { logger, cache, cached, args } = prepare(argv, false);
          const result = await cached.refreshNow(args);
          logger.debug(`warmed ${cached.name} (exit ${result.exitCode})`);
          await cache.drain();
        } catch (error) {
          fail(error);
        }
      },
    )
    .command(
      'invalidate',
      'Discard the cached result and recompute it',
      (y) => withCacheOptions(y),
      async (argv) => {
        try {
          const { logger, cache, cached, args } = prepare(argv, false);
          replay(await cached.forceInvalidate(args), logger);
          await cache.drain();
        } catch (error) {
          fail(error);
        }
      },
    )
    .command(
      'sweep',
      'Delete expired results',
      (y) => y.option('force', { type: 'boolean', default: false, describe: 'Ignore the minimum sweep interval' }),
      async (argv) => {
        try {
          const logger = consoleLogger(argv.verbose);
          const result = await createCache(argv, logger).sweep({ force: argv.force });
          logger.info(
            result
              ? `Removed ${result.removedArtifacts} artifact(s) and ${result.removedPointers} pointer(s).`
              : 'Sweep skipped.',
          );
        } catch (error) {
          fail(error);
        }
      },
    )
    .command(
      'benchmark',
      'Time a command unwrapped, with a cold cache and with a warm cache',
      (y) => y,
      async (argv) => {
        try {
          const logger = consoleLogger(argv.verbose);
          const [executable, ...args] = commandLine(argv);
          const result = await benchmark(new CommandOperation(executable), args, logger);
          console.info(formatBenchmark(result));
        } catch (error) {
          fail(error);
        }
      },
    )
    .demandCommand(1)
    .help();

if (!process.env.JEST_WORKER_ID) {
  cli(hideBin(process.argv)).parseAsync().catch(fail);
}
