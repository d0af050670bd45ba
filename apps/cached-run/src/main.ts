import * as core from "@actions/core";
import { CommandCache } from "./cache";
import { actionsLogger } from "./logger";
import { shellOperation } from "./operation";
import { loadSettings } from "./settings";
import { CacheStatus } from "./types";
import { errorMessage } from "./util";

export const parseList = (input: string): string[] =>
  input
    .split(/[,\n]/)
    .map((item) => item.trim())
    .filter(Boolean);

export async function run() {
  try {
    const runCommand = core.getInput("run", { required: true });
    const shell = core.getInput("shell", { required: false }) || 'bash';
    const workingDirectory = core.getInput("working-directory", { required: false }) || '.';
    const ttl = core.getInput("ttl", { required: false }) || '1h';
    const refresh = core.getInput("refresh", { required: false }) || undefined;
    const envNames = parseList(core.getInput("env", { required: false }) || '');
    const locked = core.getInput("locked", { required: false }) === 'true';
    const cacheDir = core.getInput("cache-dir", { required: false });

    const settings = loadSettings({
      env: cacheDir ? { ...process.env, CACHED_RUN_DIR: cacheDir } : process.env,
      logger: actionsLogger,
    });
    const cache = new CommandCache({ settings, logger: actionsLogger });
    const cached = cache.wrap(shellOperation(runCommand, shell, workingDirectory), {
      ttl,
      refresh,
      env: envNames,
      locked,
    });

    core.info(`🚀 Executing command: ${runCommand}`);
    const result = await cached.invoke([]);
    const cacheHit = result.status === CacheStatus.HIT || result.status === CacheStatus.STALE;

    if (cacheHit) {
      core.info(`✅ Cache hit (${result.status}) in: ${settings.root}`);
    } else if (result.status === CacheStatus.BYPASS) {
      core.info("⚠️ Cache disabled, command ran uncached");
    } else {
      core.info(`⏰ Cache ${result.status}, results cached in: ${settings.root}`);
    }

    core.setOutput("cache-hit", cacheHit.toString());
    core.setOutput("stdout", result.stdout.toString());
    core.setOutput("stderr", result.stderr.toString());
    core.setOutput("exit-code", result.exitCode.toString());

    await cache.drain();
  } catch (error) {
    core.setFailed(`Action failed: ${errorMessage(error)}`);
  }
}

if (!process.env.JEST_WORKER_ID) {
  void run();
}
