import * as core from '@actions/core';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
}

export const actionsLogger: Logger = {
  debug: (message: string) => core.debug(message),
  info: (message: string) => core.info(message),
  warning: (message: string) => core.warning(message),
};

/**
 * Logger for the command line. Everything goes to stderr so that the replayed
 * stdout of a cached command is never interleaved with diagnostics.
 */
export const consoleLogger = (verbose: boolean): Logger => ({
  debug: (message: string) => {
    if (verbose) {
      console.error(message);
    }
  },
  info: (message: string) => {
    if (verbose) {
      console.error(message);
    }
  },
  warning: (message: string) => console.error(`warning: ${message}`),
});
