import * as exec from '@actions/exec';
import { Capture, Operation } from './types';

export interface CommandOptions {
  name?: string;
  cwd?: string;
  env?: Record<string, string>;
}

// exec.exec splits its command line on spaces; quote the executable so a path with
// spaces or quotes stays one word. Backslashes only need escaping inside quotes.
export const quoteCommand = (command: string): string =>
  /[\s"]/.test(command) ? `"${command.replace(/["\\]/g, (c) => `\\${c}`)}"` : command;

/**
 * Runs an executable, capturing stdout and stderr as raw bytes. Non-zero exits are
 * a normal outcome and are returned, not thrown.
 */
export class CommandOperation implements Operation {
  readonly name: string;

  constructor(
    readonly command: string,
    readonly baseArgs: string[] = [],
    private readonly options: CommandOptions = {},
  ) {
    this.name = options.name || [command, ...baseArgs].join(' ');
  }

  async invoke(args: string[]): Promise<Capture> {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const execOptions: exec.ExecOptions = {
      cwd: this.options.cwd,
      env: this.options.env,
      silent: true,
      ignoreReturnCode: true,
      listeners: {
        stdout: (data: Buffer) => {
          stdout.push(data);
        },
        stderr: (data: Buffer) => {
          stderr.push(data);
        },
      },
    };

    const exitCode = await exec.exec(quoteCommand(this.command), [...this.baseArgs, ...args], execOptions);

    return {
      stdout: Buffer.concat(stdout),
      stderr: Buffer.concat(stderr),
      exitCode,
    };
  }
}

export interface FunctionOutput {
  stdout?: string | Buffer;
  stderr?: string | Buffer;
  exitCode?: number;
}

export type OperationFn = (args: string[]) => FunctionOutput | Promise<FunctionOutput>;

const toBuffer = (value: string | Buffer | undefined): Buffer =>
  value === undefined ? Buffer.alloc(0) : Buffer.isBuffer(value) ? value : Buffer.from(value, 'utf8');

/** Adapts an in-process function to the operation contract. */
export class FunctionOperation implements Operation {
  constructor(
    readonly name: string,
    private readonly fn: OperationFn,
  ) {}

  async invoke(args: string[]): Promise<Capture> {
    const output = await this.fn(args);
    return {
      stdout: toBuffer(output.stdout),
      stderr: toBuffer(output.stderr),
      exitCode: output.exitCode ?? 0,
    };
  }
}

/** Maps a shell name to the interpreter invocation used to run an inline script. */
export function shellOperation(script: string, shell = 'bash', cwd?: string): CommandOperation {
  let shellCommand: string[];
  switch (shell.toLowerCase()) {
    case 'bash':
      shellCommand = ['bash', '-c'];
      break;
    case 'sh':
      shellCommand = ['sh', '-c'];
      break;
    case 'pwsh':
    case 'powershell':
      shellCommand = ['pwsh', '-Command'];
      break;
    case 'python':
      shellCommand = ['python', '-c'];
      break;
    case 'node':
      shellCommand = ['node', '-e'];
      break;
    default:
      shellCommand = [shell, '-c'];
  }

  return new CommandOperation(shellCommand[0], [...shellCommand.slice(1), script], {
    name: cwd ? `${shellCommand[0]}@${cwd}:${script}` : `${shellCommand[0]}:${script}`,
    cwd,
  });
}
