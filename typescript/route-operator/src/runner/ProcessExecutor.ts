import {
  ExecException,
  ExecOptionsWithStringEncoding,
  exec as nodeExec,
} from 'child_process';

import { CommandTimeoutError, ProcessExecutionError } from '../errors.js';

/**
 * Starts a named external process, waits for it to exit and resolves its
 * complete standard output. Rejects with a ProcessExecutionError when the
 * process cannot be started or exits unsuccessfully.
 */
export interface ProcessExecutor {
  execute(name: string, commandLine: string): Promise<string>;
}

export interface KillableProcess {
  kill(signal?: NodeJS.Signals): boolean;
}

export type ExecFn = (
  commandLine: string,
  options: ExecOptionsWithStringEncoding,
  callback: (
    error: ExecException | null,
    stdout: string,
    stderr: string,
  ) => void,
) => KillableProcess;

const defaultExec: ExecFn = (commandLine, options, callback) =>
  nodeExec(commandLine, options, callback);

// core read prints whole configs to stdout, well past exec's 1MB default
const DEFAULT_MAX_BUFFER = 1024 * 10000;

export interface ShellProcessExecutorOptions {
  // Exposed to the child as HYP_KEY, which the CLI reads for signing
  deployerKey?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  timeoutMs?: number;
  maxBuffer?: number;
  exec?: ExecFn;
}

export class ShellProcessExecutor implements ProcessExecutor {
  constructor(private readonly options: ShellProcessExecutorOptions = {}) {}

  execute(name: string, commandLine: string): Promise<string> {
    const { timeoutMs, exec = defaultExec } = this.options;

    return new Promise((resolve, reject) => {
      let timedOut = false;
      let child: KillableProcess | undefined;
      // Armed before the spawn so a synchronous exit still clears it
      const timeoutId = timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            child?.kill('SIGTERM');
          }, timeoutMs)
        : undefined;

      child = exec(
        commandLine,
        {
          encoding: 'utf8',
          cwd: this.options.cwd,
          env: this.buildEnv(),
          maxBuffer: this.options.maxBuffer ?? DEFAULT_MAX_BUFFER,
        },
        (error, stdout, stderr) => {
          if (timeoutId !== undefined) clearTimeout(timeoutId);

          if (timedOut && timeoutMs) {
            reject(
              new CommandTimeoutError(
                name,
                commandLine,
                timeoutMs,
                error ?? undefined,
              ),
            );
          } else if (error) {
            const exitCode =
              typeof error.code === 'number' ? error.code : undefined;
            reject(
              new ProcessExecutionError(
                name,
                commandLine,
                exitCode !== undefined
                  ? `exited with code ${exitCode}`
                  : error.message,
                exitCode,
                stderr,
                error,
              ),
            );
          } else {
            resolve(stdout);
          }
        },
      );
    });
  }

  private buildEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, ...this.options.env };
    if (this.options.deployerKey) {
      env.HYP_KEY = this.options.deployerKey;
    }
    return env;
  }
}
