import type { Logger } from 'pino';

import { errorMessage, rootLogger } from '@warpops/utils';

import { DuplicateCommandNameError, ProcessExecutionError } from '../errors.js';

import type { ProcessExecutor } from './ProcessExecutor.js';

export interface Command {
  name: string;
  command: string;
}

export type CommandOutputs = Readonly<Record<string, string>>;

/**
 * Runs batches of named commands one after another. A batch either
 * completes and yields the stdout of every command, or rejects on the
 * first failure without running the rest of the batch.
 */
export class CommandRunner {
  private readonly logger: Logger;

  constructor(
    private readonly executor: ProcessExecutor,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ module: 'command-runner' });
  }

  async runBatch(commands: readonly Command[]): Promise<CommandOutputs> {
    assertUniqueNames(commands);

    const outputs: Record<string, string> = {};
    for (const { name, command } of commands) {
      outputs[name] = await this.execute(name, command);
    }
    return Object.freeze(outputs);
  }

  private async execute(name: string, command: string): Promise<string> {
    const logger = this.logger.child({ command: name });
    logger.debug({ commandLine: command }, 'Starting command');

    const startTime = Date.now();
    try {
      const output = await this.executor.execute(name, command);
      logger.debug(
        { durationMs: Date.now() - startTime, outputLength: output.length },
        'Command completed',
      );
      return output;
    } catch (error) {
      logger.error(
        { durationMs: Date.now() - startTime, error: errorMessage(error) },
        'Command failed',
      );
      if (error instanceof ProcessExecutionError) throw error;
      throw new ProcessExecutionError(
        name,
        command,
        errorMessage(error),
        undefined,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }
}

function assertUniqueNames(commands: readonly Command[]) {
  const seen = new Set<string>();
  for (const { name } of commands) {
    if (seen.has(name)) throw new DuplicateCommandNameError(name);
    seen.add(name);
  }
}
